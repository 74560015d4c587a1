import { describe, it, expect } from 'vitest';
import {
  buildAgentPrompt,
  buildAgentSystemPrompt,
  parseReasoningAction,
  renderStep,
} from '../../../src/executor/prompt-builder.js';
import { AgentSteps } from '../../../src/executor/steps.js';
import { ModelInvocationError } from '../../../src/core/errors.js';

describe('buildAgentSystemPrompt', () => {
  it('lists tools with their parameters', () => {
    const prompt = buildAgentSystemPrompt([
      {
        name: 'read_file',
        description: 'Read a file.',
        parameters: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'File path' },
            limit: { type: 'number', description: 'Max lines' },
          },
          required: ['path'],
        },
      },
    ]);

    expect(prompt).toContain('## Tools\n- read_file: Read a file.\n    - path (string, required): File path\n    - limit (number): Max lines\n');
    expect(prompt).toContain('{"action": "complete", "summary": "<what was done>"}');
  });

  it('marks an empty tool list', () => {
    expect(buildAgentSystemPrompt([])).toContain('## Tools\n(none)\n');
  });
});

describe('renderStep', () => {
  it('renders each step kind', () => {
    expect(renderStep(AgentSteps.system('go'))).toBe('[system] go');
    expect(renderStep(AgentSteps.thinking('hmm'))).toBe('[thought] hmm');
    expect(renderStep(AgentSteps.tool('read_file', { path: 'a.ts' }, 'content', true))).toBe(
      '[tool read_file] {"path":"a.ts"}\n[result ok] content',
    );
    expect(renderStep(AgentSteps.question('Which?'))).toBe('[asked user] Which?');
    expect(renderStep(AgentSteps.answer('That one'))).toBe('[user] That one');
    expect(renderStep(AgentSteps.error('oops'))).toBe('[error] oops');
    expect(renderStep(AgentSteps.complete('done'))).toBe('[complete] done');
  });

  it('clips long tool output', () => {
    const rendered = renderStep(AgentSteps.tool('run_shell', {}, 'x'.repeat(4001), false));
    expect(rendered).toBe(`[tool run_shell] {}\n[result failed] ${'x'.repeat(4000)}\n[... truncated ...]`);
  });
});

describe('buildAgentPrompt', () => {
  it('builds a minimal prompt', () => {
    expect(buildAgentPrompt({ task: 'Fix lint', steps: [] })).toBe(
      '## Task\nFix lint\n\nReply with the next action as a single JSON object.',
    );
  });

  it('includes working directory, files and history', () => {
    const prompt = buildAgentPrompt({
      task: 'Fix lint',
      steps: [AgentSteps.system('Starting task: Fix lint'), AgentSteps.thinking('look at eslint config')],
      fileContext: 'eslint.config.js',
      workingDirectory: '/work/app',
    });

    expect(prompt).toBe(
      [
        '## Task\nFix lint',
        '## Working directory\n/work/app',
        '## Project files\neslint.config.js',
        '## History\n[system] Starting task: Fix lint\n[thought] look at eslint config',
        'Reply with the next action as a single JSON object.',
      ].join('\n\n'),
    );
  });

  it('keeps only the most recent steps', () => {
    const steps = Array.from({ length: 45 }, (_, i) => AgentSteps.thinking(`t${i}`));
    const prompt = buildAgentPrompt({ task: 'T', steps });

    expect(prompt).toContain('## History\n(5 earlier steps omitted)\n[thought] t5\n');
    expect(prompt).not.toContain('[thought] t4\n');
    expect(prompt).toContain('[thought] t44\n\nReply with');
  });
});

describe('parseReasoningAction', () => {
  it('parses a tool call', () => {
    expect(parseReasoningAction('{"action":"tool","tool":"read_file","args":{"path":"a.ts"},"thought":"look"}')).toEqual({
      type: 'tool',
      tool: 'read_file',
      args: { path: 'a.ts' },
      thought: 'look',
    });
  });

  it('defaults missing tool args', () => {
    expect(parseReasoningAction('{"action":"tool","tool":"search_codebase"}')).toEqual({
      type: 'tool',
      tool: 'search_codebase',
      args: {},
      thought: undefined,
    });
  });

  it('extracts the object from surrounding prose', () => {
    expect(parseReasoningAction('Sure.\n{"action":"complete","summary":"all good"}\nThanks')).toEqual({
      type: 'complete',
      summary: 'all good',
    });
  });

  it('maps ask_user and think', () => {
    expect(parseReasoningAction('{"action":"ask_user","question":"Which branch?"}')).toEqual({
      type: 'askUser',
      question: 'Which branch?',
    });
    expect(parseReasoningAction('{"action":"think","thought":"compare both"}')).toEqual({
      type: 'think',
      thought: 'compare both',
    });
  });

  it('defaults a missing completion summary', () => {
    expect(parseReasoningAction('{"action":"complete"}')).toEqual({ type: 'complete', summary: '' });
  });

  it('treats plain prose as a thought', () => {
    expect(parseReasoningAction('  I should read the config first.  ')).toEqual({
      type: 'think',
      thought: 'I should read the config first.',
    });
  });

  it('rejects empty, invalid and unknown replies', () => {
    expect(() => parseReasoningAction('   ')).toThrow(ModelInvocationError);
    expect(() => parseReasoningAction('{not json}')).toThrow(/^Model reply is not valid JSON/);
    expect(() => parseReasoningAction('{"action":"dance"}')).toThrow(/^Model reply is not a known action/);
  });

  it('marks parse failures as malformed', () => {
    try {
      parseReasoningAction('{"action":"tool"}');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ModelInvocationError);
      expect(err).toMatchObject({ kind: 'malformed' });
    }
  });
});
