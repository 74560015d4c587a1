/**
 * Prompt composition and action parsing for the autonomous loop.
 *
 * The model answers with one JSON object per turn; parseReasoningAction
 * turns that reply into a ReasoningAction.
 */

import { z } from 'zod';
import { ModelInvocationError } from '../core/errors.js';
import type { ToolDefinition } from '../tools/types.js';
import type { AgentStep, ReasoningAction } from './types.js';

const MAX_HISTORY_STEPS = 40;
const MAX_OUTPUT_IN_PROMPT = 4000;

export interface AgentPromptInput {
  task: string;
  steps: readonly AgentStep[];
  fileContext?: string;
  workingDirectory?: string;
}

export function buildAgentSystemPrompt(tools: ToolDefinition[]): string {
  const toolLines = tools.map(tool => {
    const params = Object.entries(tool.parameters.properties)
      .map(([name, prop]) => {
        const required = tool.parameters.required?.includes(name) ? ', required' : '';
        return `    - ${name} (${prop.type}${required}): ${prop.description}`;
      })
      .join('\n');
    return `- ${tool.name}: ${tool.description}${params ? `\n${params}` : ''}`;
  });

  return `You are an autonomous software agent working in a local project.
Work step by step. Each reply must be exactly one JSON object and nothing else.

## Actions
{"action": "tool", "tool": "<name>", "args": {...}, "thought": "<why>"}
{"action": "think", "thought": "<reasoning>"}
{"action": "ask_user", "question": "<question>"}
{"action": "complete", "summary": "<what was done>"}

## Tools
${toolLines.length > 0 ? toolLines.join('\n') : '(none)'}

## Rules
- Inspect files before changing them
- Ask the user only when the task cannot be finished without an answer
- Use "complete" as soon as the task is done`;
}

function clip(text: string): string {
  return text.length > MAX_OUTPUT_IN_PROMPT
    ? `${text.substring(0, MAX_OUTPUT_IN_PROMPT)}\n[... truncated ...]`
    : text;
}

export function renderStep(step: AgentStep): string {
  switch (step.type) {
    case 'system':
      return `[system] ${step.text}`;
    case 'thinking':
      return `[thought] ${step.text}`;
    case 'tool':
      return `[tool ${step.name}] ${JSON.stringify(step.input)}\n[result ${step.success ? 'ok' : 'failed'}] ${clip(step.output)}`;
    case 'userInput':
      return step.direction === 'question' ? `[asked user] ${step.text}` : `[user] ${step.text}`;
    case 'error':
      return `[error] ${step.text}`;
    case 'complete':
      return `[complete] ${step.text}`;
  }
}

/**
 * Task, recent history and file context as one user prompt.
 */
export function buildAgentPrompt(input: AgentPromptInput): string {
  const sections = [`## Task\n${input.task}`];

  if (input.workingDirectory) {
    sections.push(`## Working directory\n${input.workingDirectory}`);
  }
  if (input.fileContext) {
    sections.push(`## Project files\n${input.fileContext}`);
  }

  const omitted = Math.max(0, input.steps.length - MAX_HISTORY_STEPS);
  const recent = input.steps.slice(omitted).map(renderStep);
  if (recent.length > 0) {
    const note = omitted > 0 ? `(${omitted} earlier steps omitted)\n` : '';
    sections.push(`## History\n${note}${recent.join('\n')}`);
  }

  sections.push('Reply with the next action as a single JSON object.');
  return sections.join('\n\n');
}

const ActionSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('tool'),
    tool: z.string().min(1),
    args: z.record(z.unknown()).default({}),
    thought: z.string().optional(),
  }),
  z.object({ action: z.literal('think'), thought: z.string() }),
  z.object({ action: z.literal('ask_user'), question: z.string().min(1) }),
  z.object({ action: z.literal('complete'), summary: z.string().default('') }),
]);

/**
 * Parse a model reply. The first `{` to the last `}` is taken as the JSON
 * object; a reply with no JSON at all is treated as a thought.
 */
export function parseReasoningAction(reply: string): ReasoningAction {
  const text = reply.trim();
  if (text.length === 0) {
    throw new ModelInvocationError('Model returned an empty response', 'malformed');
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return { type: 'think', thought: text };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    throw new ModelInvocationError(
      `Model reply is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      'malformed',
    );
  }

  const parsed = ActionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ModelInvocationError(`Model reply is not a known action: ${parsed.error.message}`, 'malformed');
  }

  const action = parsed.data;
  switch (action.action) {
    case 'tool':
      return { type: 'tool', tool: action.tool, args: action.args, thought: action.thought };
    case 'think':
      return { type: 'think', thought: action.thought };
    case 'ask_user':
      return { type: 'askUser', question: action.question };
    case 'complete':
      return { type: 'complete', summary: action.summary };
  }
}
