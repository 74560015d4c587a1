import { describe, it, expect } from 'vitest';
import { ToolRegistry } from '../../../src/tools/registry.js';
import type { Tool, ToolContext } from '../../../src/tools/types.js';
import type { Delegator } from '../../../src/tools/builtin/delegate.js';

const context: ToolContext = { workingDir: process.cwd(), executionId: 'test-1' };

function fakeTool(name: string, run: Tool['execute']): Tool {
  return {
    name,
    description: `${name} tool`,
    parameters: { type: 'object', properties: {}, required: [] },
    execute: run,
  };
}

const delegator: Delegator = {
  delegate: async (role, task) => ({
    output: task,
    agentId: role,
    role,
    input: task,
    executionTime: 0,
    modelSwitchTime: 0,
    tokensUsed: 1,
  }),
};

describe('ToolRegistry', () => {
  it('registers the file, shell and search tools by default', () => {
    const registry = ToolRegistry.createDefault();
    expect(registry.list().map(t => t.name)).toEqual(['read_file', 'write_file', 'run_shell', 'search_codebase']);
  });

  it('adds screenshot and delegation tools when their collaborators are given', () => {
    const registry = ToolRegistry.createDefault({
      capture: { capture: async () => ({ path: 'shot.png' }) },
      delegator,
    });
    expect(registry.list().map(t => t.name)).toEqual([
      'read_file',
      'write_file',
      'run_shell',
      'search_codebase',
      'take_screenshot',
      'delegate_to_coder',
      'delegate_to_researcher',
      'delegate_to_vision',
    ]);
  });

  it('exposes definitions without the execute function', () => {
    const registry = new ToolRegistry();
    registry.register(fakeTool('echo', async () => ({ success: true, output: '' })));
    expect(registry.definitions()).toEqual([
      { name: 'echo', description: 'echo tool', parameters: { type: 'object', properties: {}, required: [] } },
    ]);
    expect(registry.has('echo')).toBe(true);
    expect(registry.has('other')).toBe(false);
  });

  it('runs a tool and returns its result', async () => {
    const registry = new ToolRegistry();
    registry.register(fakeTool('echo', async args => ({ success: true, output: String(args.text) })));
    await expect(registry.execute('echo', { text: 'hi' }, context)).resolves.toEqual({ success: true, output: 'hi' });
  });

  it('reports an unknown tool as a failed result', async () => {
    const registry = new ToolRegistry();
    registry.register(fakeTool('echo', async () => ({ success: true, output: '' })));
    await expect(registry.execute('nope', {}, context)).resolves.toEqual({
      success: false,
      output: '',
      error: 'Tool "nope" not found. Available: echo',
    });
  });

  it('reports a throwing tool as a failed result', async () => {
    const registry = new ToolRegistry();
    registry.register(
      fakeTool('boom', async () => {
        throw new Error('kaboom');
      }),
    );
    await expect(registry.execute('boom', {}, context)).resolves.toEqual({
      success: false,
      output: '',
      error: 'Tool "boom" failed: kaboom',
    });
  });

  it('passes tool argument errors through unchanged', async () => {
    const registry = ToolRegistry.createDefault();
    const result = await registry.execute('read_file', {}, context);
    expect(result.error).toBe('Missing required string argument "path"');
  });
});
