import { describe, it, expect } from 'vitest';
import { AgentSteps } from '../../../src/executor/steps.js';

describe('AgentSteps', () => {
  it('stamps each step with an id and time', () => {
    const step = AgentSteps.thinking('plan');
    expect(step.id).toHaveLength(10);
    expect(step.timestamp).toBeLessThanOrEqual(Date.now());
    expect(AgentSteps.thinking('plan').id).not.toBe(step.id);
  });

  it('freezes steps and tool inputs', () => {
    const input = { path: 'a.ts' };
    const step = AgentSteps.tool('read_file', input, 'ok', true);
    expect(Object.isFrozen(step)).toBe(true);
    input.path = 'b.ts';
    expect(step).toMatchObject({ type: 'tool', input: { path: 'a.ts' } });
  });
});
