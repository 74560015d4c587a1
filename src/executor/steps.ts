import { nanoid } from 'nanoid';
import type { AgentStep } from './types.js';

export const STOPPED_TEXT = 'Agent stopped by user';

function stamp(): { id: string; timestamp: number } {
  return { id: nanoid(10), timestamp: Date.now() };
}

function frozen(step: AgentStep): AgentStep {
  return Object.freeze(step);
}

export const AgentSteps = {
  system: (text: string): AgentStep => frozen({ ...stamp(), type: 'system', text }),
  thinking: (text: string): AgentStep => frozen({ ...stamp(), type: 'thinking', text }),
  tool: (name: string, input: Record<string, unknown>, output: string, success: boolean): AgentStep =>
    frozen({ ...stamp(), type: 'tool', name, input: Object.freeze({ ...input }), output, success }),
  question: (text: string): AgentStep => frozen({ ...stamp(), type: 'userInput', direction: 'question', text }),
  answer: (text: string): AgentStep => frozen({ ...stamp(), type: 'userInput', direction: 'answer', text }),
  error: (text: string): AgentStep => frozen({ ...stamp(), type: 'error', text }),
  complete: (text: string): AgentStep => frozen({ ...stamp(), type: 'complete', text }),
};
