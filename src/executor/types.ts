import type { ToolDefinition } from '../tools/types.js';

interface StepBase {
  readonly id: string;
  readonly timestamp: number;
}

export type AgentStep = StepBase &
  (
    | { readonly type: 'system'; readonly text: string }
    | { readonly type: 'thinking'; readonly text: string }
    | {
        readonly type: 'tool';
        readonly name: string;
        readonly input: Readonly<Record<string, unknown>>;
        readonly output: string;
        readonly success: boolean;
      }
    | { readonly type: 'userInput'; readonly direction: 'question' | 'answer'; readonly text: string }
    | { readonly type: 'error'; readonly text: string }
    | { readonly type: 'complete'; readonly text: string }
  );

export type AgentStepType = AgentStep['type'];

export type ExecutorState =
  | 'idle'
  | 'thinking'
  | 'tool'
  | 'observing'
  | 'waitingForUser'
  | 'complete'
  | 'error'
  | 'stopped';

export type ReasoningAction =
  | { type: 'tool'; tool: string; args: Record<string, unknown>; thought?: string }
  | { type: 'complete'; summary: string }
  | { type: 'askUser'; question: string }
  | { type: 'think'; thought: string };

export interface ReasoningRequest {
  systemPrompt: string;
  prompt: string;
  tools: ToolDefinition[];
}

/** Decides the next action of the autonomous loop */
export interface ReasoningModel {
  next(request: ReasoningRequest): Promise<ReasoningAction>;
}

/** Supplies project files relevant to a task, already rendered as text */
export interface FileContextProvider {
  getContext(task: string, workingDirectory?: string): Promise<string>;
}

export interface AgentOutcome {
  status: 'complete' | 'error' | 'stopped';
  /** Completion summary, error text or the stop notice */
  summary: string;
  steps: readonly AgentStep[];
  loops: number;
}
