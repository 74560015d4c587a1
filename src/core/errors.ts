import type { AgentRole } from '../models/types.js';
import type { TaskResult } from '../agents/types.js';

export type ErrorStage = 'config' | 'plan' | 'execute' | 'verify' | 'tool' | 'loop';

export class CycleForgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: ErrorStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'CycleForgeError';
  }
}

/**
 * An unfittable or malformed model selection. Raised before anything runs.
 */
export class ConfigurationError extends CycleForgeError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', 'config', cause);
    this.name = 'ConfigurationError';
  }
}

export type InvocationFailureKind = 'network' | 'unavailable' | 'malformed';

export class ModelInvocationError extends CycleForgeError {
  constructor(
    message: string,
    public readonly kind: InvocationFailureKind,
    public readonly role?: AgentRole,
    cause?: Error,
  ) {
    super(message, 'MODEL_INVOCATION_ERROR', 'execute', cause);
    this.name = 'ModelInvocationError';
  }
}

/**
 * Aborted orchestration run. `results` holds the steps that completed
 * before the failing one.
 */
export class TaskExecutionError extends CycleForgeError {
  constructor(
    message: string,
    public readonly stepIndex: number,
    public readonly agentId: string,
    public readonly results: readonly TaskResult[],
    cause?: Error,
  ) {
    super(message, 'TASK_EXECUTION_ERROR', 'execute', cause);
    this.name = 'TaskExecutionError';
  }
}

export class ToolExecutionError extends CycleForgeError {
  constructor(message: string, public readonly tool: string, cause?: Error) {
    super(message, 'TOOL_EXECUTION_ERROR', 'tool', cause);
    this.name = 'ToolExecutionError';
  }
}

export class IterationBudgetExceededError extends CycleForgeError {
  constructor(public readonly maxLoops: number) {
    super(`max loops exceeded (${maxLoops})`, 'ITERATION_BUDGET_EXCEEDED', 'loop');
    this.name = 'IterationBudgetExceededError';
  }
}

export class AgentStateError extends CycleForgeError {
  constructor(message: string) {
    super(message, 'AGENT_STATE_ERROR', 'loop');
    this.name = 'AgentStateError';
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
