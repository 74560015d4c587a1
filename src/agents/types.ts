import type { PresetType } from '../core/types.js';
import type { AgentRole, ModelVariant } from '../models/types.js';

export const TASK_CAPABILITIES = [
  'codeGeneration',
  'codeReview',
  'debugging',
  'research',
  'documentation',
  'imageAnalysis',
  'planning',
  'synthesis',
] as const;

export type TaskCapability = (typeof TASK_CAPABILITIES)[number];

export interface AgentDefinition {
  /** Same as the role name */
  readonly id: string;
  readonly role: AgentRole;
  readonly model: ModelVariant;
  readonly capabilities: ReadonlySet<TaskCapability>;
  readonly priority: number;
}

export interface RoleProfile {
  displayName: string;
  description: string;
  systemPrompt: string;
  capabilities: readonly TaskCapability[];
  priority: number;
  temperature: number;
}

export interface TaskContext {
  workingDirectory?: string;
  files: Record<string, string>;
  /** Output of every step so far, in order */
  previousResults: string[];
}

export interface TaskResult {
  readonly output: string;
  readonly agentId: string;
  readonly role: AgentRole;
  readonly input: string;
  /** ms */
  readonly executionTime: number;
  /** ms spent loading the model before this step; 0 on a warm hit */
  readonly modelSwitchTime: number;
  readonly tokensUsed: number;
}

export interface OrchestrationStatistics {
  availableRAM: number;
  canRunParallel: boolean;
  modelSwitchCount: number;
  totalSwitchTime: number;
  averageSwitchTime: number;
  warmAgent: AgentRole | null;
  warmHits: number;
  warmMisses: number;
  registeredAgents: number;
}

export type OrchestrationState =
  | 'idle'
  | 'planning'
  | 'executing'
  | 'verifying'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type ExecutionStrategy = 'auto' | 'pipeline';

export interface RunOptions {
  /** Explicit agent order; runs the task as a pipeline */
  agents?: AgentRole[];
  preset?: PresetType;
  /** Hints for capability inference, e.g. attached image paths */
  images?: string[];
}

export interface VerificationVerdict {
  reviewer: AgentRole;
  approved: boolean;
  feedback: string;
}

export interface VerificationReport {
  verdicts: VerificationVerdict[];
  revisions: number;
  approved: boolean;
}
