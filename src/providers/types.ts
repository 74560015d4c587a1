import type { AgentRole, MemorySettings, ModelVariant } from '../models/types.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface InvocationContext {
  /** Variant selected for the role */
  model: ModelVariant;
  systemPrompt: string;
  temperature?: number;
  /** Runtime memory settings; the provider default applies when omitted */
  memory?: MemorySettings;
  /** Orchestrator plan for the whole run */
  plan?: string;
  files: Readonly<Record<string, string>>;
  workingDirectory?: string;
}

export interface InvocationResult {
  text: string;
  tokensUsed?: number;
}

/**
 * Runs one prompt against the model serving a role. Failures are thrown
 * as ModelInvocationError.
 */
export interface ModelInvoker {
  invoke(role: AgentRole, prompt: string, context: InvocationContext): Promise<InvocationResult>;
  /** Warm the model ahead of the first invocation */
  load?(role: AgentRole, model: ModelVariant): Promise<void>;
}
