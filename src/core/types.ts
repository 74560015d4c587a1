import { z } from 'zod';
import type { AgentRole } from '../models/types.js';
import type { OrchestrationState, TaskResult } from '../agents/types.js';
import type { AgentStep, ExecutorState } from '../executor/types.js';
import type { BudgetedPhase } from '../policy/quality-presets.js';

// ===== Configuration =====

export const PresetTypeSchema = z.enum(['fast', 'balanced', 'thorough']);

export type PresetType = z.infer<typeof PresetTypeSchema>;

export const CycleForgeConfigSchema = z.object({
  ollama: z.object({
    baseUrl: z.string().url().default('http://localhost:11434'),
    timeoutMs: z.number().int().positive().default(120000),
  }).default({}),
  memory: z.object({
    /** Multiplier over weight size for context buffers and runtime */
    overheadFactor: z.number().min(1).max(4).default(1.2),
    /** Share of system RAM the models may use; the rest stays with the OS */
    safetyFactor: z.number().gt(0).max(1).default(0.75),
    upgradeHeadroomGB: z.number().min(0).default(8),
    fallbackRamGB: z.number().positive().default(16),
  }).default({}),
  orchestration: z.object({
    preset: PresetTypeSchema.default('balanced'),
    retryBaseDelayMs: z.number().min(0).default(1000),
  }).default({}),
  executor: z.object({
    maxLoops: z.number().int().min(1).max(500).default(50),
  }).default({}),
  ui: z.object({
    verbose: z.boolean().default(false),
  }).default({}),
});

export type CycleForgeConfig = z.infer<typeof CycleForgeConfigSchema>;

// ===== Events =====

export interface EngineEvents {
  'orchestration:state': { state: OrchestrationState; task: string };
  'orchestration:progress': { progress: number; statusMessage: string };
  'orchestration:switch': { from: AgentRole | null; to: AgentRole; durationMs: number };
  'orchestration:step': { index: number; total: number; result: TaskResult };
  'orchestration:plan': { plan: string };
  'orchestration:verdict': { reviewer: AgentRole; approved: boolean; feedback: string };
  'orchestration:retry': { role: AgentRole; attempt: number; error: string };
  'orchestration:overrun': { phase: BudgetedPhase; elapsedMs: number; budgetMs: number };
  'agent:step': { step: AgentStep };
  'agent:state': { state: ExecutorState };
}
