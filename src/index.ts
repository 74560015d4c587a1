/**
 * cycleforge: multi-model orchestration for local specialist models
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { CycleAgentManager, ModelTierManager, OllamaProvider } from 'cycleforge';
 *
 * const tierManager = new ModelTierManager();
 * const manager = new CycleAgentManager({ tierManager, invoker: new OllamaProvider() });
 * const output = await manager.planAndExecute('add input validation to the signup form');
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, type ConfigOverrides } from './core/config.js';
export { getLogger, setLogger, createLogger } from './core/logger.js';
export { AsyncMutex } from './core/mutex.js';
export {
  CycleForgeError,
  ConfigurationError,
  ModelInvocationError,
  TaskExecutionError,
  ToolExecutionError,
  IterationBudgetExceededError,
  AgentStateError,
  type ErrorStage,
  type InvocationFailureKind,
} from './core/errors.js';
export {
  CycleForgeConfigSchema,
  PresetTypeSchema,
  type CycleForgeConfig,
  type EngineEvents,
  type PresetType,
} from './core/types.js';

// Models
export * from './models/types.js';
export { getVariant, listVariants, compareTiers, nextTier, ROLE_LABELS, TIER_MIN_RAM } from './models/catalog.js';
export {
  ModelTierManager,
  DEFAULT_TIER_SETTINGS,
  detectSystemRAM,
  recommendedTier,
  type TierManagerOptions,
} from './models/tier-manager.js';
export {
  CONFIGURATION_KEY,
  MemoryKeyValueStore,
  YamlFileStore,
  loadCustomConfiguration,
  saveCustomConfiguration,
  parseCustomConfiguration,
  type KeyValueStore,
} from './models/configuration-store.js';

// Policy
export {
  getPreset,
  listPresets,
  suggestPreset,
  targetDuration,
  phaseBudget,
  type QualityPreset,
  type VerificationLevel,
  type StageType,
  type BudgetedPhase,
} from './policy/quality-presets.js';

// Agents
export * from './agents/types.js';
export { ROLE_TABLE, getRoleProfile } from './agents/roles.js';
export { WarmSlot } from './agents/warm-slot.js';
export {
  KeywordCapabilityClassifier,
  loadCapabilityRules,
  type CapabilityClassifier,
  type CapabilityRule,
  type Classification,
  type ClassificationHints,
} from './agents/capability-classifier.js';
export {
  CycleAgentManager,
  buildStepInput,
  parseVerdict,
  type CycleAgentManagerOptions,
} from './agents/cycle-manager.js';

// Executor
export * from './executor/types.js';
export { AgentExecutor, type AgentExecutorOptions } from './executor/agent-executor.js';
export { AgentSteps, STOPPED_TEXT } from './executor/steps.js';
export { buildAgentPrompt, buildAgentSystemPrompt, parseReasoningAction } from './executor/prompt-builder.js';
export { ProjectFileContext } from './executor/file-context.js';

// Tools
export type { Tool, ToolContext, ToolResult, ToolParameters, ToolProperty, ToolDefinition } from './tools/types.js';
export { ToolRegistry, type DefaultToolOptions } from './tools/registry.js';
export { ReadFileTool } from './tools/builtin/read-file.js';
export { WriteFileTool } from './tools/builtin/write-file.js';
export { RunShellTool } from './tools/builtin/run-shell.js';
export { SearchCodebaseTool } from './tools/builtin/search-codebase.js';
export { TakeScreenshotTool, type ScreenCapture, type Capture, type CaptureRequest } from './tools/builtin/take-screenshot.js';
export { DelegateTool, createDelegationTools, type Delegator } from './tools/builtin/delegate.js';

// Providers
export type { ModelInvoker, InvocationContext, InvocationResult, ChatMessage } from './providers/types.js';
export { OllamaProvider, type OllamaProviderConfig } from './providers/ollama.js';

export { VERSION, NAME } from './version.js';
