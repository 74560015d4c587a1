export const AGENT_ROLES = ['orchestrator', 'coder', 'researcher', 'vision'] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];

/** Cost/quality bands of model variants, ascending. */
export const TIER_ORDER = ['small', 'medium', 'large'] as const;

export type ModelTier = (typeof TIER_ORDER)[number];

export interface ModelVariant {
  readonly name: string;
  /** Runtime model tag, e.g. `qwen3:8b` */
  readonly tag: string;
  readonly parameterCount: string;
  readonly diskSizeGB: number;
  /** Resident memory of the weights, before runtime overhead */
  readonly estimatedRamGB: number;
  readonly tier: ModelTier;
  /** 1-10 */
  readonly quality: number;
  /** 1-10, higher is faster */
  readonly speed: number;
}

export interface ModelSelection {
  role: AgentRole;
  tier: ModelTier;
  enabled: boolean;
}

export interface CustomConfiguration {
  selections: ModelSelection[];
}

export interface ConfigurationAnalysis {
  readonly canFit: boolean;
  readonly estimatedRAM: number;
  readonly usableRAM: number;
  readonly totalDisk: number;
  readonly speedRating: number;
  readonly qualityRating: number;
  readonly recommendation: string;
  readonly modelDescriptions: readonly string[];
}

export interface MemorySettings {
  contextWindow: number;
  maxTokens: number;
  /** Runtime keep-alive duration, e.g. "10m"; "0" unloads right after use */
  keepAlive: string;
}

export interface TierComparison {
  tier: ModelTier;
  minRAM: number;
  totalDiskGB: number;
  parameterCount: string;
  quality: number;
  speed: number;
  isRecommended: boolean;
  isAvailable: boolean;
}

export interface RequiredModel {
  role: AgentRole;
  variant: ModelVariant;
}

export interface ModelAvailability extends RequiredModel {
  installed: boolean;
}

export interface TierSettings {
  overheadFactor: number;
  safetyFactor: number;
  upgradeHeadroomGB: number;
  fallbackRamGB: number;
}
