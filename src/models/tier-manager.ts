/**
 * ModelTierManager: fits a multi-model configuration into host memory.
 *
 * Analysis is a pure function of (configuration, systemRAM, settings).
 * The active configuration lives in a KeyValueStore and only changes
 * through saveConfiguration / updateSelection.
 */

import { ConfigurationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { getMemoryGB } from '../utils/platform.js';
import { ROLE_LABELS, TIER_MIN_RAM, compareTiers, getVariant, listVariants, nextTier } from './catalog.js';
import {
  MemoryKeyValueStore,
  loadCustomConfiguration,
  parseCustomConfiguration,
  saveCustomConfiguration,
  type KeyValueStore,
} from './configuration-store.js';
import {
  AGENT_ROLES,
  TIER_ORDER,
  type AgentRole,
  type ConfigurationAnalysis,
  type CustomConfiguration,
  type MemorySettings,
  type ModelAvailability,
  type ModelSelection,
  type ModelTier,
  type ModelVariant,
  type RequiredModel,
  type TierComparison,
  type TierSettings,
} from './types.js';

export const DEFAULT_TIER_SETTINGS: Readonly<TierSettings> = Object.freeze({
  overheadFactor: 1.2,
  safetyFactor: 0.75,
  upgradeHeadroomGB: 8,
  fallbackRamGB: 16,
});

const ROLE_WEIGHTS: Readonly<Record<AgentRole, number>> = {
  orchestrator: 1.5,
  coder: 1.5,
  researcher: 1.0,
  vision: 0.5,
};

const SWITCH_PENALTY = 0.5;
const MIN_CONTEXT_WINDOW = 2048;

const BASE_MEMORY: Readonly<Record<ModelTier, MemorySettings>> = {
  small: { contextWindow: 4096, maxTokens: 2048, keepAlive: '5m' },
  medium: { contextWindow: 8192, maxTokens: 4096, keepAlive: '10m' },
  large: { contextWindow: 16384, maxTokens: 8192, keepAlive: '30m' },
};

export interface TierManagerOptions {
  /** Injected host RAM in GB; skips detection */
  systemRAM?: number;
  /** RAM probe used when systemRAM is not given */
  probe?: () => number;
  settings?: Partial<TierSettings>;
  store?: KeyValueStore;
}

interface EnabledModel {
  selection: ModelSelection;
  variant: ModelVariant;
}

export function recommendedTier(ramGB: number): ModelTier {
  if (ramGB >= TIER_MIN_RAM.large) return 'large';
  if (ramGB >= TIER_MIN_RAM.medium) return 'medium';
  return 'small';
}

/**
 * Probe host memory in GB. Falls back when the probe throws or returns
 * something that is not a positive finite number.
 */
export function detectSystemRAM(
  probe: () => number = getMemoryGB,
  fallbackGB: number = DEFAULT_TIER_SETTINGS.fallbackRamGB,
): number {
  const logger = getLogger();
  let value: number;
  try {
    value = probe();
  } catch (err) {
    logger.warn({ err, fallbackGB }, 'Memory probe failed, using fallback');
    return fallbackGB;
  }
  if (!Number.isFinite(value) || value <= 0) {
    logger.warn({ value, fallbackGB }, 'Memory probe returned an unusable value, using fallback');
    return fallbackGB;
  }
  return value;
}

/** Runtime tags without a version default to `latest` */
function normalizeTag(tag: string): string {
  const trimmed = tag.trim().toLowerCase();
  return trimmed.includes(':') ? trimmed : `${trimmed}:latest`;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function clampRating(value: number): number {
  return round(Math.min(10, Math.max(0, value)), 1);
}

function gb(value: number): string {
  return `${value.toFixed(1)} GB`;
}

function weightedMean(models: EnabledModel[], pick: (variant: ModelVariant) => number): number {
  let total = 0;
  let weight = 0;
  for (const { selection, variant } of models) {
    const w = ROLE_WEIGHTS[selection.role];
    total += pick(variant) * w;
    weight += w;
  }
  return weight === 0 ? 0 : total / weight;
}

export class ModelTierManager {
  readonly systemRAM: number;
  readonly recommendedTier: ModelTier;
  readonly settings: Readonly<TierSettings>;
  private store: KeyValueStore;
  private logger = getLogger();

  constructor(options: TierManagerOptions = {}) {
    this.settings = Object.freeze({ ...DEFAULT_TIER_SETTINGS, ...options.settings });
    this.systemRAM = options.systemRAM ?? detectSystemRAM(options.probe, this.settings.fallbackRamGB);
    this.recommendedTier = recommendedTier(this.systemRAM);
    this.store = options.store ?? new MemoryKeyValueStore();

    this.logger.debug(
      { systemRAM: this.systemRAM, recommendedTier: this.recommendedTier },
      'Tier manager initialized',
    );
  }

  get usableRAM(): number {
    return round(this.systemRAM * this.settings.safetyFactor, 2);
  }

  /** Resident estimate of one variant including runtime overhead */
  estimateVariantRAM(variant: ModelVariant): number {
    return round(variant.estimatedRamGB * this.settings.overheadFactor, 2);
  }

  createDefaultConfiguration(): CustomConfiguration {
    return {
      selections: AGENT_ROLES.map(role => ({ role, tier: this.recommendedTier, enabled: true })),
    };
  }

  getModelOptions(role: AgentRole): Array<{ tier: ModelTier; variant: ModelVariant }> {
    return listVariants(role);
  }

  analyzeConfiguration(config: CustomConfiguration): ConfigurationAnalysis {
    const models = this.enabledModels(config);
    const usableRAM = this.usableRAM;

    if (models.length === 0) {
      return Object.freeze({
        canFit: true,
        estimatedRAM: 0,
        usableRAM,
        totalDisk: 0,
        speedRating: 0,
        qualityRating: 0,
        recommendation: 'Select at least one model.',
        modelDescriptions: Object.freeze([]),
      });
    }

    const totalDisk = round(models.reduce((sum, m) => sum + m.variant.diskSizeGB, 0), 2);
    const estimatedRAM = this.estimateRAM(models);
    const canFit = estimatedRAM <= usableRAM;

    let speed = weightedMean(models, v => v.speed) - SWITCH_PENALTY * (models.length - 1);
    if (!canFit) speed /= 2;

    return Object.freeze({
      canFit,
      estimatedRAM,
      usableRAM,
      totalDisk,
      speedRating: clampRating(speed),
      qualityRating: clampRating(weightedMean(models, v => v.quality)),
      recommendation: this.recommend(models, estimatedRAM, usableRAM),
      modelDescriptions: Object.freeze(models.map(m => this.describe(m))),
    });
  }

  getMemorySettings(config: CustomConfiguration = this.getActiveConfiguration()): MemorySettings {
    const base = BASE_MEMORY[this.recommendedTier];
    const models = this.enabledModels(config);

    let contextWindow = base.contextWindow;
    let keepAlive = base.keepAlive;

    const largest = models.reduce<ModelTier | undefined>(
      (max, m) => (max === undefined || compareTiers(m.selection.tier, max) > 0 ? m.selection.tier : max),
      undefined,
    );
    if (largest !== undefined) {
      const excess = Math.max(0, compareTiers(largest, this.recommendedTier));
      contextWindow = contextWindow / 2 ** excess;
    }

    if (!this.analyzeConfiguration(config).canFit) {
      contextWindow /= 2;
      keepAlive = '0';
    }

    contextWindow = Math.max(MIN_CONTEXT_WINDOW, contextWindow);
    return {
      contextWindow,
      maxTokens: Math.min(base.maxTokens, contextWindow / 2),
      keepAlive,
    };
  }

  /**
   * Stored configuration, or the default when nothing has been saved.
   * Roles missing from a stored configuration are added disabled.
   */
  getActiveConfiguration(): CustomConfiguration {
    const stored = loadCustomConfiguration(this.store);
    if (!stored) return this.createDefaultConfiguration();

    const selections = AGENT_ROLES.map(
      role => stored.selections.find(s => s.role === role) ?? { role, tier: this.recommendedTier, enabled: false },
    );
    return { selections: selections.map(s => ({ ...s })) };
  }

  saveConfiguration(config: CustomConfiguration): ConfigurationAnalysis {
    const parsed = parseCustomConfiguration(config);
    const analysis = this.analyzeConfiguration(parsed);
    if (!analysis.canFit) {
      throw new ConfigurationError(
        `Configuration needs ${gb(analysis.estimatedRAM)} but only ${gb(analysis.usableRAM)} is usable. ${analysis.recommendation}`,
      );
    }
    saveCustomConfiguration(this.store, parsed);
    this.logger.info(
      { estimatedRAM: analysis.estimatedRAM, selections: parsed.selections },
      'Model configuration saved',
    );
    return analysis;
  }

  updateSelection(role: AgentRole, patch: Partial<Omit<ModelSelection, 'role'>>): CustomConfiguration {
    const current = this.getActiveConfiguration();
    const next: CustomConfiguration = {
      selections: current.selections.map(s => (s.role === role ? { ...s, ...patch, role } : { ...s })),
    };
    this.saveConfiguration(next);
    return next;
  }

  /** Variants that must be present in the runtime, one per enabled role */
  getModelsToDownload(config: CustomConfiguration = this.getActiveConfiguration()): RequiredModel[] {
    return this.enabledModels(config).map(({ selection, variant }) => ({ role: selection.role, variant }));
  }

  checkModelsAvailable(
    installed: readonly string[],
    config: CustomConfiguration = this.getActiveConfiguration(),
  ): ModelAvailability[] {
    const present = new Set(installed.map(normalizeTag));
    return this.getModelsToDownload(config).map(model => ({
      ...model,
      installed: present.has(normalizeTag(model.variant.tag)),
    }));
  }

  getTierComparisons(): TierComparison[] {
    return TIER_ORDER.map(tier => {
      const lead = getVariant('orchestrator', tier);
      const totalDiskGB = AGENT_ROLES.reduce((sum, role) => sum + getVariant(role, tier).diskSizeGB, 0);
      return {
        tier,
        minRAM: TIER_MIN_RAM[tier],
        totalDiskGB: round(totalDiskGB, 2),
        parameterCount: lead.parameterCount,
        quality: lead.quality,
        speed: lead.speed,
        isRecommended: tier === this.recommendedTier,
        isAvailable: this.systemRAM >= TIER_MIN_RAM[tier],
      };
    });
  }

  private enabledModels(config: CustomConfiguration): EnabledModel[] {
    return config.selections
      .filter(selection => selection.enabled)
      .map(selection => ({ selection, variant: getVariant(selection.role, selection.tier) }));
  }

  private estimateRAM(models: EnabledModel[]): number {
    return round(models.reduce((sum, m) => sum + m.variant.estimatedRamGB * this.settings.overheadFactor, 0), 2);
  }

  private recommend(models: EnabledModel[], estimatedRAM: number, usableRAM: number): string {
    if (estimatedRAM > usableRAM) {
      const [target] = [...models].sort(
        (a, b) =>
          compareTiers(b.selection.tier, a.selection.tier) ||
          b.variant.estimatedRamGB - a.variant.estimatedRamGB ||
          AGENT_ROLES.indexOf(a.selection.role) - AGENT_ROLES.indexOf(b.selection.role),
      );
      const label = ROLE_LABELS[target.selection.role];
      const needs = `Needs ${gb(estimatedRAM)} but only ${gb(usableRAM)} is usable.`;
      const lower = nextTier(target.selection.tier, -1);
      if (lower === undefined) {
        return `${needs} Disable ${label} (${target.variant.name}).`;
      }
      return `${needs} Downgrade ${label} from ${target.selection.tier} to ${lower} (${getVariant(target.selection.role, lower).name}).`;
    }

    const headroom = round(usableRAM - estimatedRAM, 2);
    if (headroom >= this.settings.upgradeHeadroomGB) {
      const candidates = [...models].sort(
        (a, b) =>
          compareTiers(a.selection.tier, b.selection.tier) ||
          AGENT_ROLES.indexOf(a.selection.role) - AGENT_ROLES.indexOf(b.selection.role),
      );
      for (const { selection, variant } of candidates) {
        const higher = nextTier(selection.tier, 1);
        if (higher === undefined) continue;
        const upgraded = getVariant(selection.role, higher);
        const delta = (upgraded.estimatedRamGB - variant.estimatedRamGB) * this.settings.overheadFactor;
        if (estimatedRAM + delta <= usableRAM) {
          return `${gb(headroom)} headroom available. Consider upgrading ${ROLE_LABELS[selection.role]} to ${higher} (${upgraded.name}).`;
        }
      }
    }

    return 'Configuration fits comfortably.';
  }

  private describe({ selection, variant }: EnabledModel): string {
    return `${ROLE_LABELS[selection.role]}: ${variant.name} (${variant.parameterCount}, ${gb(variant.diskSizeGB)} disk, ~${gb(this.estimateVariantRAM(variant))} RAM)`;
  }
}
