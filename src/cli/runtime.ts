/**
 * Wires the engine from configuration for the CLI commands.
 */

import { resolve } from 'path';
import { z } from 'zod';
import { ConfigManager, type ConfigOverrides } from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import { EventBus } from '../core/events.js';
import { createLogger, setLogger } from '../core/logger.js';
import { PresetTypeSchema, type CycleForgeConfig, type PresetType } from '../core/types.js';
import { getVariant } from '../models/catalog.js';
import { YamlFileStore } from '../models/configuration-store.js';
import { ModelTierManager } from '../models/tier-manager.js';
import { AGENT_ROLES, TIER_ORDER, type AgentRole, type ModelTier } from '../models/types.js';
import { suggestPreset } from '../policy/quality-presets.js';
import { OllamaProvider } from '../providers/ollama.js';
import { getStatePath } from '../utils/platform.js';

export type GlobalOptions = {
  dir?: string;
  verbose?: boolean;
};

export interface Runtime {
  projectDir: string;
  config: CycleForgeConfig;
  tierManager: ModelTierManager;
  provider: OllamaProvider;
  events: EventBus;
}

export function createRuntime(options: GlobalOptions, overrides: ConfigOverrides = {}): Runtime {
  const projectDir = resolve(options.dir ?? '.');
  const config = new ConfigManager(projectDir).load({
    ...overrides,
    ...(options.verbose ? { ui: { verbose: true } } : {}),
  });

  if (config.ui.verbose) {
    setLogger(createLogger('cycleforge', true));
  }

  const tierManager = new ModelTierManager({
    settings: config.memory,
    store: new YamlFileStore(getStatePath()),
  });

  const active = tierManager.getActiveConfiguration();
  const orchestrator = active.selections.find(s => s.role === 'orchestrator');
  const provider = new OllamaProvider({
    baseUrl: config.ollama.baseUrl,
    timeoutMs: config.ollama.timeoutMs,
    memory: tierManager.getMemorySettings(active),
    reasoningModel: getVariant('orchestrator', orchestrator?.tier ?? tierManager.recommendedTier).tag,
  });

  return { projectDir, config, tierManager, provider, events: new EventBus() };
}

const RoleArg = z.enum(AGENT_ROLES);
const TierArg = z.enum(TIER_ORDER);

export function parseRole(value: string): AgentRole {
  const parsed = RoleArg.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigurationError(`Unknown role "${value}". Expected one of: ${AGENT_ROLES.join(', ')}`);
  }
  return parsed.data;
}

export function parseTier(value: string): ModelTier {
  const parsed = TierArg.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigurationError(`Unknown tier "${value}". Expected one of: ${TIER_ORDER.join(', ')}`);
  }
  return parsed.data;
}

export function parseRoleList(value: string): AgentRole[] {
  return value
    .split(',')
    .filter(part => part.trim().length > 0)
    .map(parseRole);
}

/**
 * `--preset` value; "auto" picks a preset from the wording of the task.
 */
export function parsePreset(value: string, task: string): PresetType {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'auto') return suggestPreset(task);
  const parsed = PresetTypeSchema.safeParse(normalized);
  if (!parsed.success) {
    throw new ConfigurationError(`Unknown preset "${value}". Expected fast, balanced, thorough or auto`);
  }
  return parsed.data;
}

export function parsePositiveInt(value: string, option: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${option} must be a positive integer (got "${value}")`);
  }
  return parsed;
}
