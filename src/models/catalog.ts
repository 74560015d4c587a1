/**
 * Model Catalog
 *
 * Static {role × tier} → variant table. Disk sizes are the quantized
 * weights as pulled by the runtime; RAM estimates are resident weights
 * without context buffers (the tier manager applies the overhead factor).
 */

import type { AgentRole, ModelTier, ModelVariant } from './types.js';
import { TIER_ORDER } from './types.js';

const BANDS: Record<ModelTier, { quality: number; speed: number }> = {
  small: { quality: 6, speed: 9 },
  medium: { quality: 8, speed: 7 },
  large: { quality: 10, speed: 5 },
};

function variant(
  tier: ModelTier,
  name: string,
  tag: string,
  parameterCount: string,
  diskSizeGB: number,
  estimatedRamGB: number,
): ModelVariant {
  return Object.freeze({ name, tag, parameterCount, diskSizeGB, estimatedRamGB, tier, ...BANDS[tier] });
}

const CATALOG: Readonly<Record<AgentRole, Readonly<Record<ModelTier, ModelVariant>>>> = Object.freeze({
  orchestrator: Object.freeze({
    small: variant('small', 'Qwen3 8B', 'qwen3:8b', '8B', 5.0, 5.5),
    medium: variant('medium', 'Qwen3 14B', 'qwen3:14b', '14B', 9.0, 10.0),
    large: variant('large', 'Qwen3 32B', 'qwen3:32b', '32B', 20.0, 21.0),
  }),
  coder: Object.freeze({
    small: variant('small', 'Qwen2.5-Coder 7B', 'qwen2.5-coder:7b', '7B', 4.5, 5.0),
    medium: variant('medium', 'Qwen2.5-Coder 14B', 'qwen2.5-coder:14b', '14B', 9.0, 10.0),
    large: variant('large', 'Qwen2.5-Coder 32B', 'qwen2.5-coder:32b', '32B', 20.0, 21.0),
  }),
  researcher: Object.freeze({
    small: variant('small', 'Command-R 7B', 'command-r:7b', '7B', 4.5, 5.0),
    medium: variant('medium', 'Command-R 14B', 'command-r:14b', '14B', 9.0, 10.0),
    large: variant('large', 'Command-R 35B', 'command-r:35b', '35B', 20.0, 22.0),
  }),
  vision: Object.freeze({
    small: variant('small', 'Qwen2-VL 7B', 'qwen2-vl:7b', '7B', 4.5, 5.0),
    medium: variant('medium', 'Qwen2-VL 14B', 'qwen2-vl:14b', '14B', 9.0, 10.0),
    large: variant('large', 'Qwen3-VL 32B', 'qwen3-vl:32b', '32B', 20.0, 21.0),
  }),
});

/** Minimum host RAM (GB) at which each tier becomes the recommendation. */
export const TIER_MIN_RAM: Readonly<Record<ModelTier, number>> = Object.freeze({
  small: 16,
  medium: 24,
  large: 32,
});

export const ROLE_LABELS: Readonly<Record<AgentRole, string>> = Object.freeze({
  orchestrator: 'Orchestrator',
  coder: 'Coder',
  researcher: 'Researcher',
  vision: 'Vision',
});

export function getVariant(role: AgentRole, tier: ModelTier): ModelVariant {
  return CATALOG[role][tier];
}

/**
 * All variants for a role, ascending by disk size.
 */
export function listVariants(role: AgentRole): Array<{ tier: ModelTier; variant: ModelVariant }> {
  return TIER_ORDER
    .map(tier => ({ tier, variant: CATALOG[role][tier] }))
    .sort((a, b) => a.variant.diskSizeGB - b.variant.diskSizeGB || compareTiers(a.tier, b.tier));
}

export function compareTiers(a: ModelTier, b: ModelTier): number {
  return TIER_ORDER.indexOf(a) - TIER_ORDER.indexOf(b);
}

export function nextTier(tier: ModelTier, direction: 1 | -1): ModelTier | undefined {
  return TIER_ORDER[TIER_ORDER.indexOf(tier) + direction];
}
