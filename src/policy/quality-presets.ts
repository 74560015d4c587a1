/**
 * Quality presets: fixed execution policies trading latency for rigor.
 */

import type { PresetType } from '../core/types.js';

export type VerificationLevel = 'none' | 'llmReview' | 'expertJudge';

export type StageType = 'knowledge' | 'plan' | 'implement' | 'scale' | 'production';

/** Run phases that carry a time budget */
export type BudgetedPhase = 'planning' | 'executing' | 'verifying';

export interface QualityPreset {
  readonly type: PresetType;
  readonly requiresPlanning: boolean;
  readonly verificationLevel: VerificationLevel;
  /** Retries per failed invocation, also the revision budget */
  readonly retryLimit: number;
  readonly targetTimeSeconds: number;
  readonly description: string;
  /** Stages the preset covers; each takes a share of targetTimeSeconds */
  readonly stages: readonly StageType[];
}

const PRESETS: Readonly<Record<PresetType, QualityPreset>> = {
  fast: {
    type: 'fast',
    requiresPlanning: false,
    verificationLevel: 'none',
    retryLimit: 0,
    targetTimeSeconds: 30,
    description: 'Single pass with no verification, for quick and simple tasks.',
    stages: ['knowledge', 'implement'],
  },
  balanced: {
    type: 'balanced',
    requiresPlanning: true,
    verificationLevel: 'llmReview',
    retryLimit: 1,
    targetTimeSeconds: 180,
    description: 'Plan, execute, then one model review. Suits most coding tasks.',
    stages: ['knowledge', 'plan', 'implement', 'production'],
  },
  thorough: {
    type: 'thorough',
    requiresPlanning: true,
    verificationLevel: 'expertJudge',
    retryLimit: 3,
    targetTimeSeconds: 600,
    description: 'Plan, execute, multi-judge review and revisions for critical changes.',
    stages: ['knowledge', 'plan', 'implement', 'scale', 'production'],
  },
};

const STAGE_SHARE: Readonly<Record<StageType, number>> = {
  knowledge: 0.15,
  plan: 0.2,
  implement: 0.4,
  scale: 0.15,
  production: 0.1,
};

const PHASE_STAGES: Readonly<Record<BudgetedPhase, readonly StageType[]>> = {
  planning: ['plan'],
  executing: ['knowledge', 'implement', 'scale'],
  verifying: ['production'],
};

const CRITICAL_KEYWORDS = ['security', 'production', 'refactor', 'migrate', 'critical', 'performance'];
const SIMPLE_KEYWORDS = ['tell me', 'explain', 'how do i', 'list', 'read', 'check'];

export function getPreset(type: PresetType): QualityPreset {
  return PRESETS[type];
}

export function listPresets(): QualityPreset[] {
  return Object.values(PRESETS);
}

/**
 * Pick a preset from the wording of a prompt. Critical keywords win over
 * simple ones.
 */
export function suggestPreset(prompt: string): PresetType {
  const lower = prompt.toLowerCase();
  if (CRITICAL_KEYWORDS.some(kw => lower.includes(kw))) return 'thorough';
  if (SIMPLE_KEYWORDS.some(kw => lower.includes(kw))) return 'fast';
  return 'balanced';
}

/** Time budget for one stage, in seconds */
export function targetDuration(preset: QualityPreset, stage: StageType): number {
  return preset.targetTimeSeconds * STAGE_SHARE[stage];
}

/**
 * Time budget for a run phase in seconds: the shares of the preset's stages
 * that the phase covers. 0 when the preset has none of them.
 */
export function phaseBudget(preset: QualityPreset, phase: BudgetedPhase): number {
  return PHASE_STAGES[phase]
    .filter(stage => preset.stages.includes(stage))
    .reduce((sum, stage) => sum + targetDuration(preset, stage), 0);
}
