/**
 * Capability classification: free-text task → TaskCapability set.
 *
 * The manager only depends on the CapabilityClassifier interface; the
 * keyword classifier is the default and reads its rules from
 * capability-rules.json next to this module.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError, toError } from '../core/errors.js';
import { TASK_CAPABILITIES, type TaskCapability } from './types.js';

export interface ClassificationHints {
  /** Attached image paths; any image forces imageAnalysis */
  images?: string[];
}

export interface Classification {
  capabilities: TaskCapability[];
  confidence: 'high' | 'low';
  /** Keywords that matched, for logging */
  matched: string[];
}

export interface CapabilityClassifier {
  classify(task: string, hints?: ClassificationHints): Classification;
}

const CapabilityRuleSchema = z.object({
  capability: z.enum(TASK_CAPABILITIES),
  keywords: z.array(z.string().min(1)).min(1),
});

const RuleFileSchema = z.object({
  rules: z.array(CapabilityRuleSchema),
});

export type CapabilityRule = z.infer<typeof CapabilityRuleSchema>;

const RULES_URL = new URL('./capability-rules.json', import.meta.url);

/**
 * Load and validate the bundled rule table.
 */
export function loadCapabilityRules(url: URL = RULES_URL): CapabilityRule[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(url, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Failed to read capability rules from ${url.pathname}`,
      toError(err),
    );
  }
  const parsed = RuleFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid capability rules: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data.rules;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Keyword matcher. Confidence is high when at least two keywords matched
 * or an image was attached.
 */
export class KeywordCapabilityClassifier implements CapabilityClassifier {
  private patterns: Array<{ capability: TaskCapability; keyword: string; pattern: RegExp }>;

  constructor(rules: CapabilityRule[] = loadCapabilityRules()) {
    this.patterns = rules.flatMap(rule =>
      rule.keywords.map(keyword => ({
        capability: rule.capability,
        keyword,
        pattern: new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}\\b`),
      })),
    );
  }

  classify(task: string, hints: ClassificationHints = {}): Classification {
    const text = task.toLowerCase();
    const capabilities = new Set<TaskCapability>();
    const matched: string[] = [];

    if (hints.images && hints.images.length > 0) {
      capabilities.add('imageAnalysis');
    }

    for (const { capability, keyword, pattern } of this.patterns) {
      if (pattern.test(text)) {
        capabilities.add(capability);
        matched.push(keyword);
      }
    }

    const forced = (hints.images?.length ?? 0) > 0;
    return {
      capabilities: TASK_CAPABILITIES.filter(c => capabilities.has(c)),
      confidence: forced || matched.length >= 2 ? 'high' : 'low',
      matched,
    };
  }
}
