/**
 * Configuration persistence.
 *
 * The engine treats storage as an opaque key-value store; the model
 * selection is one JSON-compatible value under CONFIGURATION_KEY.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, toError } from '../core/errors.js';
import { AGENT_ROLES, TIER_ORDER, type AgentRole, type CustomConfiguration } from './types.js';

export const CONFIGURATION_KEY = 'models.configuration';

export interface KeyValueStore {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  delete(key: string): void;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private values = new Map<string, unknown>();

  get(key: string): unknown {
    return this.values.get(key);
  }

  set(key: string, value: unknown): void {
    this.values.set(key, structuredClone(value));
  }

  delete(key: string): void {
    this.values.delete(key);
  }
}

/**
 * Whole-file YAML store. Every write rewrites the file through a temp
 * file and rename.
 */
export class YamlFileStore implements KeyValueStore {
  constructor(private readonly path: string) {}

  get(key: string): unknown {
    return this.readAll()[key];
  }

  set(key: string, value: unknown): void {
    const all = this.readAll();
    all[key] = value;
    this.writeAll(all);
  }

  delete(key: string): void {
    const all = this.readAll();
    if (!(key in all)) return;
    delete all[key];
    this.writeAll(all);
  }

  private readAll(): Record<string, unknown> {
    if (!existsSync(this.path)) return {};
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(this.path, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Failed to parse state file at ${this.path}`, toError(err));
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};
    return { ...parsed };
  }

  private writeAll(values: Record<string, unknown>): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, stringifyYaml(values), 'utf-8');
    renameSync(tmp, this.path);
  }
}

const ModelSelectionSchema = z.object({
  role: z.enum(AGENT_ROLES),
  tier: z.enum(TIER_ORDER),
  enabled: z.boolean(),
});

export const CustomConfigurationSchema = z.object({
  selections: z.array(ModelSelectionSchema).superRefine((selections, ctx) => {
    const seen = new Set<AgentRole>();
    selections.forEach((selection, index) => {
      if (seen.has(selection.role)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate selection for role "${selection.role}"`,
          path: [index, 'role'],
        });
      }
      seen.add(selection.role);
    });
  }),
});

/**
 * Validate an unknown value as a CustomConfiguration.
 */
export function parseCustomConfiguration(value: unknown): CustomConfiguration {
  const parsed = CustomConfigurationSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid model configuration: ${detail}`, parsed.error);
  }
  return parsed.data;
}

export function loadCustomConfiguration(store: KeyValueStore): CustomConfiguration | null {
  const value = store.get(CONFIGURATION_KEY);
  if (value === undefined || value === null) return null;
  return parseCustomConfiguration(value);
}

export function saveCustomConfiguration(store: KeyValueStore, config: CustomConfiguration): void {
  store.set(CONFIGURATION_KEY, parseCustomConfiguration(config));
}
