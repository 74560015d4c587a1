import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { CycleForgeConfigSchema, PresetTypeSchema, type CycleForgeConfig } from './types.js';
import { ConfigurationError, toError } from './errors.js';
import { getGlobalDir, getProjectConfigPath } from '../utils/platform.js';

export type ConfigOverrides = {
  [K in keyof CycleForgeConfig]?: Partial<CycleForgeConfig[K]>;
};

export class ConfigManager {
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, options: { globalDir?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.globalDir = options.globalDir ?? getGlobalDir();
    this.projectDir = projectDir || process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: ConfigOverrides): CycleForgeConfig {
    let raw: Record<string, unknown> = {};

    // 1. Global config
    const globalConfigPath = join(this.globalDir, 'config.yaml');
    raw = this.deepMerge(raw, this.readYaml(globalConfigPath, 'global'));

    // 2. Project config
    const projectConfigPath = getProjectConfigPath(this.projectDir);
    raw = this.deepMerge(raw, this.readYaml(projectConfigPath, 'project'));

    // 3. Environment variables
    raw = this.applyEnvVars(raw);

    // 4. Overrides
    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    // 5. Validate with Zod
    const parsed = CycleForgeConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid configuration: ${detail}`, parsed.error);
    }

    return parsed.data;
  }

  /**
   * Write a starter project config unless one exists.
   */
  createProjectConfig(): { path: string; created: boolean } {
    const configPath = getProjectConfigPath(this.projectDir);
    if (existsSync(configPath)) {
      return { path: configPath, created: false };
    }
    mkdirSync(this.projectDir, { recursive: true });
    const defaultConfig = `# cycleforge project configuration
# Overrides ~/.cycleforge/config.yaml for this project
orchestration:
  # fast, balanced or thorough
  preset: balanced

executor:
  maxLoops: 50
`;
    writeFileSync(configPath, defaultConfig, 'utf-8');
    return { path: configPath, created: true };
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
    return isRecord(parsed) ? parsed : {};
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const result = { ...raw };

    if (this.env.OLLAMA_BASE_URL) {
      result.ollama = { ...asRecord(result.ollama), baseUrl: this.env.OLLAMA_BASE_URL };
    }

    const preset = this.env.CYCLEFORGE_PRESET;
    if (preset) {
      const parsed = PresetTypeSchema.safeParse(preset.toLowerCase());
      if (!parsed.success) {
        throw new ConfigurationError(`CYCLEFORGE_PRESET must be fast, balanced or thorough (got "${preset}")`);
      }
      result.orchestration = { ...asRecord(result.orchestration), preset: parsed.data };
    }

    const maxLoops = this.env.CYCLEFORGE_MAX_LOOPS;
    if (maxLoops) {
      result.executor = { ...asRecord(result.executor), maxLoops: Number(maxLoops) };
    }

    return result;
  }

  private deepMerge(target: Record<string, unknown>, source: object): Record<string, unknown> {
    const result = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = target[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}
