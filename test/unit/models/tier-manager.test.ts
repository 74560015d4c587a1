import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../src/core/errors.js';
import { MemoryKeyValueStore } from '../../../src/models/configuration-store.js';
import { ModelTierManager, detectSystemRAM, recommendedTier } from '../../../src/models/tier-manager.js';
import { AGENT_ROLES, type CustomConfiguration } from '../../../src/models/types.js';

const smallCoderOnly: CustomConfiguration = {
  selections: [{ role: 'coder', tier: 'small', enabled: true }],
};

describe('recommendedTier', () => {
  it('maps RAM to tiers at the 24 and 32 GB thresholds', () => {
    expect(recommendedTier(8)).toBe('small');
    expect(recommendedTier(23.9)).toBe('small');
    expect(recommendedTier(24)).toBe('medium');
    expect(recommendedTier(31.9)).toBe('medium');
    expect(recommendedTier(32)).toBe('large');
    expect(recommendedTier(128)).toBe('large');
  });
});

describe('detectSystemRAM', () => {
  it('returns the probed value', () => {
    expect(detectSystemRAM(() => 64)).toBe(64);
  });

  it('falls back when the probe throws', () => {
    expect(
      detectSystemRAM(() => {
        throw new Error('no sysctl');
      }, 12),
    ).toBe(12);
  });

  it('falls back on unusable values', () => {
    expect(detectSystemRAM(() => NaN, 16)).toBe(16);
    expect(detectSystemRAM(() => 0, 16)).toBe(16);
    expect(detectSystemRAM(() => -4, 16)).toBe(16);
  });
});

describe('ModelTierManager', () => {
  describe('construction', () => {
    it('uses injected RAM and derives usable RAM', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      expect(manager.systemRAM).toBe(16);
      expect(manager.usableRAM).toBe(12);
      expect(manager.recommendedTier).toBe('small');
    });

    it('uses the probe when no RAM is injected', () => {
      const manager = new ModelTierManager({ probe: () => 48 });
      expect(manager.systemRAM).toBe(48);
      expect(manager.recommendedTier).toBe('large');
    });

    it('applies settings overrides', () => {
      const manager = new ModelTierManager({ systemRAM: 16, settings: { safetyFactor: 0.5 } });
      expect(manager.usableRAM).toBe(8);
      expect(manager.settings.overheadFactor).toBe(1.2);
    });
  });

  describe('analyzeConfiguration', () => {
    it('analyzes a single small coder on a 16 GB host', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      const analysis = manager.analyzeConfiguration(smallCoderOnly);

      expect(analysis.canFit).toBe(true);
      expect(analysis.estimatedRAM).toBe(6);
      expect(analysis.usableRAM).toBe(12);
      expect(analysis.totalDisk).toBe(4.5);
      expect(analysis.speedRating).toBe(9);
      expect(analysis.qualityRating).toBe(6);
      expect(analysis.recommendation).toBe('Configuration fits comfortably.');
      expect(analysis.modelDescriptions).toEqual(['Coder: Qwen2.5-Coder 7B (7B, 4.5 GB disk, ~6.0 GB RAM)']);
    });

    it('suggests disabling the heaviest small model when nothing fits', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      const analysis = manager.analyzeConfiguration(manager.createDefaultConfiguration());

      expect(analysis.canFit).toBe(false);
      expect(analysis.estimatedRAM).toBe(24.6);
      expect(analysis.totalDisk).toBe(18.5);
      // 9 - 0.5 * 3, halved for not fitting
      expect(analysis.speedRating).toBe(3.8);
      expect(analysis.qualityRating).toBe(6);
      expect(analysis.recommendation).toBe(
        'Needs 24.6 GB but only 12.0 GB is usable. Disable Orchestrator (Qwen3 8B).',
      );
    });

    it('suggests a downgrade when the target is above small', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      const analysis = manager.analyzeConfiguration({
        selections: [
          { role: 'coder', tier: 'medium', enabled: true },
          { role: 'researcher', tier: 'small', enabled: true },
        ],
      });

      expect(analysis.canFit).toBe(false);
      expect(analysis.estimatedRAM).toBe(18);
      expect(analysis.recommendation).toBe(
        'Needs 18.0 GB but only 12.0 GB is usable. Downgrade Coder from medium to small (Qwen2.5-Coder 7B).',
      );
    });

    it('suggests an upgrade when there is enough headroom', () => {
      const manager = new ModelTierManager({ systemRAM: 32 });
      const analysis = manager.analyzeConfiguration(smallCoderOnly);

      expect(analysis.usableRAM).toBe(24);
      expect(analysis.recommendation).toBe(
        '18.0 GB headroom available. Consider upgrading Coder to medium (Qwen2.5-Coder 14B).',
      );
    });

    it('weights quality by role and penalizes extra models', () => {
      const manager = new ModelTierManager({ systemRAM: 64 });
      const analysis = manager.analyzeConfiguration({
        selections: [
          { role: 'coder', tier: 'large', enabled: true },
          { role: 'vision', tier: 'small', enabled: true },
        ],
      });

      // quality (10 * 1.5 + 6 * 0.5) / 2 = 9, speed (5 * 1.5 + 9 * 0.5) / 2 - 0.5 = 5.5
      expect(analysis.qualityRating).toBe(9);
      expect(analysis.speedRating).toBe(5.5);
      expect(analysis.canFit).toBe(true);
    });

    it('targets the heaviest large model when three large models overflow 16 GB', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      const analysis = manager.analyzeConfiguration({
        selections: [
          { role: 'coder', tier: 'large', enabled: true },
          { role: 'researcher', tier: 'large', enabled: true },
          { role: 'vision', tier: 'large', enabled: true },
        ],
      });

      expect(analysis.canFit).toBe(false);
      expect(analysis.estimatedRAM).toBe(76.8);
      expect(analysis.recommendation).toBe(
        'Needs 76.8 GB but only 12.0 GB is usable. Downgrade Researcher from large to medium (Command-R 14B).',
      );
    });

    it('never lowers the estimate when a model is enabled', () => {
      const manager = new ModelTierManager({ systemRAM: 32 });
      const selections = AGENT_ROLES.map(role => ({ role, tier: 'medium' as const, enabled: false }));
      let previous = manager.analyzeConfiguration({ selections }).estimatedRAM;

      for (let i = 0; i < selections.length; i++) {
        selections[i] = { ...selections[i], enabled: true };
        const next = manager.analyzeConfiguration({ selections }).estimatedRAM;
        expect(next).toBeGreaterThanOrEqual(previous);
        previous = next;
      }
      expect(previous).toBe(48);
    });

    it('is pure', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      const config = manager.createDefaultConfiguration();
      const snapshot = structuredClone(config);

      expect(manager.analyzeConfiguration(config)).toEqual(manager.analyzeConfiguration(config));
      expect(config).toEqual(snapshot);
    });

    it('handles a configuration with nothing enabled', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      const analysis = manager.analyzeConfiguration({
        selections: [{ role: 'coder', tier: 'large', enabled: false }],
      });

      expect(analysis).toEqual({
        canFit: true,
        estimatedRAM: 0,
        usableRAM: 12,
        totalDisk: 0,
        speedRating: 0,
        qualityRating: 0,
        recommendation: 'Select at least one model.',
        modelDescriptions: [],
      });
    });

    it('returns a frozen result', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      expect(Object.isFrozen(manager.analyzeConfiguration(smallCoderOnly))).toBe(true);
    });
  });

  describe('getMemorySettings', () => {
    it('uses the recommended tier base when the selection fits', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      expect(manager.getMemorySettings(smallCoderOnly)).toEqual({
        contextWindow: 4096,
        maxTokens: 2048,
        keepAlive: '5m',
      });
    });

    it('halves the context window per tier above the recommendation', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      const settings = manager.getMemorySettings({
        selections: [{ role: 'coder', tier: 'medium', enabled: true }],
      });
      expect(settings).toEqual({ contextWindow: 2048, maxTokens: 1024, keepAlive: '5m' });
    });

    it('shrinks further and unloads immediately when the selection does not fit', () => {
      const manager = new ModelTierManager({ systemRAM: 32 });
      const settings = manager.getMemorySettings(manager.createDefaultConfiguration());
      expect(settings).toEqual({ contextWindow: 8192, maxTokens: 4096, keepAlive: '0' });
    });

    it('never goes below the minimum context window', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      const settings = manager.getMemorySettings({
        selections: [{ role: 'coder', tier: 'large', enabled: true }],
      });
      expect(settings.contextWindow).toBe(2048);
      expect(settings.maxTokens).toBe(1024);
      expect(settings.keepAlive).toBe('0');
    });
  });

  describe('active configuration', () => {
    it('defaults to every role at the recommended tier', () => {
      const manager = new ModelTierManager({ systemRAM: 24 });
      expect(manager.getActiveConfiguration()).toEqual({
        selections: [
          { role: 'orchestrator', tier: 'medium', enabled: true },
          { role: 'coder', tier: 'medium', enabled: true },
          { role: 'researcher', tier: 'medium', enabled: true },
          { role: 'vision', tier: 'medium', enabled: true },
        ],
      });
    });

    it('saves a fitting configuration and fills missing roles as disabled', () => {
      const store = new MemoryKeyValueStore();
      const manager = new ModelTierManager({ systemRAM: 16, store });

      const analysis = manager.saveConfiguration(smallCoderOnly);
      expect(analysis.estimatedRAM).toBe(6);

      const reloaded = new ModelTierManager({ systemRAM: 16, store });
      expect(reloaded.getActiveConfiguration()).toEqual({
        selections: [
          { role: 'orchestrator', tier: 'small', enabled: false },
          { role: 'coder', tier: 'small', enabled: true },
          { role: 'researcher', tier: 'small', enabled: false },
          { role: 'vision', tier: 'small', enabled: false },
        ],
      });
    });

    it('rejects a configuration that does not fit', () => {
      const store = new MemoryKeyValueStore();
      const manager = new ModelTierManager({ systemRAM: 16, store });

      expect(() => manager.saveConfiguration(manager.createDefaultConfiguration())).toThrow(ConfigurationError);
      expect(() => manager.saveConfiguration(manager.createDefaultConfiguration())).toThrow(
        'Configuration needs 24.6 GB but only 12.0 GB is usable.',
      );
      expect(store.get('models.configuration')).toBeUndefined();
    });

    it('updates one selection and keeps the stored value when the update does not fit', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      manager.saveConfiguration(smallCoderOnly);

      const next = manager.updateSelection('researcher', { enabled: true });
      expect(next.selections.filter(s => s.enabled).map(s => s.role)).toEqual(['coder', 'researcher']);
      expect(manager.analyzeConfiguration(manager.getActiveConfiguration()).estimatedRAM).toBe(12);

      expect(() => manager.updateSelection('orchestrator', { enabled: true })).toThrow(ConfigurationError);
      expect(manager.getActiveConfiguration()).toEqual(next);
    });
  });

  describe('model availability', () => {
    const coderAndResearcher: CustomConfiguration = {
      selections: [
        { role: 'orchestrator', tier: 'small', enabled: false },
        { role: 'coder', tier: 'medium', enabled: true },
        { role: 'researcher', tier: 'small', enabled: true },
      ],
    };

    it('lists the variants of enabled roles', () => {
      const manager = new ModelTierManager({ systemRAM: 32 });
      expect(manager.getModelsToDownload(coderAndResearcher).map(m => `${m.role}=${m.variant.tag}`)).toEqual([
        'coder=qwen2.5-coder:14b',
        'researcher=command-r:7b',
      ]);
    });

    it('defaults to the active configuration', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      expect(manager.getModelsToDownload().map(m => m.variant.tag)).toEqual([
        'qwen3:8b',
        'qwen2.5-coder:7b',
        'command-r:7b',
        'qwen2-vl:7b',
      ]);
    });

    it('marks which required models are installed', () => {
      const manager = new ModelTierManager({ systemRAM: 32 });
      const availability = manager.checkModelsAvailable(['command-r:7b', 'qwen2.5-coder:7b', 'llama3:latest'], coderAndResearcher);
      expect(availability.map(m => [m.variant.tag, m.installed])).toEqual([
        ['qwen2.5-coder:14b', false],
        ['command-r:7b', true],
      ]);
    });

    it('matches tags case-insensitively', () => {
      const manager = new ModelTierManager({ systemRAM: 32 });
      const availability = manager.checkModelsAvailable([' Command-R:7B '], coderAndResearcher);
      expect(availability.map(m => m.installed)).toEqual([false, true]);
    });
  });

  describe('getTierComparisons', () => {
    it('summarizes each tier for a 16 GB host', () => {
      const manager = new ModelTierManager({ systemRAM: 16 });
      expect(manager.getTierComparisons()).toEqual([
        {
          tier: 'small',
          minRAM: 16,
          totalDiskGB: 18.5,
          parameterCount: '8B',
          quality: 6,
          speed: 9,
          isRecommended: true,
          isAvailable: true,
        },
        {
          tier: 'medium',
          minRAM: 24,
          totalDiskGB: 36,
          parameterCount: '14B',
          quality: 8,
          speed: 7,
          isRecommended: false,
          isAvailable: false,
        },
        {
          tier: 'large',
          minRAM: 32,
          totalDiskGB: 80,
          parameterCount: '32B',
          quality: 10,
          speed: 5,
          isRecommended: false,
          isAvailable: false,
        },
      ]);
    });
  });

  it('estimates a single variant with overhead', () => {
    const manager = new ModelTierManager({ systemRAM: 16 });
    const [{ variant }] = manager.getModelOptions('researcher');
    expect(variant.name).toBe('Command-R 7B');
    expect(manager.estimateVariantRAM(variant)).toBe(6);
  });
});
