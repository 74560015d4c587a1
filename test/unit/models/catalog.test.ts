import { describe, it, expect } from 'vitest';
import { compareTiers, getVariant, listVariants, nextTier } from '../../../src/models/catalog.js';
import { AGENT_ROLES, TIER_ORDER } from '../../../src/models/types.js';

describe('model catalog', () => {
  it('has a variant for every role and tier', () => {
    for (const role of AGENT_ROLES) {
      for (const tier of TIER_ORDER) {
        const variant = getVariant(role, tier);
        expect(variant.tier).toBe(tier);
        expect(variant.tag).toMatch(/^[a-z0-9.-]+:[a-z0-9]+$/);
        expect(variant.estimatedRamGB).toBeGreaterThan(variant.diskSizeGB);
      }
    }
  });

  it('grows in size and quality and shrinks in speed by tier', () => {
    for (const role of AGENT_ROLES) {
      const [small, medium, large] = TIER_ORDER.map(tier => getVariant(role, tier));
      expect(small.diskSizeGB).toBeLessThan(medium.diskSizeGB);
      expect(medium.diskSizeGB).toBeLessThan(large.diskSizeGB);
      expect(small.quality).toBeLessThan(large.quality);
      expect(small.speed).toBeGreaterThan(large.speed);
    }
  });

  it('returns the expected orchestrator variants', () => {
    expect(getVariant('orchestrator', 'small')).toMatchObject({
      name: 'Qwen3 8B',
      tag: 'qwen3:8b',
      parameterCount: '8B',
      diskSizeGB: 5,
      estimatedRamGB: 5.5,
      quality: 6,
      speed: 9,
    });
    expect(getVariant('vision', 'large').name).toBe('Qwen3-VL 32B');
  });

  it('lists variants by ascending disk size', () => {
    expect(listVariants('researcher').map(v => v.tier)).toEqual(['small', 'medium', 'large']);
  });

  it('orders and steps through tiers', () => {
    expect(compareTiers('small', 'large')).toBeLessThan(0);
    expect(compareTiers('large', 'medium')).toBeGreaterThan(0);
    expect(compareTiers('medium', 'medium')).toBe(0);
    expect(nextTier('small', 1)).toBe('medium');
    expect(nextTier('large', 1)).toBeUndefined();
    expect(nextTier('medium', -1)).toBe('small');
    expect(nextTier('small', -1)).toBeUndefined();
  });

  it('freezes variants', () => {
    expect(Object.isFrozen(getVariant('coder', 'medium'))).toBe(true);
  });
});
