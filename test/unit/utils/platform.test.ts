import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { getGlobalDir, getMemoryGB, getProjectConfigPath, getStatePath } from '../../../src/utils/platform.js';

describe('platform', () => {
  it('places state under the global directory', () => {
    expect(getStatePath()).toBe(join(getGlobalDir(), 'state.yaml'));
    expect(getGlobalDir().endsWith('.cycleforge')).toBe(true);
  });

  it('places project config in the project root', () => {
    expect(getProjectConfigPath(join('work', 'app'))).toBe(join('work', 'app', '.cycleforge.yaml'));
  });

  it('reports whole gigabytes of memory', () => {
    expect(Number.isInteger(getMemoryGB())).toBe(true);
  });
});
