import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ProjectFileContext } from '../../../src/executor/file-context.js';

describe('ProjectFileContext', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cycleforge-ctx-'));
    mkdirSync(join(dir, 'src'));
    mkdirSync(join(dir, 'node_modules', 'dep'), { recursive: true });
    writeFileSync(join(dir, 'package.json'), '{}');
    writeFileSync(join(dir, 'src', 'index.ts'), '');
    writeFileSync(join(dir, 'src', 'util.ts'), '');
    writeFileSync(join(dir, 'node_modules', 'dep', 'index.js'), '');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists project files without dependencies', async () => {
    await expect(new ProjectFileContext().getContext('task', dir)).resolves.toBe(
      'package.json\nsrc/index.ts\nsrc/util.ts',
    );
  });

  it('caps the listing', async () => {
    await expect(new ProjectFileContext(2).getContext('task', dir)).resolves.toBe(
      'package.json\nsrc/index.ts\n... and 1 more files',
    );
  });

  it('returns nothing without a working directory', async () => {
    await expect(new ProjectFileContext().getContext('task')).resolves.toBe('');
  });
});
