import { describe, it, expect } from 'vitest';
import { optionalNumber, optionalString, requireString } from '../../../src/tools/args.js';
import { resolveInside } from '../../../src/tools/paths.js';
import { ToolExecutionError } from '../../../src/core/errors.js';
import { join, resolve } from 'path';

describe('tool arguments', () => {
  it('requires non-empty strings', () => {
    expect(requireString({ path: 'a.ts' }, 'path', 'read_file')).toBe('a.ts');
    expect(() => requireString({ path: '' }, 'path', 'read_file')).toThrow(ToolExecutionError);
    expect(() => requireString({ path: 3 }, 'path', 'read_file')).toThrow('Missing required string argument "path"');
  });

  it('reads optional strings', () => {
    expect(optionalString({ q: 'x' }, 'q')).toBe('x');
    expect(optionalString({ q: '' }, 'q')).toBeUndefined();
    expect(optionalString({}, 'q')).toBeUndefined();
  });

  it('accepts numbers and numeric strings', () => {
    expect(optionalNumber({ n: 5 }, 'n')).toBe(5);
    expect(optionalNumber({ n: '12' }, 'n')).toBe(12);
    expect(optionalNumber({ n: 'twelve' }, 'n')).toBeUndefined();
    expect(optionalNumber({ n: ' ' }, 'n')).toBeUndefined();
    expect(optionalNumber({ n: Infinity }, 'n')).toBeUndefined();
  });
});

describe('resolveInside', () => {
  const root = resolve('/work/project');

  it('resolves relative paths against the working directory', () => {
    expect(resolveInside(root, 'src/a.ts', 'read_file')).toBe(join(root, 'src', 'a.ts'));
    expect(resolveInside(root, '.', 'read_file')).toBe(root);
  });

  it('refuses paths that escape the working directory', () => {
    expect(() => resolveInside(root, '../other/a.ts', 'read_file')).toThrow(
      'Path "../other/a.ts" is outside the working directory',
    );
    expect(() => resolveInside(root, '/etc/hosts', 'read_file')).toThrow(ToolExecutionError);
  });

  it('allows names that only start with two dots', () => {
    expect(resolveInside(root, '..cache', 'read_file')).toBe(join(root, '..cache'));
  });
});
