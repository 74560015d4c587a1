import { isAbsolute, relative, resolve, sep } from 'path';
import { ToolExecutionError } from '../core/errors.js';

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return !(rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel));
}

/**
 * Resolve `path` against the working directory, refusing anything that
 * lands outside it.
 */
export function resolveInside(workingDir: string, path: string, tool: string): string {
  const root = resolve(workingDir);
  const target = resolve(root, path);
  if (!isInside(root, target)) {
    throw new ToolExecutionError(`Path "${path}" is outside the working directory`, tool);
  }
  return target;
}

/**
 * Glob patterns stay relative and never climb out of the search root.
 */
export function requireContainedPattern(pattern: string, tool: string): string {
  if (isAbsolute(pattern) || pattern.split(/[\\/]+/).includes('..')) {
    throw new ToolExecutionError(`Pattern "${pattern}" reaches outside the working directory`, tool);
  }
  return pattern;
}

/** Keep only entries of `dir` that resolve inside the working directory */
export function filterInside(workingDir: string, dir: string, entries: string[]): string[] {
  const root = resolve(workingDir);
  return entries.filter(entry => isInside(root, resolve(dir, entry)));
}
