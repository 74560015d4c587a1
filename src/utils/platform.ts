import { homedir, totalmem } from 'os';
import { join } from 'path';

const BYTES_PER_GB = 1024 * 1024 * 1024;

/**
 * Get the cycleforge global data directory
 */
export function getGlobalDir(): string {
  return join(homedir(), '.cycleforge');
}

/**
 * Get the project config file path
 */
export function getProjectConfigPath(projectDir: string): string {
  return join(projectDir, '.cycleforge.yaml');
}

/**
 * Path of the persisted model selection store
 */
export function getStatePath(): string {
  return join(getGlobalDir(), 'state.yaml');
}

/**
 * Physical memory in whole GB
 */
export function getMemoryGB(): number {
  return Math.floor(totalmem() / BYTES_PER_GB);
}
