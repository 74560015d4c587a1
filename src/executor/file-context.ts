import { glob } from 'glob';
import type { FileContextProvider } from './types.js';

const IGNORE = ['node_modules/**', '.git/**', 'dist/**', 'coverage/**', '.cycleforge/**'];

/**
 * Lists project files so the model knows what exists before reading.
 */
export class ProjectFileContext implements FileContextProvider {
  constructor(private readonly maxFiles = 100) {}

  async getContext(_task: string, workingDirectory?: string): Promise<string> {
    if (!workingDirectory) return '';
    const files = (await glob('**/*', { cwd: workingDirectory, ignore: IGNORE, nodir: true, maxDepth: 8 })).sort();
    const shown = files.slice(0, this.maxFiles);
    const more = files.length > shown.length ? `\n... and ${files.length - shown.length} more files` : '';
    return `${shown.join('\n')}${more}`;
  }
}
