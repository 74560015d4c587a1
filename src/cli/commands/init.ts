import { resolve } from 'path';
import { Command } from 'commander';
import { ConfigManager } from '../../core/config.js';
import type { GlobalOptions } from '../runtime.js';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Write a starter .cycleforge.yaml in the project directory')
    .action((_options: unknown, command: Command) => {
      const { dir } = command.optsWithGlobals<GlobalOptions>();
      const { path, created } = new ConfigManager(resolve(dir ?? '.')).createProjectConfig();
      console.log(created ? `Created ${path}` : `Already exists: ${path}`);
    });
}
