/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { CycleForgeError } from '../core/errors.js';
import { NAME, VERSION } from '../version.js';
import { createAgentCommand } from './commands/agent.js';
import { createInitCommand } from './commands/init.js';
import { createModelsCommand } from './commands/models.js';
import { createRunCommand } from './commands/run.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Run tasks across local specialist models that fit in memory')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-v, --verbose', 'Log to the console instead of the log file');

  program.addCommand(createModelsCommand());
  program.addCommand(createRunCommand());
  program.addCommand(createAgentCommand());
  program.addCommand(createInitCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      const code = error instanceof CycleForgeError ? ` [${error.code}]` : '';
      console.error(`\n❌ ${error.message}${code}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    } else {
      console.error(String(error));
    }
    process.exitCode = 1;
  }
}
