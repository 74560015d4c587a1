/**
 * `cycleforge agent "task"`: autonomous loop with tools. Questions from
 * the agent are answered on stdin.
 */

import { Command } from 'commander';
import * as readline from 'readline/promises';
import { CycleAgentManager } from '../../agents/cycle-manager.js';
import { AgentExecutor } from '../../executor/agent-executor.js';
import { ProjectFileContext } from '../../executor/file-context.js';
import type { AgentStep } from '../../executor/types.js';
import { getPreset } from '../../policy/quality-presets.js';
import { ToolRegistry } from '../../tools/registry.js';
import { createRuntime, parsePositiveInt, type GlobalOptions } from '../runtime.js';

interface AgentCommandOptions {
  maxLoops?: number;
}

function describeStep(step: AgentStep): string {
  switch (step.type) {
    case 'system':
      return `· ${step.text}`;
    case 'thinking':
      return `💭 ${step.text}`;
    case 'tool':
      return `${step.success ? '🔧' : '⚠️'} ${step.name}: ${step.output.split('\n')[0]}`;
    case 'userInput':
      return step.direction === 'question' ? `❓ ${step.text}` : `↳ ${step.text}`;
    case 'error':
      return `❌ ${step.text}`;
    case 'complete':
      return `✅ ${step.text}`;
  }
}

export function createAgentCommand(): Command {
  const cmd = new Command('agent');

  cmd
    .description('Run the autonomous agent loop on a task')
    .argument('<task>', 'The task to work on')
    .option('--max-loops <n>', 'Maximum reasoning steps', (value: string) => parsePositiveInt(value, '--max-loops'))
    .action(async (task: string, options: AgentCommandOptions, command: Command) => {
      await executeAgent(task, options, command.optsWithGlobals<GlobalOptions>());
    });

  return cmd;
}

async function executeAgent(task: string, options: AgentCommandOptions, globals: GlobalOptions): Promise<void> {
  const { projectDir, config, tierManager, provider, events } = createRuntime(
    globals,
    options.maxLoops !== undefined ? { executor: { maxLoops: options.maxLoops } } : {},
  );

  const manager = new CycleAgentManager({
    tierManager,
    invoker: provider,
    events,
    preset: config.orchestration.preset,
    retryBaseDelayMs: config.orchestration.retryBaseDelayMs,
  });

  const executor = new AgentExecutor({
    reasoner: provider,
    tools: ToolRegistry.createDefault({ delegator: manager }),
    events,
    fileContext: new ProjectFileContext(),
    maxLoops: config.executor.maxLoops,
    retryLimit: getPreset(config.orchestration.preset).retryLimit,
    retryBaseDelayMs: config.orchestration.retryBaseDelayMs,
  });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const onInterrupt = (): void => executor.stop();
  process.once('SIGINT', onInterrupt);
  rl.on('SIGINT', onInterrupt);

  events.on('agent:step', ({ step }) => {
    console.log(describeStep(step));
    if (step.type === 'userInput' && step.direction === 'question') {
      rl.question('> ').then(
        answer => {
          if (executor.waitingForUser) executor.provideUserInput(answer);
        },
        (err: unknown) => {
          console.error(`Input closed: ${err instanceof Error ? err.message : String(err)}`);
          executor.stop();
        },
      );
    }
  });

  try {
    const outcome = await executor.start(task, projectDir);
    console.log();
    console.log(`${outcome.status} after ${outcome.loops} step(s)`);
    if (outcome.status === 'error') {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    rl.close();
  }
}
