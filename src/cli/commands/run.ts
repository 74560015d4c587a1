/**
 * `cycleforge run "task"`: run a task through the specialist models.
 */

import { Command } from 'commander';
import { CycleAgentManager } from '../../agents/cycle-manager.js';
import { formatDuration, stopwatch } from '../../utils/timer.js';
import { createRuntime, parsePreset, parseRoleList, type GlobalOptions } from '../runtime.js';

interface RunCommandOptions {
  pipeline?: string;
  preset?: string;
}

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run a task; Auto mode picks one specialist, --pipeline chains several')
    .argument('<task>', 'The task to run')
    .option('-p, --pipeline <roles>', 'Comma-separated roles to run in order, e.g. researcher,coder')
    .option('--preset <preset>', 'Quality preset: fast, balanced, thorough, or auto to pick one from the task')
    .action(async (task: string, options: RunCommandOptions, command: Command) => {
      await executeRun(task, options, command.optsWithGlobals<GlobalOptions>());
    });

  return cmd;
}

async function executeRun(task: string, options: RunCommandOptions, globals: GlobalOptions): Promise<void> {
  const preset = options.preset ? parsePreset(options.preset, task) : undefined;
  const { projectDir, config, tierManager, provider, events } = createRuntime(
    globals,
    preset ? { orchestration: { preset } } : {},
  );

  if (options.preset?.trim().toLowerCase() === 'auto') {
    console.log(`Preset: ${config.orchestration.preset}`);
  }

  const manager = new CycleAgentManager({
    tierManager,
    invoker: provider,
    events,
    preset: config.orchestration.preset,
    retryBaseDelayMs: config.orchestration.retryBaseDelayMs,
  });

  events.on('orchestration:state', ({ state }) => console.log(`» ${state}`));
  events.on('orchestration:switch', ({ from, to, durationMs }) => {
    console.log(`  ↻ ${from ?? 'cold'} → ${to} (${formatDuration(durationMs)})`);
  });
  events.on('orchestration:step', ({ index, total, result }) => {
    console.log(`  ✓ step ${index + 1}/${total} ${result.agentId} (${formatDuration(result.executionTime)}, ~${result.tokensUsed} tokens)`);
  });
  events.on('orchestration:verdict', ({ reviewer, approved, feedback }) => {
    console.log(`  ${approved ? '✓' : '✗'} review by ${reviewer}${approved ? '' : `: ${feedback}`}`);
  });
  events.on('orchestration:overrun', ({ phase, elapsedMs, budgetMs }) => {
    console.log(`  ⏱ ${phase} took ${formatDuration(elapsedMs)}, over the ${formatDuration(budgetMs)} target`);
  });
  events.on('orchestration:retry', ({ role, attempt, error }) => {
    console.log(`  ! retry ${attempt} for ${role}: ${error}`);
  });

  const onInterrupt = (): void => manager.cancel();
  process.once('SIGINT', onInterrupt);

  const timer = stopwatch();
  try {
    const output = await manager.planAndExecute(
      task,
      { workingDirectory: projectDir },
      { agents: options.pipeline ? parseRoleList(options.pipeline) : undefined },
    );

    const stats = manager.getStatistics();
    console.log();
    console.log(output);
    console.log();
    console.log(
      `${manager.state} in ${timer.formatted()}: ${stats.modelSwitchCount} model switch(es), ` +
        `${formatDuration(stats.totalSwitchTime)} loading`,
    );
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
