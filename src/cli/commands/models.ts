/**
 * `cycleforge models`: inspect and change the per-role model selection.
 */

import { Command } from 'commander';
import { toError } from '../../core/errors.js';
import { ROLE_LABELS } from '../../models/catalog.js';
import type { ModelTierManager } from '../../models/tier-manager.js';
import type { ConfigurationAnalysis, CustomConfiguration } from '../../models/types.js';
import type { OllamaProvider } from '../../providers/ollama.js';
import { createRuntime, parseRole, parseTier, type GlobalOptions } from '../runtime.js';

function printAnalysis(analysis: ConfigurationAnalysis): void {
  console.log(`  Estimated RAM: ${analysis.estimatedRAM} GB of ${analysis.usableRAM} GB usable`);
  console.log(`  Disk:          ${analysis.totalDisk} GB`);
  console.log(`  Fits:          ${analysis.canFit ? 'yes' : 'no'}`);
  console.log(`  Speed:         ${analysis.speedRating}/10`);
  console.log(`  Quality:       ${analysis.qualityRating}/10`);
  console.log();
  for (const line of analysis.modelDescriptions) {
    console.log(`  • ${line}`);
  }
  console.log();
  console.log(`  ${analysis.recommendation}`);
}

async function printInstalled(
  tierManager: ModelTierManager,
  provider: OllamaProvider,
  config: CustomConfiguration,
): Promise<void> {
  let installed: string[];
  try {
    installed = await provider.listModels();
  } catch (err) {
    console.log(`Installed: unknown (${toError(err).message})`);
    return;
  }

  const availability = tierManager.checkModelsAvailable(installed, config);
  const missing = availability.filter(model => !model.installed);
  console.log(`Installed: ${availability.length - missing.length}/${availability.length} selected models`);
  for (const { role, variant } of missing) {
    console.log(`  ${ROLE_LABELS[role].padEnd(13)} missing, run: ollama pull ${variant.tag}`);
  }
}

export function createModelsCommand(): Command {
  const cmd = new Command('models');

  cmd
    .description('Show the model selection, its memory footprint and the tier comparison')
    .action(async (_options: unknown, command: Command) => {
      const { tierManager, provider } = createRuntime(command.optsWithGlobals<GlobalOptions>());
      const config = tierManager.getActiveConfiguration();

      console.log();
      console.log(`System RAM: ${tierManager.systemRAM} GB (recommended tier: ${tierManager.recommendedTier})`);
      console.log();
      for (const selection of config.selections) {
        const state = selection.enabled ? selection.tier : 'disabled';
        console.log(`  ${ROLE_LABELS[selection.role].padEnd(13)} ${state}`);
      }
      console.log();
      printAnalysis(tierManager.analyzeConfiguration(config));

      const memory = tierManager.getMemorySettings(config);
      console.log();
      console.log(`  Context window ${memory.contextWindow}, max tokens ${memory.maxTokens}, keep-alive ${memory.keepAlive}`);
      console.log();
      await printInstalled(tierManager, provider, config);
      console.log();
      console.log('Tiers:');
      for (const tier of tierManager.getTierComparisons()) {
        const marks = [tier.isRecommended ? 'recommended' : '', tier.isAvailable ? '' : 'needs more RAM']
          .filter(Boolean)
          .join(', ');
        console.log(
          `  ${tier.tier.padEnd(7)} ${String(tier.minRAM).padStart(3)} GB+  ${tier.parameterCount.padEnd(4)} ` +
            `${tier.totalDiskGB} GB disk  quality ${tier.quality}  speed ${tier.speed}${marks ? `  (${marks})` : ''}`,
        );
      }
      console.log();
    });

  cmd
    .command('set')
    .description('Select the tier for a role')
    .argument('<role>', 'orchestrator, coder, researcher or vision')
    .argument('<tier>', 'small, medium or large')
    .action((role: string, tier: string, _options: unknown, command: Command) => {
      const { tierManager } = createRuntime(command.optsWithGlobals<GlobalOptions>());
      const updated = tierManager.updateSelection(parseRole(role), { tier: parseTier(tier), enabled: true });
      console.log(`Saved. ${tierManager.analyzeConfiguration(updated).recommendation}`);
    });

  for (const enabled of [true, false]) {
    cmd
      .command(enabled ? 'enable' : 'disable')
      .description(`${enabled ? 'Enable' : 'Disable'} the model for a role`)
      .argument('<role>', 'orchestrator, coder, researcher or vision')
      .action((role: string, _options: unknown, command: Command) => {
        const { tierManager } = createRuntime(command.optsWithGlobals<GlobalOptions>());
        const updated = tierManager.updateSelection(parseRole(role), { enabled });
        console.log(`Saved. ${tierManager.analyzeConfiguration(updated).recommendation}`);
      });
  }

  return cmd;
}
