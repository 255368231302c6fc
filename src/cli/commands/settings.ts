import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { PROVIDERS } from '../../infra/enhancement/provider-types.js';
import { getSettingsPath } from '../../infra/config/settings-store.js';
import { fail, getOrchestrator } from '../lib/runtime.js';

interface PromptOptions {
  image?: boolean;
  reset?: boolean;
}

function firstLine(text: string): string {
  const line = text.split('\n')[0] ?? '';
  return text.includes('\n') ? `${line} …` : line;
}

async function showSettings(): Promise<void> {
  const settings = getOrchestrator().getSettings();
  const provider = settings.activeProvider;

  console.log(chalk.cyan('\nEnhancement settings:\n'));
  console.log(chalk.white('  Enabled:'), settings.enabled ? chalk.green('Yes') : chalk.red('No'));
  console.log(chalk.white('  Provider:'), PROVIDERS[provider].displayName);
  console.log(chalk.white('  Text model:'), settings.selectedTextModels[provider] ?? chalk.gray('(none)'));
  console.log(chalk.white('  Image model:'), settings.selectedImageModels[provider] ?? chalk.gray('(none)'));
  console.log(chalk.white('  Temperature:'), settings.temperature);
  console.log(chalk.white('  Prompt:'), chalk.gray(firstLine(settings.prompt)));
  console.log(chalk.white('  Image prompt:'), chalk.gray(firstLine(settings.imageAnalysisPrompt)));
  console.log(chalk.gray(`\n  ${getSettingsPath()}\n`));
}

export const settingsCommand = new Command('settings').description('Show and change enhancement settings');

settingsCommand.command('show').description('Show current settings').action(showSettings);

settingsCommand
  .command('enable')
  .description('Turn enhancement on and check the active provider')
  .action(async () => {
    const orchestrator = getOrchestrator();
    const spinner = ora('Enabling enhancement...').start();
    await orchestrator.setEnabled(true);

    const state = orchestrator.getProviderState();
    if (state.errorMessage) {
      spinner.warn('Enhancement enabled');
      console.log(chalk.yellow(`  ${state.errorMessage}`));
    } else {
      spinner.succeed('Enhancement enabled');
    }
  });

settingsCommand
  .command('disable')
  .description('Turn enhancement off')
  .action(async () => {
    await getOrchestrator().setEnabled(false);
    console.log(chalk.green('✓ Enhancement disabled'));
  });

settingsCommand
  .command('temperature <value>')
  .description('Set sampling temperature (0 to 1)')
  .action((value: string) => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      fail(`Not a number: ${value}`);
    }
    const orchestrator = getOrchestrator();
    orchestrator.setTemperature(parsed);
    console.log(chalk.green(`✓ Temperature set to ${orchestrator.getSettings().temperature}`));
  });

settingsCommand
  .command('prompt [text]')
  .description('Show or replace the enhancement prompt')
  .option('-i, --image', 'Use the image analysis prompt instead')
  .option('-r, --reset', 'Restore the default prompt')
  .action((text: string | undefined, options: PromptOptions) => {
    const orchestrator = getOrchestrator();
    const label = options.image ? 'Image analysis prompt' : 'Prompt';

    if (options.reset) {
      if (options.image) {
        orchestrator.resetImageAnalysisPrompt();
      } else {
        orchestrator.resetPrompt();
      }
      console.log(chalk.green(`✓ ${label} restored to default`));
      return;
    }

    if (text === undefined) {
      const settings = orchestrator.getSettings();
      console.log(options.image ? settings.imageAnalysisPrompt : settings.prompt);
      return;
    }

    if (options.image) {
      orchestrator.setImageAnalysisPrompt(text);
    } else {
      orchestrator.setPrompt(text);
    }
    console.log(chalk.green(`✓ ${label} updated`));
  });
