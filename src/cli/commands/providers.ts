import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import { PROVIDERS, PROVIDER_KINDS } from '../../infra/enhancement/provider-types.js';
import { describeError, fail, getOrchestrator, maskSecret, parseProviderKind } from '../lib/runtime.js';

export const providersCommand = new Command('providers');

providersCommand
  .description('Choose and configure the enhancement provider')
  .addHelpText('after', `
Examples:
  $ voxedit providers list          Show providers and which one is active
  $ voxedit providers use groq      Switch to Groq and load its models
  $ voxedit providers key gemini    Store a Gemini API key (prompted)
  $ voxedit providers test          Test the active provider's connection
`);

providersCommand
  .command('list')
  .description('List providers')
  .action(() => {
    const orchestrator = getOrchestrator();
    const settings = orchestrator.getSettings();

    console.log(chalk.cyan('\nEnhancement providers:\n'));
    for (const kind of PROVIDER_KINDS) {
      const descriptor = PROVIDERS[kind];
      const marker = kind === settings.activeProvider ? chalk.green('●') : ' ';
      const credential = settings.credentials[kind];
      const keyInfo =
        descriptor.category === 'remote'
          ? credential
            ? chalk.gray(` key ${maskSecret(credential)}`)
            : chalk.yellow(' no API key')
          : '';
      console.log(`  ${marker} ${chalk.white(kind.padEnd(9))} ${descriptor.displayName}${keyInfo}`);
      console.log(chalk.gray(`      ${descriptor.description}`));
    }
    console.log(chalk.gray(`\nEnhancement is ${settings.enabled ? 'enabled' : 'disabled'}\n`));
  });

providersCommand
  .command('use <provider>')
  .description('Make a provider active and check it')
  .action(async (value: string) => {
    const provider = parseProviderKind(value);
    const orchestrator = getOrchestrator();
    const spinner = ora(`Activating ${PROVIDERS[provider].displayName}...`).start();

    try {
      await orchestrator.setActiveProvider(provider);
    } catch (error) {
      spinner.fail('Activation failed');
      fail(describeError(error));
    }

    const state = orchestrator.getProviderState(provider);
    if (state.available) {
      spinner.succeed(`${PROVIDERS[provider].displayName} is active`);
      console.log(chalk.white(`  Text models: ${state.textModels.length}, image models: ${state.imageModels.length}`));
    } else {
      spinner.warn(`${PROVIDERS[provider].displayName} is active but not available`);
    }
    if (state.errorMessage) {
      console.log(chalk.yellow(`  ${state.errorMessage}`));
    }
  });

providersCommand
  .command('key <provider> [apiKey]')
  .description('Store an API key for a remote provider (empty string clears it)')
  .action(async (value: string, apiKey: string | undefined) => {
    const provider = parseProviderKind(value);
    if (PROVIDERS[provider].category !== 'remote') {
      fail(`${PROVIDERS[provider].displayName} runs locally and takes no API key`);
    }

    let key = apiKey;
    if (key === undefined) {
      const answers = await inquirer.prompt<{ key: string }>([
        {
          type: 'password',
          name: 'key',
          message: `${PROVIDERS[provider].displayName} API key:`,
          mask: '*',
        },
      ]);
      key = answers.key;
    }

    getOrchestrator().setCredential(provider, key);
    console.log(
      key.trim()
        ? chalk.green(`✓ Saved API key for ${PROVIDERS[provider].displayName}`)
        : chalk.green(`✓ Removed API key for ${PROVIDERS[provider].displayName}`)
    );
  });

providersCommand
  .command('test')
  .description('Test the connection to the active provider')
  .action(async () => {
    const orchestrator = getOrchestrator();
    const provider = orchestrator.activeProvider;
    const spinner = ora(`Testing ${PROVIDERS[provider].displayName}...`).start();

    const success = await orchestrator.testConnection();
    const status = orchestrator.getProviderState(provider).connectionStatus ?? '';
    if (success) {
      spinner.succeed(status);
    } else {
      spinner.fail(status);
      process.exit(1);
    }
  });
