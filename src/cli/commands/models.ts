import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { RemoteAIModel } from '../../infra/enhancement/provider-types.js';
import { PROVIDERS } from '../../infra/enhancement/provider-types.js';
import { fail, getOrchestrator } from '../lib/runtime.js';

interface CatalogOptions {
  image?: boolean;
}

export const modelsCommand = new Command('models');

modelsCommand
  .description('List and select models of the active provider')
  .addHelpText('after', `
Examples:
  $ voxedit models list                 Fetch text models
  $ voxedit models list --image         Fetch vision-capable models
  $ voxedit models select gemma3        Use gemma3 for enhancement
`);

function printCatalog(models: RemoteAIModel[], selected: string | undefined): void {
  models.forEach((model, idx) => {
    const marker = model.id === selected ? chalk.green('●') : ' ';
    const details = chalk.gray(`${model.ownedBy}, ${model.contextWindowTokens} ctx`);
    const label = model.displayName === model.id ? model.id : `${model.displayName} (${model.id})`;
    console.log(`  ${marker} ${String(idx + 1).padStart(2)}. ${chalk.white(label)} ${details}`);
  });
}

modelsCommand
  .command('list')
  .description('Fetch the model catalog')
  .option('-i, --image', 'List vision-capable models for image analysis')
  .action(async (options: CatalogOptions) => {
    const orchestrator = getOrchestrator();
    const provider = orchestrator.activeProvider;
    const spinner = ora(`Fetching models from ${PROVIDERS[provider].displayName}...`).start();

    if (options.image) {
      await orchestrator.loadImageModels();
    } else {
      await orchestrator.loadModels();
    }

    const state = orchestrator.getProviderState(provider);
    const errorMessage = options.image ? state.imageErrorMessage : state.errorMessage;
    if (errorMessage) {
      spinner.fail('Failed to fetch models');
      fail(errorMessage);
    }

    const models = options.image ? state.imageModels : state.textModels;
    spinner.succeed(`${models.length} ${options.image ? 'image' : 'text'} models`);
    printCatalog(
      models,
      options.image ? orchestrator.getSelectedImageModel() : orchestrator.getSelectedTextModel()
    );
    console.log();
  });

modelsCommand
  .command('select <modelId>')
  .description('Select a model for the active provider')
  .option('-i, --image', 'Select the image analysis model')
  .action((modelId: string, options: CatalogOptions) => {
    const orchestrator = getOrchestrator();
    if (options.image) {
      orchestrator.setSelectedImageModel(modelId);
    } else {
      orchestrator.setSelectedTextModel(modelId);
    }
    console.log(
      chalk.green(
        `✓ ${options.image ? 'Image' : 'Text'} model for ${PROVIDERS[orchestrator.activeProvider].displayName}: ${modelId}`
      )
    );
  });
