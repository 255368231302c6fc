import * as fs from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { PROVIDERS } from '../../infra/enhancement/provider-types.js';
import { formatProviderError } from '../../infra/enhancement/provider-error.js';
import { describeError, fail, formatPercent, getOrchestrator } from '../lib/runtime.js';

interface EnhanceOptions {
  context?: string;
}

export const enhanceCommand = new Command('enhance')
  .description('Clean up a transcript with the active provider')
  .argument('<text...>', 'Transcript text')
  .option('-c, --context <text>', 'Extra context, such as an image description')
  .action(async (words: string[], options: EnhanceOptions) => {
    const orchestrator = getOrchestrator();
    const provider = orchestrator.activeProvider;
    if (!orchestrator.getSettings().enabled) {
      console.log(chalk.yellow('Enhancement is disabled; run `voxedit settings enable` first'));
    }

    const spinner = ora(`Enhancing with ${PROVIDERS[provider].displayName}...`).start();
    try {
      const result = await orchestrator.enhance(words.join(' '), {
        context: options.context,
        onProgress: (fraction) => {
          spinner.text = `Enhancing with ${PROVIDERS[provider].displayName}... ${formatPercent(fraction)}`;
        },
      });
      spinner.stop();
      console.log(result);
    } catch (error) {
      spinner.fail('Enhancement failed');
      fail(formatProviderError(provider, error));
    }
  });

export const describeImageCommand = new Command('describe-image')
  .description('Describe a screenshot with the selected image model')
  .argument('<file>', 'PNG or JPEG image')
  .action(async (file: string) => {
    let image: Buffer;
    try {
      image = fs.readFileSync(file);
    } catch (error) {
      fail(`Cannot read ${file}: ${describeError(error)}`);
    }

    const orchestrator = getOrchestrator();
    const provider = orchestrator.activeProvider;
    const spinner = ora(`Analyzing image with ${PROVIDERS[provider].displayName}...`).start();
    try {
      const description = await orchestrator.analyzeImage(new Uint8Array(image), {
        onProgress: (fraction) => {
          spinner.text = `Analyzing image with ${PROVIDERS[provider].displayName}... ${formatPercent(fraction)}`;
        },
      });
      spinner.stop();
      console.log(description);
    } catch (error) {
      spinner.fail('Image analysis failed');
      fail(formatProviderError(provider, error));
    }
  });
