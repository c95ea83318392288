import type { Command } from 'commander';
import chalk from 'chalk';
import { loadNetworkFile } from '@logic-net/neural';
import { divider, errorMessage, printError } from '../utils/output.js';
import { summarizeNetworkFile } from '../utils/network-file.js';

export interface InfoOptions {
  model: string;
  json?: boolean;
}

export async function infoAction(options: InfoOptions): Promise<number> {
  try {
    const summary = summarizeNetworkFile(await loadNetworkFile(options.model));

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            kind: summary.kind,
            version: summary.version,
            example: summary.example,
            epochs: summary.epochs,
            total_epochs: summary.totalEpochs ?? null,
            learning_rate: summary.learningRate,
            architecture: summary.architecture,
            parameters: summary.parameters,
            created: summary.created,
            final_loss: summary.finalLoss ?? null,
            final_accuracy: summary.finalAccuracy ?? null,
          },
          null,
          2
        )
      );
      return 0;
    }

    const epochs =
      summary.totalEpochs === undefined ? `${summary.epochs}` : `${summary.epochs}/${summary.totalEpochs}`;

    console.log('\n' + chalk.bold(summary.kind === 'checkpoint' ? 'Checkpoint' : 'Model'));
    console.log(divider());
    console.log(`File:          ${chalk.cyan(options.model)}`);
    console.log(`Version:       ${chalk.cyan(summary.version)}`);
    console.log(`Example:       ${chalk.cyan(summary.example)}`);
    console.log(`Epochs:        ${chalk.cyan(epochs)}`);
    console.log(`Learning rate: ${chalk.cyan(`${summary.learningRate}`)}`);
    console.log(`Architecture:  ${chalk.cyan(summary.architecture.join('-'))}`);
    console.log(`Parameters:    ${chalk.cyan(`${summary.parameters}`)}`);
    if (summary.finalLoss !== undefined) {
      console.log(`Final loss:    ${chalk.cyan(summary.finalLoss.toFixed(6))}`);
    }
    if (summary.finalAccuracy !== undefined) {
      console.log(`Accuracy:      ${chalk.cyan(`${(summary.finalAccuracy * 100).toFixed(1)}%`)}`);
    }
    console.log(`Created:       ${chalk.gray(summary.created)}`);
    console.log(divider() + '\n');
    return 0;
  } catch (error) {
    printError(errorMessage(error));
    return 1;
  }
}

export function infoCommand(program: Command): void {
  program
    .command('info')
    .description('Show metadata of a saved model or checkpoint')
    .requiredOption('-m, --model <file>', 'Model or checkpoint file')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: InfoOptions) => {
      process.exitCode = await infoAction(options);
    });
}
