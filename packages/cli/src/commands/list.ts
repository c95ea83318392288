import type { Command } from 'commander';
import chalk from 'chalk';
import { listExamples } from '@logic-net/neural';
import { renderTable } from '../utils/output.js';

export interface ListOptions {
  json?: boolean;
}

export function listAction(options: ListOptions = {}): number {
  const examples = listExamples();

  if (options.json) {
    console.log(
      JSON.stringify(
        examples.map((example) => ({
          name: example.name,
          description: example.description,
          architecture: example.recommendedArchitecture,
          epochs: example.recommendedEpochs,
          learning_rate: example.recommendedLearningRate,
        })),
        null,
        2
      )
    );
    return 0;
  }

  console.log('\n' + chalk.bold('Built-in examples'));
  console.log(
    renderTable(
      ['Name', 'Architecture', 'Epochs', 'Description'],
      examples.map((example) => [
        chalk.cyan(example.name),
        example.recommendedArchitecture.join('-'),
        String(example.recommendedEpochs),
        example.description,
      ])
    )
  );
  return 0;
}

export function listCommand(program: Command): void {
  program
    .command('list')
    .description('List the built-in training examples')
    .option('-j, --json', 'Output as JSON')
    .action((options: ListOptions) => {
      process.exitCode = listAction(options);
    });
}
