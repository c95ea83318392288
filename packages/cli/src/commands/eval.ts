import type { Command } from 'commander';
import chalk from 'chalk';
import { getExample, loadNetworkFile, type Network } from '@logic-net/neural';
import { errorMessage, formatVector, parseVector, printError, renderTable } from '../utils/output.js';
import { summarizeNetworkFile } from '../utils/network-file.js';

export interface EvalOptions {
  model: string;
  /** Comma-separated input vector; omitted means the stored example's truth table */
  input?: string;
  json?: boolean;
}

interface EvaluatedRow {
  input: number[];
  target: number[];
  output: number[];
  correct: boolean;
}

function evaluateInput(network: Network, raw: string): number[] {
  const input = parseVector(raw);
  if (input.length !== network.inputSize) {
    throw new Error(`Input has ${input.length} values, network expects ${network.inputSize}`);
  }
  return input;
}

function evaluateExample(network: Network, exampleName: string): EvaluatedRow[] {
  const example = getExample(exampleName);
  if (!example) {
    throw new Error(`No input given and '${exampleName}' is not a built-in example; pass --input`);
  }
  return example.inputs.map((input, i) => {
    const target = example.targets[i];
    const output = network.evaluate(input);
    return {
      input,
      target,
      output,
      correct: output.every((value, j) => Math.round(value) === target[j]),
    };
  });
}

export async function evalAction(options: EvalOptions): Promise<number> {
  try {
    const loaded = await loadNetworkFile(options.model);
    const { network } = loaded;

    if (options.input !== undefined) {
      const input = evaluateInput(network, options.input);
      const output = network.evaluate(input);
      if (options.json) {
        console.log(JSON.stringify({ input, output }, null, 2));
      } else {
        console.log(`Input:  ${chalk.cyan(input.join(', '))}`);
        console.log(`Output: ${chalk.cyan(formatVector(output))}`);
      }
      return 0;
    }

    const { example } = summarizeNetworkFile(loaded);
    const rows = evaluateExample(network, example);
    const accuracy = rows.filter((row) => row.correct).length / rows.length;

    if (options.json) {
      console.log(JSON.stringify({ example, accuracy, rows }, null, 2));
      return 0;
    }

    console.log('\n' + chalk.bold(`Evaluation on ${example}`));
    console.log(
      renderTable(
        ['Input', 'Target', 'Output', 'Result'],
        rows.map((row) => [
          row.input.join(', '),
          row.target.join(', '),
          formatVector(row.output),
          row.correct ? chalk.green('✓') : chalk.red('✗'),
        ])
      )
    );
    console.log(`Accuracy: ${chalk.cyan(`${(accuracy * 100).toFixed(1)}%`)}\n`);
    return 0;
  } catch (error) {
    printError(errorMessage(error));
    return 1;
  }
}

export function evalCommand(program: Command): void {
  program
    .command('eval')
    .description('Evaluate a saved model or checkpoint')
    .requiredOption('-m, --model <file>', 'Model or checkpoint file')
    .option('-i, --input <values>', 'Comma-separated input, e.g. 1,0')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: EvalOptions) => {
      process.exitCode = await evalAction(options);
    });
}
