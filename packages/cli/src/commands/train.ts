import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import {
  Logger,
  Network,
  SIGMOID,
  TrainingController,
  createSeededRandom,
  getExample,
  EXAMPLE_NAMES,
  saveModel,
  toModelFile,
  type Example,
  type TrainingConfig,
  type TrainingResult,
} from '@logic-net/neural';
import {
  divider,
  errorMessage,
  formatVector,
  parseInteger,
  parsePositiveInteger,
  parsePositiveNumber,
  printError,
  renderTable,
} from '../utils/output.js';

export interface TrainOptions {
  example: string;
  epochs?: number;
  learningRate?: number;
  output?: string;
  checkpoint?: string;
  checkpointInterval?: number;
  resume?: string;
  seed?: number;
  verbose?: boolean;
  json?: boolean;
}

export interface TrainContext {
  /** Aborting requests a stop at the next epoch boundary */
  signal?: AbortSignal;
  logger?: Logger;
}

interface Prediction {
  input: number[];
  target: number[];
  output: number[];
}

function createCliLogger(verbose: boolean): Logger {
  return new Logger({ name: 'logic-net', level: verbose ? 'info' : 'warn' });
}

function progressStep(epochs: number): number {
  return epochs < 100 ? 1 : Math.floor(epochs / 100);
}

async function createController(
  example: Example,
  options: TrainOptions,
  logger: Logger
): Promise<TrainingController> {
  const config: TrainingConfig = {
    epochs: options.epochs ?? example.recommendedEpochs,
    checkpointInterval: options.checkpointInterval,
    // A resumed run keeps writing to the file it resumed from
    checkpointPath: options.checkpoint ?? options.resume,
    verbose: options.verbose,
  };

  if (options.resume) {
    // The checkpoint keeps its own example label
    const controller = await TrainingController.resumeFromCheckpoint(options.resume, config, { logger });
    if (controller.exampleName !== example.name) {
      throw new Error(`Checkpoint was trained on ${controller.exampleName}, not ${example.name}`);
    }
    return controller;
  }

  const random = options.seed === undefined ? undefined : createSeededRandom(options.seed);
  const network = Network.create(
    example.recommendedArchitecture,
    SIGMOID,
    options.learningRate ?? example.recommendedLearningRate,
    { random }
  );
  return new TrainingController(network, { ...config, exampleName: example.name }, { logger });
}

function predict(network: Network, example: Example): Prediction[] {
  return example.inputs.map((input, i) => ({
    input,
    target: example.targets[i],
    output: network.evaluate(input),
  }));
}

function printSummary(
  example: Example,
  result: TrainingResult,
  predictions: Prediction[],
  accuracy: number
): void {
  console.log('\n' + chalk.bold(`Final predictions (${example.name})`));
  console.log(
    renderTable(
      ['Input', 'Target', 'Output', 'Result'],
      predictions.map((p) => {
        const correct = p.output.every((value, i) => Math.round(value) === p.target[i]);
        return [
          p.input.join(', '),
          p.target.join(', '),
          formatVector(p.output),
          correct ? chalk.green('✓') : chalk.red('✗'),
        ];
      })
    )
  );
  console.log(divider());
  console.log(`Epochs:     ${chalk.cyan(`${result.epochsCompleted}`)}`);
  console.log(`Final loss: ${chalk.cyan(result.finalLoss.toFixed(6))}`);
  console.log(`Accuracy:   ${chalk.cyan(`${(accuracy * 100).toFixed(1)}%`)}`);
  console.log(`Duration:   ${chalk.gray(`${result.durationMs}ms`)}`);
  console.log(divider() + '\n');
}

export async function trainAction(options: TrainOptions, context: TrainContext = {}): Promise<number> {
  const example = getExample(options.example);
  if (!example) {
    printError(`Unknown example: ${options.example}. Available: ${EXAMPLE_NAMES.join(', ')}`);
    return 1;
  }
  if (options.resume && (options.learningRate !== undefined || options.seed !== undefined)) {
    printError('--learning-rate and --seed cannot be used with --resume; the checkpoint fixes both');
    return 1;
  }

  const quiet = options.json === true || options.verbose === true;
  const spinner = ora({ text: `Preparing ${example.name} training...`, isSilent: quiet });
  const stop = new AbortController();
  const onAbort = (): void => stop.abort();
  const onSigint = (): void => {
    spinner.text = 'Stopping after the current epoch...';
    stop.abort();
  };
  context.signal?.addEventListener('abort', onAbort);
  if (context.signal?.aborted) stop.abort();
  process.on('SIGINT', onSigint);

  try {
    const controller = await createController(
      example,
      options,
      context.logger ?? createCliLogger(options.verbose === true)
    );
    const { epochs } = controller.config;
    const step = progressStep(epochs);

    controller.addCallback({
      onTrainingStart: ({ startEpoch, totalEpochs }) => {
        spinner.start(`Training ${example.name} from epoch ${startEpoch} to ${totalEpochs}...`);
      },
      onEpochEnd: async ({ epoch, totalEpochs, loss }) => {
        if (stop.signal.aborted) return 'stop';
        if (epoch % step === 0) {
          spinner.text = `Epoch ${epoch}/${totalEpochs}  loss ${loss.toFixed(6)}`;
          // Let the SIGINT handler run
          await yieldToEventLoop();
        }
        return undefined;
      },
    });

    const result = await controller.train(example.inputs, example.targets);
    const network = controller.network;
    const predictions = predict(network, example);
    const accuracy = network.accuracy(example.inputs, example.targets);
    const checkpointPath = controller.config.checkpointPath;

    if (result.status === 'interrupted') {
      spinner.warn(`Training interrupted at epoch ${result.epochsCompleted}`);
    } else {
      spinner.succeed(`Trained ${example.name} for ${result.epochsCompleted} epochs`);
    }

    let modelPath: string | undefined;
    if (options.output && result.status === 'completed') {
      await saveModel(
        toModelFile(network, {
          example: example.name,
          trainedEpochs: result.epochsCompleted,
          finalLoss: result.finalLoss,
          finalAccuracy: accuracy,
        }),
        options.output
      );
      modelPath = options.output;
    }

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            example: example.name,
            status: result.status,
            start_epoch: result.startEpoch,
            epochs: result.epochsCompleted,
            final_loss: result.finalLoss,
            accuracy,
            checkpoints_written: result.checkpointsWritten,
            checkpoint_path: checkpointPath ?? null,
            model_path: modelPath ?? null,
            predictions,
          },
          null,
          2
        )
      );
      return 0;
    }

    printSummary(example, result, predictions, accuracy);
    if (result.status === 'interrupted' && checkpointPath) {
      console.log(chalk.yellow(`Checkpoint saved to ${checkpointPath}; resume with --resume ${checkpointPath}`));
    }
    if (modelPath) {
      console.log(chalk.green(`Model saved to ${modelPath}`));
    }
    return 0;
  } catch (error) {
    spinner.fail('Training failed');
    printError(errorMessage(error));
    return 1;
  } finally {
    process.off('SIGINT', onSigint);
    context.signal?.removeEventListener('abort', onAbort);
  }
}

export function trainCommand(program: Command): void {
  program
    .command('train')
    .description('Train a network on a built-in example')
    .requiredOption('-e, --example <name>', `Example to train (${EXAMPLE_NAMES.join(', ')})`)
    .option('-n, --epochs <n>', 'Total epochs (default: the example recommendation)', parsePositiveInteger)
    .option('-l, --learning-rate <rate>', 'Learning rate', parsePositiveNumber)
    .option('-o, --output <file>', 'Write the trained model to a file')
    .option('--checkpoint <file>', 'Checkpoint file')
    .option('--checkpoint-interval <n>', 'Epochs between checkpoints', parsePositiveInteger)
    .option('--resume <file>', 'Resume from a checkpoint file')
    .option('--seed <n>', 'Seed for reproducible initial weights', parseInteger)
    .option('-v, --verbose', 'Log progress lines instead of a spinner')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: TrainOptions) => {
      process.exitCode = await trainAction(options);
    });
}
