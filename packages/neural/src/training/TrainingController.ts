/**
 * TrainingController - multi-epoch training with checkpoints and callbacks
 *
 * Owns one Network for its lifetime. Cancellation is cooperative and only
 * observed at epoch boundaries; checkpoints are likewise only taken between
 * epochs, so a saved network always corresponds to a whole epoch count.
 */

import {
  fromCheckpoint,
  loadCheckpoint,
  saveCheckpoint as writeCheckpointFile,
  toCheckpoint,
} from '../checkpoint/codec.js';
import {
  CheckpointIoError,
  DimensionMismatchError,
  InvalidTrainingStateError,
  NothingToResumeError,
  TrainingCancelledError,
} from '../errors.js';
import { Matrix } from '../matrix/Matrix.js';
import type { Network } from '../network/Network.js';
import type { VectorInput } from '../network/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type {
  EpochDirective,
  TrainingCallback,
  TrainingConfig,
  TrainingControllerOptions,
  TrainingProgress,
  TrainingResult,
  TrainingState,
  TrainingStatus,
} from './types.js';

const DEFAULT_EXAMPLE_NAME = 'custom';

function vectorLength(value: VectorInput): number {
  return value instanceof Matrix ? value.data.length : value.length;
}

export class TrainingController {
  private readonly net: Network;
  private trainingConfig: TrainingConfig;
  private readonly callbacks: TrainingCallback[] = [];
  private readonly logger: Logger;
  private currentState: TrainingState = 'idle';
  private epoch = 0;

  constructor(network: Network, config: TrainingConfig, options: TrainingControllerOptions = {}) {
    this.validateConfig(config);
    this.net = network;
    this.trainingConfig = { ...config };
    this.logger = (options.logger ?? defaultLogger).child({ component: 'training' });
  }

  /**
   * Load a checkpoint and return a controller positioned at its epoch
   */
  static async resumeFromCheckpoint(
    source: string,
    config: TrainingConfig,
    options: TrainingControllerOptions = {}
  ): Promise<TrainingController> {
    const checkpoint = await loadCheckpoint(source);
    const storedEpoch = checkpoint.metadata.epoch;
    if (storedEpoch >= config.epochs) {
      throw new NothingToResumeError(storedEpoch, config.epochs);
    }

    const controller = new TrainingController(
      fromCheckpoint(checkpoint),
      { ...config, exampleName: config.exampleName ?? checkpoint.metadata.example },
      options
    );
    controller.epoch = storedEpoch;
    controller.logger.debug('Resumed from checkpoint', {
      path: source,
      epoch: storedEpoch,
      totalEpochs: config.epochs,
    });
    return controller;
  }

  get network(): Network {
    return this.net;
  }

  get state(): TrainingState {
    return this.currentState;
  }

  get currentEpoch(): number {
    return this.epoch;
  }

  get config(): Readonly<TrainingConfig> {
    return { ...this.trainingConfig };
  }

  get exampleName(): string {
    return this.trainingConfig.exampleName ?? DEFAULT_EXAMPLE_NAME;
  }

  /**
   * Register a progress callback. Callbacks run in registration order.
   */
  addCallback(callback: TrainingCallback): void {
    if (this.currentState !== 'idle') {
      throw new InvalidTrainingStateError('add a callback', this.currentState);
    }
    this.callbacks.push(callback);
  }

  /**
   * Raise the epoch budget of a completed or interrupted run and re-arm the
   * controller so train() continues from the current epoch
   */
  continueTo(totalEpochs: number): void {
    if (this.currentState !== 'completed' && this.currentState !== 'interrupted') {
      throw new InvalidTrainingStateError('continue training', this.currentState);
    }
    if (!Number.isInteger(totalEpochs) || totalEpochs <= this.epoch) {
      throw new NothingToResumeError(this.epoch, totalEpochs);
    }
    this.trainingConfig = { ...this.trainingConfig, epochs: totalEpochs };
    this.currentState = 'idle';
  }

  /**
   * Save the current network and epoch. Not allowed while training runs.
   */
  async saveCheckpoint(destination?: string): Promise<void> {
    if (this.currentState === 'running') {
      throw new InvalidTrainingStateError('save a checkpoint', this.currentState);
    }
    const target = destination ?? this.trainingConfig.checkpointPath;
    if (!target) {
      throw new CheckpointIoError('No checkpoint destination configured', '');
    }
    await this.writeCheckpoint(target);
  }

  /**
   * Run epochs currentEpoch+1 through config.epochs over the dataset
   */
  async train(
    inputs: readonly VectorInput[],
    targets: readonly VectorInput[]
  ): Promise<TrainingResult> {
    if (this.currentState !== 'idle') {
      throw new InvalidTrainingStateError('start training', this.currentState);
    }
    this.validateDataset(inputs, targets);

    const startTime = Date.now();
    const startEpoch = this.epoch;
    const totalEpochs = this.trainingConfig.epochs;
    const logInterval = totalEpochs < 100 ? 1 : Math.floor(totalEpochs / 100);
    let lastLoss: number | undefined;
    let checkpointsWritten = 0;
    let stopRequested = false;

    this.currentState = 'running';
    this.logger.debug('Training started', { startEpoch, totalEpochs, example: this.exampleName });

    try {
      for (const callback of this.callbacks) {
        await callback.onTrainingStart?.({ startEpoch, totalEpochs });
      }

      while (this.epoch < totalEpochs) {
        const loss = this.net.trainEpoch(inputs, targets);
        this.epoch++;
        lastLoss = loss;

        const logDue = this.epoch % logInterval === 0 || this.epoch === totalEpochs;
        if (this.trainingConfig.verbose && logDue) {
          this.logger.info(`Epoch ${this.epoch}/${totalEpochs}`, { loss });
        }

        stopRequested = await this.notifyEpochEnd({
          epoch: this.epoch,
          totalEpochs,
          loss,
          predictions: inputs.map((input) => this.net.evaluate(input)),
        });
        if (stopRequested) break;

        if (this.isCheckpointEpoch(this.epoch)) {
          await this.writeCheckpoint(this.trainingConfig.checkpointPath);
          checkpointsWritten++;
        }
      }

      if (stopRequested && this.trainingConfig.checkpointPath) {
        await this.writeCheckpoint(this.trainingConfig.checkpointPath);
        checkpointsWritten++;
      }
    } catch (error) {
      this.currentState = 'failed';
      this.logger.error('Training failed', error);
      throw error;
    }

    const status: TrainingStatus = stopRequested ? 'interrupted' : 'completed';
    this.currentState = status;
    const result: TrainingResult = {
      status,
      epochsCompleted: this.epoch,
      startEpoch,
      finalLoss: lastLoss ?? this.net.meanLoss(inputs, targets),
      checkpointsWritten,
      durationMs: Date.now() - startTime,
    };

    if (stopRequested) {
      this.logger.info('Training interrupted', { epoch: this.epoch, totalEpochs });
    } else {
      this.logger.debug('Training completed', { epoch: this.epoch, loss: result.finalLoss });
    }

    for (const callback of this.callbacks) {
      await callback.onTrainingEnd?.(result);
    }

    return result;
  }

  // ==========================================================================
  // Private Helper Methods
  // ==========================================================================

  /**
   * Every callback sees the epoch even after an earlier one asked to stop.
   * Returns whether cancellation was requested.
   */
  private async notifyEpochEnd(progress: TrainingProgress): Promise<boolean> {
    let stop = false;
    for (const callback of this.callbacks) {
      let directive: EpochDirective;
      try {
        directive = await callback.onEpochEnd(progress);
      } catch (error) {
        if (error instanceof TrainingCancelledError) {
          this.logger.debug('Cancellation requested', { epoch: progress.epoch, reason: error.message });
          stop = true;
          continue;
        }
        throw error;
      }
      if (directive === 'stop') stop = true;
    }
    return stop;
  }

  private isCheckpointEpoch(epoch: number): boolean {
    if (!this.trainingConfig.checkpointPath) return false;
    const interval = this.trainingConfig.checkpointInterval;
    if (interval !== undefined && epoch % interval === 0) return true;
    return epoch === this.trainingConfig.epochs;
  }

  private async writeCheckpoint(destination: string | undefined): Promise<void> {
    if (!destination) return;
    const checkpoint = toCheckpoint(this.net, {
      example: this.exampleName,
      epoch: this.epoch,
      totalEpochs: this.trainingConfig.epochs,
    });
    try {
      await writeCheckpointFile(checkpoint, destination);
    } catch (error) {
      this.logger.error('Checkpoint write failed', error);
      throw error;
    }
    this.logger.debug('Checkpoint written', { path: destination, epoch: this.epoch });
  }

  private validateConfig(config: TrainingConfig): void {
    if (!Number.isInteger(config.epochs) || config.epochs < 0) {
      throw new Error(`Epochs must be a non-negative integer, got ${config.epochs}`);
    }
    if (
      config.checkpointInterval !== undefined &&
      (!Number.isInteger(config.checkpointInterval) || config.checkpointInterval < 1)
    ) {
      throw new Error(`Checkpoint interval must be a positive integer, got ${config.checkpointInterval}`);
    }
  }

  private validateDataset(inputs: readonly VectorInput[], targets: readonly VectorInput[]): void {
    if (inputs.length !== targets.length) {
      throw new DimensionMismatchError(
        `Dataset has ${inputs.length} inputs but ${targets.length} targets`
      );
    }
    const { inputSize, outputSize } = this.net;
    inputs.forEach((input, i) => {
      if (vectorLength(input) !== inputSize) {
        throw new DimensionMismatchError(
          `Input ${i} has length ${vectorLength(input)}, network expects ${inputSize}`
        );
      }
    });
    targets.forEach((target, i) => {
      if (vectorLength(target) !== outputSize) {
        throw new DimensionMismatchError(
          `Target ${i} has length ${vectorLength(target)}, network expects ${outputSize}`
        );
      }
    });
  }
}
