/**
 * Training Controller Types
 */

import type { Logger } from '../utils/logger.js';

// =============================================================================
// Configuration
// =============================================================================

export interface TrainingConfig {
  /** Target epoch count; training runs until currentEpoch reaches it */
  epochs: number;
  /** Write a checkpoint every N epochs (and on the final epoch) */
  checkpointInterval?: number;
  /** Checkpoint destination; no checkpoints are written without one */
  checkpointPath?: string;
  /** Log progress at info level */
  verbose?: boolean;
  /** Dataset name recorded in checkpoints */
  exampleName?: string;
}

export interface TrainingControllerOptions {
  logger?: Logger;
}

// =============================================================================
// Lifecycle
// =============================================================================

export type TrainingState = 'idle' | 'running' | 'completed' | 'interrupted' | 'failed';

export type TrainingStatus = 'completed' | 'interrupted';

export interface TrainingStartInfo {
  /** Epochs already completed when the run began */
  startEpoch: number;
  totalEpochs: number;
}

export interface TrainingProgress {
  /** 1-based index of the epoch just completed */
  epoch: number;
  totalEpochs: number;
  /** Mean sample loss over the epoch */
  loss: number;
  /** Network output for every dataset input after the epoch */
  predictions: number[][];
}

export interface TrainingResult {
  status: TrainingStatus;
  /** Value of currentEpoch when the run ended */
  epochsCompleted: number;
  startEpoch: number;
  finalLoss: number;
  checkpointsWritten: number;
  durationMs: number;
}

/**
 * Returning 'stop' from onEpochEnd (or throwing TrainingCancelledError)
 * requests cancellation at the current epoch boundary
 */
export type EpochDirective = void | 'stop';

export interface TrainingCallback {
  onTrainingStart?: (info: TrainingStartInfo) => void | Promise<void>;
  onEpochEnd: (progress: TrainingProgress) => EpochDirective | Promise<EpochDirective>;
  /** Called once for completed and interrupted runs, never for failed ones */
  onTrainingEnd?: (result: TrainingResult) => void | Promise<void>;
}
