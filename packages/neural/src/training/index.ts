/**
 * Training module exports
 */

export { TrainingController } from './TrainingController.js';

export type {
  EpochDirective,
  TrainingCallback,
  TrainingConfig,
  TrainingControllerOptions,
  TrainingProgress,
  TrainingResult,
  TrainingStartInfo,
  TrainingState,
  TrainingStatus,
} from './types.js';
