/**
 * @logic-net/neural
 *
 * A small feed-forward neural network engine for logic-gate demonstrations.
 *
 * This package provides:
 * - Dense row-major matrices with a seeded random source
 * - A fully connected network trained by per-sample backpropagation
 * - A training controller with progress callbacks, cooperative cancellation,
 *   checkpoints and resume
 * - A versioned JSON codec for checkpoints and trained models
 *
 * @example
 * ```typescript
 * import { Network, SIGMOID, TrainingController, getExample } from '@logic-net/neural';
 *
 * const xor = getExample('xor');
 * if (!xor) throw new Error('xor example missing');
 *
 * const network = Network.create(xor.recommendedArchitecture, SIGMOID, 0.5);
 * const controller = new TrainingController(network, {
 *   epochs: xor.recommendedEpochs,
 *   checkpointPath: './checkpoints/xor.json',
 *   checkpointInterval: 1000,
 *   exampleName: 'xor',
 * });
 *
 * controller.addCallback({
 *   onEpochEnd: ({ epoch, loss }) => {
 *     if (epoch % 1000 === 0) console.log(epoch, loss);
 *   },
 * });
 *
 * const result = await controller.train(xor.inputs, xor.targets);
 * ```
 */

// =============================================================================
// Matrix
// =============================================================================

export { Matrix, createSeededRandom, defaultRandom } from './matrix/index.js';

export type { MatrixRecord, RandomSource } from './matrix/index.js';

// =============================================================================
// Activations
// =============================================================================

export {
  ACTIVATION_NAMES,
  SIGMOID,
  isActivationName,
  resolveActivation,
} from './activations/index.js';

export type { Activation, ActivationName } from './activations/index.js';

// =============================================================================
// Network
// =============================================================================

export { Network } from './network/index.js';

export type {
  Architecture,
  ForwardTrace,
  NetworkOptions,
  NetworkParts,
  VectorInput,
} from './network/index.js';

// =============================================================================
// Checkpoints and Model Files
// =============================================================================

export {
  CHECKPOINT_VERSION,
  SUPPORTED_VERSIONS,
  fromCheckpoint,
  fromNetworkRecord,
  loadCheckpoint,
  loadModel,
  loadNetworkFile,
  saveCheckpoint,
  saveModel,
  toCheckpoint,
  toModelFile,
  toNetworkRecord,
} from './checkpoint/index.js';

export type {
  CheckpointDocument,
  CheckpointMetadata,
  CheckpointMetadataRecord,
  LoadedNetworkFile,
  ModelDocument,
  ModelSummary,
  ModelSummaryRecord,
  NetworkRecord,
} from './checkpoint/index.js';

// =============================================================================
// Training
// =============================================================================

export { TrainingController } from './training/index.js';

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
} from './training/index.js';

// =============================================================================
// Built-in Examples
// =============================================================================

export { EXAMPLE_NAMES, getExample, isExampleName, listExamples } from './examples/index.js';

export type { Example, ExampleName } from './examples/index.js';

// =============================================================================
// Errors and Logging
// =============================================================================

export {
  ArchitectureMismatchError,
  CheckpointIoError,
  CorruptFormatError,
  DimensionMismatchError,
  InvalidArchitectureError,
  InvalidTrainingStateError,
  NeuralNetworkError,
  NothingToResumeError,
  TrainingCancelledError,
  UnknownActivationError,
  UnsupportedVersionError,
} from './errors.js';

export type { NeuralErrorCode } from './errors.js';

export { LOG_LEVELS, Logger, logger, parseLogLevel } from './utils/logger.js';

export type { LogLevel, LoggerOptions } from './utils/logger.js';
