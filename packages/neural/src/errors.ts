/**
 * Error classes for the neural engine
 *
 * Every failure the engine can report is a subclass of NeuralNetworkError and
 * carries a stable `code` so adapters can map it without string matching.
 */

export type NeuralErrorCode =
  | 'DIMENSION_MISMATCH'
  | 'INVALID_ARCHITECTURE'
  | 'IO_ERROR'
  | 'CORRUPT_FORMAT'
  | 'UNSUPPORTED_VERSION'
  | 'ARCHITECTURE_MISMATCH'
  | 'NOTHING_TO_RESUME'
  | 'UNKNOWN_ACTIVATION'
  | 'INVALID_STATE'
  | 'TRAINING_CANCELLED';

/**
 * Base error class for the neural engine
 */
export class NeuralNetworkError extends Error {
  constructor(
    message: string,
    public readonly code: NeuralErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NeuralNetworkError';
    Object.setPrototypeOf(this, NeuralNetworkError.prototype);
  }
}

/**
 * Thrown when operand shapes are incompatible, or an input/target vector has
 * the wrong length for the network
 */
export class DimensionMismatchError extends NeuralNetworkError {
  constructor(message: string) {
    super(message, 'DIMENSION_MISMATCH');
    this.name = 'DimensionMismatchError';
    Object.setPrototypeOf(this, DimensionMismatchError.prototype);
  }
}

export class InvalidArchitectureError extends NeuralNetworkError {
  constructor(message: string) {
    super(message, 'INVALID_ARCHITECTURE');
    this.name = 'InvalidArchitectureError';
    Object.setPrototypeOf(this, InvalidArchitectureError.prototype);
  }
}

/**
 * Checkpoint or model file could not be read or written
 */
export class CheckpointIoError extends NeuralNetworkError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, 'IO_ERROR', { cause });
    this.name = 'CheckpointIoError';
    Object.setPrototypeOf(this, CheckpointIoError.prototype);
  }
}

export class CorruptFormatError extends NeuralNetworkError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CORRUPT_FORMAT', { cause });
    this.name = 'CorruptFormatError';
    Object.setPrototypeOf(this, CorruptFormatError.prototype);
  }
}

export class UnsupportedVersionError extends NeuralNetworkError {
  constructor(
    public readonly version: string,
    public readonly supported: readonly string[]
  ) {
    super(
      `Unsupported checkpoint version: ${version}. Expected one of: ${supported.join(', ')}`,
      'UNSUPPORTED_VERSION'
    );
    this.name = 'UnsupportedVersionError';
    Object.setPrototypeOf(this, UnsupportedVersionError.prototype);
  }
}

/**
 * Stored weight/bias shapes disagree with the declared architecture
 */
export class ArchitectureMismatchError extends NeuralNetworkError {
  constructor(message: string) {
    super(message, 'ARCHITECTURE_MISMATCH');
    this.name = 'ArchitectureMismatchError';
    Object.setPrototypeOf(this, ArchitectureMismatchError.prototype);
  }
}

export class NothingToResumeError extends NeuralNetworkError {
  constructor(
    public readonly storedEpoch: number,
    public readonly targetEpochs: number
  ) {
    super(
      `Nothing to resume: checkpoint is at epoch ${storedEpoch}, target is ${targetEpochs} epochs`,
      'NOTHING_TO_RESUME'
    );
    this.name = 'NothingToResumeError';
    Object.setPrototypeOf(this, NothingToResumeError.prototype);
  }
}

export class UnknownActivationError extends NeuralNetworkError {
  constructor(
    public readonly activation: string,
    public readonly available: readonly string[]
  ) {
    super(
      `Unknown activation function: ${activation}. Expected one of: ${available.join(', ')}`,
      'UNKNOWN_ACTIVATION'
    );
    this.name = 'UnknownActivationError';
    Object.setPrototypeOf(this, UnknownActivationError.prototype);
  }
}

/**
 * Operation is not allowed in the controller's current lifecycle state
 */
export class InvalidTrainingStateError extends NeuralNetworkError {
  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while training controller is ${state}`, 'INVALID_STATE');
    this.name = 'InvalidTrainingStateError';
    Object.setPrototypeOf(this, InvalidTrainingStateError.prototype);
  }
}

/**
 * Thrown from a training callback to request cancellation at the current
 * epoch boundary
 */
export class TrainingCancelledError extends NeuralNetworkError {
  constructor(reason = 'Training cancelled') {
    super(reason, 'TRAINING_CANCELLED');
    this.name = 'TrainingCancelledError';
    Object.setPrototypeOf(this, TrainingCancelledError.prototype);
  }
}
