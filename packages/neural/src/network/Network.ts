/**
 * Network - fully connected feed-forward network trained by backpropagation
 *
 * One weight matrix (next × prev) and one bias column per layer transition,
 * a single activation at every non-input layer, and plain per-sample gradient
 * descent on the squared error.
 */

import { SIGMOID, type Activation } from '../activations/index.js';
import {
  ArchitectureMismatchError,
  DimensionMismatchError,
  InvalidArchitectureError,
} from '../errors.js';
import { Matrix } from '../matrix/Matrix.js';
import { defaultRandom } from '../matrix/random.js';
import type {
  Architecture,
  ForwardTrace,
  NetworkOptions,
  NetworkParts,
  VectorInput,
} from './types.js';

export class Network {
  private readonly layers: number[];
  private readonly weightMatrices: Matrix[];
  private readonly biasVectors: Matrix[];
  private trace: ForwardTrace | null = null;
  readonly activation: Activation;
  readonly learningRate: number;

  private constructor(parts: NetworkParts) {
    this.layers = [...parts.architecture];
    this.weightMatrices = parts.weights.map((w) => w.clone());
    this.biasVectors = parts.biases.map((b) => b.clone());
    this.activation = parts.activation;
    this.learningRate = parts.learningRate;
  }

  /**
   * Build a network with weights and biases drawn uniformly from [0, 1)
   */
  static create(
    architecture: Architecture,
    activation: Activation = SIGMOID,
    learningRate = 0.5,
    options: NetworkOptions = {}
  ): Network {
    Network.validateArchitecture(architecture);
    Network.validateLearningRate(learningRate);

    const random = options.random ?? defaultRandom;
    const weights: Matrix[] = [];
    const biases: Matrix[] = [];
    for (let i = 0; i < architecture.length - 1; i++) {
      weights.push(Matrix.random(architecture[i + 1], architecture[i], random));
      biases.push(Matrix.random(architecture[i + 1], 1, random));
    }

    return new Network({ architecture, weights, biases, activation, learningRate });
  }

  /**
   * Assemble a network from existing matrices, checking every shape against
   * the architecture
   */
  static fromParts(parts: NetworkParts): Network {
    Network.validateArchitecture(parts.architecture);
    Network.validateLearningRate(parts.learningRate);

    const { architecture, weights, biases } = parts;
    const transitions = architecture.length - 1;
    if (weights.length !== transitions || biases.length !== transitions) {
      throw new ArchitectureMismatchError(
        `Architecture [${architecture.join(', ')}] needs ${transitions} weight matrices and bias vectors, ` +
          `got ${weights.length} and ${biases.length}`
      );
    }

    for (let i = 0; i < transitions; i++) {
      const rows = architecture[i + 1];
      const cols = architecture[i];
      if (weights[i].rows !== rows || weights[i].cols !== cols) {
        throw new ArchitectureMismatchError(
          `Weight matrix ${i} is ${weights[i].shape}, expected ${rows}x${cols}`
        );
      }
      if (biases[i].rows !== rows || biases[i].cols !== 1) {
        throw new ArchitectureMismatchError(
          `Bias vector ${i} is ${biases[i].shape}, expected ${rows}x1`
        );
      }
    }

    return new Network(parts);
  }

  get architecture(): number[] {
    return [...this.layers];
  }

  get inputSize(): number {
    return this.layers[0];
  }

  get outputSize(): number {
    return this.layers[this.layers.length - 1];
  }

  /** Copies of the weight matrices, one per layer transition */
  get weights(): Matrix[] {
    return this.weightMatrices.map((w) => w.clone());
  }

  get biases(): Matrix[] {
    return this.biasVectors.map((b) => b.clone());
  }

  /**
   * Values retained by the most recent feedForward, or null before the first pass
   */
  get lastTrace(): ForwardTrace | null {
    if (!this.trace) return null;
    return {
      preActivations: this.trace.preActivations.map((m) => m.clone()),
      activations: this.trace.activations.map((m) => m.clone()),
    };
  }

  /** Per-layer activations of the last feedForward, input first */
  get lastActivations(): Matrix[] | null {
    return this.trace ? this.trace.activations.map((m) => m.clone()) : null;
  }

  parameterCount(): number {
    let total = 0;
    for (let i = 0; i < this.weightMatrices.length; i++) {
      total += this.weightMatrices[i].data.length + this.biasVectors[i].data.length;
    }
    return total;
  }

  /**
   * Forward pass that retains every layer's pre-activation and activation for
   * the next backward pass. Not safe to interleave between callers sharing a
   * network; use evaluate() for read-only inference.
   */
  feedForward(input: VectorInput): Matrix {
    const column = this.toColumn(input, this.inputSize, 'input');
    const trace = this.forward(column);
    this.trace = trace;
    return trace.activations[trace.activations.length - 1].clone();
  }

  /**
   * Stateless forward pass
   */
  evaluate(input: VectorInput): number[] {
    const column = this.toColumn(input, this.inputSize, 'input');
    const trace = this.forward(column);
    return trace.activations[trace.activations.length - 1].toArray();
  }

  /**
   * One gradient descent step on a single sample. Returns the sample's mean
   * squared error, measured before the update.
   */
  trainStep(input: VectorInput, target: VectorInput): number {
    const expected = this.toColumn(target, this.outputSize, 'target');
    const trace = this.forward(this.toColumn(input, this.inputSize, 'input'));
    this.trace = trace;
    const output = trace.activations[trace.activations.length - 1];

    const transitions = this.weightMatrices.length;
    const weightGradients: Matrix[] = new Array<Matrix>(transitions);
    const biasGradients: Matrix[] = new Array<Matrix>(transitions);

    // δ_L = (output − target) ⊙ σ'(z_L)
    let delta = output
      .subtract(expected)
      .hadamard(trace.preActivations[transitions - 1].map(this.activation.derivative));

    for (let layer = transitions - 1; layer >= 0; layer--) {
      weightGradients[layer] = delta.dot(trace.activations[layer].transpose());
      biasGradients[layer] = delta;
      if (layer > 0) {
        delta = this.weightMatrices[layer]
          .transpose()
          .dot(delta)
          .hadamard(trace.preActivations[layer - 1].map(this.activation.derivative));
      }
    }

    for (let layer = 0; layer < transitions; layer++) {
      this.weightMatrices[layer].subtractInPlace(weightGradients[layer].scale(this.learningRate));
      this.biasVectors[layer].subtractInPlace(biasGradients[layer].scale(this.learningRate));
    }

    return Network.squaredError(output, expected);
  }

  /**
   * Plain training loop: every sample in dataset order, once per epoch.
   * Returns the mean sample loss of the final epoch, or the current dataset
   * loss when no epoch runs.
   */
  train(
    inputs: readonly VectorInput[],
    targets: readonly VectorInput[],
    epochs: number
  ): number {
    Network.assertPairedDataset(inputs, targets);
    if (epochs <= 0) {
      return this.meanLoss(inputs, targets);
    }
    let epochLoss = Number.NaN;
    for (let epoch = 0; epoch < epochs; epoch++) {
      epochLoss = this.trainEpoch(inputs, targets);
    }
    return epochLoss;
  }

  /**
   * One pass of trainStep over the whole dataset. Returns the mean sample loss.
   */
  trainEpoch(inputs: readonly VectorInput[], targets: readonly VectorInput[]): number {
    let total = 0;
    for (let i = 0; i < inputs.length; i++) {
      total += this.trainStep(inputs[i], targets[i]);
    }
    return inputs.length > 0 ? total / inputs.length : 0;
  }

  /**
   * Mean of the per-sample squared error over a dataset, without training
   */
  meanLoss(inputs: readonly VectorInput[], targets: readonly VectorInput[]): number {
    Network.assertPairedDataset(inputs, targets);
    if (inputs.length === 0) return 0;
    let total = 0;
    for (let i = 0; i < inputs.length; i++) {
      const output = Matrix.fromArray(this.evaluate(inputs[i]));
      total += Network.squaredError(output, this.toColumn(targets[i], this.outputSize, 'target'));
    }
    return total / inputs.length;
  }

  /**
   * Fraction of samples whose every output rounds (at 0.5) to its target
   */
  accuracy(inputs: readonly VectorInput[], targets: readonly VectorInput[]): number {
    Network.assertPairedDataset(inputs, targets);
    if (inputs.length === 0) return 0;
    let correct = 0;
    for (let i = 0; i < inputs.length; i++) {
      const output = this.evaluate(inputs[i]);
      const expected = this.toColumn(targets[i], this.outputSize, 'target').toArray();
      if (output.every((value, j) => (value >= 0.5 ? 1 : 0) === Math.round(expected[j]))) {
        correct++;
      }
    }
    return correct / inputs.length;
  }

  clone(): Network {
    return new Network({
      architecture: this.layers,
      weights: this.weightMatrices,
      biases: this.biasVectors,
      activation: this.activation,
      learningRate: this.learningRate,
    });
  }

  // ==========================================================================
  // Private Helper Methods
  // ==========================================================================

  private forward(input: Matrix): ForwardTrace {
    const preActivations: Matrix[] = [];
    const activations: Matrix[] = [input];
    let current = input;
    for (let layer = 0; layer < this.weightMatrices.length; layer++) {
      const z = this.weightMatrices[layer].dot(current).add(this.biasVectors[layer]);
      current = z.map(this.activation.apply);
      preActivations.push(z);
      activations.push(current);
    }
    return { preActivations, activations };
  }

  private toColumn(value: VectorInput, expected: number, label: string): Matrix {
    const column = value instanceof Matrix ? value : Matrix.fromArray(value);
    const length = value instanceof Matrix ? value.data.length : value.length;
    if (column.cols !== 1 || length !== expected) {
      throw new DimensionMismatchError(
        `Expected ${label} vector of length ${expected}, got ${
          value instanceof Matrix ? `a ${value.shape} matrix` : `length ${length}`
        }`
      );
    }
    return column;
  }

  private static squaredError(output: Matrix, target: Matrix): number {
    let sum = 0;
    for (let i = 0; i < output.data.length; i++) {
      const error = target.data[i] - output.data[i];
      sum += error * error;
    }
    return sum / output.data.length;
  }

  private static validateArchitecture(architecture: Architecture): void {
    if (architecture.length < 2) {
      throw new InvalidArchitectureError(
        `Architecture needs at least an input and an output layer, got [${architecture.join(', ')}]`
      );
    }
    architecture.forEach((size, index) => {
      if (!Number.isInteger(size) || size < 1) {
        throw new InvalidArchitectureError(
          `Layer ${index} size must be a positive integer, got ${size}`
        );
      }
    });
  }

  private static validateLearningRate(learningRate: number): void {
    if (!Number.isFinite(learningRate) || learningRate <= 0) {
      throw new InvalidArchitectureError(
        `Learning rate must be a positive number, got ${learningRate}`
      );
    }
  }

  private static assertPairedDataset(
    inputs: readonly VectorInput[],
    targets: readonly VectorInput[]
  ): void {
    if (inputs.length !== targets.length) {
      throw new DimensionMismatchError(
        `Dataset has ${inputs.length} inputs but ${targets.length} targets`
      );
    }
  }
}
