/**
 * Network Types
 */

import type { Activation } from '../activations/index.js';
import type { Matrix } from '../matrix/Matrix.js';
import type { RandomSource } from '../matrix/random.js';

/** Neuron count per layer, input layer first */
export type Architecture = readonly number[];

/** A network input, either a plain vector or a column Matrix */
export type VectorInput = readonly number[] | Matrix;

export interface NetworkOptions {
  /** Source for the initial weights and biases (defaults to Math.random) */
  random?: RandomSource;
}

export interface NetworkParts {
  architecture: Architecture;
  weights: readonly Matrix[];
  biases: readonly Matrix[];
  activation: Activation;
  learningRate: number;
}

/**
 * Values retained by the last feed-forward pass, consumed by backpropagation
 */
export interface ForwardTrace {
  /** z = W·a + b for every non-input layer */
  preActivations: Matrix[];
  /** σ(z) for every layer, the input vector first */
  activations: Matrix[];
}
