/**
 * Activation functions
 *
 * Activations are identified by name in persisted networks and resolved back
 * to their function pair on load; code is never serialized.
 */

import { UnknownActivationError } from '../errors.js';

export type ActivationName = 'sigmoid';

export interface Activation {
  readonly name: ActivationName;
  /** σ(z) */
  apply(z: number): number;
  /** dσ/dz evaluated at the pre-activation z */
  derivative(z: number): number;
}

function logistic(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

export const SIGMOID: Activation = {
  name: 'sigmoid',
  apply: logistic,
  derivative: (z: number): number => {
    const s = logistic(z);
    return s * (1 - s);
  },
};

const ACTIVATIONS: Record<ActivationName, Activation> = {
  sigmoid: SIGMOID,
};

export const ACTIVATION_NAMES = Object.keys(ACTIVATIONS);

export function isActivationName(name: string): name is ActivationName {
  return Object.prototype.hasOwnProperty.call(ACTIVATIONS, name);
}

export function resolveActivation(name: string): Activation {
  if (!isActivationName(name)) {
    throw new UnknownActivationError(name, ACTIVATION_NAMES);
  }
  return ACTIVATIONS[name];
}
