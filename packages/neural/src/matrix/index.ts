/**
 * Matrix module exports
 */

export { Matrix } from './Matrix.js';
export { createSeededRandom, defaultRandom } from './random.js';

export type { MatrixRecord } from './Matrix.js';
export type { RandomSource } from './random.js';
