/**
 * Network module exports
 */

export { Network } from './Network.js';

export type {
  Architecture,
  ForwardTrace,
  NetworkOptions,
  NetworkParts,
  VectorInput,
} from './types.js';
