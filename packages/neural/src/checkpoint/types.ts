/**
 * Checkpoint Types
 */

import type { Network } from '../network/Network.js';
import type { CheckpointDocument, ModelDocument } from './schema.js';

export type {
  CheckpointDocument,
  CheckpointMetadataRecord,
  ModelDocument,
  ModelSummaryRecord,
  NetworkRecord,
} from './schema.js';

/**
 * Training position recorded alongside a network snapshot
 */
export interface CheckpointMetadata {
  /** Name of the dataset the network is being trained on */
  example: string;
  /** Epochs completed so far */
  epoch: number;
  /** Target epoch count of the run */
  totalEpochs: number;
  /** ISO-8601 creation time (defaults to now) */
  timestamp?: string;
}

/**
 * Summary of a finished training run, stored in a model file
 */
export interface ModelSummary {
  example: string;
  trainedEpochs: number;
  finalLoss: number;
  finalAccuracy: number;
  /** ISO-8601 creation time (defaults to now) */
  created?: string;
}

/**
 * Result of loading a file that may be either a checkpoint or a model
 */
export type LoadedNetworkFile =
  | { kind: 'checkpoint'; network: Network; document: CheckpointDocument }
  | { kind: 'model'; network: Network; document: ModelDocument };
