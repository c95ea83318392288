/**
 * Checkpoint module exports
 */

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
} from './codec.js';

export type {
  CheckpointDocument,
  CheckpointMetadata,
  CheckpointMetadataRecord,
  LoadedNetworkFile,
  ModelDocument,
  ModelSummary,
  ModelSummaryRecord,
  NetworkRecord,
} from './types.js';
