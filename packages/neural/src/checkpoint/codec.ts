/**
 * Checkpoint and model file codec
 *
 * Both document kinds are pretty-printed JSON with snake_case keys. Doubles
 * are written with the shortest round-tripping representation, so a saved and
 * reloaded network is bit-identical to the one that was saved.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ZodError } from 'zod';
import { resolveActivation } from '../activations/index.js';
import {
  CheckpointIoError,
  CorruptFormatError,
  UnsupportedVersionError,
} from '../errors.js';
import { Matrix } from '../matrix/Matrix.js';
import { Network } from '../network/Network.js';
import {
  checkpointDocumentSchema,
  modelDocumentSchema,
  versionProbeSchema,
  type CheckpointDocument,
  type ModelDocument,
  type NetworkRecord,
} from './schema.js';
import type { CheckpointMetadata, LoadedNetworkFile, ModelSummary } from './types.js';

export const CHECKPOINT_VERSION = '1.0';
export const SUPPORTED_VERSIONS: readonly string[] = [CHECKPOINT_VERSION];

// ============================================================================
// Snapshots
// ============================================================================

export function toNetworkRecord(network: Network): NetworkRecord {
  return {
    architecture: network.architecture,
    weights: network.weights.map((w) => w.toRecord()),
    biases: network.biases.map((b) => b.toRecord()),
    activation: network.activation.name,
    learning_rate: network.learningRate,
  };
}

/**
 * Rebuild a network from its persisted form. Throws ArchitectureMismatchError
 * when stored shapes disagree with the architecture and UnknownActivationError
 * for an activation name this build does not know.
 */
export function fromNetworkRecord(record: NetworkRecord): Network {
  return Network.fromParts({
    architecture: record.architecture,
    weights: record.weights.map((w) => Matrix.fromRecord(w)),
    biases: record.biases.map((b) => Matrix.fromRecord(b)),
    activation: resolveActivation(record.activation),
    learningRate: record.learning_rate,
  });
}

export function toCheckpoint(network: Network, metadata: CheckpointMetadata): CheckpointDocument {
  return {
    metadata: {
      version: CHECKPOINT_VERSION,
      example: metadata.example,
      epoch: metadata.epoch,
      total_epochs: metadata.totalEpochs,
      learning_rate: network.learningRate,
      timestamp: metadata.timestamp ?? new Date().toISOString(),
    },
    network: toNetworkRecord(network),
  };
}

export function fromCheckpoint(checkpoint: CheckpointDocument): Network {
  return fromNetworkRecord(checkpoint.network);
}

export function toModelFile(network: Network, summary: ModelSummary): ModelDocument {
  return {
    version: CHECKPOINT_VERSION,
    model: {
      example: summary.example,
      trained_epochs: summary.trainedEpochs,
      final_loss: summary.finalLoss,
      final_accuracy: summary.finalAccuracy,
      learning_rate: network.learningRate,
      created: summary.created ?? new Date().toISOString(),
    },
    network: toNetworkRecord(network),
  };
}

// ============================================================================
// Persistence
// ============================================================================

/**
 * Write a checkpoint, creating parent directories and replacing any existing
 * file at the destination
 */
export async function saveCheckpoint(
  checkpoint: CheckpointDocument,
  destination: string
): Promise<void> {
  await writeDocument(checkpoint, destination, 'checkpoint');
}

export async function loadCheckpoint(source: string): Promise<CheckpointDocument> {
  const { raw } = await readDocument(source, 'checkpoint');
  const parsed = checkpointDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptFormatError(
      `Invalid checkpoint ${source}: ${describeIssues(parsed.error)}`,
      parsed.error
    );
  }
  return parsed.data;
}

export async function saveModel(model: ModelDocument, destination: string): Promise<void> {
  await writeDocument(model, destination, 'model');
}

export async function loadModel(source: string): Promise<ModelDocument> {
  const { raw } = await readDocument(source, 'model');
  const parsed = modelDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptFormatError(
      `Invalid model file ${source}: ${describeIssues(parsed.error)}`,
      parsed.error
    );
  }
  return parsed.data;
}

/**
 * Load either a checkpoint or a model file and rebuild its network
 */
export async function loadNetworkFile(source: string): Promise<LoadedNetworkFile> {
  const { raw, versionInMetadata } = await readDocument(source, 'network file');

  const checkpoint = checkpointDocumentSchema.safeParse(raw);
  if (checkpoint.success) {
    return {
      kind: 'checkpoint',
      network: fromCheckpoint(checkpoint.data),
      document: checkpoint.data,
    };
  }

  const model = modelDocumentSchema.safeParse(raw);
  if (model.success) {
    return {
      kind: 'model',
      network: fromNetworkRecord(model.data.network),
      document: model.data,
    };
  }

  // Checkpoints keep their version under metadata, model files at the top
  const issues = versionInMetadata ? checkpoint.error : model.error;
  throw new CorruptFormatError(
    `${source} is neither a checkpoint nor a model file: ${describeIssues(issues)}`,
    issues
  );
}

// ============================================================================
// Helpers
// ============================================================================

async function writeDocument(document: object, destination: string, label: string): Promise<void> {
  try {
    await mkdir(dirname(destination), { recursive: true });
    await writeFile(destination, JSON.stringify(document, null, 2), 'utf-8');
  } catch (error) {
    throw new CheckpointIoError(
      `Failed to write ${label} to ${destination}: ${errorMessage(error)}`,
      destination,
      error
    );
  }
}

interface VersionedDocument {
  raw: unknown;
  versionInMetadata: boolean;
}

/**
 * Read and parse a document, then check its version before anything else
 * about it is examined
 */
async function readDocument(source: string, label: string): Promise<VersionedDocument> {
  let content: string;
  try {
    content = await readFile(source, 'utf-8');
  } catch (error) {
    throw new CheckpointIoError(
      `Failed to read ${label} from ${source}: ${errorMessage(error)}`,
      source,
      error
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new CorruptFormatError(`${source} is not valid JSON: ${errorMessage(error)}`, error);
  }

  const probe = versionProbeSchema.safeParse(raw);
  if (!probe.success) {
    throw new CorruptFormatError(`${source} has no version field`, probe.error);
  }
  const versionInMetadata = 'metadata' in probe.data;
  const version = 'metadata' in probe.data ? probe.data.metadata.version : probe.data.version;
  if (!SUPPORTED_VERSIONS.includes(version)) {
    throw new UnsupportedVersionError(version, SUPPORTED_VERSIONS);
  }

  return { raw, versionInMetadata };
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
