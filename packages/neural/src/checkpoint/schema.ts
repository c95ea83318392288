/**
 * Zod schemas for persisted checkpoint and model documents
 */

import { z } from 'zod';

export const matrixRecordSchema = z
  .object({
    rows: z.number().int().positive(),
    cols: z.number().int().positive(),
    data: z.array(z.number()),
  })
  .refine((record) => record.data.length === record.rows * record.cols, {
    message: 'data length must equal rows * cols',
    path: ['data'],
  });

export const networkRecordSchema = z.object({
  architecture: z.array(z.number().int().positive()).min(2),
  weights: z.array(matrixRecordSchema),
  biases: z.array(matrixRecordSchema),
  activation: z.string(),
  learning_rate: z.number().positive(),
});

export const checkpointMetadataSchema = z.object({
  version: z.string(),
  example: z.string(),
  epoch: z.number().int().nonnegative(),
  total_epochs: z.number().int().nonnegative(),
  learning_rate: z.number(),
  timestamp: z.string(),
});

export const checkpointDocumentSchema = z.object({
  metadata: checkpointMetadataSchema,
  network: networkRecordSchema,
});

export const modelSummarySchema = z.object({
  example: z.string(),
  trained_epochs: z.number().int().nonnegative(),
  final_loss: z.number(),
  final_accuracy: z.number(),
  learning_rate: z.number(),
  created: z.string(),
});

export const modelDocumentSchema = z.object({
  version: z.string(),
  model: modelSummarySchema,
  network: networkRecordSchema,
});

/**
 * Only the version is read before the rest of the document is examined
 */
export const versionProbeSchema = z.union([
  z.object({ metadata: z.object({ version: z.string() }) }),
  z.object({ version: z.string() }),
]);

export type NetworkRecord = z.infer<typeof networkRecordSchema>;
export type CheckpointMetadataRecord = z.infer<typeof checkpointMetadataSchema>;
export type CheckpointDocument = z.infer<typeof checkpointDocumentSchema>;
export type ModelSummaryRecord = z.infer<typeof modelSummarySchema>;
export type ModelDocument = z.infer<typeof modelDocumentSchema>;
