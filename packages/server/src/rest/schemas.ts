/**
 * Request body schemas for the REST API
 */

import { z } from 'zod';

export const trainRequestSchema = z.object({
  example: z.string().min(1),
  epochs: z.number().int().positive(),
  learning_rate: z.number().positive().optional(),
  /** Seed for reproducible initial weights */
  seed: z.number().int().optional(),
});

export const evalRequestSchema = z.object({
  model_id: z.string().min(1),
  input: z.array(z.number()),
});

export type TrainRequestBody = z.infer<typeof trainRequestSchema>;
export type EvalRequestBody = z.infer<typeof evalRequestSchema>;
