/**
 * HTTP-facing error type and mapping from engine errors
 */

import { NeuralNetworkError, type NeuralErrorCode } from '@logic-net/neural';
import type { ZodError } from 'zod';

export type ApiErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNKNOWN_EXAMPLE'
  | 'MODEL_NOT_FOUND'
  | 'TRAINING_IN_PROGRESS'
  | 'INTERNAL_ERROR';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: ApiErrorCode | NeuralErrorCode
  ) {
    super(message);
    this.name = 'ApiError';
    Object.setPrototypeOf(this, ApiError.prototype);
  }

  static validation(error: ZodError): ApiError {
    const detail = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return new ApiError(`Invalid request: ${detail}`, 400, 'VALIDATION_ERROR');
  }
}

const CLIENT_ERROR_CODES: ReadonlySet<NeuralErrorCode> = new Set<NeuralErrorCode>([
  'DIMENSION_MISMATCH',
  'INVALID_ARCHITECTURE',
]);

/**
 * Normalise anything thrown by a route into a status and payload
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) return error;
  if (error instanceof NeuralNetworkError) {
    return new ApiError(error.message, CLIENT_ERROR_CODES.has(error.code) ? 400 : 500, error.code);
  }
  return new ApiError(
    error instanceof Error ? error.message : 'Internal server error',
    500,
    'INTERNAL_ERROR'
  );
}
