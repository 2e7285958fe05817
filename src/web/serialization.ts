/**
 * Shared helpers for the web API layer: error mapping and request parsing.
 */

import { z } from 'zod';
import { FactValidationError, FactFileError, ConfigError } from '../core/errors.js';

// ── Error Mapping ─────────────────────────────────────────────────────

export type ApiErrorType = 'validation' | 'invalid_fact_set' | 'internal';

const ERROR_STATUS_MAP: Record<ApiErrorType, number> = {
  validation: 400,
  invalid_fact_set: 422,
  internal: 500,
};

export function errorToHttpStatus(errorType: ApiErrorType): number {
  return ERROR_STATUS_MAP[errorType];
}

export interface ApiError {
  type: ApiErrorType;
  message: string;
  issues?: string[];
}

/** Map a thrown error to the API error body; unknown errors are internal */
export function toApiError(err: unknown): ApiError {
  if (err instanceof FactValidationError) {
    return { type: 'invalid_fact_set', message: err.message, issues: err.issues };
  }
  if (err instanceof FactFileError || err instanceof ConfigError) {
    return { type: 'validation', message: err.message };
  }
  return { type: 'internal', message: 'Internal server error' };
}

export function zodToApiError(error: z.ZodError): ApiError {
  return {
    type: 'validation',
    message: 'Invalid request',
    issues: error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`),
  };
}
