import { BaseError } from './errors.js';

/**
 * Standardized response envelope for tools that report failures as data
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  error?: string;
  errorCode?: string;
  errorDetails?: Record<string, unknown>;
  data?: T;
}

export function createError(
  error: string,
  errorCode?: string,
  errorDetails?: Record<string, unknown>,
): StandardResponse<never> {
  const response: StandardResponse<never> = { success: false, error };
  if (errorCode !== undefined) response.errorCode = errorCode;
  if (errorDetails !== undefined) response.errorDetails = errorDetails;
  return response;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build an error response from a caught exception.
 * BaseError subclasses keep their code; object details are carried over.
 */
export function createErrorFromException(error: unknown): StandardResponse<never> {
  if (error instanceof BaseError) {
    const response = createError(error.message, error.code);
    if (isRecord(error.details)) response.errorDetails = error.details;
    return response;
  }

  if (error instanceof Error) {
    return createError(error.message, 'INTERNAL_ERROR');
  }

  if (typeof error === 'string') {
    return createError(error, 'UNKNOWN_ERROR');
  }

  return createError('Unknown error', 'UNKNOWN_ERROR');
}
