/**
 * Centralized error handling utilities
 */

import { createLogger } from './logger.js';
import {
  JssApiError,
  NetworkError,
  HttpStatusError,
  AuthenticationError,
  MalformedResponseError,
} from './errors.js';
import { isAxiosError } from './type-guards.js';
import type { FetchFailure } from '../inventory/types.js';

const logger = createLogger('error-handler');

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH']);

/**
 * Convert any error to JssApiError
 */
export function normalizeError(error: unknown, context?: Record<string, unknown>): JssApiError {
  if (error instanceof JssApiError) {
    return error;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    const url = error.config?.url;
    const ctx = { ...context, ...(url ? { url } : {}) };

    if (status === undefined) {
      return new NetworkError(error.message, ctx, error, error.code ?? 'NETWORK_ERROR');
    }
    if (status === 401 || status === 403) {
      return new AuthenticationError(`Request rejected with status ${status}`, ctx, status, error);
    }
    return new HttpStatusError(`Request failed with status ${status}`, status, ctx, error);
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if ((code && NETWORK_ERROR_CODES.has(code)) || [...NETWORK_ERROR_CODES].some((c) => error.message.includes(c))) {
      return NetworkError.fromError(error, context);
    }

    if (error.message.toLowerCase().includes('unauthorized')) {
      return new AuthenticationError(error.message, context, 401, error);
    }

    return new JssApiError(error.message, undefined, 'UNKNOWN_ERROR', ['Check the logs for more details'], context, error);
  }

  return new JssApiError(String(error), undefined, 'UNKNOWN_ERROR', ['An unexpected error occurred'], context);
}

/**
 * Describe a failed detail fetch so the caller can attribute it to one identifier
 */
export function toFetchFailure(id: number, error: unknown): FetchFailure {
  const normalized = normalizeError(error, { id });
  let kind: FetchFailure['kind'] = 'unknown';
  if (normalized instanceof MalformedResponseError) kind = 'malformed';
  else if (normalized instanceof NetworkError) kind = 'network';
  else if (normalized.statusCode !== undefined) kind = 'http';

  return {
    id,
    kind,
    message: normalized.message,
    ...(normalized.statusCode !== undefined ? { statusCode: normalized.statusCode } : {}),
  };
}

/**
 * Structured error context for capturing full error details
 */
export interface ErrorContext {
  /** The operation that was being performed */
  operation: string;
  message: string;
  code?: string;
  component?: string;
  stack?: string;
  metadata?: Record<string, unknown>;
  suggestions?: string[];
  timestamp: string;
}

export function buildErrorContext(
  error: unknown,
  operation: string,
  component?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  const normalized = normalizeError(error);

  return {
    operation,
    message: normalized.message,
    code: normalized.errorCode ?? 'ERROR',
    component,
    stack: normalized.originalError?.stack ?? normalized.stack,
    metadata: {
      ...metadata,
      ...(normalized.statusCode !== undefined ? { statusCode: normalized.statusCode } : {}),
      ...(normalized.context ? { originalContext: normalized.context } : {}),
    },
    suggestions: normalized.suggestions.length > 0 ? normalized.suggestions : undefined,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Log error with full context
 */
export function logErrorWithContext(
  error: unknown,
  operation: string,
  component?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  const context = buildErrorContext(error, operation, component, metadata);

  logger.error(
    {
      error: context.message,
      code: context.code,
      component: context.component,
      metadata: context.metadata,
      suggestions: context.suggestions,
    },
    `${operation} failed`
  );

  return context;
}
