/**
 * Debug logging utilities for troubleshooting data flow.
 * Enabled via DEBUG_LOGGING=true environment variable.
 *
 * Categories:
 * - REQUEST: Raw incoming request bodies
 * - VALIDATION: Zod schema validation details
 * - TRANSFORM: Mapping raw records into stored / exported shapes
 * - STORAGE: File reads and writes
 * - PROVIDER: Queries answered by the health data store
 */

import type { LogContext, Logger } from './logger';

export type DebugCategory = 'PROVIDER' | 'REQUEST' | 'STORAGE' | 'TRANSFORM' | 'VALIDATION';

/**
 * Core debug logging function.
 * Only logs if DEBUG_LOGGING is enabled.
 */
export function debugLog(
  logger: Logger,
  category: DebugCategory,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled()) return;

  const context: LogContext = {
    debugCategory: category,
  };

  if (data !== undefined) {
    context.data = data;
  }

  logger.debug(`[DEBUG:${category}] ${message}`, context);
}

/**
 * Log a provider query and the size of its answer.
 * Logger is optional to support callers without a request scope.
 */
export function debugProviderQuery(
  logger: Logger | undefined,
  operation: string,
  details: LogContext,
): void {
  if (!isDebugEnabled() || !logger) return;

  debugLog(logger, 'PROVIDER', operation, details);
}

/**
 * Log raw request body.
 */
export function debugRequest(logger: Logger, body: unknown, metadata?: LogContext): void {
  if (!isDebugEnabled()) return;

  const bodySize = JSON.stringify(body ?? {}).length;
  debugLog(logger, 'REQUEST', `Raw request body (${String(bodySize)} bytes)`, {
    body,
    ...metadata,
  });
}

/**
 * Log storage operation.
 */
export function debugStorage(
  logger: Logger,
  operation: string,
  details: {
    data?: unknown;
    filePath?: string;
    metadata?: LogContext;
  },
): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'STORAGE', operation, details);
}

/**
 * Log data transformation with before/after counts.
 */
export function debugTransform(
  logger: Logger | undefined,
  operation: string,
  inputCount: number,
  outputCount: number,
  metadata?: LogContext,
): void {
  if (!isDebugEnabled() || !logger) return;

  debugLog(logger, 'TRANSFORM', operation, {
    inputCount,
    outputCount,
    ...metadata,
  });
}

/**
 * Log validation results.
 */
export function debugValidation(
  logger: Logger,
  success: boolean,
  input?: unknown,
  errors?: unknown,
): void {
  if (!isDebugEnabled()) return;

  if (success) {
    debugLog(logger, 'VALIDATION', 'Validation passed', { input });
  } else {
    debugLog(logger, 'VALIDATION', 'Validation failed', { errors, input });
  }
}

/**
 * Check if debug logging is enabled.
 */
export function isDebugEnabled(): boolean {
  return process.env.DEBUG_LOGGING === 'true';
}
