// ============================================================================
// Error Handler - Centralized error handling utilities
// ============================================================================

import { LayoutEngineError, ErrorSeverity } from './types';
import { createLogger, type Logger } from '../services/infra/logger';

const defaultLogger = createLogger('ErrorHandler');

// ----------------------------------------------------------------------------
// Error Normalization
// ----------------------------------------------------------------------------

/**
 * Convert any thrown value to a LayoutEngineError
 */
export function normalizeError(error: unknown): LayoutEngineError {
  if (error instanceof LayoutEngineError) {
    return error;
  }

  if (error instanceof Error) {
    return new LayoutEngineError(error.message, { cause: error });
  }

  if (typeof error === 'string') {
    return new LayoutEngineError(error);
  }

  return new LayoutEngineError('An unknown error occurred', {
    context: { originalError: String(error) },
  });
}

// ----------------------------------------------------------------------------
// Error Logging
// ----------------------------------------------------------------------------

/**
 * Log error with the level matching its severity.
 * Pass the caller's logger so the line carries the caller's context.
 */
export function logError(error: LayoutEngineError, log: Logger = defaultLogger): void {
  const logData = {
    name: error.name,
    code: error.code,
    context: error.context,
    recoverable: error.recoverable,
  };

  switch (error.severity) {
    case ErrorSeverity.INFO:
      log.info(error.message, logData);
      break;
    case ErrorSeverity.WARNING:
      log.warn(error.message, logData);
      break;
    case ErrorSeverity.CRITICAL:
      log.error(error.message, { ...logData, stack: error.stack });
      break;
    case ErrorSeverity.ERROR:
    default:
      log.error(error.message, logData);
      break;
  }
}

// ----------------------------------------------------------------------------
// Formatting
// ----------------------------------------------------------------------------

/**
 * One-line description for terminal output
 */
export function formatErrorForUser(error: unknown): string {
  const normalized = normalizeError(error);
  if (normalized.name === 'LayoutEngineError') {
    return normalized.message;
  }
  return `${normalized.name}: ${normalized.message}`;
}
