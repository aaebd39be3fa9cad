/**
 * Error Tracking Service
 *
 * Structured reporting for failures that abort a run, so the operator can
 * see which stage and which performer row failed.
 */

import { CompilationError } from '../types/errors.js';

export interface ErrorContext {
  operation?: string;
  stage?: string;
  performer?: string;
  rowNumber?: number;
  [key: string]: unknown;
}

/**
 * Context derived from a pipeline error, merged under caller context
 */
export function describeError(error: unknown): ErrorContext {
  if (!(error instanceof CompilationError)) {
    return {};
  }

  const context: ErrorContext = { stage: error.stage };
  if (error.performer) {
    context.performer = `${error.performer.name} (${error.performer.location})`;
    context.rowNumber = error.performer.rowNumber;
  }
  return context;
}

/**
 * Log a critical error with structured data
 *
 * JSON goes to stderr for log collection; outside production a
 * human-readable summary follows it.
 *
 * @param error - The error object
 * @param context - Additional context about the error
 */
export function logCriticalError(
  error: Error | unknown,
  context: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorStack = error instanceof Error ? error.stack : undefined;
  const mergedContext = { ...describeError(error), ...context };

  const logEntry = {
    severity: 'ERROR',
    message: 'COMPILATION_FAILED',
    error: {
      message: errorMessage,
      stack: errorStack,
      name: error instanceof Error ? error.name : 'UnknownError',
    },
    context: mergedContext,
    timestamp: new Date().toISOString(),
  };

  console.error(JSON.stringify(logEntry));

  if (process.env.NODE_ENV !== 'production') {
    console.error(`[CRITICAL ERROR] ${mergedContext.stage ? `[${mergedContext.stage}] ` : ''}${errorMessage}`);
    console.error('Context:', mergedContext);
    if (errorStack && !(error instanceof CompilationError)) {
      console.error('Stack:', errorStack);
    }
  }
}

/**
 * Log a warning that should be monitored
 *
 * @param message - Warning message
 * @param context - Additional context
 */
export function logWarning(message: string, context: ErrorContext): void {
  const logEntry = {
    severity: 'WARNING',
    message: `WARNING: ${message}`,
    context,
    timestamp: new Date().toISOString(),
  };

  console.warn(JSON.stringify(logEntry));
}
