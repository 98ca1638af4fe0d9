/**
 * Error Handler - User-friendly error messages, no credential leakage
 */

import { createLogger, isAppError } from '@model-bootstrap/utils';

const logger = createLogger('cli');

/**
 * Credential-shaped substrings that must never reach the terminal or the logs
 */
const SENSITIVE_PATTERNS = [
  /hf_[A-Za-z0-9]{8,}/g,
  /(bearer\s+)[^\s'"]+/gi,
  /(authorization["']?\s*[:=]\s*["']?)[^\s'",}]+/gi,
  /(HF_TOKEN\s*=\s*)[^\s'"]+/g,
];

const REDACTED = '[REDACTED]';

/**
 * Replace anything that looks like a token with a placeholder
 */
export function sanitizeErrorMessage(message: string): string {
  return SENSITIVE_PATTERNS.reduce(
    (sanitized, pattern) =>
      sanitized.replace(pattern, (_match: string, prefix?: string) =>
        typeof prefix === 'string' ? `${prefix}${REDACTED}` : REDACTED
      ),
    message
  );
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }

  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }

  return 'An unexpected error occurred';
}

/**
 * Log error with full context (for debugging), sanitized the same way
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          typeof value === 'string' ? sanitizeErrorMessage(value) : value,
        ])
      )
    : undefined;

  if (error instanceof Error) {
    logger.error('CLI error', {
      message: sanitizeErrorMessage(error.message),
      code: isAppError(error) ? error.code : undefined,
      stack: error.stack ? sanitizeErrorMessage(error.stack) : undefined,
      context: sanitizedContext,
    });
  } else {
    logger.error('CLI error', {
      error: sanitizeErrorMessage(String(error)),
      context: sanitizedContext,
    });
  }
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return formatError(error);
}
