/**
 * Unit tests for Error Handler
 */

import { describe, it, expect, vi } from 'vitest';
import { ValidationError } from '@model-bootstrap/utils';
import { formatError, handleError, sanitizeErrorMessage } from '../../src/core/error-handler.js';

const { loggerError } = vi.hoisted(() => ({ loggerError: vi.fn() }));

vi.mock('@model-bootstrap/utils', async () => {
  const actual =
    await vi.importActual<typeof import('@model-bootstrap/utils')>('@model-bootstrap/utils');
  return {
    ...actual,
    createLogger: () => ({
      error: loggerError,
      warn: vi.fn(),
      info: vi.fn(),
      debug: vi.fn(),
    }),
  };
});

describe('ErrorHandler', () => {
  describe('sanitizeErrorMessage', () => {
    it('redacts hub tokens', () => {
      expect(sanitizeErrorMessage('token hf_abcdefghijkl was rejected')).toBe(
        'token [REDACTED] was rejected'
      );
    });

    it('redacts bearer credentials', () => {
      expect(sanitizeErrorMessage('sent Bearer test-secret to the hub')).toBe(
        'sent Bearer [REDACTED] to the hub'
      );
    });

    it('redacts authorization values', () => {
      expect(sanitizeErrorMessage('authorization=test-secret rejected')).toBe(
        'authorization=[REDACTED] rejected'
      );
    });

    it('redacts HF_TOKEN assignments', () => {
      expect(sanitizeErrorMessage('check HF_TOKEN=test-secret in .env')).toBe(
        'check HF_TOKEN=[REDACTED] in .env'
      );
    });

    it('leaves ordinary messages alone', () => {
      expect(sanitizeErrorMessage("Hub file with identifier 'org/repo/x' not found")).toBe(
        "Hub file with identifier 'org/repo/x' not found"
      );
    });
  });

  describe('formatError', () => {
    it('formats Error objects', () => {
      expect(formatError(new ValidationError('Unknown catalog group(s): x'))).toBe(
        'Unknown catalog group(s): x'
      );
    });

    it('formats string errors', () => {
      expect(formatError('String error')).toBe('String error');
    });

    it('handles unknown error types', () => {
      expect(formatError({ code: 42 })).toBe('An unexpected error occurred');
    });
  });

  describe('handleError', () => {
    it('logs and returns the sanitized message', () => {
      const message = handleError(new ValidationError('Bearer hf_abcdefghijkl refused'), {
        argv: '--only sd15',
      });

      expect(message).toBe('Bearer [REDACTED] refused');
      expect(loggerError).toHaveBeenCalledTimes(1);
      expect(loggerError).toHaveBeenCalledWith(
        'CLI error',
        expect.objectContaining({
          message: 'Bearer [REDACTED] refused',
          code: 'VALIDATION_ERROR',
          context: { argv: '--only sd15' },
        })
      );
    });

    it('logs non-Error values', () => {
      handleError('HF_TOKEN=test-secret');

      expect(loggerError).toHaveBeenCalledWith('CLI error', {
        error: 'HF_TOKEN=[REDACTED]',
        context: undefined,
      });
    });
  });
});
