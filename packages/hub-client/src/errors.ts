/**
 * Translation of axios / stream failures into the fetch error taxonomy.
 */

import { isAxiosError } from 'axios';
import {
  NotFoundError,
  TransferFailedError,
  UnauthorizedError,
  errorMessage,
  isAppError,
} from '@model-bootstrap/utils';
import type { AppError } from '@model-bootstrap/utils';

/**
 * Map any thrown value to NotFoundError, UnauthorizedError or TransferFailedError.
 * Errors that are already typed pass through unchanged.
 */
export function toHubError(error: unknown, resource: string): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;

    if (status === 401 || status === 403) {
      return new UnauthorizedError(
        `Access to ${resource} was denied (HTTP ${status}). Gated repositories need a token ` +
          `whose owner has accepted the model license on the hub.`,
        { resource, status }
      );
    }

    if (status === 404) {
      return new NotFoundError('Hub file', resource, { status });
    }

    if (status !== undefined) {
      const statusText = error.response?.statusText;
      return new TransferFailedError(
        `HTTP ${status}${statusText ? ` ${statusText}` : ''} while fetching ${resource}`,
        error,
        { resource, status }
      );
    }

    return new TransferFailedError(`Network error: ${error.message}`, error, {
      resource,
      code: error.code,
    });
  }

  return new TransferFailedError(errorMessage(error), error, { resource });
}
