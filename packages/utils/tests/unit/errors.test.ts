import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigurationError,
  NotFoundError,
  TransferFailedError,
  UnauthorizedError,
  ValidationError,
  errorMessage,
  isAppError,
} from '../../src/errors.js';

describe('errors', () => {
  it('NotFoundError names the resource and identifier', () => {
    const error = new NotFoundError('Hub file', 'org/repo/model.safetensors');

    expect(error.message).toBe("Hub file with identifier 'org/repo/model.safetensors' not found");
    expect(error.code).toBe('NOT_FOUND');
    expect(error.statusCode).toBe(404);
    expect(error.context).toEqual({
      resource: 'Hub file',
      identifier: 'org/repo/model.safetensors',
    });
  });

  it('NotFoundError without identifier', () => {
    expect(new NotFoundError('Catalog').message).toBe('Catalog not found');
  });

  it('UnauthorizedError has a default message', () => {
    const error = new UnauthorizedError();
    expect(error.message).toBe('Access denied');
    expect(error.code).toBe('UNAUTHORIZED');
    expect(error.statusCode).toBe(401);
  });

  it('TransferFailedError keeps its cause', () => {
    const cause = new Error('socket hang up');
    const error = new TransferFailedError('Network error: socket hang up', cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe('TRANSFER_FAILED');
  });

  it('ConfigurationError records the key', () => {
    const error = new ConfigurationError('bad value', 'HF_ENDPOINT');
    expect(error.context).toEqual({ configKey: 'HF_ENDPOINT' });
  });

  it('sets name from the subclass', () => {
    expect(new ValidationError('x').name).toBe('ValidationError');
    expect(new ValidationError('x')).toBeInstanceOf(AppError);
  });

  it('serializes to JSON for logging', () => {
    const json = new ValidationError('Invalid catalog', { group: 'sd15' }).toJSON();

    expect(json).toMatchObject({
      name: 'ValidationError',
      message: 'Invalid catalog',
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context: { group: 'sd15' },
      isOperational: true,
    });
  });

  it('isAppError distinguishes typed errors', () => {
    expect(isAppError(new UnauthorizedError())).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
    expect(isAppError('string')).toBe(false);
  });

  it('errorMessage handles any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
    expect(errorMessage(42)).toBe('42');
  });
});
