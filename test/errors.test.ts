import { describe, it, expect } from '@jest/globals';
import {
  BatchInProgressError,
  ConfigurationError,
  ConverterUnavailableError,
  ErrorCode,
  FileNotFoundError,
  SourceDirectoryError,
  UnknownError,
  ValidationError,
  errnoOf,
  wrapError,
} from '../src/errors';

function errnoError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

describe('errors', () => {
  describe('ConverterError subclasses', () => {
    it.each([
      [new SourceDirectoryError('/data/raw', 'not found'), ErrorCode.SOURCE_DIRECTORY_UNAVAILABLE, 500],
      [new ConverterUnavailableError('/usr/bin/soffice'), ErrorCode.CONVERTER_UNAVAILABLE, 503],
      [new BatchInProgressError(), ErrorCode.BATCH_IN_PROGRESS, 409],
      [new ValidationError('bad input'), ErrorCode.VALIDATION_ERROR, 400],
      [new FileNotFoundError('a.doc'), ErrorCode.FILE_NOT_FOUND, 404],
      [new ConfigurationError('bad port'), ErrorCode.CONFIGURATION_ERROR, 500],
      [new UnknownError('boom'), ErrorCode.UNKNOWN_ERROR, 500],
    ])('%s should carry its code and status', (error, code, statusCode) => {
      expect(error.code).toBe(code);
      expect(error.statusCode).toBe(statusCode);
      expect(error.name).toBe(error.constructor.name);
      expect(error).toBeInstanceOf(Error);
    });

    it('should serialize for the API', () => {
      const error = new SourceDirectoryError('/data/raw', 'not a directory', { correlationId: 'corr-1' });

      expect(error.toApiResponse('corr-1')).toEqual({
        error: 'SourceDirectoryError',
        code: 'SOURCE_DIRECTORY_UNAVAILABLE',
        message: 'Source directory unavailable: /data/raw (not a directory)',
        statusCode: 500,
        correlationId: 'corr-1',
        timestamp: error.timestamp,
        context: { correlationId: 'corr-1', path: '/data/raw' },
      });
    });

    it('should omit an empty context', () => {
      expect(new BatchInProgressError().toApiResponse('corr-2').context).toBeUndefined();
    });
  });

  describe('wrapError', () => {
    it('should return a ConverterError unchanged', () => {
      const error = new BatchInProgressError();

      expect(wrapError(error)).toBe(error);
    });

    it('should map schema validation failures to ValidationError', () => {
      const wrapped = wrapError(errnoError('params/area must be equal to one of the allowed values', { validation: [] }));

      expect(wrapped).toBeInstanceOf(ValidationError);
      expect(wrapped.message).toBe('params/area must be equal to one of the allowed values');
    });

    it('should map client errors with a 4xx status to ValidationError', () => {
      expect(wrapError(errnoError('Unsupported Media Type', { statusCode: 415 }))).toBeInstanceOf(ValidationError);
    });

    it('should map ENOENT to FileNotFoundError', () => {
      const wrapped = wrapError(errnoError('ENOENT: no such file', { code: 'ENOENT', path: '/data/raw/a.doc' }), {
        correlationId: 'corr-3',
      });

      expect(wrapped).toBeInstanceOf(FileNotFoundError);
      expect(wrapped.message).toBe('File not found: /data/raw/a.doc');
      expect(wrapped.context).toEqual({ correlationId: 'corr-3', errno: 'ENOENT' });
    });

    it('should fall back to UnknownError and keep the errno', () => {
      const wrapped = wrapError(errnoError('permission denied', { code: 'EACCES' }));

      expect(wrapped).toBeInstanceOf(UnknownError);
      expect(wrapped.statusCode).toBe(500);
      expect(wrapped.context).toEqual({ errno: 'EACCES' });
    });
  });

  describe('errnoOf', () => {
    it('should read string codes only', () => {
      expect(errnoOf(errnoError('x', { code: 'EXDEV' }))).toBe('EXDEV');
      expect(errnoOf(errnoError('x', { code: 1 }))).toBeUndefined();
      expect(errnoOf('ENOENT')).toBeUndefined();
      expect(errnoOf(null)).toBeUndefined();
    });
  });
});
