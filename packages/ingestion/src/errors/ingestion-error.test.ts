import { describe, expect, test } from 'vitest';

import {
  ConfigError,
  DocumentNotFoundError,
  IngestionError,
  InvalidStateTransitionError,
  StoreError,
  createAbortError,
  isAbortError,
} from './ingestion-error';

describe('IngestionError', () => {
  test('fromError keeps the cause and prefixes the context', () => {
    const cause = new Error('disk full');
    const error = IngestionError.fromError('Failed to save crop', cause);

    expect(error.name).toBe('IngestionError');
    expect(error.message).toBe('Failed to save crop: disk full');
    expect(error.cause).toBe(cause);
  });

  test('getErrorMessage stringifies non-errors', () => {
    expect(IngestionError.getErrorMessage('plain')).toBe('plain');
    expect(IngestionError.getErrorMessage(42)).toBe('42');
  });
});

describe('DocumentNotFoundError', () => {
  test('names the missing path', () => {
    const error = new DocumentNotFoundError('/data/pdfs/q3.pdf');

    expect(error).toBeInstanceOf(IngestionError);
    expect(error.name).toBe('DocumentNotFoundError');
    expect(error.message).toBe('Document not found: /data/pdfs/q3.pdf');
    expect(error.filePath).toBe('/data/pdfs/q3.pdf');
  });
});

describe('StoreError', () => {
  test('carries the transient flag', () => {
    const error = StoreError.fromError('Upsert failed', new Error('503'), true);

    expect(error.message).toBe('Upsert failed: 503');
    expect(error.transient).toBe(true);
    expect(StoreError.isTransient(error)).toBe(true);
  });

  test('only transient store errors are transient', () => {
    expect(StoreError.isTransient(new StoreError('bad id', false))).toBe(
      false,
    );
    expect(StoreError.isTransient(new Error('timeout'))).toBe(false);
  });
});

describe('InvalidStateTransitionError', () => {
  test('describes the rejected transition', () => {
    const error = new InvalidStateTransitionError('NEW', 'STORED');

    expect(error.message).toBe(
      'Invalid document state transition: NEW -> STORED',
    );
    expect(error.from).toBe('NEW');
    expect(error.to).toBe('STORED');
  });
});

describe('ConfigError', () => {
  test('is an IngestionError', () => {
    expect(new ConfigError('bad')).toBeInstanceOf(IngestionError);
    expect(new ConfigError('bad').name).toBe('ConfigError');
  });
});

describe('abort helpers', () => {
  test('createAbortError builds a named error', () => {
    const error = createAbortError('stopped');

    expect(error.name).toBe('AbortError');
    expect(isAbortError(error)).toBe(true);
    expect(isAbortError(new Error('stopped'))).toBe(false);
    expect(isAbortError('AbortError')).toBe(false);
  });
});
