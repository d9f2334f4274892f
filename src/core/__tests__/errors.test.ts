import { describe, it, expect } from 'vitest';
import {
  AnchorValidationError,
  Errors,
  GraphLoadError,
  StorageError,
  ValidationError,
  isRetryableError,
  isValidationError,
  isWorldModelError,
  toError,
} from '../errors.js';
import { Err, Ok, mapError, safeAsync, safeJsonParse } from '../result.js';

describe('errors', () => {
  it('wraps a loader failure with its source', () => {
    const error = Errors.graphLoad('edges', new Error('disk gone'));
    expect(error).toBeInstanceOf(GraphLoadError);
    expect(error.message).toBe('Graph load (edges) failed: disk gone');
    expect(error.retryable).toBe(false);
    expect(error.toJSON().details).toEqual({ source: 'edges', cause: 'disk gone' });
  });

  it('marks SQLite lock contention as retryable', () => {
    expect(Errors.graphLoad('nodes', new Error('SQLITE_BUSY: database is locked')).retryable).toBe(true);
    expect(isRetryableError(new Error('database is locked'))).toBe(true);
    expect(isRetryableError(new StorageError('lock', true, 'held'))).toBe(true);
    expect(isRetryableError('busy')).toBe(false);
  });

  it('formats codes and messages', () => {
    const error = Errors.validation('polarity', '1 or -1', '0');
    expect(error.toString()).toBe('[VALIDATION_ERROR] Validation failed for polarity: expected 1 or -1, got 0');
    expect(Errors.storage('write', 'full').message).toBe('Storage write failed: full');
    expect(Errors.config('planner.maxSteps', 'too small').configKey).toBe('planner.maxSteps');
  });

  it('narrows with the type guards', () => {
    expect(isWorldModelError(Errors.schema('world_model', 3, 4))).toBe(true);
    expect(isWorldModelError(new Error('plain'))).toBe(false);
    expect(isValidationError(new ValidationError('f', 'a', 'b'))).toBe(true);
    expect(isValidationError(new AnchorValidationError('n1', 'pillar:P9', 'unknown pillar'))).toBe(true);
    expect(isValidationError(Errors.storage('read', 'x'))).toBe(false);
  });

  it('converts thrown values to Error', () => {
    const error = new Error('kept');
    expect(toError(error)).toBe(error);
    expect(toError('text').message).toBe('text');
  });
});

describe('result', () => {
  it('captures async failures', async () => {
    expect(await safeAsync(async () => 4)).toEqual(Ok(4));
    const failed = await safeAsync(async () => {
      throw new Error('nope');
    });
    expect(failed.ok).toBe(false);
    if (failed.ok) return;
    expect(failed.error.message).toBe('nope');
  });

  it('maps only the error side', () => {
    expect(mapError(Ok(1), () => 'mapped')).toEqual(Ok(1));
    expect(mapError(Err('raw'), (error) => `${error}!`)).toEqual(Err('raw!'));
  });

  it('parses JSON without throwing', () => {
    expect(safeJsonParse('{"a":1}')).toEqual(Ok({ a: 1 }));
    expect(safeJsonParse('{').ok).toBe(false);
  });
});
