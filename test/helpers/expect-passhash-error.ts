import { expect } from 'vitest';
import {
  isPasshashError,
  type PasshashError,
  type PasshashErrorCode,
} from '../../src/shared/errors/errors';

/** Runs `fn`, asserts it throws a PasshashError with `code`, and returns the error. */
export function expectPasshashError(fn: () => unknown, code: PasshashErrorCode): PasshashError {
  try {
    fn();
  } catch (err) {
    if (isPasshashError(err)) {
      expect(err.code).toBe(code);
      return err;
    }
    throw err;
  }
  throw new Error(`expected a ${code} error, but nothing was thrown`);
}
