/**
 * Tests for Result<T, E> pattern
 */

import { describe, it, expect } from 'vitest';
import { Ok, Err, ok, err, isOk, isErr, type Result } from '../result.js';

describe('Result Pattern', () => {
  describe('Ok class', () => {
    it('should create Ok instance with value', () => {
      const result = new Ok(42);

      expect(result.value).toBe(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
    });

    it('should map over success value', () => {
      const mapped = ok(10).map((x) => x * 2);

      expect(mapped.isOk()).toBe(true);
      expect(mapped.unwrap()).toBe(20);
    });

    it('should unwrap to value and ignore the fallback', () => {
      expect(ok('actual').unwrap()).toBe('actual');
      expect(ok('actual').unwrapOr('default')).toBe('actual');
    });
  });

  describe('Err class', () => {
    it('should create Err instance with error', () => {
      const result = new Err('failure');

      expect(result.error).toBe('failure');
      expect(result._tag).toBe('Err');
      expect(result.isErr()).toBe(true);
      expect(result.isOk()).toBe(false);
    });

    it('should keep the error through map', () => {
      const mapped = err('failure').map((x: number) => x * 2);

      expect(mapped.isErr()).toBe(true);
      if (mapped.isErr()) {
        expect(mapped.error).toBe('failure');
      }
    });

    it('should rethrow an Error on unwrap', () => {
      const cause = new Error('boom');

      expect(() => err(cause).unwrap()).toThrow(cause);
      expect(() => err('plain').unwrap()).toThrow(
        'Called unwrap on an Err value: plain'
      );
    });

    it('should return the fallback for unwrapOr', () => {
      expect(err('failure').unwrapOr('default')).toBe('default');
    });
  });

  describe('type guards', () => {
    it('should narrow a Result', () => {
      const results: Result<number, string>[] = [ok(1), err('no')];

      expect(results.filter((result) => isOk(result))).toHaveLength(1);
      expect(results.filter((result) => isErr(result))).toHaveLength(1);
    });
  });
});
