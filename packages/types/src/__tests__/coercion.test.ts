import { describe, it, expect } from 'vitest';
import { compileValidator } from '@argspec/core';
import {
  Int,
  NonEmptyStr,
  PositiveInt,
  withNumericStringCoercion,
} from '../index.js';

describe('withNumericStringCoercion', () => {
  const LooseInt = withNumericStringCoercion(Int);

  it('converts decimal strings and leaves everything else alone', () => {
    expect(LooseInt.coerce?.(' 42 ')).toBe(42);
    expect(LooseInt.coerce?.('+7')).toBe(7);
    expect(LooseInt.coerce?.('-1.5')).toBe(-1.5);
    expect(LooseInt.coerce?.('0.45')).toBe(0.45);
    expect(LooseInt.coerce?.('4x')).toBe('4x');
    expect(LooseInt.coerce?.('')).toBe('');
    expect(LooseInt.coerce?.(7)).toBe(7);
  });

  it('leaves strings that do not name their number exactly', () => {
    for (const raw of [
      '9007199254740993',
      '99999999999999999999',
      '1e3',
      '-1.5e3',
      '1.0',
      '1.',
      '.5',
      '007',
      'Infinity',
    ]) {
      expect(LooseInt.coerce?.(raw)).toBe(raw);
    }
    expect(LooseInt.coerce?.('9007199254740991')).toBe(9007199254740991);
  });

  it('keeps the inner name and inline fragment', () => {
    expect(LooseInt.name).toBe('Int');
    expect(LooseInt.emitInlineCheck?.('v')).toBe('Number.isInteger(v)');
  });

  describe('in an order validator', () => {
    const order = compileValidator({
      present_name: { type: NonEmptyStr },
      qty: { type: withNumericStringCoercion(PositiveInt), default: 1 },
    });

    it('runs on the specialized path', () => {
      expect(order.strategy).toBe('inline');
    });

    it('applies the default', () => {
      expect(order.validate({ present_name: 'Teddy Bear' })).toEqual({
        present_name: 'Teddy Bear',
        qty: 1,
      });
    });

    it('returns the converted number', () => {
      expect(order.validate({ present_name: 'Teddy Bear', qty: '22' })).toEqual({
        present_name: 'Teddy Bear',
        qty: 22,
      });
    });

    it('rejects integer strings it cannot convert exactly', () => {
      expect(() =>
        order.validate({ present_name: 'Teddy Bear', qty: '9007199254740993' })
      ).toThrow(
        'validator: parameter "qty" failed PositiveInt: expected a positive integer, got "9007199254740993"'
      );
      expect(() =>
        order.validate({ present_name: 'Teddy Bear', qty: '1e3' })
      ).toThrow(
        'validator: parameter "qty" failed PositiveInt: expected a positive integer, got "1e3"'
      );
    });

    it('rejects a string that converts to a non-integer', () => {
      expect(() =>
        order.validate({ present_name: 'Teddy Bear', qty: '0.45' })
      ).toThrow(
        'validator: parameter "qty" failed PositiveInt: expected a positive integer, got 0.45'
      );
    });
  });
});
