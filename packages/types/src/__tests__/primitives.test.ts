import { describe, it, expect } from 'vitest';
import { compileValidator, type TypeCapability } from '@argspec/core';
import {
  Any,
  Bool,
  Defined,
  Int,
  NonEmptyStr,
  Num,
  PositiveInt,
  PositiveOrZeroInt,
  Str,
} from '../index.js';

const SAMPLES: unknown[] = [
  '',
  'text',
  '42',
  0,
  -0,
  1,
  -1,
  1.5,
  Number.NaN,
  Infinity,
  true,
  false,
  null,
  [],
  [1],
  {},
  () => 1,
  10n,
];

/** Evaluate a capability's inline fragment the way generated code does */
function inlineVerdict(capability: TypeCapability, value: unknown): boolean {
  const fragment = capability.emitInlineCheck?.('v') ?? 'false';
  const evaluate = new Function('v', `"use strict"; return Boolean(${fragment});`);
  return evaluate(value) === true;
}

const capabilities = [
  Str,
  NonEmptyStr,
  Num,
  Int,
  PositiveInt,
  PositiveOrZeroInt,
  Bool,
  Any,
  Defined,
];

describe.each(capabilities)('$name', (capability) => {
  it('has an inline fragment that agrees with check', () => {
    for (const value of SAMPLES) {
      expect(inlineVerdict(capability, value), String(value)).toBe(
        capability.check(value).ok
      );
    }
  });
});

describe('primitive failure reasons', () => {
  it.each([
    [Str, 5, 'expected a string, got 5'],
    [Str, [], 'expected a string, got an array'],
    [NonEmptyStr, '', 'expected a non-empty string, got ""'],
    [Num, Number.NaN, 'expected a finite number, got NaN'],
    [Num, '1', 'expected a finite number, got "1"'],
    [Int, 1.5, 'expected an integer, got 1.5'],
    [PositiveInt, 0, 'expected a positive integer, got 0'],
    [PositiveOrZeroInt, -1, 'expected an integer >= 0, got -1'],
    [Bool, null, 'expected a boolean, got null'],
    [Defined, null, 'expected a value, got null'],
  ] as const)('case %#: rejects the value', (capability, value, reason) => {
    expect(capability.check(value)).toEqual({ ok: false, reason });
  });
});

describe('validators built from primitives', () => {
  it('take the specialized path', () => {
    const validator = compileValidator({
      title: { type: NonEmptyStr },
      pages: { type: PositiveInt },
      draft: { type: Bool, default: false },
    });
    expect(validator.strategy).toBe('inline');
    expect(validator.validate({ title: 'Notes', pages: 3 })).toEqual({
      title: 'Notes',
      pages: 3,
      draft: false,
    });
    expect(() => validator.validate({ title: 'Notes', pages: 0 })).toThrow(
      'validator: parameter "pages" failed PositiveInt: expected a positive integer, got 0'
    );
  });
});
