/**
 * Scalar capabilities. Every one carries an inline fragment, so validators
 * built only from these run on the specialized path.
 */

import { defineCapability, fail, pass } from '@argspec/core';
import { received } from './received.js';

export const Str = defineCapability<string>({
  name: 'Str',
  check: (value) =>
    typeof value === 'string'
      ? pass()
      : fail(`expected a string, got ${received(value)}`),
  emitInlineCheck: (ref) => `typeof ${ref} === "string"`,
});

export const NonEmptyStr = defineCapability<string>({
  name: 'NonEmptyStr',
  check: (value) =>
    typeof value === 'string' && value.length > 0
      ? pass()
      : fail(`expected a non-empty string, got ${received(value)}`),
  emitInlineCheck: (ref) => `(typeof ${ref} === "string" && ${ref}.length > 0)`,
});

/** Finite numbers; NaN and the infinities are rejected */
export const Num = defineCapability<number>({
  name: 'Num',
  check: (value) =>
    Number.isFinite(value)
      ? pass()
      : fail(`expected a finite number, got ${received(value)}`),
  emitInlineCheck: (ref) => `Number.isFinite(${ref})`,
});

export const Int = defineCapability<number>({
  name: 'Int',
  check: (value) =>
    Number.isInteger(value)
      ? pass()
      : fail(`expected an integer, got ${received(value)}`),
  emitInlineCheck: (ref) => `Number.isInteger(${ref})`,
});

export const PositiveInt = defineCapability<number>({
  name: 'PositiveInt',
  check: (value) =>
    typeof value === 'number' && Number.isInteger(value) && value > 0
      ? pass()
      : fail(`expected a positive integer, got ${received(value)}`),
  emitInlineCheck: (ref) => `(Number.isInteger(${ref}) && ${ref} > 0)`,
});

export const PositiveOrZeroInt = defineCapability<number>({
  name: 'PositiveOrZeroInt',
  check: (value) =>
    typeof value === 'number' && Number.isInteger(value) && value >= 0
      ? pass()
      : fail(`expected an integer >= 0, got ${received(value)}`),
  emitInlineCheck: (ref) => `(Number.isInteger(${ref}) && ${ref} >= 0)`,
});

export const Bool = defineCapability<boolean>({
  name: 'Bool',
  check: (value) =>
    typeof value === 'boolean'
      ? pass()
      : fail(`expected a boolean, got ${received(value)}`),
  emitInlineCheck: (ref) => `typeof ${ref} === "boolean"`,
});

export const Any = defineCapability<unknown>({
  name: 'Any',
  check: () => pass(),
  emitInlineCheck: () => 'true',
});

/** Anything but null (absent values never reach a check) */
export const Defined = defineCapability<NonNullable<unknown>>({
  name: 'Defined',
  check: (value) =>
    value !== null && value !== undefined
      ? pass()
      : fail(`expected a value, got ${received(value)}`),
  emitInlineCheck: (ref) => `(${ref} !== null && ${ref} !== undefined)`,
});
