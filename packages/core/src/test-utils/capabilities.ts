/**
 * Small capabilities for the core test suites. The stock library lives in
 * @argspec/types, which depends on this package.
 */

import { defineCapability, fail, pass } from '../types/capability.js';

export const Str = defineCapability<string>({
  name: 'Str',
  check: (value) =>
    typeof value === 'string' ? pass() : fail('expected a string'),
  emitInlineCheck: (ref) => `typeof ${ref} === "string"`,
});

export const NonEmptyStr = defineCapability<string>({
  name: 'NonEmptyStr',
  check: (value) =>
    typeof value === 'string' && value.length > 0
      ? pass()
      : fail('expected a non-empty string'),
  emitInlineCheck: (ref) => `(typeof ${ref} === "string" && ${ref}.length > 0)`,
});

/** Positive integers; strings of decimal digits are converted first */
export const PositiveInt = defineCapability<number>({
  name: 'PositiveInt',
  check: (value) =>
    typeof value === 'number' && Number.isInteger(value) && value > 0
      ? pass()
      : fail('expected a positive integer'),
  emitInlineCheck: (ref) => `(Number.isInteger(${ref}) && ${ref} > 0)`,
  coerce: (value) =>
    typeof value === 'string' && /^[0-9]+$/.test(value) ? Number(value) : value,
});

export const Any = defineCapability<unknown>({
  name: 'Any',
  check: () => pass(),
  emitInlineCheck: () => 'true',
});

/** No inline form: forces the generic path */
export const Even = defineCapability<number>({
  name: 'Even',
  check: (value) =>
    typeof value === 'number' && Number.isInteger(value) && value % 2 === 0
      ? pass()
      : fail('expected an even integer'),
});

/** Inline fragment that does not parse */
export const BrokenInline = defineCapability<string>({
  name: 'BrokenInline',
  check: () => pass(),
  emitInlineCheck: (ref) => `${ref} ===`,
});

/** Check that throws instead of failing */
export const Exploding = defineCapability<unknown>({
  name: 'Exploding',
  check: () => {
    throw new Error('boom');
  },
});
