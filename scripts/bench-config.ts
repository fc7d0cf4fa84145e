import type { ParameterRecord } from '../packages/core/src/index.js';
import {
  NonEmptyStr,
  PositiveInt,
  Str,
  arrayOf,
  enumOf,
  withNumericStringCoercion,
} from '../packages/types/src/index.js';
import type { BenchCase, IterationConfig } from './bench-types.js';

export const DEFAULT_ITERATIONS: IterationConfig = {
  warmup: 200,
  measured: 2_000,
};

/** Validations timed together in one sample */
export const BATCH_SIZE = 100;

export const BENCH_BUDGETS = {
  /** The specialized validator must be at least as fast as the generic one */
  minInlineSpeedup: 1,
} as const;

export const benchParameters = {
  present_name: { type: NonEmptyStr },
  qty: { type: withNumericStringCoercion(PositiveInt), default: 1 },
  tags: { type: arrayOf(Str), optional: true },
  note: { type: Str, optional: true },
  size: { type: enumOf(['s', 'm', 'l']), default: 'm' },
} satisfies ParameterRecord;

export const cases: readonly BenchCase[] = [
  {
    id: 'defaults',
    label: 'required name only, defaults filled',
    args: { present_name: 'Teddy Bear' },
  },
  {
    id: 'full',
    label: 'every parameter supplied',
    args: {
      present_name: 'Teddy Bear',
      qty: '22',
      tags: ['plush', 'gift'],
      note: 'wrap it',
      size: 'l',
    },
  },
];
