/**
 * Static output types of a validator, computed from its parameter
 * definitions and options.
 */

import type {
  ParameterList,
  ParameterRecord,
  ParameterSpecSet,
  ParametersInput,
} from '../params/parameter-spec.js';
import type { TypeCapability } from './capability.js';

type Simplify<T> = { [K in keyof T]: T[K] } & {};

/** Value type produced by one parameter definition */
export type OutputOf<D> = D extends { type: TypeCapability<infer T> } ? T : unknown;

/** A definition yields an optional output when it can be absent with no default */
type IsOptional<D> = D extends { default: unknown }
  ? false
  : D extends { optional: true }
    ? true
    : D extends { required: false }
      ? true
      : false;

type RequiredKeys<P> = {
  [K in keyof P]-?: IsOptional<P[K]> extends true ? never : K;
}[keyof P];

type OptionalKeys<P> = {
  [K in keyof P]-?: IsOptional<P[K]> extends true ? K : never;
}[keyof P];

export type InferValues<P> = Simplify<
  { -readonly [K in RequiredKeys<P>]: OutputOf<P[K]> } & {
    -readonly [K in OptionalKeys<P>]?: OutputOf<P[K]>;
  }
>;

type ListToRecord<L extends ParameterList> = {
  [D in L[number] as D['name']]: D;
};

type RecordOf<P extends ParametersInput> = P extends ParameterList
  ? ListToRecord<P>
  : P extends ParameterRecord
    ? P
    : never;

type ListTuple<L extends ParameterList> = {
  -readonly [I in keyof L]: IsOptional<L[I]> extends true
    ? OutputOf<L[I]> | undefined
    : OutputOf<L[I]>;
};

type OrderedOf<O> = O extends { outputMode: 'ordered-list' } ? true : false;
type PositionalOf<O> = O extends { sourceMode: 'positional' } ? true : false;
type SlurpyOf<O> = O extends { slurpy: true | TypeCapability } ? true : false;

/**
 * What `validate` returns for parameters P under options O
 * - mapped: an object keyed by parameter name
 * - ordered-list: a tuple in declaration order (for list definitions),
 *   followed by the extras when slurpy
 * A prebuilt ParameterSpecSet carries no static types.
 */
export type ValidatedOutput<P, O> = P extends ParameterSpecSet
  ? OrderedOf<O> extends true
    ? unknown[]
    : Record<string, unknown>
  : P extends ParametersInput
    ? DefinitionOutput<P, O>
    : never;

type DefinitionOutput<P extends ParametersInput, O> =
  OrderedOf<O> extends true
    ? P extends ParameterList
      ? SlurpyOf<O> extends true
        ? ListTuple<P> extends infer L extends readonly unknown[]
          ? PositionalOf<O> extends true
            ? [...L, ...unknown[]]
            : [...L, Record<string, unknown>]
          : never
        : ListTuple<P>
      : unknown[]
    : SlurpyOf<O> extends true
      ? InferValues<RecordOf<P>> & Record<string, unknown>
      : InferValues<RecordOf<P>>;
