import type { Reporters } from './runtime.js';
import type { DefaultFactory } from '../params/parameter-spec.js';
import type { TypeCapability } from '../types/capability.js';

/** Values a routine returns: a record for mapped output, an array for ordered-list output */
export type ValidatedValues = Record<string, unknown> | unknown[];

export type Routine = (args: unknown) => ValidatedValues;

/** Bindings visible to generated code */
export interface RoutineScope {
  readonly r: Reporters;
  /** Capabilities by step index */
  readonly k: readonly TypeCapability[];
  /** Default values or factories by step index */
  readonly d: readonly (unknown | DefaultFactory<unknown>)[];
  /** Slurpy capability */
  readonly x?: TypeCapability;
}

export interface BuiltRoutine {
  routine: Routine;
  strategy: 'inline' | 'generic';
  /** Generated source, specialized path only */
  source?: string;
}
