/* eslint-disable complexity */
/**
 * Declarative parameter descriptions.
 *
 * A ParameterSpecSet is built once from either an ordered list of named
 * definitions or a record (whose insertion order is the declaration order)
 * and is frozen afterwards. Every definition-time problem surfaces here as a
 * SpecDefinitionError; nothing is deferred to call time.
 */

import { ErrorCode } from '../errors/codes.js';
import { SpecDefinitionError } from '../types/errors.js';
import {
  isTypeCapability,
  type TypeCapability,
} from '../types/capability.js';

export type DefaultFactory<T> = () => T;

export interface ParameterDefinition<T = unknown> {
  type: TypeCapability<T>;
  /** Defaults to true unless `optional` or `default` is given */
  required?: boolean;
  optional?: boolean;
  /** A value, or a factory called on every call where the value is absent */
  default?: T | DefaultFactory<T>;
}

export interface NamedParameterDefinition<T = unknown>
  extends ParameterDefinition<T> {
  name: string;
}

/**
 * Keys are declared in insertion order. Integer-like keys ("0", "12") would be
 * enumerated ahead of the others, so a record may not use them; declare such
 * parameters with a list instead.
 */
export type ParameterRecord = Readonly<Record<string, ParameterDefinition>>;
export type ParameterList = readonly NamedParameterDefinition[];
export type ParametersInput = ParameterRecord | ParameterList;

export type DefaultKind = 'none' | 'value' | 'factory';

export type ParameterDefault =
  | { kind: 'none' }
  | { kind: 'value'; value: unknown }
  | { kind: 'factory'; factory: DefaultFactory<unknown>; source: object };

const NO_DEFAULT: ParameterDefault = Object.freeze({ kind: 'none' });

const RESERVED_NAMES = new Set(['__proto__']);
const INTEGER_LIKE = /^(?:0|[1-9][0-9]*)$/;

export class ParameterSpec {
  readonly name: string;
  readonly position: number;
  readonly type: TypeCapability;
  readonly required: boolean;
  readonly default: ParameterDefault;

  constructor(definition: NamedParameterDefinition, position: number) {
    const { name } = definition;
    if (typeof name !== 'string' || name.length === 0) {
      throw new SpecDefinitionError({
        message: `parameter at position ${position} needs a non-empty string name`,
        context: { position },
      });
    }
    if (RESERVED_NAMES.has(name)) {
      throw new SpecDefinitionError({
        message: `"${name}" cannot be used as a parameter name`,
        context: { parameter: name, position },
      });
    }
    if (!isTypeCapability(definition.type)) {
      throw new SpecDefinitionError({
        message: `parameter "${name}" needs a type capability with a name and a check function`,
        context: { parameter: name, position },
      });
    }

    const hasDefault = definition.default !== undefined;
    if (definition.required === true && definition.optional === true) {
      throw new SpecDefinitionError({
        message: `parameter "${name}" cannot be both required and optional`,
        context: { parameter: name, position },
      });
    }
    if (definition.required === true && hasDefault) {
      throw new SpecDefinitionError({
        message: `parameter "${name}" is required and cannot have a default`,
        errorCode: ErrorCode.DEFAULT_ON_REQUIRED,
        context: { parameter: name, position },
      });
    }

    this.name = name;
    this.position = position;
    this.type = definition.type;
    this.required =
      definition.required ?? !(definition.optional === true || hasDefault);
    this.default = hasDefault
      ? resolveDefault(name, position, definition.type, definition.default)
      : NO_DEFAULT;
    Object.freeze(this);
  }

  get optional(): boolean {
    return !this.required;
  }
}

function resolveDefault(
  name: string,
  position: number,
  type: TypeCapability,
  raw: unknown
): ParameterDefault {
  if (typeof raw === 'function') {
    const factory: DefaultFactory<unknown> = () => raw();
    return Object.freeze({ kind: 'factory', factory, source: raw });
  }

  const value = type.coerce ? type.coerce(raw) : raw;
  if (typeof value === 'object' && value !== null) {
    throw new SpecDefinitionError({
      message: `default for parameter "${name}" is an object; pass a factory such as () => value so each call gets its own copy`,
      errorCode: ErrorCode.INVALID_DEFAULT,
      context: { parameter: name, position },
    });
  }
  const verdict = type.check(value);
  if (!verdict.ok) {
    throw new SpecDefinitionError({
      message: `default for parameter "${name}" failed ${type.name}: ${verdict.reason}`,
      errorCode: ErrorCode.INVALID_DEFAULT,
      context: { parameter: name, position, reason: verdict.reason, value },
    });
  }
  return Object.freeze({ kind: 'value', value });
}

function isParameterList(input: ParametersInput): input is ParameterList {
  return Array.isArray(input);
}

/**
 * Immutable, ordered set of parameter specs
 */
export class ParameterSpecSet implements Iterable<ParameterSpec> {
  readonly #specs: readonly ParameterSpec[];
  readonly #byName: ReadonlyMap<string, ParameterSpec>;

  private constructor(specs: ParameterSpec[]) {
    const byName = new Map<string, ParameterSpec>();
    for (const spec of specs) {
      if (byName.has(spec.name)) {
        throw new SpecDefinitionError({
          message: `duplicate parameter name "${spec.name}"`,
          errorCode: ErrorCode.DUPLICATE_PARAMETER,
          context: { parameter: spec.name, position: spec.position },
        });
      }
      byName.set(spec.name, spec);
    }
    this.#specs = Object.freeze(specs);
    this.#byName = byName;
    Object.freeze(this);
  }

  static from(input: ParametersInput | ParameterSpecSet): ParameterSpecSet {
    if (input instanceof ParameterSpecSet) return input;
    if (isParameterList(input)) {
      return new ParameterSpecSet(
        input.map((definition, position) => new ParameterSpec(definition, position))
      );
    }
    if (input === null || typeof input !== 'object') {
      throw new SpecDefinitionError({
        message: 'parameters must be a list of definitions or a record',
      });
    }
    const entries = Object.entries(input);
    const integerLike = entries.find(([name]) => INTEGER_LIKE.test(name));
    if (integerLike) {
      throw new SpecDefinitionError({
        message: `parameter "${integerLike[0]}" has an integer-like name, which a record cannot keep in declaration order; use a list of definitions`,
        context: { parameter: integerLike[0] },
      });
    }
    return new ParameterSpecSet(
      entries.map(
        ([name, definition], position) =>
          new ParameterSpec({ ...definition, name }, position)
      )
    );
  }

  get size(): number {
    return this.#specs.length;
  }

  get names(): string[] {
    return this.#specs.map((spec) => spec.name);
  }

  get(name: string): ParameterSpec | undefined {
    return this.#byName.get(name);
  }

  has(name: string): boolean {
    return this.#byName.has(name);
  }

  at(position: number): ParameterSpec | undefined {
    return this.#specs[position];
  }

  [Symbol.iterator](): Iterator<ParameterSpec> {
    return this.#specs[Symbol.iterator]();
  }
}

export function defineParameters(
  input: ParametersInput | ParameterSpecSet
): ParameterSpecSet {
  return ParameterSpecSet.from(input);
}
