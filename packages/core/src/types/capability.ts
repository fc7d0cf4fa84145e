/**
 * Type capability contract consumed by the compiler.
 *
 * A capability is a predicate over a single value plus, optionally, an inline
 * form: a JavaScript boolean expression over a named variable that the
 * builder splices into a specialized validator. A capability without the
 * inline form is fully usable and sends its validator down the generic path.
 */

export type CheckResult = { ok: true } | { ok: false; reason: string };

export interface TypeCapability<T = unknown> {
  /** Display name, used in error messages and cache descriptors */
  readonly name: string;
  check(value: unknown): CheckResult;
  /**
   * Returns a side-effect free expression that is truthy exactly when
   * `check` passes for the value held in the variable `ref`.
   */
  emitInlineCheck?(ref: string): string;
  /** Conversion applied before `check`; returns its input when it cannot convert */
  coerce?(value: unknown): unknown;
  /** Phantom marker carrying the validated value type */
  readonly _output?: T;
}

export type InlineCapability<T = unknown> = TypeCapability<T> & {
  emitInlineCheck(ref: string): string;
};

/** Output type of a capability */
export type CapabilityOutput<C> = C extends TypeCapability<infer T> ? T : never;

const PASS: CheckResult = Object.freeze({ ok: true });

export function pass(): CheckResult {
  return PASS;
}

export function fail(reason: string): CheckResult {
  return { ok: false, reason };
}

export function hasInlineCheck<T>(
  capability: TypeCapability<T>
): capability is InlineCapability<T> {
  return typeof capability.emitInlineCheck === 'function';
}

export function isTypeCapability(value: unknown): value is TypeCapability {
  if (value === null || typeof value !== 'object') return false;
  if (!('name' in value) || typeof value.name !== 'string') return false;
  if (!('check' in value) || typeof value.check !== 'function') return false;
  if (
    'emitInlineCheck' in value &&
    value.emitInlineCheck !== undefined &&
    typeof value.emitInlineCheck !== 'function'
  ) {
    return false;
  }
  if (
    'coerce' in value &&
    value.coerce !== undefined &&
    typeof value.coerce !== 'function'
  ) {
    return false;
  }
  return true;
}

export interface CapabilityDefinition {
  name: string;
  check(value: unknown): CheckResult;
  emitInlineCheck?(ref: string): string;
  coerce?(value: unknown): unknown;
}

/**
 * Build a frozen capability. The returned object is the identity used by
 * validator cache descriptors, so define capabilities once at module scope.
 * Methods are copied off the definition and must not rely on `this`.
 */
export function defineCapability<T>(
  definition: CapabilityDefinition
): TypeCapability<T> {
  return Object.freeze({
    name: definition.name,
    check: definition.check,
    ...(definition.emitInlineCheck
      ? { emitInlineCheck: definition.emitInlineCheck }
      : {}),
    ...(definition.coerce ? { coerce: definition.coerce } : {}),
  });
}
