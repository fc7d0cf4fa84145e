/**
 * Capability constructors built from other capabilities or values.
 *
 * A composite offers an inline fragment only when every member does; a
 * single generic-only member sends the whole validator down the generic path.
 */

import {
  SpecDefinitionError,
  defineCapability,
  fail,
  hasInlineCheck,
  pass,
  type CapabilityOutput,
  type CheckResult,
  type InlineCapability,
  type TypeCapability,
} from '@argspec/core';
import { received } from './received.js';

export type EnumValue = string | number | boolean | null;

function literal(value: EnumValue): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/**
 * One of a fixed set of primitive values, compared with SameValueZero
 *
 * @example
 * const Color = enumOf(['red', 'green', 'blue']);
 */
export function enumOf<const V extends readonly EnumValue[]>(
  values: V,
  name?: string
): TypeCapability<V[number]> {
  const allowed: readonly EnumValue[] = Object.freeze([...values]);
  const listed = allowed.map(literal).join(', ');
  // NaN never equals itself, so a set holding it cannot be spliced as ===
  const inlinable = !allowed.some(
    (value) => typeof value === 'number' && Number.isNaN(value)
  );

  return defineCapability<V[number]>({
    name: name ?? `enumOf(${listed})`,
    check: (value) =>
      allowed.some((candidate) => sameValueZero(candidate, value))
        ? pass()
        : fail(`expected one of ${listed}, got ${received(value)}`),
    ...(inlinable
      ? {
          emitInlineCheck: (ref: string) =>
            allowed.length === 0
              ? 'false'
              : `(${allowed.map((value) => `${ref} === ${literal(value)}`).join(' || ')})`,
        }
      : {}),
  });
}

/**
 * Arrays whose every element passes `item`. Holes are skipped.
 */
export function arrayOf<T>(item: TypeCapability<T>): TypeCapability<T[]> {
  const inline = hasInlineCheck(item) ? item : undefined;

  return defineCapability<T[]>({
    name: `arrayOf(${item.name})`,
    check: (value) => {
      if (!Array.isArray(value)) {
        return fail(`expected an array, got ${received(value)}`);
      }
      let failure: CheckResult = pass();
      value.every((element: unknown, index) => {
        const verdict = item.check(element);
        if (verdict.ok) return true;
        failure = fail(`element ${index}: ${verdict.reason}`);
        return false;
      });
      return failure;
    },
    ...(inline
      ? {
          emitInlineCheck: (ref: string) =>
            `(Array.isArray(${ref}) && ${ref}.every((${ref}_i) => ${inline.emitInlineCheck(`${ref}_i`)}))`,
        }
      : {}),
  });
}

/**
 * Accepts null (and undefined) in addition to what `inner` accepts
 */
export function maybe<T>(
  inner: TypeCapability<T>
): TypeCapability<T | null | undefined> {
  const inline = hasInlineCheck(inner) ? inner : undefined;

  return defineCapability<T | null | undefined>({
    name: `maybe(${inner.name})`,
    check: (value) =>
      value === null || value === undefined ? pass() : inner.check(value),
    ...(inline
      ? {
          emitInlineCheck: (ref: string) =>
            `(${ref} === null || ${ref} === undefined || (${inline.emitInlineCheck(ref)}))`,
        }
      : {}),
    ...(inner.coerce
      ? { coerce: (value: unknown) => (inner.coerce ? inner.coerce(value) : value) }
      : {}),
  });
}

/**
 * Accepts a value when any member accepts it; members are tried in order
 */
export function union<const M extends readonly TypeCapability[]>(
  ...members: M
): TypeCapability<CapabilityOutput<M[number]>> {
  if (members.length === 0) {
    throw new SpecDefinitionError({
      message: 'union needs at least one member capability',
    });
  }
  const name = members.map((member) => member.name).join(' | ');
  const inlines: InlineCapability[] = [];
  for (const member of members) {
    if (hasInlineCheck(member)) inlines.push(member);
  }

  return defineCapability<CapabilityOutput<M[number]>>({
    name,
    check: (value) => {
      const reasons: string[] = [];
      for (const member of members) {
        const verdict = member.check(value);
        if (verdict.ok) return verdict;
        reasons.push(`${member.name}: ${verdict.reason}`);
      }
      return fail(`matched none of ${name} (${reasons.join('; ')})`);
    },
    ...(inlines.length === members.length
      ? {
          emitInlineCheck: (ref: string) =>
            `(${inlines.map((member) => `(${member.emitInlineCheck(ref)})`).join(' || ')})`,
        }
      : {}),
  });
}

/**
 * Instances of a class (or anything with it on the prototype chain).
 * Has no inline form: the constructor is not reachable from generated code.
 */
export function instanceOf<T>(
  ctor: abstract new (...args: never[]) => T,
  name: string = ctor.name || 'instance'
): TypeCapability<T> {
  return defineCapability<T>({
    name,
    check: (value) =>
      value instanceof ctor
        ? pass()
        : fail(`expected an instance of ${name}, got ${received(value)}`),
  });
}

/**
 * Capability from a free predicate. Always runs on the generic path.
 *
 * @example
 * const Even = predicate<number>('Even', (value) => Number.isInteger(value) && Number(value) % 2 === 0);
 */
export function predicate<T = unknown>(
  name: string,
  test: (value: unknown) => boolean,
  reason: string = `rejected by ${name}`
): TypeCapability<T> {
  return defineCapability<T>({
    name,
    check: (value) => (test(value) ? pass() : fail(reason)),
  });
}
