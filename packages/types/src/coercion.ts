import {
  defineCapability,
  hasInlineCheck,
  type TypeCapability,
} from '@argspec/core';

const NUMERIC = /^[+-]?[0-9]+(?:\.[0-9]+)?$/;

/** Only strings that name their number exactly are converted */
function toNumber(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  if (!NUMERIC.test(trimmed)) return value;
  const converted = Number(trimmed);
  const canonical = trimmed.startsWith('+') ? trimmed.slice(1) : trimmed;
  return String(converted) === canonical ? converted : value;
}

/**
 * Wrap a numeric capability so decimal strings (`"42"`, `" -1.5 "`) are
 * converted to numbers before the check. A string is converted only when the
 * number prints back as the same digits, so `"1.0"`, `"1e3"`, `"007"` and
 * integers past 2^53 stay strings and fail the inner check. Other values pass
 * through unchanged.
 * The coerced number is what ends up in the validated output.
 */
export function withNumericStringCoercion<T>(
  inner: TypeCapability<T>
): TypeCapability<T> {
  const inline = hasInlineCheck(inner) ? inner : undefined;

  return defineCapability<T>({
    name: inner.name,
    check: (value) => inner.check(value),
    coerce: (value) => {
      const converted = toNumber(value);
      return inner.coerce ? inner.coerce(converted) : converted;
    },
    ...(inline
      ? { emitInlineCheck: (ref: string) => inline.emitInlineCheck(ref) }
      : {}),
  });
}
