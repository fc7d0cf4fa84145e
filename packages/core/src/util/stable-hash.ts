import { createHash } from 'node:crypto';

/** JSON values accepted by the canonical encoder */
export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue };

export interface StableHashResult {
  digest: string;
  canonical: string;
}

function normalizeNumber(value: number): string {
  if (Object.is(value, -0)) return '0';
  if (!Number.isFinite(value)) {
    throw new TypeError(`cannot canonicalize non-finite number ${value}`);
  }
  return JSON.stringify(value);
}

function isCanonicalArray(
  value: CanonicalValue
): value is readonly CanonicalValue[] {
  return Array.isArray(value);
}

/**
 * Deterministic JSON text: object keys sorted, -0 folded into 0
 */
export function canonicalize(value: CanonicalValue): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return normalizeNumber(value);
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (isCanonicalArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }
  const entries = Object.keys(value)
    .sort()
    .map((key) => {
      const item = value[key];
      return `${JSON.stringify(key)}:${item === undefined ? 'null' : canonicalize(item)}`;
    });
  return `{${entries.join(',')}}`;
}

export function stableHash(value: CanonicalValue): StableHashResult {
  const canonical = canonicalize(value);
  const digest = createHash('sha256').update(canonical, 'utf8').digest('hex');
  return { digest, canonical };
}
