/**
 * Canonical descriptors for the validator cache.
 *
 * Two spec sets share a descriptor when they declare the same names in the
 * same order with the same flags, the same capability objects, equal
 * primitive defaults (or the same factories) and the same resolved options.
 * Capability, factory and symbol identity map to process-local ids.
 */

import type { ParameterDefault, ParameterSpecSet } from '../params/parameter-spec.js';
import type { ResolvedOptions } from '../types/options.js';
import { stableHash, type CanonicalValue } from './stable-hash.js';

const identities = new WeakMap<object, number>();
// Symbols are kept alive by the static default that holds them
const symbolIdentities = new Map<symbol, number>();
let nextIdentity = 1;

export function identityOf(target: object): number {
  const known = identities.get(target);
  if (known !== undefined) return known;
  const id = nextIdentity++;
  identities.set(target, id);
  return id;
}

function symbolIdentityOf(target: symbol): number {
  const known = symbolIdentities.get(target);
  if (known !== undefined) return known;
  const id = nextIdentity++;
  symbolIdentities.set(target, id);
  return id;
}

function describeValue(value: unknown): CanonicalValue {
  if (value === null) return { kind: 'null' };
  if (typeof value === 'symbol') {
    return { kind: 'symbol', id: symbolIdentityOf(value) };
  }
  if (typeof value === 'number' && Object.is(value, -0)) {
    return { kind: 'number', value: '-0' };
  }
  return { kind: typeof value, value: String(value) };
}

function describeDefault(fallback: ParameterDefault): CanonicalValue {
  switch (fallback.kind) {
    case 'none':
      return null;
    case 'value':
      return { value: describeValue(fallback.value) };
    case 'factory':
      return { factory: identityOf(fallback.source) };
  }
}

export interface ValidatorDescriptor {
  digest: string;
  canonical: string;
}

export function describeValidator(
  specs: ParameterSpecSet,
  options: ResolvedOptions
): ValidatorDescriptor {
  const parameters: CanonicalValue[] = [];
  for (const spec of specs) {
    parameters.push({
      name: spec.name,
      position: spec.position,
      required: spec.required,
      type: { name: spec.type.name, id: identityOf(spec.type) },
      default: describeDefault(spec.default),
    });
  }

  const slurpy: CanonicalValue =
    typeof options.slurpy === 'boolean'
      ? options.slurpy
      : { name: options.slurpy.name, id: identityOf(options.slurpy) };

  return stableHash({
    parameters,
    sourceMode: options.sourceMode,
    outputMode: options.outputMode,
    strict: options.strict,
    slurpy,
    name: options.name,
    codegen: options.codegen,
  });
}
