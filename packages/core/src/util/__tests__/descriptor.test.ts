import { describe, it, expect } from 'vitest';
import { ParameterSpecSet } from '../../params/parameter-spec.js';
import { defineCapability, pass } from '../../types/capability.js';
import { resolveOptions, type ValidatorOptions } from '../../types/options.js';
import { describeValidator, identityOf } from '../descriptor.js';
import { Any, PositiveInt, Str } from '../../test-utils/capabilities.js';

const digestOf = (
  params: Parameters<typeof ParameterSpecSet.from>[0],
  options: ValidatorOptions = {}
) =>
  describeValidator(
    ParameterSpecSet.from(params),
    resolveOptions({ debug: false, ...options })
  ).digest;

describe('identityOf', () => {
  it('assigns one stable id per object', () => {
    const a = {};
    const b = {};
    expect(identityOf(a)).toBe(identityOf(a));
    expect(identityOf(a)).not.toBe(identityOf(b));
  });
});

describe('describeValidator', () => {
  it('matches structurally identical definitions', () => {
    expect(digestOf({ a: { type: Str }, n: { type: PositiveInt, default: 1 } })).toBe(
      digestOf({ a: { type: Str }, n: { type: PositiveInt, default: 1 } })
    );
  });

  it('distinguishes capability objects that share a name', () => {
    const OtherStr = defineCapability<string>({ name: 'Str', check: () => pass() });
    expect(digestOf({ a: { type: Str } })).not.toBe(digestOf({ a: { type: OtherStr } }));
  });

  it('distinguishes declaration order', () => {
    expect(digestOf({ a: { type: Str }, b: { type: Str } })).not.toBe(
      digestOf({ b: { type: Str }, a: { type: Str } })
    );
  });

  it('distinguishes defaults by type and by factory identity', () => {
    expect(digestOf({ a: { type: Any, default: '1' } })).not.toBe(
      digestOf({ a: { type: Any, default: 1 } })
    );
    expect(digestOf({ n: { type: PositiveInt, default: 1 } })).not.toBe(
      digestOf({ n: { type: PositiveInt, default: 2 } })
    );
    const factory = () => 1;
    expect(digestOf({ n: { type: PositiveInt, default: factory } })).toBe(
      digestOf({ n: { type: PositiveInt, default: factory } })
    );
    expect(digestOf({ n: { type: PositiveInt, default: factory } })).not.toBe(
      digestOf({ n: { type: PositiveInt, default: () => 1 } })
    );
  });

  it('distinguishes symbol defaults that share a description', () => {
    const first = Symbol('tag');
    const second = Symbol('tag');
    expect(digestOf({ t: { type: Any, default: first } })).toBe(
      digestOf({ t: { type: Any, default: first } })
    );
    expect(digestOf({ t: { type: Any, default: first } })).not.toBe(
      digestOf({ t: { type: Any, default: second } })
    );
  });

  it('includes the resolved options', () => {
    const params = { a: { type: Str } };
    const base = digestOf(params);
    expect(digestOf(params, { strict: true })).toBe(base);
    expect(digestOf(params, { strict: false })).not.toBe(base);
    expect(digestOf(params, { outputMode: 'ordered-list' })).not.toBe(base);
    expect(digestOf(params, { name: 'other' })).not.toBe(base);
    expect(digestOf(params, { slurpy: Str })).not.toBe(digestOf(params, { slurpy: true }));
  });

  it('leaves debug output out of the descriptor', () => {
    const params = { a: { type: Str } };
    expect(digestOf(params, { debug: () => undefined })).toBe(digestOf(params));
  });

  it('exposes the canonical text', () => {
    const { canonical } = describeValidator(
      ParameterSpecSet.from({ a: { type: Str } }),
      resolveOptions({ debug: false })
    );
    expect(canonical).toContain('"sourceMode":"named"');
    expect(canonical).toContain('"outputMode":"mapped"');
  });
});
