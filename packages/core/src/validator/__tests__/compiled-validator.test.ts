import { describe, it, expect } from 'vitest';
import { compileValidator } from '../../api.js';
import {
  ArgumentShapeError,
  ExtraArgumentsError,
  MissingRequiredParameterError,
  TypeMismatchError,
  UnknownParameterError,
  ValidationError,
} from '../../types/errors.js';
import {
  Any,
  Even,
  Exploding,
  NonEmptyStr,
  PositiveInt,
  Str,
} from '../../test-utils/capabilities.js';

function expectThrown<E extends Error>(
  ctor: abstract new (...args: never[]) => E,
  fn: () => unknown
): E {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(ctor);
    if (error instanceof ctor) return error;
  }
  throw new Error(`expected ${ctor.name} to be thrown`);
}

const paths = [
  { codegen: true, strategy: 'inline' },
  { codegen: false, strategy: 'generic' },
] as const;

describe.each(paths)('CompiledValidator ($strategy path)', ({ codegen, strategy }) => {
  const order = () =>
    compileValidator(
      {
        present_name: { type: NonEmptyStr },
        qty: { type: PositiveInt, default: 1 },
      },
      { codegen }
    );

  it('builds on the expected path', () => {
    expect(order().strategy).toBe(strategy);
  });

  describe('named arguments, mapped output', () => {
    it('applies the default when a value is omitted', () => {
      expect(order().validate({ present_name: 'Teddy Bear' })).toEqual({
        present_name: 'Teddy Bear',
        qty: 1,
      });
    });

    it('keeps the coerced value', () => {
      expect(order().validate({ present_name: 'Teddy Bear', qty: '22' })).toEqual({
        present_name: 'Teddy Bear',
        qty: 22,
      });
    });

    it('rejects a value its capability refuses', () => {
      const error = expectThrown(TypeMismatchError, () =>
        order().validate({ present_name: 'Teddy Bear', qty: '0.45' })
      );
      expect(error.parameter).toBe('qty');
      expect(error.reason).toBe('expected a positive integer');
      expect(error.message).toBe('validator: parameter "qty" failed PositiveInt: expected a positive integer');
    });

    it('reports the first missing parameter in declaration order', () => {
      const error = expectThrown(MissingRequiredParameterError, () =>
        order().validate({ qty: 'not a number' })
      );
      expect(error.parameter).toBe('present_name');
      expect(error.message).toBe('validator: missing required parameter "present_name"');
    });

    it('rejects undeclared keys in strict mode', () => {
      const error = expectThrown(UnknownParameterError, () =>
        order().validate({ present_name: 'x', extra: 1 })
      );
      expect(error.parameter).toBe('extra');
      expect(error.message).toBe('validator: unknown parameter "extra"');
    });

    it('checks undeclared keys before any declared parameter', () => {
      expectThrown(UnknownParameterError, () => order().validate({ extra: 1 }));
    });

    it('drops undeclared keys when not strict', () => {
      const validator = compileValidator(
        { present_name: { type: NonEmptyStr } },
        { codegen, strict: false }
      );
      expect(validator.validate({ present_name: 'x', extra: 1 })).toEqual({
        present_name: 'x',
      });
    });

    it('treats an explicit undefined as absent', () => {
      expect(order().validate({ present_name: 'x', qty: undefined })).toEqual({
        present_name: 'x',
        qty: 1,
      });
    });

    it('ignores inherited properties', () => {
      const args: object = Object.create({ present_name: 'inherited' });
      expectThrown(MissingRequiredParameterError, () => order().validate(args));
    });

    it('omits optional parameters that were not supplied', () => {
      const validator = compileValidator(
        { nickname: { type: Str, optional: true } },
        { codegen }
      );
      const out = validator.validate({});
      expect(out).toEqual({});
      expect(Object.hasOwn(out, 'nickname')).toBe(false);
      expect(validator.validate({ nickname: 'Ted' })).toEqual({ nickname: 'Ted' });
    });

    it('rejects a container of the wrong shape', () => {
      const error = expectThrown(ArgumentShapeError, () =>
        order().validate(['Teddy Bear'])
      );
      expect(error.message).toBe('validator: expected an object of named arguments, received an array');
      expect(() => order().validate(null)).toThrow(
        'validator: expected an object of named arguments, received null'
      );
    });

    it('uses the validator name in messages', () => {
      const validator = compileValidator(
        { id: { type: PositiveInt } },
        { codegen, name: 'loadUser' }
      );
      expect(() => validator.validate({})).toThrow(
        'loadUser: missing required parameter "id"'
      );
    });
  });

  describe('ordered-list output', () => {
    it('returns values in declaration order whatever the key order', () => {
      const validator = compileValidator(
        {
          present_name: { type: NonEmptyStr },
          qty: { type: PositiveInt, default: 1 },
        },
        { codegen, outputMode: 'ordered-list' }
      );
      expect(validator.validate({ qty: 3, present_name: 'Bear' })).toEqual([
        'Bear',
        3,
      ]);
      expect(validator.validate({ present_name: 'Bear' })).toEqual(['Bear', 1]);
    });

    it('keeps a slot for an omitted optional parameter', () => {
      const validator = compileValidator(
        [
          { name: 'a', type: Str, optional: true },
          { name: 'b', type: Str },
        ],
        { codegen, outputMode: 'ordered-list' }
      );
      const out = validator.validate({ b: 'x' });
      expect(out).toHaveLength(2);
      expect(out).toEqual([undefined, 'x']);
    });
  });

  describe('positional arguments', () => {
    const params = [
      { name: 'a', type: Str },
      { name: 'b', type: PositiveInt, default: 2 },
    ] as const;

    it('maps positions onto names', () => {
      const validator = compileValidator(params, {
        codegen,
        sourceMode: 'positional',
      });
      expect(validator.validate(['x'])).toEqual({ a: 'x', b: 2 });
      expect(validator.validate(['x', undefined])).toEqual({ a: 'x', b: 2 });
    });

    it('returns an ordered list', () => {
      const validator = compileValidator(params, {
        codegen,
        sourceMode: 'positional',
        outputMode: 'ordered-list',
      });
      expect(validator.validate(['x', '7'])).toEqual(['x', 7]);
    });

    it('rejects arguments beyond the declared count', () => {
      const validator = compileValidator(params, {
        codegen,
        sourceMode: 'positional',
      });
      const error = expectThrown(ExtraArgumentsError, () =>
        validator.validate(['x', 3, 4])
      );
      expect(error).toBeInstanceOf(UnknownParameterError);
      expect(error.parameter).toBe('[2]');
      expect(error.message).toBe('validator: expected at most 2 argument(s), got an extra one at index 2');
    });

    it('rejects an object', () => {
      const validator = compileValidator(params, {
        codegen,
        sourceMode: 'positional',
      });
      expect(() => validator.validate({ a: 'x' })).toThrow(
        'validator: expected an array of arguments, received an object'
      );
    });
  });

  describe('defaults', () => {
    it('calls a factory default on every call', () => {
      const validator = compileValidator(
        { tags: { type: Any, default: () => [] } },
        { codegen }
      );
      const first = validator.validate({});
      const second = validator.validate({});
      expect(first).toEqual({ tags: [] });
      expect(first.tags).not.toBe(second.tags);
    });

    it('checks the value a factory returns', () => {
      const validator = compileValidator(
        { n: { type: PositiveInt, default: () => -1 } },
        { codegen }
      );
      const error = expectThrown(TypeMismatchError, () => validator.validate({}));
      expect(error.parameter).toBe('n');
    });
  });

  describe('slurpy', () => {
    it('keeps extra named arguments in mapped output', () => {
      const validator = compileValidator(
        { present_name: { type: NonEmptyStr } },
        { codegen, slurpy: true }
      );
      expect(validator.validate({ present_name: 'x', note: 'hi' })).toEqual({
        present_name: 'x',
        note: 'hi',
      });
    });

    it('checks extras against a slurpy capability', () => {
      const validator = compileValidator(
        { present_name: { type: NonEmptyStr } },
        { codegen, slurpy: Str }
      );
      const error = expectThrown(TypeMismatchError, () =>
        validator.validate({ present_name: 'x', note: 5 })
      );
      expect(error.parameter).toBe('note');
      expect(error.message).toBe('validator: parameter "note" failed Str: expected a string');
    });

    it('appends extras as a trailing record in ordered-list output', () => {
      const validator = compileValidator(
        [{ name: 'present_name', type: NonEmptyStr }],
        { codegen, slurpy: true, outputMode: 'ordered-list' }
      );
      expect(validator.validate({ note: 'hi', present_name: 'x' })).toEqual([
        'x',
        { note: 'hi' },
      ]);
    });

    it('appends positional extras', () => {
      const validator = compileValidator([{ name: 'a', type: Str }], {
        codegen,
        sourceMode: 'positional',
        outputMode: 'ordered-list',
        slurpy: PositiveInt,
      });
      expect(validator.validate(['x', 1, '2'])).toEqual(['x', 1, 2]);
      expect(() => validator.validate(['x', 1, 'two'])).toThrow(
        'validator: parameter "[2]" failed PositiveInt: expected a positive integer'
      );
    });

    it('copies a "__proto__" key as an own property', () => {
      const validator = compileValidator(
        { present_name: { type: NonEmptyStr } },
        { codegen, slurpy: true }
      );
      const args: unknown = JSON.parse(
        '{"present_name":"x","__proto__":{"polluted":true}}'
      );
      const out = validator.validate(args);
      expect(Object.hasOwn(out, '__proto__')).toBe(true);
      expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
    });
  });

  describe('purity', () => {
    it('returns equal, fresh results for identical input', () => {
      const validator = order();
      const args = Object.freeze({ present_name: 'Teddy Bear', qty: 4 });
      const first = validator.validate(args);
      const second = validator.validate(args);
      expect(first).toEqual(second);
      expect(first).not.toBe(second);
      expect(args).toEqual({ present_name: 'Teddy Bear', qty: 4 });
    });
  });

  describe('safeValidate', () => {
    it('returns Ok for valid input', () => {
      const result = order().safeValidate({ present_name: 'x' });
      expect(result.isOk()).toBe(true);
      expect(result.unwrap()).toEqual({ present_name: 'x', qty: 1 });
    });

    it('returns Err carrying the validation error', () => {
      const result = order().safeValidate({});
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(MissingRequiredParameterError);
        expect(result.error.parameter).toBe('present_name');
      }
    });

    it('reports acceptance as a boolean', () => {
      expect(order().accepts({ present_name: 'x' })).toBe(true);
      expect(order().accepts({ present_name: '' })).toBe(false);
    });
  });
});

describe('CompiledValidator strategy selection', () => {
  it('exposes the generated source on the specialized path', () => {
    const validator = compileValidator({ a: { type: Str } }, { name: 'greet' });
    expect(validator.strategy).toBe('inline');
    expect(validator.source).toContain('return function validate_greet(args) {');
    expect(validator.fallbackReason).toBeUndefined();
  });

  it('falls back to the generic path for a capability without inline form', () => {
    const validator = compileValidator({ n: { type: Even }, s: { type: Str } });
    expect(validator.strategy).toBe('generic');
    expect(validator.source).toBeUndefined();
    expect(validator.fallbackReason).toBe(
      'parameter "n" uses Even, which has no inline check'
    );
    expect(validator.validate({ n: 4, s: 'x' })).toEqual({ n: 4, s: 'x' });
    expect(() => validator.validate({ n: 3, s: 'x' })).toThrow(
      'validator: parameter "n" failed Even: expected an even integer'
    );
  });

  it('records disabled code generation as the fallback reason', () => {
    const validator = compileValidator({ a: { type: Str } }, { codegen: false });
    expect(validator.fallbackReason).toBe('code generation disabled');
  });

  it('is frozen', () => {
    const validator = compileValidator({ a: { type: Str } });
    expect(Object.isFrozen(validator)).toBe(true);
    expect(validator.parameters).toEqual(['a']);
  });
});

describe('safeValidate with a throwing capability', () => {
  it('rethrows errors that are not validation errors', () => {
    const validator = compileValidator({ a: { type: Exploding } });
    expect(() => validator.safeValidate({ a: 1 })).toThrow('boom');
    const error = expectThrown(Error, () => validator.validate({ a: 1 }));
    expect(error).not.toBeInstanceOf(ValidationError);
  });
});
