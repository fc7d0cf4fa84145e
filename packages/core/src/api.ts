/**
 * Public entry points.
 *
 * `defineValidator` is the usual call: it builds the spec set, resolves the
 * options and returns the cached validator for that descriptor, compiling it
 * on first request. `compileValidator` skips the cache.
 */

import { compileSpecs } from './compiler/compile.js';
import {
  ParameterSpecSet,
  type ParametersInput,
} from './params/parameter-spec.js';
import type { ValidatedOutput } from './types/infer.js';
import { resolveOptions, type ValidatorOptions } from './types/options.js';
import { describeValidator } from './util/descriptor.js';
import { ValidatorCache } from './util/validator-cache.js';
import type { CompiledValidator } from './validator/compiled-validator.js';

export interface DefineValidatorOptions extends ValidatorOptions {
  /** Cache to use instead of the process-wide one */
  cache?: ValidatorCache;
}

export type ValidatorFor<
  P extends ParametersInput | ParameterSpecSet,
  O = Record<never, never>,
> = CompiledValidator<ValidatedOutput<P, O>>;

function splitOptions(options: DefineValidatorOptions): {
  cache: ValidatorCache;
  validatorOptions: ValidatorOptions;
} {
  const { cache, ...validatorOptions } = options;
  return { cache: cache ?? ValidatorCache.global(), validatorOptions };
}

/**
 * Compile (once) and return the validator for a set of parameters.
 *
 * @example
 * const validateOrder = defineValidator({
 *   present_name: { type: NonEmptyStr },
 *   qty: { type: PositiveInt, default: 1 },
 * });
 * validateOrder.validate({ present_name: 'Teddy Bear' });
 * // => { present_name: 'Teddy Bear', qty: 1 }
 */
export function defineValidator<
  const P extends ParametersInput | ParameterSpecSet,
  const O extends DefineValidatorOptions = Record<never, never>,
>(params: P, options?: O): ValidatorFor<P, O> {
  const { cache, validatorOptions } = splitOptions(options ?? {});
  return cache.getOrCompile<ValidatedOutput<P, O>>(params, validatorOptions);
}

/**
 * Like `defineValidator`, resolving once concurrent requests for the same
 * descriptor have shared a single compilation
 */
export async function defineValidatorAsync<
  const P extends ParametersInput | ParameterSpecSet,
  const O extends DefineValidatorOptions = Record<never, never>,
>(params: P, options?: O): Promise<ValidatorFor<P, O>> {
  const { cache, validatorOptions } = splitOptions(options ?? {});
  return cache.getOrCompileAsync<ValidatedOutput<P, O>>(
    params,
    validatorOptions
  );
}

/**
 * Compile without consulting or filling any cache
 */
export function compileValidator<
  const P extends ParametersInput | ParameterSpecSet,
  const O extends ValidatorOptions = Record<never, never>,
>(params: P, options?: O): ValidatorFor<P, O> {
  const specs = ParameterSpecSet.from(params);
  const resolved = resolveOptions(options);
  return compileSpecs<ValidatedOutput<P, O>>(
    specs,
    resolved,
    describeValidator(specs, resolved)
  );
}
