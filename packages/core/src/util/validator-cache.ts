/**
 * Process-wide store of compiled validators keyed by canonical descriptor.
 *
 * Entries are created lazily and never evicted. Compilation is synchronous,
 * so the check-then-insert in `getOrCompile` runs without interleaving;
 * `getOrCompileAsync` single-flights concurrent callers through a map of
 * in-flight promises so each descriptor compiles once.
 */

import { compileSpecs } from '../compiler/compile.js';
import { ErrorCode } from '../errors/codes.js';
import {
  ParameterSpecSet,
  type ParametersInput,
} from '../params/parameter-spec.js';
import { SpecDefinitionError } from '../types/errors.js';
import {
  resolveOptions,
  type ResolvedOptions,
  type ValidatorOptions,
} from '../types/options.js';
import type { ValidatedValues } from '../compiler/types.js';
import type { CompiledValidator } from '../validator/compiled-validator.js';
import { describeValidator, type ValidatorDescriptor } from './descriptor.js';

export type CompileFn = (
  specs: ParameterSpecSet,
  options: ResolvedOptions,
  descriptor: ValidatorDescriptor
) => CompiledValidator<unknown>;

export interface ValidatorCacheOptions {
  /** Compiler used on a miss (default: plan + build) */
  compile?: CompileFn;
}

interface PreparedRequest {
  specs: ParameterSpecSet;
  options: ResolvedOptions;
  descriptor: ValidatorDescriptor;
}

export class ValidatorCache {
  static #global: ValidatorCache | undefined;

  readonly #entries = new Map<string, CompiledValidator<unknown>>();
  readonly #inFlight = new Map<string, Promise<CompiledValidator<unknown>>>();
  readonly #compiling = new Set<string>();
  readonly #compile: CompileFn;

  constructor(options: ValidatorCacheOptions = {}) {
    this.#compile = options.compile ?? compileSpecs;
  }

  /** The process-wide cache, created empty on first use */
  static global(): ValidatorCache {
    ValidatorCache.#global ??= new ValidatorCache();
    return ValidatorCache.#global;
  }

  get size(): number {
    return this.#entries.size;
  }

  has(descriptor: string): boolean {
    return this.#entries.has(descriptor);
  }

  /**
   * Return the validator for this descriptor, compiling it on first request.
   * `T` is the output type the caller knows the definitions produce.
   */
  getOrCompile<T = ValidatedValues>(
    params: ParametersInput | ParameterSpecSet,
    options: ValidatorOptions = {}
  ): CompiledValidator<T> {
    const request = this.#prepare(params, options);
    return this.#compileEntry(request) as CompiledValidator<T>;
  }

  async getOrCompileAsync<T = ValidatedValues>(
    params: ParametersInput | ParameterSpecSet,
    options: ValidatorOptions = {}
  ): Promise<CompiledValidator<T>> {
    const request = this.#prepare(params, options);
    const key = request.descriptor.digest;
    const hit = this.#entries.get(key);
    if (hit) return hit as CompiledValidator<T>;

    let task = this.#inFlight.get(key);
    if (!task) {
      task = Promise.resolve().then(() => this.#compileEntry(request));
      this.#inFlight.set(key, task);
      const settle = (): void => {
        this.#inFlight.delete(key);
      };
      void task.then(settle, settle);
    } else if (request.options.debug) {
      request.options.debug(
        `cache ${request.options.name}: joining in-flight compilation`
      );
    }
    const validator = await task;
    return validator as CompiledValidator<T>;
  }

  #prepare(
    params: ParametersInput | ParameterSpecSet,
    options: ValidatorOptions
  ): PreparedRequest {
    const specs = ParameterSpecSet.from(params);
    const resolved = resolveOptions(options);
    return {
      specs,
      options: resolved,
      descriptor: describeValidator(specs, resolved),
    };
  }

  #compileEntry({
    specs,
    options,
    descriptor,
  }: PreparedRequest): CompiledValidator<unknown> {
    const key = descriptor.digest;
    const hit = this.#entries.get(key);
    if (hit) {
      if (options.debug) options.debug(`cache ${options.name}: hit`);
      return hit;
    }
    if (this.#compiling.has(key)) {
      throw new SpecDefinitionError({
        message: `${options.name}: validator requested again while it is being compiled`,
        errorCode: ErrorCode.RECURSIVE_COMPILATION,
        context: { validator: options.name },
      });
    }

    this.#compiling.add(key);
    try {
      const validator = this.#compile(specs, options, descriptor);
      this.#entries.set(key, validator);
      return validator;
    } finally {
      this.#compiling.delete(key);
    }
  }
}

export function getValidatorCache(): ValidatorCache {
  return ValidatorCache.global();
}
