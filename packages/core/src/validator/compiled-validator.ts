import { isValidationError, type ValidationError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { OutputMode, SourceMode } from '../types/options.js';
import type { ExecutionStrategy } from '../compiler/planner.js';
import type { Routine, ValidatedValues } from '../compiler/types.js';

export interface ValidatorInfo {
  name: string;
  strategy: ExecutionStrategy;
  sourceMode: SourceMode;
  outputMode: OutputMode;
  parameters: readonly string[];
  /** Cache descriptor digest */
  descriptor: string;
  /** Generated source, specialized path only */
  source?: string;
  fallbackReason?: string;
}

/**
 * A compiled, immutable parameter validator.
 *
 * `validate` is a pure function of its input: it never mutates the raw
 * arguments, the spec or the plan, and returns a fresh container each call.
 */
export class CompiledValidator<T = ValidatedValues> {
  readonly name: string;
  readonly strategy: ExecutionStrategy;
  readonly sourceMode: SourceMode;
  readonly outputMode: OutputMode;
  readonly parameters: readonly string[];
  readonly descriptor: string;
  readonly source?: string;
  readonly fallbackReason?: string;
  readonly #routine: Routine;

  constructor(routine: Routine, info: ValidatorInfo) {
    this.#routine = routine;
    this.name = info.name;
    this.strategy = info.strategy;
    this.sourceMode = info.sourceMode;
    this.outputMode = info.outputMode;
    this.parameters = Object.freeze([...info.parameters]);
    this.descriptor = info.descriptor;
    if (info.source !== undefined) this.source = info.source;
    if (info.fallbackReason !== undefined) {
      this.fallbackReason = info.fallbackReason;
    }
    Object.freeze(this);
  }

  /**
   * Validate raw arguments, throwing the first violation in declaration order
   */
  validate(args: unknown): T {
    // The routine assembles exactly the shape T describes
    return this.#routine(args) as T;
  }

  /**
   * Like `validate`, but call-time violations come back as an Err.
   * Errors that are not validation errors (a throwing capability) still throw.
   */
  safeValidate(args: unknown): Result<T, ValidationError> {
    try {
      return ok(this.validate(args));
    } catch (error) {
      if (isValidationError(error)) return err(error);
      throw error;
    }
  }

  /** Validate-and-discard convenience: true when `args` passes */
  accepts(args: unknown): boolean {
    return this.safeValidate(args).isOk();
  }
}

/**
 * Generated source of a validator, or undefined on the generic path
 */
export function sourceFor(validator: CompiledValidator<unknown>): string | undefined {
  return validator.source;
}
