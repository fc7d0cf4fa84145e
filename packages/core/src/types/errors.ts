/**
 * Error hierarchy for argspec
 * Definition-time errors abort compilation; call-time errors are thrown from
 * a compiled validator and always name the offending parameter.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

export interface ErrorContext {
  parameter?: string; // Offending parameter name, or `[i]` for a positional extra
  position?: number; // Declared (or supplied) position of the parameter
  validator?: string; // Name of the compiled validator
  reason?: string; // Human readable reason from a type capability
  value?: unknown; // Problematic value (may contain PII)
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  parameter?: string;
}

interface ErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all argspec errors
 */
export abstract class ArgSpecError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor({
    message,
    errorCode,
    severity = 'error',
    context,
    cause,
  }: ErrorParams) {
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and drops context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      parameter: this.context?.parameter,
    };
  }

  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return { ...rest, value: '[REDACTED]' };
  }
}

/**
 * Raised while building a parameter spec set or compiling it.
 * Never deferred to call time.
 */
export class SpecDefinitionError extends ArgSpecError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_PARAMETER_DEFINITION,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Invalid validator options
 */
export class ConfigError extends ArgSpecError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.CONFIGURATION_ERROR, context });
  }
}

/**
 * Base class of every error a compiled validator throws at call time
 */
export abstract class ValidationError extends ArgSpecError {
  get parameter(): string {
    return this.context?.parameter ?? '';
  }
}

export class MissingRequiredParameterError extends ValidationError {
  constructor(params: { parameter: string; position: number; validator: string }) {
    super({
      message: `${params.validator}: missing required parameter "${params.parameter}"`,
      errorCode: ErrorCode.MISSING_REQUIRED_PARAMETER,
      context: { ...params },
    });
  }
}

export class UnknownParameterError extends ValidationError {
  constructor(params: {
    parameter: string;
    validator: string;
    message?: string;
    errorCode?: ErrorCode;
    position?: number;
  }) {
    super({
      message:
        params.message ??
        `${params.validator}: unknown parameter "${params.parameter}"`,
      errorCode: params.errorCode ?? ErrorCode.UNKNOWN_PARAMETER,
      context: {
        parameter: params.parameter,
        validator: params.validator,
        position: params.position,
      },
    });
  }
}

/**
 * Positional arguments beyond the declared count
 */
export class ExtraArgumentsError extends UnknownParameterError {
  constructor(params: { index: number; expected: number; validator: string }) {
    super({
      parameter: `[${params.index}]`,
      position: params.index,
      validator: params.validator,
      errorCode: ErrorCode.EXTRA_ARGUMENTS,
      message: `${params.validator}: expected at most ${params.expected} argument(s), got an extra one at index ${params.index}`,
    });
  }
}

export class TypeMismatchError extends ValidationError {
  constructor(params: {
    parameter: string;
    position?: number;
    validator: string;
    type: string;
    reason: string;
    value: unknown;
  }) {
    super({
      message: `${params.validator}: parameter "${params.parameter}" failed ${params.type}: ${params.reason}`,
      errorCode: ErrorCode.TYPE_MISMATCH,
      context: {
        parameter: params.parameter,
        position: params.position,
        validator: params.validator,
        type: params.type,
        reason: params.reason,
        value: params.value,
      },
    });
  }

  get reason(): string {
    return this.context?.reason ?? '';
  }
}

/**
 * Raw arguments arrived in the wrong container (an array in named mode,
 * an object in positional mode, null, ...)
 */
export class ArgumentShapeError extends ValidationError {
  constructor(params: { validator: string; expected: string; received: string }) {
    super({
      message: `${params.validator}: expected ${params.expected}, received ${params.received}`,
      errorCode: ErrorCode.ARGUMENT_SHAPE,
      context: {
        validator: params.validator,
        expected: params.expected,
        received: params.received,
      },
    });
  }
}

export function isArgSpecError(error: unknown): error is ArgSpecError {
  return error instanceof ArgSpecError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
