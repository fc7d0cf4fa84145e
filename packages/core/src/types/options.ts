/**
 * Configuration options for compiling a parameter validator
 *
 * All options are optional with conservative defaults: named arguments,
 * mapped output, strict unknown-key rejection, code generation allowed.
 */

import { ConfigError } from './errors.js';
import { isTypeCapability, type TypeCapability } from './capability.js';

/** How raw arguments arrive */
export type SourceMode = 'named' | 'positional';

/** Shape of the validated values */
export type OutputMode = 'mapped' | 'ordered-list';

/**
 * Extra-argument policy
 * - false: extras are rejected (strict named, positional) or dropped (non-strict named)
 * - true: extras are kept as-is
 * - capability: extras are kept and each one is checked
 */
export type SlurpyOption = boolean | TypeCapability;

export type DebugSink = (line: string) => void;

export interface ValidatorOptions {
  /** Raw argument container (default: 'named') */
  sourceMode?: SourceMode;
  /** Result container (default: 'mapped') */
  outputMode?: OutputMode;
  /** Reject undeclared keys in named mode (default: true) */
  strict?: boolean;
  /** Keep extra arguments instead of rejecting them (default: false) */
  slurpy?: SlurpyOption;
  /** Validator name used in error messages (default: 'validator') */
  name?: string;
  /** Allow the specialized path built with runtime code generation (default: true) */
  codegen?: boolean;
  /**
   * Log compilation details to stderr, or to the given sink
   * (default: true when ARGSPEC_DEBUG=1)
   */
  debug?: boolean | DebugSink;
}

export interface ResolvedOptions {
  sourceMode: SourceMode;
  outputMode: OutputMode;
  strict: boolean;
  slurpy: SlurpyOption;
  name: string;
  codegen: boolean;
  debug: false | DebugSink;
}

export const DEFAULT_OPTIONS = Object.freeze({
  sourceMode: 'named',
  outputMode: 'mapped',
  strict: true,
  slurpy: false,
  name: 'validator',
  codegen: true,
} as const);

const SOURCE_MODES: readonly SourceMode[] = ['named', 'positional'];
const OUTPUT_MODES: readonly OutputMode[] = ['mapped', 'ordered-list'];

const stderrSink: DebugSink = (line) => {
  process.stderr.write(`[argspec] ${line}\n`);
};

function resolveDebug(debug: ValidatorOptions['debug']): false | DebugSink {
  if (typeof debug === 'function') return debug;
  if (debug === true) return stderrSink;
  if (debug === false) return false;
  return process.env.ARGSPEC_DEBUG === '1' ? stderrSink : false;
}

/**
 * Merge user options onto the defaults and validate the combination
 */
export function resolveOptions(
  userOptions: ValidatorOptions = {}
): ResolvedOptions {
  validateOptions(userOptions);

  return {
    sourceMode: userOptions.sourceMode ?? DEFAULT_OPTIONS.sourceMode,
    outputMode: userOptions.outputMode ?? DEFAULT_OPTIONS.outputMode,
    strict: userOptions.strict ?? DEFAULT_OPTIONS.strict,
    slurpy: userOptions.slurpy ?? DEFAULT_OPTIONS.slurpy,
    name: userOptions.name ?? DEFAULT_OPTIONS.name,
    codegen: userOptions.codegen ?? DEFAULT_OPTIONS.codegen,
    debug: resolveDebug(userOptions.debug),
  };
}

/**
 * Validate option values and combinations
 */
// eslint-disable-next-line complexity
export function validateOptions(options: ValidatorOptions): void {
  const { sourceMode, outputMode, strict, slurpy, name, codegen, debug } =
    options;

  if (sourceMode !== undefined && !SOURCE_MODES.includes(sourceMode)) {
    throw new ConfigError(
      `sourceMode must be one of ${SOURCE_MODES.join(', ')}, got ${String(sourceMode)}`,
      { option: 'sourceMode' }
    );
  }

  if (outputMode !== undefined && !OUTPUT_MODES.includes(outputMode)) {
    throw new ConfigError(
      `outputMode must be one of ${OUTPUT_MODES.join(', ')}, got ${String(outputMode)}`,
      { option: 'outputMode' }
    );
  }

  if (strict !== undefined && typeof strict !== 'boolean') {
    throw new ConfigError('strict must be a boolean', { option: 'strict' });
  }

  if (codegen !== undefined && typeof codegen !== 'boolean') {
    throw new ConfigError('codegen must be a boolean', { option: 'codegen' });
  }

  if (
    debug !== undefined &&
    typeof debug !== 'boolean' &&
    typeof debug !== 'function'
  ) {
    throw new ConfigError('debug must be a boolean or a function', {
      option: 'debug',
    });
  }

  if (
    slurpy !== undefined &&
    typeof slurpy !== 'boolean' &&
    !isTypeCapability(slurpy)
  ) {
    throw new ConfigError('slurpy must be a boolean or a type capability', {
      option: 'slurpy',
    });
  }

  if (
    slurpy !== undefined &&
    slurpy !== false &&
    sourceMode === 'positional' &&
    (outputMode ?? DEFAULT_OPTIONS.outputMode) === 'mapped'
  ) {
    throw new ConfigError(
      'slurpy positional arguments need outputMode "ordered-list"',
      { option: 'slurpy' }
    );
  }

  if (name !== undefined && (typeof name !== 'string' || name.length === 0)) {
    throw new ConfigError('name must be a non-empty string', {
      option: 'name',
    });
  }
}
