// @argspec/core entry point
//
// Public API:
// - defineValidator / defineValidatorAsync / compileValidator build validators
//   from parameter definitions; the first two go through the process-wide
//   ValidatorCache.
// - The capability contract (TypeCapability, pass/fail, defineCapability) is
//   what capability libraries such as @argspec/types implement.
// - Planner and builder entry points are exported for tooling that inspects
//   plans or generated source.

export {
  defineValidator,
  defineValidatorAsync,
  compileValidator,
  type DefineValidatorOptions,
  type ValidatorFor,
} from './api.js';

// Parameters
export {
  ParameterSpec,
  ParameterSpecSet,
  defineParameters,
  type DefaultFactory,
  type DefaultKind,
  type NamedParameterDefinition,
  type ParameterDefault,
  type ParameterDefinition,
  type ParameterList,
  type ParameterRecord,
  type ParametersInput,
} from './params/parameter-spec.js';

// Capabilities
export {
  defineCapability,
  fail,
  hasInlineCheck,
  isTypeCapability,
  pass,
  type CapabilityDefinition,
  type CapabilityOutput,
  type CheckResult,
  type InlineCapability,
  type TypeCapability,
} from './types/capability.js';

// Options
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  validateOptions,
  type DebugSink,
  type OutputMode,
  type ResolvedOptions,
  type SlurpyOption,
  type SourceMode,
  type ValidatorOptions,
} from './types/options.js';

// Errors
export { ErrorCode, type Severity, getExitCode } from './errors/codes.js';
export {
  ArgSpecError,
  ArgumentShapeError,
  ConfigError,
  ExtraArgumentsError,
  MissingRequiredParameterError,
  SpecDefinitionError,
  TypeMismatchError,
  UnknownParameterError,
  ValidationError,
  isArgSpecError,
  isValidationError,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  type Result,
} from './types/result.js';
export type {
  InferValues,
  OutputOf,
  ValidatedOutput,
} from './types/infer.js';

// Compilation
export {
  planValidation,
  type CompilationPlan,
  type ExecutionStrategy,
  type ExtrasPolicy,
  type FetchStrategy,
  type PlanStep,
} from './compiler/planner.js';
export { buildRoutine } from './compiler/builder.js';
export { describeReceived } from './compiler/runtime.js';
export { emitRoutineSource, routineName } from './compiler/codegen.js';
export type { Routine, ValidatedValues } from './compiler/types.js';
export {
  CompiledValidator,
  sourceFor,
  type ValidatorInfo,
} from './validator/compiled-validator.js';

// Cache
export {
  ValidatorCache,
  getValidatorCache,
  type CompileFn,
  type ValidatorCacheOptions,
} from './util/validator-cache.js';
export {
  describeValidator,
  type ValidatorDescriptor,
} from './util/descriptor.js';
