/**
 * Compilation planner: spec set + resolved options -> ordered step list.
 *
 * One execution strategy is chosen for the whole plan. The specialized
 * ('inline') strategy is taken only when code generation is allowed and
 * every capability involved (declared parameters and a slurpy capability)
 * offers an inline check; otherwise the plan runs on the generic path.
 */

import type {
  DefaultKind,
  ParameterDefault,
  ParameterSpec,
  ParameterSpecSet,
} from '../params/parameter-spec.js';
import {
  hasInlineCheck,
  type TypeCapability,
} from '../types/capability.js';
import type {
  OutputMode,
  ResolvedOptions,
  SourceMode,
} from '../types/options.js';

export type FetchStrategy =
  | { kind: 'key'; key: string }
  | { kind: 'index'; index: number };

export interface PlanStep {
  readonly name: string;
  readonly position: number;
  readonly fetch: FetchStrategy;
  readonly required: boolean;
  readonly defaultKind: DefaultKind;
  readonly default: ParameterDefault;
  readonly capability: TypeCapability;
  readonly inline: boolean;
}

export type ExecutionStrategy = 'inline' | 'generic';

/**
 * What happens to arguments outside the declared set
 * - reject: strict named mode (UnknownParameterError), positional mode (ExtraArgumentsError)
 * - ignore: non-strict named mode, extras are dropped
 * - keep: slurpy, extras are carried into the output (checked when a capability is given)
 */
export type ExtrasPolicy =
  | { kind: 'reject' }
  | { kind: 'ignore' }
  | { kind: 'keep'; capability?: TypeCapability; inline: boolean };

export interface CompilationPlan {
  readonly name: string;
  readonly sourceMode: SourceMode;
  readonly outputMode: OutputMode;
  readonly steps: readonly PlanStep[];
  readonly declared: ReadonlySet<string>;
  readonly extras: ExtrasPolicy;
  readonly strategy: ExecutionStrategy;
  /** Why the generic path was chosen, when it was */
  readonly fallbackReason?: string;
}

function planStep(spec: ParameterSpec, sourceMode: SourceMode): PlanStep {
  const fetch: FetchStrategy =
    sourceMode === 'named'
      ? { kind: 'key', key: spec.name }
      : { kind: 'index', index: spec.position };

  return Object.freeze({
    name: spec.name,
    position: spec.position,
    fetch,
    required: spec.required,
    defaultKind: spec.default.kind,
    default: spec.default,
    capability: spec.type,
    inline: hasInlineCheck(spec.type),
  });
}

function planExtras(options: ResolvedOptions): ExtrasPolicy {
  const { slurpy } = options;
  if (slurpy === true) {
    return { kind: 'keep', inline: true };
  }
  if (slurpy !== false) {
    return { kind: 'keep', capability: slurpy, inline: hasInlineCheck(slurpy) };
  }
  if (options.sourceMode === 'named' && !options.strict) {
    return { kind: 'ignore' };
  }
  return { kind: 'reject' };
}

function chooseStrategy(
  steps: readonly PlanStep[],
  extras: ExtrasPolicy,
  options: ResolvedOptions
): { strategy: ExecutionStrategy; fallbackReason?: string } {
  if (!options.codegen) {
    return { strategy: 'generic', fallbackReason: 'code generation disabled' };
  }
  const blocking = steps.find((step) => !step.inline);
  if (blocking) {
    return {
      strategy: 'generic',
      fallbackReason: `parameter "${blocking.name}" uses ${blocking.capability.name}, which has no inline check`,
    };
  }
  if (extras.kind === 'keep' && !extras.inline && extras.capability) {
    return {
      strategy: 'generic',
      fallbackReason: `slurpy capability ${extras.capability.name} has no inline check`,
    };
  }
  return { strategy: 'inline' };
}

export function planValidation(
  specs: ParameterSpecSet,
  options: ResolvedOptions
): CompilationPlan {
  const steps: PlanStep[] = [];
  for (const spec of specs) {
    steps.push(planStep(spec, options.sourceMode));
  }
  const extras = planExtras(options);
  const { strategy, fallbackReason } = chooseStrategy(steps, extras, options);

  return Object.freeze({
    name: options.name,
    sourceMode: options.sourceMode,
    outputMode: options.outputMode,
    steps: Object.freeze(steps),
    declared: new Set(specs.names),
    extras: Object.freeze(extras),
    strategy,
    ...(fallbackReason === undefined ? {} : { fallbackReason }),
  });
}
