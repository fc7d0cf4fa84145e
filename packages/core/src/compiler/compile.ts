import type { ParameterSpecSet } from '../params/parameter-spec.js';
import type { ResolvedOptions } from '../types/options.js';
import type { ValidatorDescriptor } from '../util/descriptor.js';
import { CompiledValidator } from '../validator/compiled-validator.js';
import { buildRoutine } from './builder.js';
import { planValidation } from './planner.js';
import type { ValidatedValues } from './types.js';

/**
 * Plan and build one validator. Runs once per distinct descriptor when
 * reached through the validator cache.
 */
export function compileSpecs<T = ValidatedValues>(
  specs: ParameterSpecSet,
  options: ResolvedOptions,
  descriptor: ValidatorDescriptor
): CompiledValidator<T> {
  const plan = planValidation(specs, options);
  if (options.debug) {
    options.debug(
      `compile ${plan.name} [${descriptor.digest.slice(0, 12)}] ${plan.sourceMode}->${plan.outputMode}, ${plan.steps.length} parameter(s), strategy ${plan.strategy}`
    );
  }
  const built = buildRoutine(plan, options.debug);

  return new CompiledValidator<T>(built.routine, {
    name: plan.name,
    strategy: built.strategy,
    sourceMode: plan.sourceMode,
    outputMode: plan.outputMode,
    parameters: specs.names,
    descriptor: descriptor.digest,
    ...(built.source === undefined ? {} : { source: built.source }),
    ...(built.strategy === 'generic'
      ? { fallbackReason: plan.fallbackReason ?? 'code generation refused' }
      : {}),
  });
}
