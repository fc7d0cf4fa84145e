/**
 * Validator builder: turns a compilation plan into a routine, taking the
 * specialized path when the plan allows it and falling back to the generic
 * loop otherwise (or when the runtime refuses code generation).
 */

import type { DebugSink } from '../types/options.js';
import { buildInlineRoutine } from './codegen.js';
import { buildGenericRoutine } from './generic.js';
import type { CompilationPlan } from './planner.js';
import { createReporters } from './runtime.js';
import type { BuiltRoutine } from './types.js';

export function buildRoutine(
  plan: CompilationPlan,
  debug: false | DebugSink = false
): BuiltRoutine {
  const reporters = createReporters(plan);

  if (plan.strategy === 'inline') {
    const outcome = buildInlineRoutine(plan, reporters);
    if (outcome.ok) {
      if (debug) {
        debug(`build ${plan.name}: inline\n${outcome.source}`);
      }
      return { routine: outcome.routine, strategy: 'inline', source: outcome.source };
    }
    if (debug) {
      debug(`build ${plan.name}: code generation refused (${outcome.reason}), using generic`);
    }
  } else if (debug) {
    debug(`build ${plan.name}: generic (${plan.fallbackReason ?? 'no reason'})`);
  }

  return {
    routine: buildGenericRoutine(plan, reporters),
    strategy: 'generic',
  };
}
