/* eslint-disable complexity */
/**
 * Generic routine: a loop over the plan steps calling each capability's
 * `check`. Used whenever some capability lacks an inline form or code
 * generation is disabled. Must stay observably identical to the routine
 * emitted by ./codegen.ts.
 */

import type { TypeCapability } from '../types/capability.js';
import type { CompilationPlan, PlanStep } from './planner.js';
import type { Reporters } from './runtime.js';
import type { Routine } from './types.js';

type NamedArgs = Record<string, unknown>;

function isNamedArgs(args: unknown): args is NamedArgs {
  return typeof args === 'object' && args !== null && !Array.isArray(args);
}

function fetchValue(step: PlanStep, args: NamedArgs | unknown[]): unknown {
  if (Array.isArray(args)) {
    return step.fetch.kind === 'index' ? args[step.fetch.index] : undefined;
  }
  if (step.fetch.kind !== 'key') return undefined;
  return Object.hasOwn(args, step.fetch.key) ? args[step.fetch.key] : undefined;
}

function coerceWith(capability: TypeCapability, value: unknown): unknown {
  return capability.coerce ? capability.coerce(value) : value;
}

function resolveStep(
  step: PlanStep,
  index: number,
  args: NamedArgs | unknown[],
  r: Reporters
): unknown {
  let value = fetchValue(step, args);
  if (value === undefined) {
    const fallback = step.default;
    if (fallback.kind === 'value') return fallback.value;
    if (fallback.kind === 'factory') {
      value = coerceWith(step.capability, fallback.factory());
      if (!step.capability.check(value).ok) r.mismatch(index, value);
      return value;
    }
    if (step.required) r.missing(index);
    return undefined;
  }
  value = coerceWith(step.capability, value);
  if (!step.capability.check(value).ok) r.mismatch(index, value);
  return value;
}

export function buildGenericRoutine(
  plan: CompilationPlan,
  r: Reporters
): Routine {
  const { steps, declared, extras } = plan;
  const mapped = plan.outputMode === 'mapped';
  const extrasCapability =
    extras.kind === 'keep' ? extras.capability : undefined;

  const checkExtra = (label: string, raw: unknown): unknown => {
    if (!extrasCapability) return raw;
    const value = coerceWith(extrasCapability, raw);
    if (!extrasCapability.check(value).ok) r.extraMismatch(label, value);
    return value;
  };

  const resolveAll = (args: NamedArgs | unknown[]): unknown[] => {
    return steps.map((step, i) => resolveStep(step, i, args, r));
  };

  const collectNamedExtras = (
    target: NamedArgs,
    source: NamedArgs
  ): NamedArgs => {
    for (const key of Object.keys(source)) {
      if (declared.has(key)) continue;
      r.defineExtra(target, key, checkExtra(key, source[key]));
    }
    return target;
  };

  const toMapped = (values: unknown[]): NamedArgs => {
    const out: NamedArgs = {};
    steps.forEach((step, i) => {
      if (values[i] !== undefined) out[step.name] = values[i];
    });
    return out;
  };

  if (plan.sourceMode === 'named') {
    return function validateGeneric(args: unknown) {
      if (!isNamedArgs(args)) return r.shape(args);
      if (extras.kind === 'reject') {
        for (const key of Object.keys(args)) {
          if (!declared.has(key)) r.unknown(key);
        }
      }
      const values = resolveAll(args);
      if (mapped) {
        const out = toMapped(values);
        return extras.kind === 'keep' ? collectNamedExtras(out, args) : out;
      }
      if (extras.kind === 'keep') values.push(collectNamedExtras({}, args));
      return values;
    };
  }

  return function validateGeneric(args: unknown) {
    if (!Array.isArray(args)) return r.shape(args);
    if (extras.kind === 'reject' && args.length > steps.length) {
      r.extra(steps.length);
    }
    const values = resolveAll(args);
    if (mapped) return toMapped(values);
    if (extras.kind === 'keep') {
      for (let i = steps.length; i < args.length; i++) {
        values.push(checkExtra(`[${i}]`, args[i]));
      }
    }
    return values;
  };
}
