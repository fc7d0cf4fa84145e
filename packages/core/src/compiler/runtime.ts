/**
 * Call-time helpers shared by the specialized and the generic routine.
 *
 * Every failure either path reports goes through the reporters built here,
 * so both paths throw the same error classes with the same messages and
 * context for the same input.
 */

import {
  ArgumentShapeError,
  ExtraArgumentsError,
  MissingRequiredParameterError,
  TypeMismatchError,
  UnknownParameterError,
} from '../types/errors.js';
import type { TypeCapability } from '../types/capability.js';
import type { CompilationPlan, PlanStep } from './planner.js';

export interface Reporters {
  shape(received: unknown): never;
  unknown(key: string): never;
  extra(index: number): never;
  missing(step: number): never;
  mismatch(step: number, value: unknown): never;
  extraMismatch(key: string, value: unknown): never;
  defineExtra(target: Record<string, unknown>, key: string, value: unknown): void;
}

export function describeReceived(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value === 'object' ? 'an object' : typeof value;
}

function reasonFor(capability: TypeCapability, value: unknown): string {
  const verdict = capability.check(value);
  return verdict.ok ? 'rejected by inline check' : verdict.reason;
}

function stepAt(plan: CompilationPlan, index: number): PlanStep {
  const step = plan.steps[index];
  if (!step) {
    throw new RangeError(`${plan.name}: no parameter at step ${index}`);
  }
  return step;
}

export function createReporters(plan: CompilationPlan): Reporters {
  const validator = plan.name;
  const expected =
    plan.sourceMode === 'named' ? 'an object of named arguments' : 'an array of arguments';

  return Object.freeze({
    shape(received: unknown): never {
      throw new ArgumentShapeError({
        validator,
        expected,
        received: describeReceived(received),
      });
    },
    unknown(key: string): never {
      throw new UnknownParameterError({ parameter: key, validator });
    },
    extra(index: number): never {
      throw new ExtraArgumentsError({
        index,
        expected: plan.steps.length,
        validator,
      });
    },
    missing(index: number): never {
      const step = stepAt(plan, index);
      throw new MissingRequiredParameterError({
        parameter: step.name,
        position: step.position,
        validator,
      });
    },
    mismatch(index: number, value: unknown): never {
      const step = stepAt(plan, index);
      throw new TypeMismatchError({
        parameter: step.name,
        position: step.position,
        validator,
        type: step.capability.name,
        reason: reasonFor(step.capability, value),
        value,
      });
    },
    extraMismatch(key: string, value: unknown): never {
      const capability =
        plan.extras.kind === 'keep' ? plan.extras.capability : undefined;
      throw new TypeMismatchError({
        parameter: key,
        validator,
        type: capability?.name ?? 'slurpy',
        reason: capability ? reasonFor(capability, value) : 'rejected',
        value,
      });
    },
    defineExtra(
      target: Record<string, unknown>,
      key: string,
      value: unknown
    ): void {
      // A plain assignment to "__proto__" would replace the prototype
      Object.defineProperty(target, key, {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    },
  });
}
