/* eslint-disable max-lines-per-function */
/* eslint-disable complexity */
/**
 * Specialized routine: one JavaScript function emitted from the plan with
 * every capability's inline check spliced in, instantiated once with the
 * Function constructor.
 *
 * Fragments run against locals named `v<i>` (declared parameters) and `e`
 * (slurpy extras). Failures are routed to the shared reporters (`r`) so the
 * thrown errors match the generic routine exactly.
 */

import type { InlineCapability, TypeCapability } from '../types/capability.js';
import { hasInlineCheck } from '../types/capability.js';
import { SpecDefinitionError } from '../types/errors.js';
import type { CompilationPlan, PlanStep } from './planner.js';
import type { Reporters } from './runtime.js';
import type { Routine, RoutineScope } from './types.js';

const lit = (value: string): string => JSON.stringify(value);

export function routineName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_$]/g, '_');
  return `validate_${cleaned}`;
}

function inlineOf(capability: TypeCapability): InlineCapability {
  if (!hasInlineCheck(capability)) {
    throw new SpecDefinitionError({
      message: `${capability.name} has no inline check; the plan should have taken the generic path`,
    });
  }
  return capability;
}

class SourceWriter {
  readonly #lines: string[] = [];
  #depth = 0;

  line(text: string): this {
    this.#lines.push(`${'  '.repeat(this.#depth)}${text}`);
    return this;
  }

  open(text: string): this {
    this.line(text);
    this.#depth++;
    return this;
  }

  close(text = '}'): this {
    this.#depth--;
    return this.line(text);
  }

  /** Close the current block and open the next one on the same line */
  reopen(text: string): this {
    return this.close(text).indent();
  }

  private indent(): this {
    this.#depth++;
    return this;
  }

  toString(): string {
    return this.#lines.join('\n');
  }
}

function emitCheck(
  w: SourceWriter,
  capability: InlineCapability,
  ref: string,
  coerceRef: string | undefined,
  onFailure: string
): void {
  if (coerceRef) w.line(`${ref} = ${coerceRef}.coerce(${ref});`);
  w.line(`if (!(${capability.emitInlineCheck(ref)})) ${onFailure};`);
}

function emitFetch(w: SourceWriter, step: PlanStep, ref: string): void {
  if (step.fetch.kind === 'index') {
    w.line(`let ${ref} = args[${step.fetch.index}];`);
    return;
  }
  const key = lit(step.fetch.key);
  w.line(`let ${ref} = Object.hasOwn(args, ${key}) ? args[${key}] : undefined;`);
}

function emitStep(w: SourceWriter, step: PlanStep, i: number): void {
  const ref = `v${i}`;
  const capability = inlineOf(step.capability);
  const coerceRef = capability.coerce ? `k${i}` : undefined;
  const onFailure = `r.mismatch(${i}, ${ref})`;

  emitFetch(w, step, ref);
  switch (step.default.kind) {
    case 'value':
      w.open(`if (${ref} === undefined) {`).line(`${ref} = d${i};`);
      w.reopen('} else {');
      emitCheck(w, capability, ref, coerceRef, onFailure);
      w.close();
      break;
    case 'factory':
      w.open(`if (${ref} === undefined) {`).line(`${ref} = d${i}();`);
      emitCheck(w, capability, ref, coerceRef, onFailure);
      w.reopen('} else {');
      emitCheck(w, capability, ref, coerceRef, onFailure);
      w.close();
      break;
    case 'none':
      if (step.required) {
        w.line(`if (${ref} === undefined) r.missing(${i});`);
        emitCheck(w, capability, ref, coerceRef, onFailure);
      } else {
        w.open(`if (${ref} !== undefined) {`);
        emitCheck(w, capability, ref, coerceRef, onFailure);
        w.close();
      }
      break;
  }
}

/** Whether a step's value can never be undefined after it passed */
function alwaysDefined(step: PlanStep): boolean {
  if (step.capability.coerce) return false;
  return step.required || step.default.kind === 'value';
}

function emitDeclaredSwitch(
  w: SourceWriter,
  steps: readonly PlanStep[],
  onDeclared: string
): void {
  w.open('switch (key) {');
  for (const step of steps) {
    w.line(`case ${lit(step.name)}:`);
  }
  if (steps.length > 0) w.line(`  ${onDeclared};`);
  w.close();
}

function emitExtraValue(
  w: SourceWriter,
  plan: CompilationPlan,
  label: string
): void {
  if (plan.extras.kind !== 'keep' || !plan.extras.capability) return;
  const capability = inlineOf(plan.extras.capability);
  emitCheck(
    w,
    capability,
    'e',
    capability.coerce ? 'x' : undefined,
    `r.extraMismatch(${label}, e)`
  );
}

function emitBody(w: SourceWriter, plan: CompilationPlan): void {
  const { steps, extras } = plan;
  const named = plan.sourceMode === 'named';
  const mapped = plan.outputMode === 'mapped';

  // 1. raw argument shape and undeclared arguments
  if (named) {
    w.line(
      'if (typeof args !== "object" || args === null || Array.isArray(args)) return r.shape(args);'
    );
    if (extras.kind === 'reject') {
      w.open('for (const key of Object.keys(args)) {');
      w.open('switch (key) {');
      for (const step of steps) w.line(`case ${lit(step.name)}:`);
      if (steps.length > 0) w.line('  break;');
      w.line('default:');
      w.line('  r.unknown(key);');
      w.close();
      w.close();
    }
  } else {
    w.line('if (!Array.isArray(args)) return r.shape(args);');
    if (extras.kind === 'reject') {
      w.line(`if (args.length > ${steps.length}) r.extra(${steps.length});`);
    }
  }

  // 2. declared parameters, in declaration order
  steps.forEach((step, i) => emitStep(w, step, i));

  // 3. output
  if (mapped) {
    w.line('const out = {};');
    steps.forEach((step, i) => {
      const assign = `out[${lit(step.name)}] = v${i};`;
      if (alwaysDefined(step)) w.line(assign);
      else w.line(`if (v${i} !== undefined) ${assign}`);
    });
  } else {
    w.line(`const out = [${steps.map((_, i) => `v${i}`).join(', ')}];`);
  }

  if (extras.kind === 'keep') {
    if (named) {
      const target = mapped ? 'out' : 'rest';
      if (!mapped) w.line('const rest = {};');
      w.open('for (const key of Object.keys(args)) {');
      emitDeclaredSwitch(w, steps, 'continue');
      w.line('let e = args[key];');
      emitExtraValue(w, plan, 'key');
      w.line(`r.defineExtra(${target}, key, e);`);
      w.close();
      if (!mapped) w.line('out.push(rest);');
    } else {
      w.open(`for (let i = ${steps.length}; i < args.length; i++) {`);
      w.line('let e = args[i];');
      emitExtraValue(w, plan, '"[" + i + "]"');
      w.line('out.push(e);');
      w.close();
    }
  }

  w.line('return out;');
}

/**
 * Emit the factory source: `scope => routine`
 */
export function emitRoutineSource(plan: CompilationPlan): string {
  const w = new SourceWriter();
  w.line('"use strict";');
  w.line('const r = scope.r;');
  plan.steps.forEach((step, i) => {
    if (step.capability.coerce) w.line(`const k${i} = scope.k[${i}];`);
    if (step.default.kind !== 'none') w.line(`const d${i} = scope.d[${i}];`);
  });
  if (plan.extras.kind === 'keep' && plan.extras.capability?.coerce) {
    w.line('const x = scope.x;');
  }
  w.open(`return function ${routineName(plan.name)}(args) {`);
  emitBody(w, plan);
  w.close('};');
  return w.toString();
}

function createScope(plan: CompilationPlan, r: Reporters): RoutineScope {
  return Object.freeze({
    r,
    k: Object.freeze(plan.steps.map((step) => step.capability)),
    d: Object.freeze(
      plan.steps.map((step) => {
        switch (step.default.kind) {
          case 'value':
            return step.default.value;
          case 'factory':
            return step.default.factory;
          case 'none':
            return undefined;
        }
      })
    ),
    ...(plan.extras.kind === 'keep' && plan.extras.capability
      ? { x: plan.extras.capability }
      : {}),
  });
}

export type CodegenOutcome =
  | { ok: true; routine: Routine; source: string }
  | { ok: false; reason: string; source: string };

/**
 * Build the specialized routine. Returns a failure outcome when the runtime
 * refuses code generation (EvalError); a fragment that does not parse is a
 * definition error.
 */
export function buildInlineRoutine(
  plan: CompilationPlan,
  r: Reporters
): CodegenOutcome {
  const source = emitRoutineSource(plan);
  let factory: (scope: RoutineScope) => Routine;
  try {
    factory = new Function('scope', source) as (scope: RoutineScope) => Routine;
  } catch (error) {
    if (error instanceof EvalError) {
      return { ok: false, reason: error.message, source };
    }
    throw new SpecDefinitionError({
      message: `${plan.name}: generated validator does not compile; check the inline fragments of ${plan.steps
        .map((step) => step.capability.name)
        .join(', ')}`,
      context: { validator: plan.name, source },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return { ok: true, routine: factory(createScope(plan, r)), source };
}
