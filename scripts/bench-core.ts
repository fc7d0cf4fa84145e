import { performance } from 'node:perf_hooks';
import process from 'node:process';
import {
  compileValidator,
  ParameterSpecSet,
  type ParametersInput,
} from '../packages/core/src/index.js';
import {
  BATCH_SIZE,
  BENCH_BUDGETS,
  DEFAULT_ITERATIONS,
  benchParameters,
  cases,
} from './bench-config.js';
import type {
  BenchCase,
  CaseSummary,
  Contender,
  GateSummary,
  IterationConfig,
} from './bench-types.js';
export type {
  BenchCase,
  CaseSummary,
  Contender,
  GateSummary,
  IterationConfig,
} from './bench-types.js';

export { BATCH_SIZE, BENCH_BUDGETS, DEFAULT_ITERATIONS, benchParameters, cases };

type Validate = (args: Readonly<Record<string, unknown>>) => unknown;

export function calculatePercentile(
  values: readonly number[],
  percentile: number
): number {
  if (!Number.isFinite(percentile) || percentile < 0 || percentile > 1) {
    throw new RangeError('percentile must be between 0 and 1');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const first = sorted[0];
  if (first === undefined) {
    return 0;
  }
  const rankedIndex =
    percentile <= 0 ? 0 : Math.ceil(percentile * sorted.length) - 1;
  const index = Math.min(sorted.length - 1, Math.max(0, rankedIndex));
  return sorted[index] ?? first;
}

/**
 * Interprets the parameter list on every call: the baseline the compiled
 * validators are measured against. Named, strict, mapped output only.
 */
export function interpretCall(
  specs: ParameterSpecSet,
  args: Readonly<Record<string, unknown>>
): Record<string, unknown> {
  for (const key of Object.keys(args)) {
    if (!specs.has(key)) {
      throw new Error(`unknown parameter "${key}"`);
    }
  }
  const out: Record<string, unknown> = {};
  for (const spec of specs) {
    const raw = Object.hasOwn(args, spec.name) ? args[spec.name] : undefined;
    let value: unknown;
    if (raw !== undefined) {
      value = spec.type.coerce ? spec.type.coerce(raw) : raw;
    } else if (spec.default.kind === 'value') {
      value = spec.default.value;
    } else if (spec.default.kind === 'factory') {
      value = spec.default.factory();
    } else if (spec.required) {
      throw new Error(`missing required parameter "${spec.name}"`);
    } else {
      continue;
    }
    const result = spec.type.check(value);
    if (!result.ok) {
      throw new Error(`"${spec.name}": ${result.reason}`);
    }
    if (value !== undefined) out[spec.name] = value;
  }
  return out;
}

export function createContenders(
  params: ParametersInput = benchParameters
): Record<Contender, Validate> {
  const inline = compileValidator(params, { name: 'bench_inline' });
  const generic = compileValidator(params, {
    name: 'bench_generic',
    codegen: false,
  });
  const specs = ParameterSpecSet.from(params);
  return {
    inline: (args) => inline.validate(args),
    generic: (args) => generic.validate(args),
    naive: (args) => interpretCall(specs, args),
  };
}

/**
 * Time `iterations.measured` batches of BATCH_SIZE calls after the warmup
 * batches, returning nanoseconds per call for each batch
 */
export function measure(
  run: Validate,
  args: Readonly<Record<string, unknown>>,
  iterations: IterationConfig,
  batchSize: number = BATCH_SIZE
): number[] {
  const normalized = normalizeIterations(iterations);
  for (let i = 0; i < normalized.warmup * batchSize; i++) run(args);
  const samples: number[] = [];
  for (let batch = 0; batch < normalized.measured; batch++) {
    const start = performance.now();
    for (let i = 0; i < batchSize; i++) run(args);
    const elapsedMs = performance.now() - start;
    samples.push((elapsedMs * 1e6) / batchSize);
  }
  return samples;
}

export function summarizeSamples(
  caseId: string,
  contender: Contender,
  samplesNs: readonly number[]
): CaseSummary {
  const totalNs = samplesNs.reduce((sum, value) => sum + value, 0);
  const meanNs = samplesNs.length === 0 ? 0 : totalNs / samplesNs.length;
  return {
    caseId,
    contender,
    measuredCount: samplesNs.length,
    opsPerSecond: meanNs > 0 ? 1e9 / meanNs : 0,
    p50Ns: calculatePercentile(samplesNs, 0.5),
    p95Ns: calculatePercentile(samplesNs, 0.95),
  };
}

export function runCase(
  benchCase: BenchCase,
  contenders: Record<Contender, Validate>,
  iterations: IterationConfig = DEFAULT_ITERATIONS
): CaseSummary[] {
  const order: Contender[] = ['inline', 'generic', 'naive'];
  return order.map((contender) =>
    summarizeSamples(
      benchCase.id,
      contender,
      measure(contenders[contender], benchCase.args, iterations)
    )
  );
}

export function computeGateSummary(
  summaries: readonly CaseSummary[]
): GateSummary {
  let worst: number | undefined;
  for (const entry of summaries) {
    if (entry.contender !== 'inline') continue;
    const generic = summaries.find(
      (other) =>
        other.caseId === entry.caseId && other.contender === 'generic'
    );
    if (!generic || generic.opsPerSecond === 0) continue;
    const ratio = entry.opsPerSecond / generic.opsPerSecond;
    worst = worst === undefined ? ratio : Math.min(worst, ratio);
  }
  return { inlineSpeedup: worst ?? 0 };
}

export function resolveIterationOverridesFromEnv(
  env: NodeJS.ProcessEnv = process.env
): IterationConfig | undefined {
  if (env.ARGSPEC_BENCH_QUICK === '1') {
    return { warmup: 1, measured: 3 };
  }

  const warmupValue = parseEnvInteger(env.ARGSPEC_BENCH_WARMUP);
  const measuredValue = parseEnvInteger(env.ARGSPEC_BENCH_MEASURED);
  if (warmupValue === undefined && measuredValue === undefined) {
    return undefined;
  }
  const warmup = warmupValue ?? DEFAULT_ITERATIONS.warmup;
  const measured = measuredValue ?? DEFAULT_ITERATIONS.measured;
  return normalizeIterations({ warmup, measured });
}

export function formatCaseSummary(summary: CaseSummary): string {
  return [
    `• ${summary.caseId.padEnd(10)} ${summary.contender.padEnd(8)}`,
    `batches=${summary.measuredCount}`,
    `ops/s=${Math.round(summary.opsPerSecond)}`,
    `p50=${summary.p50Ns.toFixed(0)}ns`,
    `p95=${summary.p95Ns.toFixed(0)}ns`,
  ].join(' · ');
}

export function formatGateSummary(summary: GateSummary): string {
  return `Gate summary → inline/generic=${summary.inlineSpeedup.toFixed(
    2
  )}x (budget ≥ ${BENCH_BUDGETS.minInlineSpeedup}x)`;
}

function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function normalizeIterations(config: IterationConfig): IterationConfig {
  if (!Number.isFinite(config.warmup) || !Number.isFinite(config.measured)) {
    throw new Error(
      'Iteration configuration must define numeric warmup and measured counts'
    );
  }
  const warmup = Math.max(0, Math.trunc(config.warmup));
  const measured = Math.max(0, Math.trunc(config.measured));
  if (measured === 0) {
    throw new Error('Measured iteration count must be greater than zero');
  }
  return { warmup, measured };
}
