import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import {
  BENCH_BUDGETS,
  DEFAULT_ITERATIONS,
  cases,
  computeGateSummary,
  createContenders,
  formatCaseSummary,
  formatGateSummary,
  resolveIterationOverridesFromEnv,
  runCase,
  type CaseSummary,
} from './bench-core.js';

function writeLine(message: string): void {
  process.stdout.write(`${message}\n`);
}

function main(): void {
  const iterations = resolveIterationOverridesFromEnv() ?? DEFAULT_ITERATIONS;
  writeLine(`argspec bench harness · cwd: ${process.cwd()}`);
  writeLine(
    `Warmup batches: ${iterations.warmup} · Measured batches: ${iterations.measured}`
  );

  const contenders = createContenders();
  const summaries: CaseSummary[] = [];
  for (const benchCase of cases) {
    writeLine(`${benchCase.id}: ${benchCase.label}`);
    for (const summary of runCase(benchCase, contenders, iterations)) {
      summaries.push(summary);
      writeLine(formatCaseSummary(summary));
    }
  }

  const gate = computeGateSummary(summaries);
  writeLine(formatGateSummary(gate));

  if (gate.inlineSpeedup < BENCH_BUDGETS.minInlineSpeedup) {
    console.error(
      `❌ Bench gate failed: inline validator slower than generic (${gate.inlineSpeedup.toFixed(2)}x)`
    );
    process.exitCode = 1;
  } else {
    console.error('✅ Bench gate passed');
  }
}

const executedDirectly =
  typeof process.argv[1] === 'string' &&
  fileURLToPath(import.meta.url) === path.resolve(process.argv[1]);

if (executedDirectly) {
  try {
    main();
  } catch (error) {
    console.error('Bench harness failed:', error);
    process.exitCode = 1;
  }
}
