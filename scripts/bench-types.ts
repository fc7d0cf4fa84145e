export interface IterationConfig {
  warmup: number;
  measured: number;
}

export interface BenchCase {
  id: string;
  label: string;
  /** Arguments validated on every operation */
  args: Readonly<Record<string, unknown>>;
}

export type Contender = 'inline' | 'generic' | 'naive';

export interface CaseSummary {
  caseId: string;
  contender: Contender;
  measuredCount: number;
  opsPerSecond: number;
  /** Per-operation latency percentiles, in nanoseconds */
  p50Ns: number;
  p95Ns: number;
}

export interface GateSummary {
  /** Lowest inline/generic throughput ratio over all cases */
  inlineSpeedup: number;
}
