/**
 * Benchmark result formatting utilities
 */

import type { Bench, Task } from 'tinybench';

export interface FormattedResult {
  name: string;
  ops: number;
  mean: number;
  p75: number;
  p99: number;
  stdDev: number;
  margin: number;
  samples: number;
  cv: number; // Coefficient of variation
}

export interface TrackedScenario {
  ops_per_sec: number;
  mean_ns: number;
  p75_ns: number;
  p99_ns: number;
  std_dev_ns: number;
  margin_of_error_ns: number;
  samples: number;
  cv: number;
}

export interface TrackingRecord {
  timestamp: string;
  commit: string;
  scenarios: Record<string, TrackedScenario>;
}

const NS_PER_MS = 1_000_000;

/**
 * Format a single benchmark task result; tinybench reports times in milliseconds
 */
export function formatTaskResult(name: string, task: Task): FormattedResult | null {
  const result = task.result;
  if (!result) {
    return null;
  }

  const meanNs = result.mean * NS_PER_MS;
  const stdDevNs = result.sd * NS_PER_MS;

  return {
    name,
    ops: result.hz,
    mean: meanNs,
    p75: result.p75 * NS_PER_MS,
    p99: result.p99 * NS_PER_MS,
    stdDev: stdDevNs,
    margin: result.moe * NS_PER_MS,
    samples: result.samples.length,
    cv: meanNs > 0 ? stdDevNs / meanNs : 0,
  };
}

/**
 * Format all benchmark results from a Bench instance
 */
export function formatBenchResults(bench: Bench): FormattedResult[] {
  const results: FormattedResult[] = [];
  for (const task of bench.tasks) {
    const formatted = formatTaskResult(task.name, task);
    if (formatted) {
      results.push(formatted);
    }
  }
  return results;
}

/**
 * Pick a unit that keeps the number readable
 */
export function formatLatency(ns: number): string {
  if (ns >= 1_000_000) {
    return `${(ns / 1_000_000).toFixed(3)}ms`;
  }
  if (ns >= 1_000) {
    return `${(ns / 1_000).toFixed(1)}μs`;
  }
  return `${ns.toFixed(0)}ns`;
}

/**
 * Create a markdown table from benchmark results
 */
export function resultsToMarkdownTable(results: readonly FormattedResult[]): string {
  const headers = ['Name', 'Ops/sec', 'Mean', 'P75', 'P99', 'Std Dev', 'Margin'];
  const separator = headers.map((h) => '-'.repeat(h.length));

  const rows = results.map((r) => [
    r.name,
    r.ops.toFixed(2),
    formatLatency(r.mean),
    formatLatency(r.p75),
    formatLatency(r.p99),
    formatLatency(r.stdDev),
    `±${formatLatency(r.margin)}`,
  ]);

  const table = [headers.join(' | '), separator.join(' | '), ...rows.map((row) => row.join(' | '))];

  return table.join('\n');
}

/**
 * Export results in a format suitable for continuous benchmarking
 */
export function exportForTracking(
  results: readonly FormattedResult[],
  env: Record<string, string | undefined> = process.env,
): TrackingRecord {
  const scenarios: Record<string, TrackedScenario> = {};
  for (const result of results) {
    scenarios[result.name] = {
      ops_per_sec: result.ops,
      mean_ns: result.mean,
      p75_ns: result.p75,
      p99_ns: result.p99,
      std_dev_ns: result.stdDev,
      margin_of_error_ns: result.margin,
      samples: result.samples,
      cv: result.cv,
    };
  }

  return {
    timestamp: new Date().toISOString(),
    commit: env['GITHUB_SHA'] || 'local',
    scenarios,
  };
}
