/**
 * Benchmark configuration utilities for statistical reliability
 */

import type { Options } from 'tinybench';

export type BenchmarkProfile = 'quick' | 'standard' | 'precise';

/**
 * Configuration profiles for different benchmark scenarios
 */
export const BENCHMARK_PROFILES = {
  /**
   * Quick profile for development/debugging
   * Faster but less reliable results
   */
  quick: {
    time: 250,
    iterations: 10,
    warmupTime: 50,
  },

  /**
   * Standard profile for regular benchmarking
   */
  standard: {
    time: 1000,
    warmupTime: 100,
  },

  /**
   * High-precision profile for CI
   * Longer runtime, more samples
   */
  precise: {
    time: 2000,
    iterations: 200,
    warmupTime: 500,
    warmupIterations: 20,
  },
} as const satisfies Record<BenchmarkProfile, Options>;

export function getBenchmarkProfile(
  env: Record<string, string | undefined> = process.env,
): BenchmarkProfile {
  const profile = env['BENCHMARK_PROFILE'];
  return profile === 'quick' || profile === 'precise' ? profile : 'standard';
}

/**
 * Get benchmark configuration based on environment
 */
export function getBenchmarkConfig(env: Record<string, string | undefined> = process.env): Options {
  return BENCHMARK_PROFILES[getBenchmarkProfile(env)];
}

export interface SampleAnalysis {
  mean: number;
  median: number;
  stdDev: number;
  cv: number; // Coefficient of variation
  outliers: number;
  isStable: boolean;
}

/**
 * Statistical analysis helpers
 */
export function analyzeResults(samples: readonly number[]): SampleAnalysis {
  const sorted = [...samples].sort((a, b) => a - b);
  const n = samples.length;
  const at = (index: number): number => sorted[index] ?? 0;

  const mean = samples.reduce((sum, val) => sum + val, 0) / n;

  const median = n % 2 === 0 ? (at(n / 2 - 1) + at(n / 2)) / 2 : at(Math.floor(n / 2));

  const variance = samples.reduce((sum, val) => sum + Math.pow(val - mean, 2), 0) / (n - 1);
  const stdDev = Math.sqrt(variance);

  const cv = stdDev / mean;

  // Outlier detection using IQR method
  const q1 = at(Math.floor(n * 0.25));
  const q3 = at(Math.floor(n * 0.75));
  const iqr = q3 - q1;
  const lowerBound = q1 - 1.5 * iqr;
  const upperBound = q3 + 1.5 * iqr;
  const outliers = samples.filter((val) => val < lowerBound || val > upperBound).length;

  // Stable if CV < 5% and outliers < 5%
  const isStable = cv < 0.05 && outliers / n < 0.05;

  return { mean, median, stdDev, cv, outliers, isStable };
}

/**
 * One-line stability verdict for a task, or null when there are too few samples
 */
export function describeStability(name: string, samples: readonly number[]): string | null {
  if (samples.length < 2) {
    return null;
  }
  const analysis = analyzeResults(samples);
  const marker = analysis.isStable ? '🟢' : '🔴';
  return `${marker} ${name}: CV ${(analysis.cv * 100).toFixed(1)}%, ${analysis.outliers} outliers`;
}

/**
 * Recommendations for benchmark reliability
 */
export function getBenchmarkRecommendations(
  env: Record<string, string | undefined> = process.env,
): string[] {
  const recommendations = [
    '🔧 For best results, run benchmarks on a dedicated machine',
    '🔋 Ensure stable power supply (avoid battery mode)',
    '🔇 Close unnecessary applications to reduce system noise',
    '📊 Run multiple benchmark sessions and compare results',
  ];

  if (env['NODE_ENV'] === 'development') {
    recommendations.push('🚀 Use BENCHMARK_PROFILE=quick for faster development cycles');
  }

  if (env['CI']) {
    recommendations.push('🏗️  CI environments may have higher variance - consider dedicated runners');
  }

  return recommendations;
}
