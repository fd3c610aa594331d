#!/usr/bin/env tsx

/**
 * Standalone matrix operation benchmark runner using tinybench directly
 *
 * Covers the elementwise operations, the product and both eliminations.
 */

import { pathToFileURL } from 'node:url';
import { Bench } from 'tinybench';
import { add, determinant, inverse, multiply, transpose } from '@densemat/core';
import { CUBIC_SIZES, MATRIX_SIZES, formatSize } from '../utils/sizes';
import { benchmarkMatrix, invertibleMatrix } from '../utils/data';
import {
  describeStability,
  getBenchmarkConfig,
  getBenchmarkProfile,
  getBenchmarkRecommendations,
} from '../utils/config';
import { exportForTracking, formatBenchResults, resultsToMarkdownTable } from '../utils/formatting';

async function runLinalgBenchmarks(): Promise<Bench> {
  console.log('🚀 Running Matrix Operation Benchmarks\n');

  console.log('💡 Benchmark Reliability Tips:');
  getBenchmarkRecommendations().forEach((tip) => console.log(`   ${tip}`));
  console.log('');

  const config = getBenchmarkConfig();
  const bench = new Bench(config);

  console.log(`📊 Using profile: ${getBenchmarkProfile()}`);
  console.log(`⏱️  Runtime: ${config.time ?? 'default'}ms per benchmark\n`);

  console.log('Setting up elementwise benchmarks...');
  for (const size of MATRIX_SIZES) {
    const a = benchmarkMatrix(size.order, `a-${size.name}`);
    const b = benchmarkMatrix(size.order, `b-${size.name}`);

    bench.add(`add ${formatSize(size)}`, () => {
      add(a, b);
    });
    bench.add(`transpose ${formatSize(size)}`, () => {
      transpose(a);
    });
  }

  console.log('Setting up cubic benchmarks...');
  for (const size of CUBIC_SIZES) {
    const a = benchmarkMatrix(size.order, `a-${size.name}`);
    const b = benchmarkMatrix(size.order, `b-${size.name}`);
    const invertible = invertibleMatrix(size.order, `inv-${size.name}`);

    bench.add(`multiply ${formatSize(size)}`, () => {
      multiply(a, b);
    });
    bench.add(`determinant ${formatSize(size)}`, () => {
      determinant(invertible);
    });
    bench.add(`inverse ${formatSize(size)}`, () => {
      inverse(invertible);
    });
  }

  console.log(`\nRunning ${bench.tasks.length} benchmarks...\n`);
  await bench.run();

  console.log('\n📊 Benchmark Results\n');
  console.log('='.repeat(80));
  console.table(bench.table());

  const results = formatBenchResults(bench);
  console.log('\n📋 Summary:\n');
  console.log(resultsToMarkdownTable(results));

  console.log('\n📈 Stability:\n');
  for (const task of bench.tasks) {
    const verdict = describeStability(task.name, task.result?.samples ?? []);
    if (verdict) {
      console.log(`   ${verdict}`);
    }
  }

  console.log('\n📦 Tracking record:\n');
  console.log(JSON.stringify(exportForTracking(results), null, 2));

  return bench;
}

// Run if executed directly
if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runLinalgBenchmarks().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}

export { runLinalgBenchmarks };
