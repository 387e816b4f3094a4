/**
 * Benchmark runner for scanner throughput
 *
 * Measures scan time across synthetic datasets.
 */

import { performance } from 'perf_hooks';

import { createScanner, type Scanner } from '../scanner/scanner.js';
import { datasetNames, getDataset, type Dataset, type DatasetName } from './datasets.js';

export interface BenchmarkMetrics {
  scanTimeMs: number;
  throughputBytesPerSecond: number;
  tagCount: number;
}

export interface BenchmarkResult {
  dataset: string;
  byteLength: number;
  metrics: BenchmarkMetrics;
}

export interface BenchmarkOptions {
  datasets?: readonly DatasetName[];

  /** Runs per dataset; the median is reported. */
  iterations?: number;
}

/**
 * Measure a single scan of a dataset
 */
function measureScan(scanner: Scanner, dataset: Dataset): BenchmarkMetrics {
  const startTime = performance.now();
  const index = scanner.scan(dataset.bytes, dataset.byteOrder);
  const scanTimeMs = performance.now() - startTime;

  return {
    scanTimeMs,
    throughputBytesPerSecond: scanTimeMs > 0 ? dataset.bytes.length / (scanTimeMs / 1000) : Infinity,
    tagCount: index.count,
  };
}

/**
 * Run a dataset for multiple iterations and return the median result
 */
function runMultipleIterations(scanner: Scanner, dataset: Dataset, iterations: number): BenchmarkMetrics {
  const results: BenchmarkMetrics[] = [];
  for (let i = 0; i < iterations; i++)
    results.push(measureScan(scanner, dataset));

  results.sort((a, b) => a.scanTimeMs - b.scanTimeMs);
  return results[Math.floor(results.length / 2)];
}

export function runBenchmark(options?: BenchmarkOptions): BenchmarkResult[] {
  const iterations = Math.max(1, options?.iterations ?? 5);
  const scanner = createScanner();
  const results: BenchmarkResult[] = [];

  for (const name of options?.datasets ?? datasetNames) {
    const dataset = getDataset(name);
    results.push({
      dataset: name,
      byteLength: dataset.bytes.length,
      metrics: runMultipleIterations(scanner, dataset, iterations),
    });
  }

  return results;
}

/**
 * Format results as an aligned text table, one row per dataset
 */
export function formatSummary(results: readonly BenchmarkResult[]): string {
  const lines: string[] = [];
  for (const result of results) {
    const throughputMB = (result.metrics.throughputBytesPerSecond / (1024 * 1024)).toFixed(1);
    lines.push(
      result.dataset.padEnd(16) +
      result.metrics.scanTimeMs.toFixed(2).padStart(10) + 'ms' +
      throughputMB.padStart(10) + 'MB/s' +
      String(result.metrics.tagCount).padStart(10) + ' tags');
  }
  return lines.join('\n');
}
