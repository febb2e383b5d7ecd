#!/usr/bin/env tsx
/**
 * Speed Test Benchmark Script
 *
 * Runs a set of SQL queries through the speed-test runner repeatedly and
 * reports per-backend timing statistics for MongoDB and PostgreSQL.
 *
 * Usage:
 *   npm run benchmark
 *   npm run benchmark -- --iterations 20
 *   npm run benchmark -- --query "SELECT name FROM users WHERE age > 60 LIMIT 10"
 */

import 'dotenv/config';
import { closeStores, createStores } from '../src/backends/index.js';
import { loadBackendConfig } from '../src/config/backend.js';
import { SpeedTestRunner, type BackendOutcome } from '../src/speedtest/SpeedTestRunner.js';

/**
 * CLI configuration
 */
interface BenchmarkConfig {
  queries: string[];
  iterations: number;
  warmupRuns: number;
}

interface BackendStats {
  mean: number;
  median: number;
  p95: number;
  failures: number;
}

/**
 * Benchmark results for a single query
 */
interface BenchmarkResult {
  query: string;
  document: BackendStats;
  relational: BackendStats;
  totalMean: number;
}

const DEFAULT_QUERIES = [
  'SELECT * FROM users LIMIT 100',
  'SELECT name, age FROM users WHERE age > 60 LIMIT 100',
  "SELECT * FROM users WHERE age >= 30 AND age <= 40 AND name != 'abcdefg' LIMIT 500",
  'SELECT name FROM users WHERE age = 18 OR age = 90 LIMIT 1000 OFFSET 100',
];

/**
 * Parse CLI arguments
 */
function parseArgs(): BenchmarkConfig {
  const args = process.argv.slice(2);
  const config: BenchmarkConfig = {
    queries: [],
    iterations: 10,
    warmupRuns: 2,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--query' && i + 1 < args.length) {
      config.queries.push(args[++i]);
    } else if (arg === '--iterations' && i + 1 < args.length) {
      config.iterations = parseInt(args[++i], 10);
    } else if (arg === '--warmup' && i + 1 < args.length) {
      config.warmupRuns = parseInt(args[++i], 10);
    } else if (arg === '--help' || arg === '-h') {
      printUsage();
      process.exit(0);
    }
  }

  if (config.queries.length === 0) {
    config.queries = DEFAULT_QUERIES;
  }

  return config;
}

/**
 * Print usage information
 */
function printUsage(): void {
  console.log(`
Speed Test Benchmark

Usage:
  npm run benchmark [options]

Options:
  --query <sql>        Query to benchmark (repeatable; defaults to a built-in set)
  --iterations <n>     Number of measured iterations per query (default: 10)
  --warmup <n>         Number of warmup runs before measuring (default: 2)
  --help, -h           Show this help message

Examples:
  npm run benchmark
  npm run benchmark -- --iterations 20 --warmup 5
  npm run benchmark -- --query "SELECT * FROM users WHERE age < 25"
  `);
}

/**
 * Calculate statistics from timing array
 */
function calculateStats(timings: number[]): { mean: number; median: number; p95: number } {
  if (timings.length === 0) {
    return { mean: 0, median: 0, p95: 0 };
  }

  const sorted = [...timings].sort((a, b) => a - b);
  const mean = timings.reduce((sum, t) => sum + t, 0) / timings.length;

  const median =
    sorted.length % 2 === 0
      ? (sorted[sorted.length / 2 - 1] + sorted[sorted.length / 2]) / 2
      : sorted[Math.floor(sorted.length / 2)];

  const p95Index = Math.min(sorted.length - 1, Math.ceil(sorted.length * 0.95) - 1);
  const p95 = sorted[Math.max(0, p95Index)];

  return { mean, median, p95 };
}

function summarize(outcomes: BackendOutcome[]): BackendStats {
  const timings: number[] = [];
  let failures = 0;

  for (const outcome of outcomes) {
    if (outcome.status === 'ok') {
      timings.push(outcome.elapsedMs);
    } else {
      failures++;
    }
  }

  return { ...calculateStats(timings), failures };
}

/**
 * Run benchmark for a single query
 */
async function runBenchmark(
  runner: SpeedTestRunner,
  query: string,
  config: BenchmarkConfig
): Promise<BenchmarkResult> {
  console.log(`\n📊 ${query}`);

  console.log(`   Running ${config.warmupRuns} warmup queries...`);
  for (let i = 0; i < config.warmupRuns; i++) {
    await runner.run(query);
  }

  console.log(`   Running ${config.iterations} measured queries...`);
  const documentOutcomes: BackendOutcome[] = [];
  const relationalOutcomes: BackendOutcome[] = [];
  const totals: number[] = [];

  for (let i = 0; i < config.iterations; i++) {
    const report = await runner.run(query);
    documentOutcomes.push(report.document);
    relationalOutcomes.push(report.relational);
    totals.push(report.totalParallelTimeMs);
  }

  const result: BenchmarkResult = {
    query,
    document: summarize(documentOutcomes),
    relational: summarize(relationalOutcomes),
    totalMean: calculateStats(totals).mean,
  };

  console.log(`   ✓ MongoDB mean: ${result.document.mean.toFixed(2)}ms`);
  console.log(`   ✓ PostgreSQL mean: ${result.relational.mean.toFixed(2)}ms`);

  const lastDocument = documentOutcomes[documentOutcomes.length - 1];
  if (lastDocument?.status === 'rejected') {
    console.log(`   ⚠️  Not translatable: ${lastDocument.failure.message}`);
  }

  return result;
}

function formatRow(label: string, stats: BackendStats): string {
  return `│ ${label.padEnd(11)} │ ${stats.mean.toFixed(2).padStart(12)} │ ${stats.median.toFixed(2).padStart(12)} │ ${stats.p95.toFixed(2).padStart(12)} │ ${String(stats.failures).padStart(8)} │`;
}

/**
 * Print results table
 */
function printResultsTable(results: BenchmarkResult[]): void {
  console.log('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  console.log('📈 Benchmark Results');
  console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');

  for (const result of results) {
    console.log(`\n${result.query}`);
    console.log('┌─────────────┬──────────────┬──────────────┬──────────────┬──────────┐');
    console.log('│ Backend     │ Mean (ms)    │ Median (ms)  │ P95 (ms)     │ Failures │');
    console.log('├─────────────┼──────────────┼──────────────┼──────────────┼──────────┤');
    console.log(formatRow('MongoDB', result.document));
    console.log(formatRow('PostgreSQL', result.relational));
    console.log('└─────────────┴──────────────┴──────────────┴──────────────┴──────────┘');
    console.log(`   Parallel wall time (mean): ${result.totalMean.toFixed(2)}ms`);
  }

  console.log('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
}

/**
 * Main execution
 */
async function main() {
  console.log('🚀 SQL Bridge Speed Test Benchmark\n');

  const config = parseArgs();

  console.log('Configuration:');
  console.log(`  - Queries: ${config.queries.length}`);
  console.log(`  - Iterations per query: ${config.iterations}`);
  console.log(`  - Warmup runs: ${config.warmupRuns}`);

  const backend = loadBackendConfig();
  const stores = createStores(backend);
  const runner = new SpeedTestRunner(stores.documentStore, stores.relationalStore, {
    timeoutMs: backend.backendTimeoutMs,
  });

  try {
    const results: BenchmarkResult[] = [];
    for (const query of config.queries) {
      results.push(await runBenchmark(runner, query, config));
    }

    printResultsTable(results);
    console.log('\n✅ Benchmark complete!\n');
  } finally {
    await closeStores(stores);
  }
}

main().catch((err) => {
  console.error('\n❌ Benchmark failed:');

  if (err instanceof Error) {
    console.error('Message:', err.message);

    if (err.message.includes('ECONNREFUSED')) {
      console.error('\n💡 Hint: A database server is not running or not accessible.');
      console.error('   Run: npm run health');
    }
  } else {
    console.error(err);
  }

  process.exit(1);
});
