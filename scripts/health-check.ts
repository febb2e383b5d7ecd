#!/usr/bin/env tsx
/**
 * Health Check and Diagnostic Tool
 *
 * Validates connection settings and pings MongoDB and PostgreSQL.
 *
 * Usage:
 *   npm run health
 */

import 'dotenv/config';
import { closeStores, createStores } from '../src/backends/index.js';
import { loadBackendConfig } from '../src/config/backend.js';
import { runHealthChecks, type HealthCheckResult } from '../src/utils/healthCheck.js';

/**
 * Print a single health check result
 */
function printResult(result: HealthCheckResult): void {
  const icon = result.status === 'ok' ? '✅' : result.status === 'warn' ? '⚠️ ' : '❌';
  const statusLabel = result.status.toUpperCase().padEnd(5);

  console.log(`${icon} [${statusLabel}] ${result.label}`);

  if (result.details) {
    console.log(`   ${result.details}`);
  }

  if (result.hint) {
    console.log(`   💡 ${result.hint}`);
  }
}

/**
 * Print summary statistics
 */
function printSummary(results: HealthCheckResult[]): void {
  const counts = {
    ok: results.filter((r) => r.status === 'ok').length,
    warn: results.filter((r) => r.status === 'warn').length,
    error: results.filter((r) => r.status === 'error').length,
  };

  console.log('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  console.log('📊 Summary');
  console.log(`   ✅ ${counts.ok} OK`);
  console.log(`   ⚠️  ${counts.warn} Warning(s)`);
  console.log(`   ❌ ${counts.error} Error(s)`);

  if (counts.error > 0) {
    console.log('\n❌ Health check FAILED');
  } else if (counts.warn > 0) {
    console.log('\n⚠️  Health check passed with warnings');
  } else {
    console.log('\n✅ All health checks passed!');
  }
  console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n');
}

/**
 * Main execution
 */
async function main() {
  console.log('🏥 SQL Bridge Health Check\n');
  console.log('Running diagnostics...\n');

  const stores = createStores(loadBackendConfig());

  let results: HealthCheckResult[];
  try {
    results = await runHealthChecks(stores.documentStore, stores.relationalStore);
  } finally {
    await closeStores(stores);
  }

  for (const result of results) {
    printResult(result);
  }

  printSummary(results);

  const hasErrors = results.some((r) => r.status === 'error');
  process.exit(hasErrors ? 1 : 0);
}

main().catch((err) => {
  console.error('\n❌ Health check failed:');

  if (err instanceof Error) {
    console.error('Message:', err.message);

    if (err.message.includes('connection string')) {
      console.error('\n💡 Hint: Fix MONGO_URI or POSTGRES_URI in your environment or .env file.');
    }
  } else {
    console.error(err);
  }

  process.exit(1);
});
