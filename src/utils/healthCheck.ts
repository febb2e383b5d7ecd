/**
 * Health Check Utilities
 *
 * Reusable checks for configuration and backend connectivity, shared by the
 * `health` MCP tool and the `health-check` script.
 */

import type { IDocumentStore, IRelationalStore } from '../backends/IQueryBackends.js';
import {
  DEFAULT_MONGO_URI,
  DEFAULT_POSTGRES_URI,
  sanitizeConnectionString,
} from '../config/backend.js';

export type HealthStatus = 'ok' | 'warn' | 'error';

export interface HealthCheckResult {
  checkId: string;
  label: string;
  status: HealthStatus;
  details?: string;
  hint?: string;
}

/**
 * Helper functions to create health check results
 */
export function ok(checkId: string, label: string, details?: string): HealthCheckResult {
  return { checkId, label, status: 'ok', details };
}

export function warn(
  checkId: string,
  label: string,
  details?: string,
  hint?: string
): HealthCheckResult {
  return { checkId, label, status: 'warn', details, hint };
}

export function error(
  checkId: string,
  label: string,
  details?: string,
  hint?: string
): HealthCheckResult {
  return { checkId, label, status: 'error', details, hint };
}

function checkUri(
  checkId: string,
  name: string,
  defaultUri: string,
  protocols: string[]
): HealthCheckResult {
  const value = process.env[name]?.trim();

  if (!value) {
    return warn(
      checkId,
      name,
      `Not set, using default ${sanitizeConnectionString(defaultUri)}`,
      `Set ${name} if the database is not reachable at the default address`
    );
  }

  if (!protocols.some((protocol) => value.startsWith(protocol))) {
    return error(checkId, name, 'Invalid protocol', `${name} must start with ${protocols.join(' or ')}`);
  }

  return ok(checkId, name, sanitizeConnectionString(value));
}

/**
 * Check that connection strings are set and well-formed
 */
export function checkEnv(): HealthCheckResult[] {
  return [
    checkUri('env:mongo-uri', 'MONGO_URI', DEFAULT_MONGO_URI, ['mongodb://', 'mongodb+srv://']),
    checkUri('env:postgres-uri', 'POSTGRES_URI', DEFAULT_POSTGRES_URI, [
      'postgres://',
      'postgresql://',
    ]),
  ];
}

function connectionFailure(checkId: string, label: string, err: unknown): HealthCheckResult {
  const message = err instanceof Error ? err.message : String(err);

  if (message.includes('ECONNREFUSED')) {
    return error(checkId, label, 'Connection refused', 'The server is not running or not reachable');
  }

  if (message.includes('authentication failed') || message.includes('Authentication failed')) {
    return error(checkId, label, 'Authentication failed', 'Check the credentials in the connection string');
  }

  if (message.includes('Server selection timed out')) {
    return error(checkId, label, 'Server selection timed out', 'Check MONGO_URI and that mongod is running');
  }

  return error(checkId, label, message);
}

export async function checkDocumentStore(store: IDocumentStore): Promise<HealthCheckResult> {
  try {
    await store.ping();
    return ok('db:mongodb', 'MongoDB connection', 'ping ok');
  } catch (err) {
    return connectionFailure('db:mongodb', 'MongoDB connection', err);
  }
}

export async function checkRelationalStore(store: IRelationalStore): Promise<HealthCheckResult> {
  try {
    await store.ping();
    return ok('db:postgres', 'PostgreSQL connection', 'SELECT 1 ok');
  } catch (err) {
    return connectionFailure('db:postgres', 'PostgreSQL connection', err);
  }
}

/**
 * Ping both backends concurrently
 */
export async function checkBackends(
  documentStore: IDocumentStore,
  relationalStore: IRelationalStore
): Promise<HealthCheckResult[]> {
  return Promise.all([checkDocumentStore(documentStore), checkRelationalStore(relationalStore)]);
}

/**
 * Run all health checks
 */
export async function runHealthChecks(
  documentStore: IDocumentStore,
  relationalStore: IRelationalStore
): Promise<HealthCheckResult[]> {
  const results = checkEnv();

  // Invalid connection strings make the pings meaningless
  if (results.some((result) => result.status === 'error')) {
    return results;
  }

  results.push(...(await checkBackends(documentStore, relationalStore)));
  return results;
}
