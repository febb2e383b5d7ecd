import type { BackendConfig } from '../config/backend.js';
import type { IDocumentStore, IRelationalStore } from './IQueryBackends.js';
import { MongoDocumentStore } from './MongoDocumentStore.js';
import { PostgresRelationalStore } from './PostgresRelationalStore.js';

export type {
  BackendRows,
  CollectionSample,
  IDocumentStore,
  IRelationalStore,
  Row,
} from './IQueryBackends.js';
export { MongoDocumentStore } from './MongoDocumentStore.js';
export { PostgresRelationalStore } from './PostgresRelationalStore.js';

export interface BackendStores {
  documentStore: IDocumentStore;
  relationalStore: IRelationalStore;
}

/**
 * Build both stores from configuration. Neither connects until first used.
 */
export function createStores(config: BackendConfig): BackendStores {
  return {
    documentStore: new MongoDocumentStore(
      config.mongoUri,
      config.databaseName,
      config.serverSelectionTimeoutMs,
      config.backendTimeoutMs
    ),
    relationalStore: new PostgresRelationalStore(config.postgresUri, config.backendTimeoutMs),
  };
}

/**
 * Close both stores, reporting the first failure after both have been tried.
 */
export async function closeStores(stores: BackendStores): Promise<void> {
  const results = await Promise.allSettled([
    stores.documentStore.close(),
    stores.relationalStore.close(),
  ]);

  for (const result of results) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
  }
}
