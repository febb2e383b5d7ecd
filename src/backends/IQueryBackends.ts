import type { TranslatedQuery } from '../sql/types.js';

export type Row = Record<string, unknown>;

/**
 * Rows returned by one backend together with the time the driver call took.
 */
export interface BackendRows {
  rows: Row[];
  elapsedMs: number;
}

export interface CollectionSample {
  name: string;
  documents: Row[];
}

/**
 * Document-store side of a comparison. Runs translated queries.
 */
export interface IDocumentStore {
  find(query: TranslatedQuery): Promise<BackendRows>;
  ping(): Promise<void>;
  /** Every collection with up to `limit` documents each, `_id` hidden */
  sampleCollections(limit: number): Promise<CollectionSample[]>;
  close(): Promise<void>;
}

/**
 * Relational side of a comparison. Runs the original SQL untouched.
 */
export interface IRelationalStore {
  query(sql: string): Promise<BackendRows>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
