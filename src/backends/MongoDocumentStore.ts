import { MongoClient, type Db, type Document, type Filter } from 'mongodb';
import type { DocumentFilter, TranslatedQuery } from '../sql/types.js';
import type { BackendRows, CollectionSample, IDocumentStore, Row } from './IQueryBackends.js';
import { logger } from '../utils/logger.js';

/**
 * Copy a rendered filter into the driver's filter type.
 */
function toDriverFilter(filter: DocumentFilter): Filter<Document> {
  const result: Filter<Document> = {};
  for (const [key, value] of Object.entries(filter)) {
    result[key] = Array.isArray(value) ? value.map(toDriverFilter) : value;
  }
  return result;
}

function toRow(document: Document): Row {
  return { ...document };
}

/**
 * MongoDocumentStore
 * MongoDB implementation of IDocumentStore.
 *
 * The client connects lazily on first use; `close()` releases its pool.
 */
export class MongoDocumentStore implements IDocumentStore {
  private client: MongoClient;
  private db: Db;

  /**
   * @param mongoUri - MongoDB connection string
   * @param databaseName - Database holding the collections queried by table name
   * @param serverSelectionTimeoutMs - How long the driver waits for a reachable server
   * @param maxTimeMs - Server-side time limit for each find, if any
   */
  constructor(
    mongoUri: string,
    databaseName: string,
    serverSelectionTimeoutMs = 5_000,
    private readonly maxTimeMs?: number
  ) {
    this.client = new MongoClient(mongoUri, { serverSelectionTimeoutMS: serverSelectionTimeoutMs });
    this.db = this.client.db(databaseName);
  }

  async find(query: TranslatedQuery): Promise<BackendRows> {
    const start = performance.now();

    let cursor = this.db
      .collection(query.table)
      .find(toDriverFilter(query.filter), {
        projection: query.projection,
        ...(this.maxTimeMs !== undefined ? { maxTimeMS: this.maxTimeMs } : {}),
      });
    if (query.offset !== null) {
      cursor = cursor.skip(query.offset);
    }
    if (query.limit !== null) {
      // The driver reads limit(0) as "no limit"; LIMIT 0 must return nothing
      if (query.limit === 0) {
        await cursor.close();
        return { rows: [], elapsedMs: performance.now() - start };
      }
      cursor = cursor.limit(query.limit);
    }

    const documents = await cursor.toArray();
    const elapsedMs = performance.now() - start;

    logger.queryTiming('mongodb', elapsedMs, {
      collection: query.table,
      rowCount: documents.length,
    });

    return { rows: documents.map(toRow), elapsedMs };
  }

  async ping(): Promise<void> {
    await this.client.db('admin').command({ ping: 1 });
  }

  async sampleCollections(limit: number): Promise<CollectionSample[]> {
    const collections = await this.db.listCollections({}, { nameOnly: true }).toArray();

    const samples: CollectionSample[] = [];
    for (const { name } of collections) {
      const documents = await this.db
        .collection(name)
        .find({}, { projection: { _id: 0 } })
        .limit(limit)
        .toArray();
      samples.push({ name, documents: documents.map(toRow) });
    }
    return samples;
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
