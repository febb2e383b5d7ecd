#!/usr/bin/env tsx
/**
 * Sample Data Loader
 *
 * Generates random users and loads the same rows into the MongoDB `users`
 * collection and the PostgreSQL `users` table, replacing what was there.
 *
 * Usage:
 *   npm run load-data
 *   npm run load-data -- --count 100000 --batch-size 2000
 */

import 'dotenv/config';
import { MongoClient } from 'mongodb';
import pg from 'pg';
import { loadBackendConfig, sanitizeConnectionString } from '../src/config/backend.js';
import {
  buildUserInsert,
  chunk,
  generateUsers,
  validateInsertBatchSize,
  type SampleUser,
} from '../src/utils/sampleData.js';

const { Client } = pg;

interface LoadConfig {
  count: number;
  batchSize: number;
}

function parseArgs(): LoadConfig {
  const args = process.argv.slice(2);
  const config: LoadConfig = {
    count: 500_000,
    batchSize: 5_000,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--count' && i + 1 < args.length) {
      config.count = parseInt(args[++i], 10);
    } else if (arg === '--batch-size' && i + 1 < args.length) {
      config.batchSize = parseInt(args[++i], 10);
    } else if (arg === '--help' || arg === '-h') {
      console.log('Usage: npm run load-data -- [--count <n>] [--batch-size <n>]');
      process.exit(0);
    }
  }

  if (!Number.isInteger(config.count) || config.count <= 0) {
    throw new Error('--count must be a positive integer');
  }
  validateInsertBatchSize(config.batchSize);

  return config;
}

async function loadMongo(mongoUri: string, databaseName: string, users: SampleUser[]) {
  const client = new MongoClient(mongoUri);
  try {
    const collection = client.db(databaseName).collection<SampleUser>('users');

    console.log('🗑️  Clearing MongoDB collection "users"...');
    await collection.deleteMany({});

    console.log(`📥 Inserting ${users.length.toLocaleString()} documents...`);
    // insertMany adds _id to each object it receives
    await collection.insertMany(users.map((user) => ({ ...user })));
    console.log('✅ MongoDB loaded\n');
  } finally {
    await client.close();
  }
}

async function loadPostgres(postgresUri: string, users: SampleUser[], batchSize: number) {
  const client = new Client({ connectionString: postgresUri });
  await client.connect();

  try {
    console.log('🔨 Recreating PostgreSQL table "users"...');
    await client.query('DROP TABLE IF EXISTS users');
    await client.query(`
      CREATE TABLE users (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100),
        age INT
      )
    `);

    const batches = chunk(users, batchSize);
    console.log(`📥 Inserting ${users.length.toLocaleString()} rows in ${batches.length} batch(es)...`);

    for (const [index, batch] of batches.entries()) {
      const { text, values } = buildUserInsert(batch);
      await client.query(text, values);
      console.log(`   -> batch ${index + 1}/${batches.length}`);
    }
    console.log('✅ PostgreSQL loaded\n');
  } finally {
    await client.end();
  }
}

/**
 * Main execution
 */
async function main() {
  console.log('🚀 Sample Data Loader\n');

  const config = parseArgs();
  const backend = loadBackendConfig();

  console.log('📋 Configuration:');
  console.log(`   MongoDB: ${sanitizeConnectionString(backend.mongoUri)} (db: ${backend.databaseName})`);
  console.log(`   PostgreSQL: ${sanitizeConnectionString(backend.postgresUri)}`);
  console.log(`   Records: ${config.count.toLocaleString()}`);
  console.log(`   Batch size: ${config.batchSize.toLocaleString()}\n`);

  const users = generateUsers(config.count);

  await loadMongo(backend.mongoUri, backend.databaseName, users);
  await loadPostgres(backend.postgresUri, users, config.batchSize);

  console.log('🎉 Both backends hold the same data');
}

main().catch((err) => {
  console.error('\n❌ Load failed:');

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
