import { describe, it, expect, beforeEach, afterEach, afterAll, jest } from '@jest/globals';
import { SqlBridgeController, describeOutcome, type McpContent } from '../SqlBridgeController.js';
import { SpeedTestRunner } from '../../speedtest/SpeedTestRunner.js';
import { FakeDocumentStore } from '../../../tests/helpers/FakeDocumentStore.js';
import { FakeRelationalStore } from '../../../tests/helpers/FakeRelationalStore.js';

function textOf(result: McpContent): string {
  return result.content[0].text;
}

function jsonOf(result: McpContent): unknown {
  const text = textOf(result);
  return JSON.parse(text.slice(text.indexOf('\n\n') + 2));
}

function createController(
  documentStore = new FakeDocumentStore(),
  relationalStore = new FakeRelationalStore()
) {
  const runner = new SpeedTestRunner(documentStore, relationalStore, { timeoutMs: 1_000 });
  return new SqlBridgeController(documentStore, relationalStore, runner, { inspectLimit: 50 });
}

describe('SqlBridgeController', () => {
  const ORIGINAL_ENV = { ...process.env };

  beforeEach(() => {
    process.env = { ...ORIGINAL_ENV };
    delete process.env.MONGO_URI;
    delete process.env.POSTGRES_URI;
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(() => {
    process.env = ORIGINAL_ENV;
  });

  describe('handleTranslateTool', () => {
    it('should return the translated query', async () => {
      const result = await createController().handleTranslateTool({
        query: 'SELECT name FROM users WHERE age < 25 LIMIT 3',
      });

      expect(result.isError).toBe(false);
      expect(textOf(result).split('\n')[0]).toBe('Translated query on "users"');
      expect(jsonOf(result)).toEqual({
        target: ['name'],
        table: 'users',
        filter: { age: { $lt: 25 } },
        projection: { name: 1, _id: 0 },
        limit: 3,
        offset: null,
      });
    });

    it('should return a tagged failure as error content', async () => {
      const result = await createController().handleTranslateTool({
        query: 'SELECT * FROM t WHERE a IN (1, 2)',
      });

      expect(result.isError).toBe(true);
      expect(textOf(result).split('\n')[0]).toBe('Error: UnsupportedFeature: Unsupported feature: IN');
      expect(jsonOf(result)).toEqual({
        kind: 'UnsupportedFeature',
        feature: 'IN',
        message: 'Unsupported feature: IN',
        offset: 24,
      });
    });

    it('should reject invalid arguments', async () => {
      const result = await createController().handleTranslateTool({});

      expect(result.isError).toBe(true);
      expect(jsonOf(result)).toEqual({ error: 'Missing required argument "query"' });
    });
  });

  describe('handleSpeedTestTool', () => {
    it('should summarise both backends', async () => {
      const controller = createController(
        new FakeDocumentStore({ rows: [{ age: 30 }], elapsedMs: 1.25 }),
        new FakeRelationalStore({ rows: [{ age: 30 }, { age: 31 }], elapsedMs: 2 })
      );

      const result = await controller.handleSpeedTestTool({ query: 'SELECT * FROM users' });
      const lines = textOf(result).split('\n');

      expect(result.isError).toBe(false);
      expect(lines[0]).toMatch(/^Total parallel time: \d+\.\dms$/);
      expect(lines[1]).toBe('document: ok, 1 rows in 1.3ms');
      expect(lines[2]).toBe('relational: ok, 2 rows in 2.0ms');
    });

    it('should not flag an error when only one side fails', async () => {
      const controller = createController(
        new FakeDocumentStore(),
        new FakeRelationalStore({ failWith: new Error('relation "users" does not exist') })
      );

      const result = await controller.handleSpeedTestTool({ query: 'SELECT * FROM users' });

      expect(result.isError).toBe(false);
      expect(textOf(result).split('\n')[2]).toBe(
        'relational: error (relation "users" does not exist)'
      );
    });

    it('should flag an error when neither side succeeds', async () => {
      const controller = createController(
        new FakeDocumentStore(),
        new FakeRelationalStore({ failWith: new Error('syntax error at or near "LIKE"') })
      );

      const result = await controller.handleSpeedTestTool({
        query: "SELECT * FROM users WHERE name LIKE 'a%'",
      });

      expect(result.isError).toBe(true);
      expect(textOf(result).split('\n')[1]).toBe(
        'document: rejected (UnsupportedFeature: Unsupported feature: LIKE)'
      );
    });
  });

  describe('handleHealthTool', () => {
    it('should report ok when both backends answer', async () => {
      const result = await createController().handleHealthTool();

      expect(result.isError).toBe(false);
      expect(textOf(result).split('\n')[0]).toBe('status: ok');
    });

    it('should list failing checks', async () => {
      const controller = createController(
        new FakeDocumentStore({ pingError: new Error('connect ECONNREFUSED 127.0.0.1:27017') })
      );

      const result = await controller.handleHealthTool();

      expect(result.isError).toBe(true);
      expect(textOf(result).split('\n')[0]).toBe('status: error (MongoDB connection)');
    });
  });

  describe('handleInspectTool', () => {
    const collections = [
      { name: 'users', documents: [{ name: 'aaaaaaa', age: 20 }, { name: 'bbbbbbb', age: 30 }] },
      { name: 'orders', documents: [] },
    ];

    it('should sample every collection with the default limit', async () => {
      const documentStore = new FakeDocumentStore({ collections });

      const result = await createController(documentStore).handleInspectTool(undefined);

      expect(documentStore.sampleLimits).toEqual([50]);
      expect(textOf(result).split('\n')[0]).toBe('2 collection(s), up to 50 document(s) each');
      expect(jsonOf(result)).toEqual({
        collections: ['users', 'orders'],
        data: {
          users: [
            { name: 'aaaaaaa', age: 20 },
            { name: 'bbbbbbb', age: 30 },
          ],
          orders: [],
        },
      });
    });

    it('should honour an explicit limit', async () => {
      const documentStore = new FakeDocumentStore({ collections });

      const result = await createController(documentStore).handleInspectTool({ limit: 1 });

      expect(documentStore.sampleLimits).toEqual([1]);
      expect(jsonOf(result)).toEqual({
        collections: ['users', 'orders'],
        data: { users: [{ name: 'aaaaaaa', age: 20 }], orders: [] },
      });
    });

    it('should reject an invalid limit', async () => {
      const result = await createController().handleInspectTool({ limit: -3 });

      expect(result.isError).toBe(true);
      expect(jsonOf(result)).toEqual({ error: 'Argument "limit" must be a positive integer' });
    });
  });
});

describe('describeOutcome', () => {
  it('should describe timeouts', () => {
    expect(describeOutcome('relational', { status: 'timeout', timeoutMs: 500, elapsedMs: 501 })).toBe(
      'relational: timed out after 500ms'
    );
  });
});
