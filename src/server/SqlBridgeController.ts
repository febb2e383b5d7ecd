import type { IDocumentStore, IRelationalStore, Row } from '../backends/IQueryBackends.js';
import type { BackendOutcome, SpeedTestRunner } from '../speedtest/SpeedTestRunner.js';
import { tryTranslateSql } from '../sql/SqlTranslator.js';
import { runHealthChecks } from '../utils/healthCheck.js';
import { ToolArgsValidator, ValidationError } from '../validators/ToolArgsValidator.js';

/**
 * MCP Content format for responses
 */
export type McpContent = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

export type ToolArgs = Record<string, unknown> | undefined;

function formatMs(ms: number): string {
  return `${ms.toFixed(1)}ms`;
}

export function describeOutcome(backend: string, outcome: BackendOutcome): string {
  switch (outcome.status) {
    case 'ok':
      return `${backend}: ok, ${outcome.rowCount} rows in ${formatMs(outcome.elapsedMs)}`;
    case 'error':
      return `${backend}: error (${outcome.error})`;
    case 'timeout':
      return `${backend}: timed out after ${outcome.timeoutMs}ms`;
    case 'rejected':
      return `${backend}: rejected (${outcome.failure.kind}: ${outcome.failure.message})`;
  }
}

/**
 * SqlBridgeController - MCP Tool Orchestration Layer
 *
 * Bridges MCP tool calls to the translator, the speed-test runner and the
 * backend stores, and formats every result as MCP text content.
 *
 * **Supported Operations:**
 * - `translate_sql`: Translate a SQL query into a document-store query
 * - `speedtest`: Run a query against both backends and compare timings
 * - `health`: Check configuration and ping both backends
 * - `inspect`: Sample the documents of every collection
 *
 * Argument errors and translation failures come back as `isError` content;
 * anything else propagates to the server, which logs it.
 */
export class SqlBridgeController {
  constructor(
    private documentStore: IDocumentStore,
    private relationalStore: IRelationalStore,
    private runner: SpeedTestRunner,
    private options: { inspectLimit: number }
  ) {}

  /**
   * Format a result as MCP content
   */
  private formatResponse(result: unknown, summary?: string, isError = false): McpContent {
    const text = summary
      ? `${summary}\n\n${JSON.stringify(result, null, 2)}`
      : JSON.stringify(result, null, 2);

    return {
      content: [
        {
          type: 'text',
          text,
        },
      ],
      isError,
    };
  }

  private formatValidationError(error: ValidationError): McpContent {
    return this.formatResponse({ error: error.message }, `Error: ${error.message}`, true);
  }

  /**
   * Handle TRANSLATE_SQL tool
   */
  async handleTranslateTool(args: ToolArgs): Promise<McpContent> {
    let query: string;
    try {
      query = ToolArgsValidator.requireQuery(args);
    } catch (error) {
      if (error instanceof ValidationError) {
        return this.formatValidationError(error);
      }
      throw error;
    }

    const result = tryTranslateSql(query);
    if (!result.ok) {
      return this.formatResponse(
        result.error,
        `Error: ${result.error.kind}: ${result.error.message}`,
        true
      );
    }

    return this.formatResponse(result.query, `Translated query on "${result.query.table}"`);
  }

  /**
   * Handle SPEEDTEST tool
   */
  async handleSpeedTestTool(args: ToolArgs): Promise<McpContent> {
    let query: string;
    try {
      query = ToolArgsValidator.requireQuery(args);
    } catch (error) {
      if (error instanceof ValidationError) {
        return this.formatValidationError(error);
      }
      throw error;
    }

    const report = await this.runner.run(query);

    const summary = [
      `Total parallel time: ${formatMs(report.totalParallelTimeMs)}`,
      describeOutcome('document', report.document),
      describeOutcome('relational', report.relational),
    ].join('\n');

    const bothFailed = report.document.status !== 'ok' && report.relational.status !== 'ok';
    return this.formatResponse(report, summary, bothFailed);
  }

  /**
   * Handle HEALTH tool
   */
  async handleHealthTool(): Promise<McpContent> {
    const results = await runHealthChecks(this.documentStore, this.relationalStore);
    const failed = results.filter((result) => result.status === 'error');

    const summary =
      failed.length === 0
        ? 'status: ok'
        : `status: error (${failed.map((result) => result.label).join(', ')})`;

    return this.formatResponse({ results }, summary, failed.length > 0);
  }

  /**
   * Handle INSPECT tool
   */
  async handleInspectTool(args: ToolArgs): Promise<McpContent> {
    let limit: number;
    try {
      limit = ToolArgsValidator.optionalPositiveInt(args, 'limit') ?? this.options.inspectLimit;
    } catch (error) {
      if (error instanceof ValidationError) {
        return this.formatValidationError(error);
      }
      throw error;
    }

    const samples = await this.documentStore.sampleCollections(limit);

    const data: Record<string, Row[]> = {};
    for (const sample of samples) {
      data[sample.name] = sample.documents;
    }

    return this.formatResponse(
      { collections: samples.map((sample) => sample.name), data },
      `${samples.length} collection(s), up to ${limit} document(s) each`
    );
  }
}
