import type { BackendRows, IDocumentStore, IRelationalStore } from '../backends/IQueryBackends.js';
import { toTranslationFailure, type TranslationFailure } from '../sql/errors.js';
import { tryTranslateSql } from '../sql/SqlTranslator.js';
import { assertSingleSelect } from '../sql/StatementGuard.js';
import type { TranslatedQuery } from '../sql/types.js';
import { debugLog, logger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/withTimeout.js';

export type BackendName = 'document' | 'relational';

export type BackendOutcome =
  | { status: 'ok'; rowCount: number; elapsedMs: number }
  | { status: 'error'; error: string; elapsedMs: number }
  | { status: 'timeout'; timeoutMs: number; elapsedMs: number }
  | { status: 'rejected'; failure: TranslationFailure };

function checkRelationalStatement(sql: string): TranslationFailure | null {
  try {
    assertSingleSelect(sql);
    return null;
  } catch (error) {
    return toTranslationFailure(error);
  }
}

export interface SpeedTestReport {
  query: string;
  /** Translated document query, or null when translation failed */
  translation: TranslatedQuery | null;
  totalParallelTimeMs: number;
  document: BackendOutcome;
  relational: BackendOutcome;
}

export interface SpeedTestOptions {
  /** Budget for each backend call */
  timeoutMs: number;
}

/**
 * SpeedTestRunner
 *
 * Translates a SQL query once, then runs the document-store query and the
 * original SQL concurrently and reports each side separately. A failure,
 * timeout or rejected translation on one side never discards the other
 * side's result.
 *
 * The original SQL reaches the relational store only if it is a single
 * SELECT; anything else marks that side `rejected` without running it.
 *
 * @example
 * ```typescript
 * const runner = new SpeedTestRunner(documentStore, relationalStore, { timeoutMs: 30_000 });
 * const report = await runner.run('SELECT * FROM users WHERE age > 30 LIMIT 100');
 * // report.document.status === 'ok', report.relational.status === 'ok'
 * ```
 */
export class SpeedTestRunner {
  constructor(
    private readonly documentStore: IDocumentStore,
    private readonly relationalStore: IRelationalStore,
    private readonly options: SpeedTestOptions
  ) {}

  async run(sql: string): Promise<SpeedTestReport> {
    const start = performance.now();
    const translation = tryTranslateSql(sql);

    const documentTask: Promise<BackendOutcome> = translation.ok
      ? this.measure('document', () => this.documentStore.find(translation.query))
      : Promise.resolve<BackendOutcome>({ status: 'rejected', failure: translation.error });
    const guard = checkRelationalStatement(sql);
    const relationalTask: Promise<BackendOutcome> = guard
      ? Promise.resolve<BackendOutcome>({ status: 'rejected', failure: guard })
      : this.measure('relational', () => this.relationalStore.query(sql));

    const [document, relational] = await Promise.all([documentTask, relationalTask]);
    const totalParallelTimeMs = performance.now() - start;

    const report: SpeedTestReport = {
      query: sql,
      translation: translation.ok ? translation.query : null,
      totalParallelTimeMs,
      document,
      relational,
    };

    logger.metric('speedtest', {
      table: report.translation?.table,
      totalParallelTimeMs,
      documentStatus: document.status,
      relationalStatus: relational.status,
    });

    return report;
  }

  private async measure(
    backend: BackendName,
    task: () => Promise<BackendRows>
  ): Promise<BackendOutcome> {
    const { timeoutMs } = this.options;
    const start = performance.now();

    try {
      const result = await withTimeout(task(), timeoutMs, `${backend} backend`);
      debugLog('speedtest', `${backend} backend finished`, {
        rowCount: result.rows.length,
        elapsedMs: result.elapsedMs,
      });
      return { status: 'ok', rowCount: result.rows.length, elapsedMs: result.elapsedMs };
    } catch (error) {
      const elapsedMs = performance.now() - start;

      if (error instanceof TimeoutError) {
        logger.warn(`${backend} backend timed out`, { timeoutMs, elapsedMs });
        return { status: 'timeout', timeoutMs, elapsedMs };
      }

      const message = error instanceof Error ? error.message : String(error);
      logger.error(`${backend} backend failed`, { error, elapsedMs });
      return { status: 'error', error: message, elapsedMs };
    }
  }
}
