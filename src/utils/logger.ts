import { loadDebugConfig, LogLevel } from '../config/debug.js';

const debugConfig = loadDebugConfig();

export type DebugCategory = 'translator' | 'executor' | 'speedtest';

function categoryEnabled(category: DebugCategory): boolean {
  if (!debugConfig.enabled) {
    return false;
  }

  switch (category) {
    case 'translator':
      return debugConfig.logTranslator;
    case 'executor':
      return debugConfig.logExecutor;
    case 'speedtest':
      return debugConfig.logSpeedTest;
    default:
      return false;
  }
}

interface LogEntry {
  timestamp: string;
  level: string;
  category?: string;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[debugConfig.logLevel];
}

function errorReplacer(_key: string, val: unknown): unknown {
  if (val instanceof Error) {
    return { name: val.name, message: val.message, stack: val.stack };
  }
  return val;
}

const serialize = (value: unknown) => {
  try {
    return JSON.stringify(value, errorReplacer, 2);
  } catch (error) {
    return `[unserializable: ${error instanceof Error ? error.message : String(error)}]`;
  }
};

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[sqlbridge:${category}]` : '[sqlbridge]';
  const levelStr = `[${level.toUpperCase()}]`;

  const base = `${timestamp} ${levelStr} ${categoryStr} ${message}`;

  const hasAdditionalData = Object.keys(rest).length > 0;
  if (!hasAdditionalData) {
    return base;
  }

  return `${base}\n${serialize(rest)}`;
}

function formatJson(entry: LogEntry): string {
  try {
    return JSON.stringify(entry, errorReplacer);
  } catch (error) {
    return JSON.stringify({
      ...entry,
      _serializationError: `Failed to serialize: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}

// stdout carries the MCP protocol, so every log line goes to stderr
function emit(entry: LogEntry): void {
  const output = debugConfig.logFormat === 'json' ? formatJson(entry) : formatPretty(entry);
  console.error(output);
}

function describeError(error: Error): Record<string, unknown> {
  const errorEntry: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause) {
    errorEntry.cause = error.cause;
  }
  return errorEntry;
}

export interface Timer {
  end(metadata?: Record<string, unknown>): number;
}

class Logger {
  private createEntry(
    level: LogLevel,
    category: string | undefined,
    message: string,
    payload?: unknown
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (category) {
      entry.category = category;
    }

    if (payload !== undefined) {
      if (payload instanceof Error) {
        entry.error = describeError(payload);
      } else if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
        for (const [key, val] of Object.entries(payload)) {
          entry[key] = val instanceof Error ? describeError(val) : val;
        }
      } else {
        entry.data = payload;
      }
    }

    return entry;
  }

  debug(category: DebugCategory, message: string, payload?: unknown): void {
    if (!categoryEnabled(category) || !shouldLog(LogLevel.DEBUG)) {
      return;
    }

    emit(this.createEntry(LogLevel.DEBUG, category, message, payload));
  }

  info(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    emit(this.createEntry(LogLevel.INFO, undefined, message, payload));
  }

  warn(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.WARN)) {
      return;
    }

    emit(this.createEntry(LogLevel.WARN, undefined, message, payload));
  }

  error(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.ERROR)) {
      return;
    }

    emit(this.createEntry(LogLevel.ERROR, undefined, message, payload));
  }

  metric(metricName: string, payload: unknown): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    const entry = this.createEntry(LogLevel.INFO, undefined, metricName, payload);
    entry.type = 'metric';
    emit(entry);
  }

  /**
   * Start a span; `end()` emits a metric with the elapsed time and returns it.
   */
  startTimer(spanName: string, metadata?: Record<string, unknown>): Timer {
    const start = performance.now();
    return {
      end: (extra?: Record<string, unknown>) => {
        const durationMs = performance.now() - start;
        this.metric(spanName, { ...metadata, ...extra, durationMs });
        return durationMs;
      },
    };
  }

  /**
   * Warn when a backend query exceeds the configured slow-query threshold.
   */
  queryTiming(backend: string, durationMs: number, metadata?: Record<string, unknown>): void {
    if (durationMs >= debugConfig.slowQueryThresholdMs) {
      this.warn(`slow ${backend} query`, {
        ...metadata,
        durationMs,
        thresholdMs: debugConfig.slowQueryThresholdMs,
      });
      return;
    }
    this.debug('executor', `${backend} query finished`, { ...metadata, durationMs });
  }
}

// Singleton instance
export const logger = new Logger();

export function debugLog(category: DebugCategory, message: string, payload?: unknown) {
  logger.debug(category, message, payload);
}
