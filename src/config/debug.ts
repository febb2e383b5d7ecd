export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface DebugConfig {
  enabled: boolean;
  logTranslator: boolean;
  logExecutor: boolean;
  logSpeedTest: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  slowQueryThresholdMs: number;
}

const toBool = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === 'json' ? 'json' : defaultValue;
};

const toNumber = (value: string | undefined, defaultValue: number): number => {
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
};

export function loadDebugConfig(): DebugConfig {
  const enabled = toBool(process.env.SQLBRIDGE_DEBUG_MODE, false);

  // Level, format and the slow-query threshold apply whether or not debug mode is on
  const logLevel = toLogLevel(process.env.SQLBRIDGE_LOG_LEVEL, LogLevel.INFO);
  const logFormat = toLogFormat(process.env.SQLBRIDGE_LOG_FORMAT, 'pretty');
  const slowQueryThresholdMs = toNumber(process.env.SQLBRIDGE_SLOW_QUERY_THRESHOLD_MS, 1000);

  if (!enabled) {
    return {
      enabled: false,
      logTranslator: false,
      logExecutor: false,
      logSpeedTest: false,
      logLevel,
      logFormat,
      slowQueryThresholdMs,
    };
  }

  return {
    enabled: true,
    logTranslator: toBool(process.env.SQLBRIDGE_DEBUG_TRANSLATOR, true),
    logExecutor: toBool(process.env.SQLBRIDGE_DEBUG_EXECUTOR, true),
    logSpeedTest: toBool(process.env.SQLBRIDGE_DEBUG_SPEEDTEST, true),
    logLevel,
    logFormat,
    slowQueryThresholdMs,
  };
}
