import { describe, it, expect, beforeEach, afterAll } from '@jest/globals';
import { loadDebugConfig, LogLevel } from '../debug.js';

describe('loadDebugConfig', () => {
  // Capture original env at module load to avoid mutation issues
  const ORIGINAL_ENV = { ...process.env };

  beforeEach(() => {
    process.env = { ...ORIGINAL_ENV };
    delete process.env.SQLBRIDGE_DEBUG_MODE;
    delete process.env.SQLBRIDGE_DEBUG_TRANSLATOR;
    delete process.env.SQLBRIDGE_DEBUG_EXECUTOR;
    delete process.env.SQLBRIDGE_DEBUG_SPEEDTEST;
    delete process.env.SQLBRIDGE_LOG_LEVEL;
    delete process.env.SQLBRIDGE_LOG_FORMAT;
    delete process.env.SQLBRIDGE_SLOW_QUERY_THRESHOLD_MS;
  });

  afterAll(() => {
    process.env = ORIGINAL_ENV;
  });

  it('should default to debug disabled when env is not set', () => {
    const config = loadDebugConfig();

    expect(config).toEqual({
      enabled: false,
      logTranslator: false,
      logExecutor: false,
      logSpeedTest: false,
      logLevel: LogLevel.INFO,
      logFormat: 'pretty',
      slowQueryThresholdMs: 1000,
    });
  });

  it('should enable debug with all categories defaulting to true', () => {
    process.env.SQLBRIDGE_DEBUG_MODE = 'true';

    const config = loadDebugConfig();

    expect(config.enabled).toBe(true);
    expect(config.logTranslator).toBe(true);
    expect(config.logExecutor).toBe(true);
    expect(config.logSpeedTest).toBe(true);
  });

  it('should allow explicit false categories when debug is enabled', () => {
    process.env.SQLBRIDGE_DEBUG_MODE = 'true';
    process.env.SQLBRIDGE_DEBUG_EXECUTOR = 'false';

    const config = loadDebugConfig();

    expect(config.logExecutor).toBe(false);
    expect(config.logTranslator).toBe(true);
    expect(config.logSpeedTest).toBe(true);
  });

  it('should ignore category flags when debug mode is off', () => {
    process.env.SQLBRIDGE_DEBUG_TRANSLATOR = 'true';

    const config = loadDebugConfig();

    expect(config.enabled).toBe(false);
    expect(config.logTranslator).toBe(false);
  });

  it('should handle case-insensitive debug mode TRUE', () => {
    process.env.SQLBRIDGE_DEBUG_MODE = 'TRUE';

    expect(loadDebugConfig().enabled).toBe(true);
  });

  it('should treat any other value as false', () => {
    process.env.SQLBRIDGE_DEBUG_MODE = 'yes';

    expect(loadDebugConfig().enabled).toBe(false);
  });

  it('should parse log level case-insensitively', () => {
    process.env.SQLBRIDGE_LOG_LEVEL = ' WARN ';

    expect(loadDebugConfig().logLevel).toBe(LogLevel.WARN);
  });

  it('should fall back to info for an unknown log level', () => {
    process.env.SQLBRIDGE_LOG_LEVEL = 'verbose';

    expect(loadDebugConfig().logLevel).toBe(LogLevel.INFO);
  });

  it('should accept json log format and fall back to pretty otherwise', () => {
    process.env.SQLBRIDGE_LOG_FORMAT = 'JSON';
    expect(loadDebugConfig().logFormat).toBe('json');

    process.env.SQLBRIDGE_LOG_FORMAT = 'xml';
    expect(loadDebugConfig().logFormat).toBe('pretty');
  });

  it('should read the slow query threshold and ignore invalid numbers', () => {
    process.env.SQLBRIDGE_SLOW_QUERY_THRESHOLD_MS = '250';
    expect(loadDebugConfig().slowQueryThresholdMs).toBe(250);

    process.env.SQLBRIDGE_SLOW_QUERY_THRESHOLD_MS = 'soon';
    expect(loadDebugConfig().slowQueryThresholdMs).toBe(1000);
  });
});
