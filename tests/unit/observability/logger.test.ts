import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import config from '../../../src/config.js';
import {
  createLogger,
  withLogContext,
  withRealmContext,
} from '../../../src/utils/observability/index.js';

const envSnapshot = { ...process.env };
const levelSnapshot = config.logLevel;

afterEach(() => {
  process.env = { ...envSnapshot };
  config.logLevel = levelSnapshot;
  vi.restoreAllMocks();
});

describe('observability logger', () => {
  it('writes redacted JSON logs to local file in development', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qbo-obs-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'development';
    config.logLevel = 'info';
    process.env.APP_LOG_FILE = logFile;

    const logger = createLogger({ domain: 'unit-test' });
    const stdoutSpy = vi.spyOn(process.stdout, 'write');

    await withLogContext({ requestId: 'req_test_123' }, async () => {
      logger.info('test_event', {
        realmId: 'realm-1',
        refreshToken: 'refresh-1',
        upstreamBody: '{"error":"invalid_grant"}',
      });
    });

    await vi.waitFor(() => {
      expect(fs.existsSync(logFile)).toBe(true);
      const content = fs.readFileSync(logFile, 'utf-8');
      expect(content.trim().length).toBeGreaterThan(0);
    }, { timeout: 1000 });

    const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
    const payload = JSON.parse(lines[0]) as Record<string, unknown>;

    expect(payload.event).toBe('test_event');
    expect(payload.level).toBe('info');
    expect(payload.domain).toBe('unit-test');
    expect(payload.requestId).toBe('req_test_123');
    expect(payload.realmId).toBe('realm-1');
    expect(payload.refreshToken).toBe('[REDACTED]');
    expect(payload.upstreamBody).toBe('[REDACTED_TEXT len=25]');
    expect(stdoutSpy).toHaveBeenCalled();
  });

  it('does not write local file sink in production by default', () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qbo-obs-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'production';
    config.logLevel = 'info';
    process.env.APP_LOG_FILE = logFile;
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    const logger = createLogger({ domain: 'unit-test' });
    logger.info('prod_event', { ok: true });

    expect(fs.existsSync(logFile)).toBe(false);
  });

  it('drops records below the configured level', () => {
    process.env.NODE_ENV = 'production';
    config.logLevel = 'warn';
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const logger = createLogger({ domain: 'unit-test' });
    logger.info('quiet_event');
    logger.warn('loud_event', { realmId: 'realm-1' });

    expect(stdoutSpy).not.toHaveBeenCalled();
    expect(stderrSpy).toHaveBeenCalledTimes(1);
    const record = JSON.parse(String(stderrSpy.mock.calls[0][0])) as Record<string, unknown>;
    expect(record).toMatchObject({ level: 'warn', event: 'loud_event', domain: 'unit-test', realmId: 'realm-1' });
  });

  it('ignores LOG_LEVEL changes made after config was loaded', () => {
    process.env.NODE_ENV = 'production';
    config.logLevel = 'error';
    process.env.LOG_LEVEL = 'debug';
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    createLogger({ domain: 'unit-test' }).info('quiet_event');

    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('tags lines written inside a realm operation', () => {
    process.env.NODE_ENV = 'production';
    config.logLevel = 'info';
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const logger = createLogger({ domain: 'unit-test' });

    withLogContext({ requestId: 'req_test_123', operation: 'GET /callback' }, () => {
      withRealmContext('realm-7', 'completeAuthorization', () => {
        logger.info('authorization_completed');
      });
    });

    const record = JSON.parse(String(stdoutSpy.mock.calls[0][0])) as Record<string, unknown>;
    expect(record).toMatchObject({
      event: 'authorization_completed',
      requestId: 'req_test_123',
      realmId: 'realm-7',
      operation: 'completeAuthorization',
      domain: 'unit-test',
    });
  });
});
