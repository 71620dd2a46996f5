/**
 * Unit tests for LoggerService
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LoggerService } from './logger.service';

describe('LoggerService', () => {
  const originalEnv = { ...process.env };
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'notifications-logs-'));
    process.env.LOG_DIR = logDir;
    process.env.NODE_ENV = 'test';
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  const read = (file: string) => fs.readFileSync(path.join(logDir, file), 'utf8');

  it('writes to the level file and all.log with the context', () => {
    const logger = new LoggerService();

    logger.log('notification sent', 'NotificationsService');

    expect(read('info.log')).toMatch(/^\[[^\]]+\] \[INFO\] \[NotificationsService\] notification sent\n$/);
    expect(read('all.log')).toBe(read('info.log'));
  });

  it('appends the trace to error entries', () => {
    const logger = new LoggerService();

    logger.error('dispatch failed', 'Error: boom\n    at line', 'DeliveryDispatcher');

    expect(read('error.log')).toContain('[ERROR] [DeliveryDispatcher] dispatch failed\nError: boom\n    at line\n');
  });

  it('drops entries below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    const logger = new LoggerService();

    logger.debug('noisy');
    logger.log('also noisy');
    logger.warn('kept', 'Test');

    expect(fs.existsSync(path.join(logDir, 'debug.log'))).toBe(false);
    expect(fs.existsSync(path.join(logDir, 'info.log'))).toBe(false);
    expect(read('all.log')).toContain('[WARN] [Test] kept');
  });

  it('falls back to debug for an unknown LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'chatty';
    const logger = new LoggerService();

    logger.verbose('verbose entry');

    expect(read('debug.log')).toContain('[DEBUG] verbose entry');
  });
});
