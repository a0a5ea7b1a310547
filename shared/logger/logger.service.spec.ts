import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LoggerService } from './logger.service';

describe('LoggerService', () => {
  const originalEnv = { ...process.env };
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'webhook-logs-'));
    process.env.LOG_DIR = logDir;
    process.env.NODE_ENV = 'test';
    delete process.env.LOG_LEVEL;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('writes info lines to info.log and all.log with the context tag', () => {
    const logger = new LoggerService();

    logger.log('dispatched 2 deliveries', 'WebhookDispatcherService');

    const info = fs.readFileSync(path.join(logDir, 'info.log'), 'utf8');
    const all = fs.readFileSync(path.join(logDir, 'all.log'), 'utf8');
    expect(info).toMatch(/^\[[^\]]+\] \[INFO\] \[WebhookDispatcherService\] dispatched 2 deliveries\n$/);
    expect(all).toBe(info);
  });

  it('appends the stack trace to error lines', () => {
    const logger = new LoggerService();

    logger.error('boom', 'Error: boom\n    at test', 'Worker');

    const error = fs.readFileSync(path.join(logDir, 'error.log'), 'utf8');
    expect(error).toContain('[ERROR] [Worker] boom\nError: boom\n    at test\n');
  });

  it('drops lines below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    const logger = new LoggerService();

    logger.debug('noise');
    logger.log('more noise');
    logger.warn('kept');

    expect(fs.existsSync(path.join(logDir, 'debug.log'))).toBe(false);
    expect(fs.existsSync(path.join(logDir, 'info.log'))).toBe(false);
    expect(fs.readFileSync(path.join(logDir, 'all.log'), 'utf8')).toMatch(/\[WARN\] kept\n$/);
  });
});
