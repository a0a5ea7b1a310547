/**
 * Logger Service for the webhook dispatch service.
 * Appends plain-text lines to <LOG_DIR>/<level>.log and <LOG_DIR>/all.log.
 */

import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function parseLevel(raw: string | undefined): LogLevel {
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return raw;
  }
  return 'debug';
}

@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;

  constructor() {
    this.logDir = path.resolve(process.env.LOG_DIR || path.join(process.cwd(), 'logs'));
    this.minLevel = parseLevel(process.env.LOG_LEVEL);
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private writeLog(level: LogLevel, message: string, context?: string) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const logLine = `[${new Date().toISOString()}] [${level.toUpperCase()}]${context ? ` [${context}]` : ''} ${message}\n`;

    fs.appendFileSync(path.join(this.logDir, `${level}.log`), logLine, 'utf8');
    fs.appendFileSync(path.join(this.logDir, 'all.log'), logLine, 'utf8');
  }

  log(message: string, context?: string) {
    this.writeLog('info', message, context);
    if (process.env.NODE_ENV === 'development') {
      console.log(message, context || '');
    }
  }

  error(message: string, trace?: string, context?: string) {
    this.writeLog('error', `${message}${trace ? `\n${trace}` : ''}`, context);
    if (process.env.NODE_ENV === 'development') {
      console.error(message, trace || '', context || '');
    }
  }

  warn(message: string, context?: string) {
    this.writeLog('warn', message, context);
    if (process.env.NODE_ENV === 'development') {
      console.warn(message, context || '');
    }
  }

  debug(message: string, context?: string) {
    this.writeLog('debug', message, context);
    if (process.env.NODE_ENV === 'development') {
      console.debug(message, context || '');
    }
  }

  verbose(message: string, context?: string) {
    this.debug(message, context);
  }
}
