/**
 * Logger Service for the notification dispatch service
 * Appends one line per entry to <LOG_DIR>/<level>.log and <LOG_DIR>/all.log
 */

import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly logDir: string;
  private readonly threshold: LogLevel;

  constructor() {
    this.logDir = path.resolve(process.env.LOG_DIR || path.join(process.cwd(), 'logs'));
    const configured = (process.env.LOG_LEVEL || 'debug').toLowerCase();
    this.threshold = isLogLevel(configured) ? configured : 'debug';

    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.threshold];
  }

  private writeLog(level: LogLevel, message: string, context?: string) {
    if (!this.isEnabled(level)) {
      return;
    }

    const logLine = `[${new Date().toISOString()}] [${level.toUpperCase()}]${context ? ` [${context}]` : ''} ${message}\n`;

    fs.appendFileSync(path.join(this.logDir, `${level}.log`), logLine, 'utf8');
    fs.appendFileSync(path.join(this.logDir, 'all.log'), logLine, 'utf8');

    if (process.env.NODE_ENV === 'development') {
      const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      sink(logLine.trimEnd());
    }
  }

  log(message: string, context?: string) {
    this.writeLog('info', message, context);
  }

  error(message: string, trace?: string, context?: string) {
    this.writeLog('error', `${message}${trace ? `\n${trace}` : ''}`, context);
  }

  warn(message: string, context?: string) {
    this.writeLog('warn', message, context);
  }

  debug(message: string, context?: string) {
    this.writeLog('debug', message, context);
  }

  verbose(message: string, context?: string) {
    this.debug(message, context);
  }
}
