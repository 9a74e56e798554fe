/**
 * Logger Service
 *
 * Leveled console logger with optional daily log file (`bot-YYYY-MM-DD.log`, UTC date
 * of each entry). Every entry is `[timestamp] [LEVEL] message {context}`.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LogLevel } from '../types/enums';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export type LogContext = Record<string, unknown>;

export class LoggerService {
  constructor(
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly logDir: string = './logs',
    private readonly writeToFile: boolean = true,
  ) {
    if (this.writeToFile) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel];
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const line = this.format(timestamp, level, message, context);

    switch (level) {
    case LogLevel.ERROR:
      console.error(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    default:
      console.log(line);
    }

    if (this.writeToFile) {
      fs.appendFileSync(this.logFilePathFor(timestamp), line + '\n', 'utf-8');
    }
  }

  private logFilePathFor(timestamp: string): string {
    return path.join(this.logDir, `bot-${timestamp.split('T')[0]}.log`);
  }

  private format(timestamp: string, level: LogLevel, message: string, context?: LogContext): string {
    const contextText = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level}] ${message}${contextText}`;
  }
}
