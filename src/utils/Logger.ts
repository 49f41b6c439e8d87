export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

import fs from 'fs';
import path from 'path';

export class Logger {
  private static logLevel: LogLevel = LogLevel.INFO;
  private static logEnabled: boolean = true;
  private static consoleEnabled: boolean = false;
  private static logFile: string = path.join(process.cwd(), 'loop-pipeline-converter.log');

  static setLogLevel(level: LogLevel) {
    Logger.logLevel = level;
  }

  static enableLogs(enabled: boolean) {
    Logger.logEnabled = enabled;
  }

  static enableConsole(enabled: boolean) {
    Logger.consoleEnabled = enabled;
  }

  static setLogFile(file: string) {
    Logger.logFile = file;
  }

  static parseLevel(value: string | undefined): LogLevel {
    const normalized = (value ?? '').toUpperCase();
    return Object.values(LogLevel).find(level => level === normalized) ?? LogLevel.INFO;
  }

  private static shouldLog(level: LogLevel): boolean {
    if (!Logger.logEnabled) return false;

    const levels = Object.values(LogLevel);
    const currentLevelIndex = levels.indexOf(Logger.logLevel);
    const messageLevelIndex = levels.indexOf(level);

    return messageLevelIndex >= currentLevelIndex;
  }

  private static formatMessage(level: LogLevel, context: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] ${level.padEnd(5)} [${context}] ${message}`;
  }

  private static write(level: LogLevel, message: string) {
    fs.appendFileSync(this.logFile, message + '\n');
    if (this.consoleEnabled) {
      if (level === LogLevel.ERROR) {
        console.error(message);
      } else {
        console.log(message);
      }
    }
  }

  private static log(level: LogLevel, context: string, message: string, data?: unknown) {
    if (!this.shouldLog(level)) return;
    const logMessage = this.formatMessage(level, context, message);
    if (data !== undefined) {
      this.write(level, `${logMessage}\n${JSON.stringify(data, null, 2)}`);
    } else {
      this.write(level, logMessage);
    }
  }

  static debug(context: string, message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, context, message, data);
  }

  static info(context: string, message: string, data?: unknown) {
    this.log(LogLevel.INFO, context, message, data);
  }

  static warn(context: string, message: string, data?: unknown) {
    this.log(LogLevel.WARN, context, message, data);
  }

  static error(context: string, message: string, error?: unknown) {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.write(LogLevel.ERROR, this.formatMessage(LogLevel.ERROR, context, message));
      if (error) {
        if (error instanceof Error) {
          this.write(LogLevel.ERROR, error.stack || error.message);
        } else {
          this.write(LogLevel.ERROR, JSON.stringify(error, null, 2));
        }
      }
    }
  }
}
