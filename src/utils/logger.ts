import chalk from 'chalk';
import fs from 'fs-extra';
import * as path from 'path';
import { config } from '../config.js';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export interface LoggerOptions {
  level: LogLevel;
  logDir: string;
  toFile: boolean;
}

export function parseLogLevel(value: string): LogLevel {
  const upper = value.toUpperCase();
  return Object.values(LogLevel).find((level) => level === upper) ?? LogLevel.INFO;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly logDir: string | null;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.logDir = options.toFile ? path.resolve(options.logDir) : null;
    if (this.logDir) {
      fs.ensureDirSync(this.logDir);
    }
  }

  formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args
      .map((arg) => (typeof arg === 'object' && arg !== null ? JSON.stringify(arg, null, 2) : String(arg)))
      .join(' ');
    return formattedArgs
      ? `[${timestamp}] [${level}] ${message} ${formattedArgs}`
      : `[${timestamp}] [${level}] ${message}`;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private writeToFile(line: string): void {
    if (!this.logDir) return;
    const logFile = path.join(this.logDir, `${new Date().toISOString().split('T')[0]}.log`);
    fs.appendFileSync(logFile, line + '\n');
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.DEBUG)) return;
    const formatted = this.formatMessage(LogLevel.DEBUG, message, ...args);
    console.log(chalk.gray(formatted));
    this.writeToFile(formatted);
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.INFO)) return;
    const formatted = this.formatMessage(LogLevel.INFO, message, ...args);
    console.log(chalk.blue(formatted));
    this.writeToFile(formatted);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.WARN)) return;
    const formatted = this.formatMessage(LogLevel.WARN, message, ...args);
    console.log(chalk.yellow(formatted));
    this.writeToFile(formatted);
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.ERROR)) return;
    const formatted = this.formatMessage(LogLevel.ERROR, message, ...args);
    console.error(chalk.red(formatted));
    this.writeToFile(formatted);
  }
}

export const logger = new Logger({
  level: parseLogLevel(config.logLevel),
  logDir: config.logDir,
  toFile: config.logToFile,
});
