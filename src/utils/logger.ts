import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import process from 'node:process';
import { format } from 'node:util';
import chalk from 'chalk';
import { errorMessage } from './errors.js';
import { formatLogTimestamp } from './formatters.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
}

export type LogLevelName = keyof typeof LogLevel;

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

export interface LoggerConfig {
  colors: boolean;
  logLevel: LogLevel;
  logFile: string | null;
}

export function parseLogLevel(name: string): LogLevel {
  const normalized = name.toUpperCase();
  const match = LOG_LEVEL_NAMES.find(level => level === normalized);
  return match === undefined ? LogLevel.INFO : LogLevel[match];
}

const SENSITIVE_STRING = /Bearer\s+[\w-]+|X-API-Key:\s*\S+|apiKey":\s*"[^"]+"|api_key":\s*"[^"]+"/gi;

export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;
  private colorsEnabled: boolean = true;
  private logFile: string | null = null;

  private constructor() {
    // Plain text when piped, under a service manager, or when asked
    if (process.env.NO_COLOR || process.env.CI === 'true' || !process.stdout.isTTY) {
      this.colorsEnabled = false;
    }
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public configure(config: Partial<LoggerConfig>): void {
    if (config.logLevel !== undefined) {
      this.setLogLevel(config.logLevel);
    }
    if (config.colors !== undefined) {
      this.setColors(config.colors);
    }
    if (config.logFile !== undefined) {
      this.setLogFile(config.logFile);
    }
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public setColors(enabled: boolean): void {
    this.colorsEnabled = enabled;
  }

  /**
   * Append every emitted line to `file` as well as the console. `null` turns
   * the file sink off.
   */
  public setLogFile(file: string | null): void {
    if (file) {
      mkdirSync(dirname(file), { recursive: true });
    }
    this.logFile = file;
  }

  private colorize(text: string, colorFn: typeof chalk.blue): string {
    return this.colorsEnabled ? colorFn(text) : text;
  }

  public debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, message, args);
  }

  public info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, message, args);
  }

  public warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARNING, message, args);
  }

  public error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, message, args);
  }

  /**
   * CLI confirmation output. Goes to the console only, never to the log file.
   */
  public success(message: string): void {
    console.log(this.colorize(`✔ ${message}`, chalk.green));
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (this.logLevel > level) {
      return;
    }

    const sanitizedArgs = args.map(arg => this.sanitizeForLogging(arg));
    const body = sanitizedArgs.length > 0 ? format(message, ...sanitizedArgs) : message;
    const line = `[${formatLogTimestamp(new Date())}] ${LogLevel[level]}: ${body}`;

    if (this.logFile) {
      try {
        appendFileSync(this.logFile, `${line}\n`);
      }
      catch (error) {
        const failedFile = this.logFile;
        this.logFile = null;
        console.error(`Log file ${failedFile} is not writable, logging to console only: ${errorMessage(error)}`);
      }
    }

    switch (level) {
      case LogLevel.DEBUG:
        console.log(this.colorize(line, chalk.gray));
        break;
      case LogLevel.INFO:
        console.log(this.colorize(line, chalk.blue));
        break;
      case LogLevel.WARNING:
        console.warn(this.colorize(line, chalk.yellow));
        break;
      case LogLevel.ERROR:
        console.error(this.colorize(line, chalk.red));
        break;
    }
  }

  private sanitizeForLogging(value: unknown): unknown {
    if (typeof value === 'string') {
      return value.replace(SENSITIVE_STRING, '[REDACTED]');
    }
    if (Array.isArray(value)) {
      return value.map(item => this.sanitizeForLogging(item));
    }
    if (typeof value === 'object' && value !== null && !(value instanceof Error)) {
      const sanitized: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        const lowered = key.toLowerCase();
        if (lowered.includes('token')
          || lowered.includes('password')
          || lowered.includes('secret')
          || lowered.includes('key')) {
          sanitized[key] = '[REDACTED]';
        }
        else {
          sanitized[key] = this.sanitizeForLogging(entry);
        }
      }
      return sanitized;
    }
    return value;
  }
}

export const logger = Logger.getInstance();
