/**
 * Logger Interface and Console Implementation
 *
 * Callers that already run a logging stack can pass their own ILogger to
 * KeyedCryptoService.create; the console logger is the fallback.
 */

import { LOG_LEVEL_ENV_VAR } from "../constants";

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>
  ): void;
}

/**
 * Resolve a level name such as "warn" or "DEBUG"; anything else yields the fallback
 */
export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = LogLevel.INFO
): LogLevel {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized) ?? fallback;
}

export class ConsoleLogger implements ILogger {
  private logLevel: LogLevel;
  private readonly name: string;

  constructor(logLevel: LogLevel = LogLevel.INFO, name = "keyed-crypto") {
    this.logLevel = logLevel;
    this.name = name;
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  /* eslint-disable no-console -- Console logger implementation requires console output */
  public debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.debug(this.formatMessage("DEBUG", message, context));
    }
  }

  public info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage("INFO", message, context));
    }
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage("WARN", message, context));
    }
  }

  public error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>
  ): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage("ERROR", message, context, error));
    }
  }
  /* eslint-enable no-console */

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
  }

  public formatMessage(
    level: string,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): string {
    const timestamp = new Date().toISOString();
    let formatted = `[${timestamp}] [${level}] [${this.name}] ${message}`;

    if (context) {
      try {
        formatted += ` ${JSON.stringify(context)}`;
      } catch {
        formatted += ` [Context serialization failed]`;
      }
    }

    if (error instanceof Error) {
      formatted += `\nError: ${error.name}: ${error.message}`;
      if (error.stack) {
        formatted += `\nStack: ${error.stack}`;
      }
    } else if (error !== undefined) {
      formatted += `\nError: ${String(error)}`;
    }

    return formatted;
  }
}

/**
 * Default logger instance, level taken from KEYED_CRYPTO_LOG_LEVEL
 */
export const defaultLogger: ILogger = new ConsoleLogger(
  parseLogLevel(process.env[LOG_LEVEL_ENV_VAR])
);
