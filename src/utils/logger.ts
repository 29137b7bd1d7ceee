import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

/**
 * Log level enumeration
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: Record<string, unknown>;
  traceId?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  directory?: string;
  fileOutput?: boolean;
}

const LEVEL_COLORS: Record<string, (text: string) => string> = {
  DEBUG: chalk.gray,
  INFO: chalk.cyan,
  WARN: chalk.yellow,
  ERROR: chalk.red,
};

/**
 * Structured logger with log levels, daily JSON-lines files and operation tracing
 */
export class Logger {
  private static currentLogLevel: LogLevel = Logger.parseLogLevel(process.env.LOG_LEVEL || 'info');
  private static logDirectory: string = process.env.LOG_DIR || './logs';
  private static fileOutput: boolean = process.env.NODE_ENV !== 'test';
  private static currentDate: string = new Date().toISOString().split('T')[0];
  private static logFile: string = path.join(Logger.logDirectory, `${Logger.currentDate}.log`);
  private static operationStack: Map<string, { startTime: number; label: string }> = new Map();
  private static traceIdCounter: number = 0;

  static parseLogLevel(level: string): LogLevel {
    switch (level.toLowerCase()) {
      case 'debug':
        return LogLevel.DEBUG;
      case 'warn':
        return LogLevel.WARN;
      case 'error':
        return LogLevel.ERROR;
      case 'info':
      default:
        return LogLevel.INFO;
    }
  }

  /**
   * Apply settings from the loaded configuration
   */
  static configure(options: LoggerOptions): void {
    if (options.level !== undefined) {
      Logger.currentLogLevel = options.level;
    }
    if (options.directory !== undefined) {
      Logger.logDirectory = options.directory;
      Logger.logFile = path.join(Logger.logDirectory, `${Logger.currentDate}.log`);
    }
    if (options.fileOutput !== undefined) {
      Logger.fileOutput = options.fileOutput;
    }
  }

  private static ensureLogDirectory(): void {
    if (!fs.existsSync(Logger.logDirectory)) {
      fs.mkdirSync(Logger.logDirectory, { recursive: true });
    }
  }

  /**
   * Switch to a new file when the day changes
   */
  private static checkLogRotation(): void {
    const today = new Date().toISOString().split('T')[0];
    if (today !== Logger.currentDate) {
      Logger.currentDate = today;
      Logger.logFile = path.join(Logger.logDirectory, `${Logger.currentDate}.log`);
    }
  }

  static formatConsoleEntry(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toLocaleTimeString();
    const colorize = LEVEL_COLORS[entry.level] ?? ((text: string) => text);
    const level = colorize(entry.level.padEnd(5));
    const context = entry.context ? chalk.gray(` ${JSON.stringify(entry.context)}`) : '';
    const duration = entry.duration !== undefined ? ` (${entry.duration}ms)` : '';
    return `[${timestamp}] [${level}] ${entry.message}${duration}${context}`;
  }

  private static writeLog(entry: LogEntry): void {
    const consoleOutput = Logger.formatConsoleEntry(entry);
    if (entry.level === 'ERROR') {
      console.error(consoleOutput);
    } else if (entry.level === 'WARN') {
      console.warn(consoleOutput);
    } else {
      console.log(consoleOutput);
    }

    if (!Logger.fileOutput) {
      return;
    }

    try {
      Logger.ensureLogDirectory();
      Logger.checkLogRotation();
      fs.appendFileSync(Logger.logFile, JSON.stringify(entry) + '\n');
    } catch (error) {
      // Keep running without the file sink
      Logger.fileOutput = false;
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`Log file ${Logger.logFile} is not writable, file logging disabled: ${reason}`);
    }
  }

  private static generateTraceId(): string {
    return `trace-${Date.now()}-${++Logger.traceIdCounter}`;
  }

  private static createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    traceId?: string,
    duration?: number,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
    };

    if (context) {
      entry.context = context;
    }

    if (traceId) {
      entry.traceId = traceId;
    }

    if (duration !== undefined) {
      entry.duration = duration;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  static info(message: string, context?: Record<string, unknown>): void {
    if (Logger.currentLogLevel <= LogLevel.INFO) {
      Logger.writeLog(Logger.createEntry(LogLevel.INFO, message, context));
    }
  }

  static warn(message: string, context?: Record<string, unknown>): void {
    if (Logger.currentLogLevel <= LogLevel.WARN) {
      Logger.writeLog(Logger.createEntry(LogLevel.WARN, message, context));
    }
  }

  static error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (Logger.currentLogLevel <= LogLevel.ERROR) {
      Logger.writeLog(Logger.createEntry(LogLevel.ERROR, message, context, error));
    }
  }

  static debug(message: string, context?: Record<string, unknown>): void {
    if (Logger.currentLogLevel <= LogLevel.DEBUG) {
      Logger.writeLog(Logger.createEntry(LogLevel.DEBUG, message, context));
    }
  }

  /**
   * Start tracking an operation and return its trace ID
   */
  static startOperation(label: string): string {
    const traceId = Logger.generateTraceId();
    Logger.operationStack.set(traceId, { startTime: Date.now(), label });
    Logger.debug(`Operation started: ${label}`, { traceId });
    return traceId;
  }

  static endOperation(traceId: string, success: boolean = true, context?: Record<string, unknown>): void {
    const operation = Logger.operationStack.get(traceId);
    if (!operation) {
      return;
    }
    const duration = Date.now() - operation.startTime;
    const level = success ? LogLevel.DEBUG : LogLevel.WARN;
    if (Logger.currentLogLevel <= level) {
      Logger.writeLog(
        Logger.createEntry(
          level,
          `Operation completed: ${operation.label}`,
          { ...context, success },
          undefined,
          traceId,
          duration,
        ),
      );
    }
    Logger.operationStack.delete(traceId);
  }

  static setLogLevel(level: LogLevel): void {
    Logger.currentLogLevel = level;
  }

  static getLogLevel(): LogLevel {
    return Logger.currentLogLevel;
  }

  static activeOperations(): number {
    return Logger.operationStack.size;
  }
}
