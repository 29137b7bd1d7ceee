import axios, { AxiosError } from 'axios';
import { ZodError } from 'zod';
import { Logger } from './logger';

/**
 * Centralized error handling and categorization
 * Provides consistent error types and logging across API, store and sync layers
 */

export enum ErrorType {
  // HTTP Client Errors (4xx)
  BadRequest = 'BadRequest',
  AuthExpired = 'AuthExpired',
  Forbidden = 'Forbidden',
  NotFound = 'NotFound',
  FatalApiError = 'FatalApiError',

  // Rate Limiting (429)
  RateLimit = 'RateLimit',

  // HTTP Server Errors (5xx)
  InternalServerError = 'InternalServerError',
  BadGateway = 'BadGateway',
  ServiceUnavailable = 'ServiceUnavailable',
  GatewayTimeout = 'GatewayTimeout',

  // Network Errors
  NetworkError = 'NetworkError',
  Timeout = 'Timeout',

  // Application Errors
  MalformedData = 'MalformedData',
  ValidationError = 'ValidationError',
  ConfigurationError = 'ConfigurationError',
  PersistenceError = 'PersistenceError',

  Unknown = 'Unknown',
}

export interface ErrorContext {
  operation: string;
  resource?: string;
  details?: Record<string, unknown>;
}

/**
 * Base application error with type and context information
 */
export class AppError extends Error {
  constructor(
    public type: ErrorType,
    message: string,
    public statusCode?: number,
    public originalError?: unknown,
    public context?: ErrorContext,
    public retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, AppError.prototype);
  }

  /**
   * Temporary failures that may succeed on retry
   */
  isRetryable(): boolean {
    return [
      ErrorType.RateLimit,
      ErrorType.InternalServerError,
      ErrorType.BadGateway,
      ErrorType.ServiceUnavailable,
      ErrorType.GatewayTimeout,
      ErrorType.Timeout,
      ErrorType.NetworkError,
    ].includes(this.type);
  }

  getUserMessage(): string {
    const contextStr = this.context ? ` (${this.context.operation})` : '';

    switch (this.type) {
      case ErrorType.RateLimit:
        return `Rate limit exceeded. Please try again later.${contextStr}`;
      case ErrorType.AuthExpired:
        return `Spotify session expired. Run "release-week auth" to sign in again.${contextStr}`;
      case ErrorType.Forbidden:
        return `Access denied. Check the granted scopes.${contextStr}`;
      case ErrorType.NotFound:
        return `Resource not found.${contextStr}`;
      case ErrorType.ValidationError:
        return `Invalid input. ${this.message}${contextStr}`;
      case ErrorType.ConfigurationError:
        return `Configuration error. ${this.message}`;
      case ErrorType.NetworkError:
        return `Network error. Please check your connection.${contextStr}`;
      case ErrorType.Timeout:
        return `Request timed out. Please try again.${contextStr}`;
      case ErrorType.InternalServerError:
      case ErrorType.BadGateway:
      case ErrorType.ServiceUnavailable:
      case ErrorType.GatewayTimeout:
        return `Service temporarily unavailable. Please try again later.${contextStr}`;
      case ErrorType.PersistenceError:
        return `Could not write the local cache. ${this.message}${contextStr}`;
      default:
        return `Error: ${this.message}${contextStr}`;
    }
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      statusCode: this.statusCode,
      retryAfterMs: this.retryAfterMs,
      context: this.context,
      isRetryable: this.isRetryable(),
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Raised by the sync engine after it has marked the update state failed
 */
export class SyncError extends AppError {
  constructor(
    public readonly kind: string,
    public readonly stage: string,
    public readonly reason: AppError,
  ) {
    super(
      reason.type,
      `${kind} sync stopped at ${stage}: ${reason.message}`,
      reason.statusCode,
      reason,
      { operation: `sync ${kind}`, details: { stage } },
      reason.retryAfterMs,
    );
    this.name = 'SyncError';
    Object.setPrototypeOf(this, SyncError.prototype);
  }

  getUserMessage(): string {
    return `${this.reason.getUserMessage()}\nStopped at ${this.stage}. Run the same command again to resume.`;
  }
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
    return value * 1000;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

function apiMessage(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) {
    return typeof data === 'string' && data.length > 0 ? data : undefined;
  }
  if ('error_description' in data && typeof data.error_description === 'string') {
    return data.error_description;
  }
  if ('error' in data) {
    const inner = data.error;
    if (typeof inner === 'string') {
      return inner;
    }
    if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
      return inner.message;
    }
  }
  if ('message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return undefined;
}

/**
 * Error handler utility for consistent error processing
 */
export class ErrorHandler {
  /**
   * Parse and categorize an error into AppError
   * Handles Axios errors, zod errors, generic Error objects, and unknown types
   */
  static parse(error: unknown, context: ErrorContext): AppError {
    if (error instanceof AppError) {
      if (error.context) {
        return error;
      }
      return new AppError(error.type, error.message, error.statusCode, error.originalError, context, error.retryAfterMs);
    }

    if (axios.isAxiosError(error)) {
      return this.parseAxiosError(error, context);
    }

    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return new AppError(
        ErrorType.MalformedData,
        `Unexpected response shape${where}: ${issue?.message ?? error.message}`,
        undefined,
        error,
        context,
      );
    }

    if (error instanceof Error) {
      return this.parseStandardError(error, context);
    }

    return new AppError(ErrorType.Unknown, String(error), undefined, error, context);
  }

  private static parseAxiosError(error: AxiosError, context: ErrorContext): AppError {
    const status = error.response?.status;
    const errorMsg = apiMessage(error.response?.data) || error.message;

    let type: ErrorType;
    switch (status) {
      case 400:
        type = ErrorType.BadRequest;
        break;
      case 401:
        type = ErrorType.AuthExpired;
        break;
      case 403:
        type = ErrorType.Forbidden;
        break;
      case 404:
        type = ErrorType.NotFound;
        break;
      case 429:
        type = ErrorType.RateLimit;
        break;
      case 500:
        type = ErrorType.InternalServerError;
        break;
      case 502:
        type = ErrorType.BadGateway;
        break;
      case 503:
        type = ErrorType.ServiceUnavailable;
        break;
      case 504:
        type = ErrorType.GatewayTimeout;
        break;
      case undefined:
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.message.includes('timeout')) {
          type = ErrorType.Timeout;
        } else {
          type = ErrorType.NetworkError;
        }
        break;
      default:
        type = status >= 500 ? ErrorType.InternalServerError : ErrorType.FatalApiError;
    }

    const retryAfterMs = status === 429 ? parseRetryAfter(error.response?.headers?.['retry-after']) : undefined;

    return new AppError(
      type,
      status !== undefined ? `HTTP ${status}: ${errorMsg}` : errorMsg,
      status,
      error,
      context,
      retryAfterMs,
    );
  }

  /**
   * Look for common patterns in plain error messages
   */
  private static parseStandardError(error: Error, context: ErrorContext): AppError {
    const msg = error.message.toLowerCase();

    let type: ErrorType = ErrorType.Unknown;

    if (msg.includes('timeout')) {
      type = ErrorType.Timeout;
    } else if (msg.includes('network') || msg.includes('econnrefused') || msg.includes('econnreset')) {
      type = ErrorType.NetworkError;
    } else if (msg.includes('sqlite') || msg.includes('database')) {
      type = ErrorType.PersistenceError;
    }

    return new AppError(type, error.message, undefined, error, context);
  }

  static log(error: AppError, severity: 'error' | 'warn' | 'info' = 'error'): void {
    const baseMsg = `[${error.context?.operation || 'unknown'}] ${error.message}`;
    const details = { type: error.type, ...error.context?.details };

    if (severity === 'error') {
      Logger.error(baseMsg, undefined, details);
    } else if (severity === 'warn') {
      Logger.warn(baseMsg, details);
    } else {
      Logger.info(baseMsg, details);
    }
  }

  /**
   * Run a function and rethrow whatever it raises as a logged AppError
   */
  static async wrapAsync<T>(fn: () => Promise<T>, context: ErrorContext): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const appError = this.parse(error, context);
      this.log(appError, appError.isRetryable() ? 'warn' : 'error');
      throw appError;
    }
  }
}
