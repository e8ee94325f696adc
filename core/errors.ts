/**
 * Error handling module for archive analytics
 * Defines error types, codes, and classification logic
 */

/**
 * Standard error codes
 */
export enum ErrorCode {
  // Archive Errors
  MISSING_ARCHIVE = "MISSING_ARCHIVE",
  MALFORMED_RECORD = "MALFORMED_RECORD",
  SNAPSHOT_MISMATCH = "SNAPSHOT_MISMATCH",
  INVALID_SNAPSHOT = "INVALID_SNAPSHOT",

  // Network Errors
  NETWORK_ERROR = "NETWORK_ERROR",
  TIMEOUT = "TIMEOUT",

  // Data Service Errors
  AUTH_FAILED = "AUTH_FAILED",
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",
  API_ERROR = "API_ERROR",
  INVALID_RESPONSE = "INVALID_RESPONSE",
  NOT_FOUND = "NOT_FOUND",
  SERVER_ERROR = "SERVER_ERROR",

  // System Errors
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_SYSTEM_ERROR = "FILE_SYSTEM_ERROR",
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  path?: string;
  file?: string;
  username?: string;
  operation?: string;
  statusCode?: number;
  [key: string]: unknown;
}

interface AnalyticsErrorOptions {
  retryable?: boolean;
  context?: ErrorContext;
  originalError?: Error;
  statusCode?: number;
}

/**
 * Base error for everything the toolkit raises on purpose
 */
export class AnalyticsError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;
  public readonly statusCode?: number;

  constructor(code: ErrorCode, message: string, options: AnalyticsErrorOptions = {}) {
    super(message);
    this.name = "AnalyticsError";
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = options.context || {};
    this.timestamp = new Date();
    this.originalError = options.originalError;
    this.statusCode = options.statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Get a user-friendly error message
   */
  public getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.RATE_LIMIT_EXCEEDED:
        return "Data service rate limit exceeded. Try again later.";
      case ErrorCode.AUTH_FAILED:
        return "Data service rejected the credentials. Check DATA_SERVICE_COOKIES.";
      case ErrorCode.NETWORK_ERROR:
        return `Could not reach the data service: ${this.message}`;
      case ErrorCode.TIMEOUT:
        return "Data service request timed out.";
      default:
        return this.message;
    }
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
            stack: this.originalError.stack,
          }
        : undefined,
    };
  }

  /**
   * Create AnalyticsError from an HTTP response status
   */
  public static fromHttpResponse(
    response: { status: number; statusText?: string },
    context?: ErrorContext
  ): AnalyticsError {
    const statusCode = response.status;
    const statusText = response.statusText || String(statusCode);

    if (statusCode === 429) {
      return new AnalyticsError(ErrorCode.RATE_LIMIT_EXCEEDED, `Rate limit exceeded: ${statusText}`, {
        retryable: true,
        statusCode,
        context,
      });
    }

    if (statusCode === 401 || statusCode === 403) {
      return new AnalyticsError(ErrorCode.AUTH_FAILED, `Authentication failed: ${statusText}`, {
        statusCode,
        context,
      });
    }

    if (statusCode === 404) {
      return new AnalyticsError(ErrorCode.NOT_FOUND, `Not found: ${statusText}`, {
        statusCode,
        context,
      });
    }

    if (statusCode >= 500) {
      return new AnalyticsError(ErrorCode.SERVER_ERROR, `Server error: ${statusText}`, {
        retryable: true,
        statusCode,
        context,
      });
    }

    return new AnalyticsError(ErrorCode.API_ERROR, `HTTP ${statusCode}: ${statusText}`, {
      statusCode,
      context,
    });
  }
}

/**
 * The archive root or its `data` subdirectory does not exist
 */
export class MissingArchiveError extends AnalyticsError {
  public readonly expectedPath: string;

  constructor(expectedPath: string, originalError?: Error) {
    super(ErrorCode.MISSING_ARCHIVE, `Archive data directory not found: ${expectedPath}`, {
      context: { path: expectedPath },
      originalError,
    });
    this.name = "MissingArchiveError";
    this.expectedPath = expectedPath;
  }

  public getUserMessage(): string {
    return `No Twitter archive found: expected a "data" directory at ${this.expectedPath}`;
  }
}

/**
 * An export file exists but its payload is not a JSON array.
 * Recoverable: the file is skipped.
 */
export class MalformedRecordError extends AnalyticsError {
  public readonly file: string;

  constructor(file: string, reason: string, originalError?: Error) {
    super(ErrorCode.MALFORMED_RECORD, `Malformed archive file ${file}: ${reason}`, {
      context: { file },
      originalError,
    });
    this.name = "MalformedRecordError";
    this.file = file;
  }
}

/**
 * Two snapshots handed to the growth comparator belong to different accounts
 */
export class SnapshotMismatchError extends AnalyticsError {
  public readonly oldAccountId?: string;
  public readonly newAccountId?: string;

  constructor(oldAccountId: string | undefined, newAccountId: string | undefined) {
    super(
      ErrorCode.SNAPSHOT_MISMATCH,
      `Cannot compare snapshots of different accounts: ${oldAccountId ?? "<unknown>"} vs ${newAccountId ?? "<unknown>"}`,
      { context: { oldAccountId, newAccountId } }
    );
    this.name = "SnapshotMismatchError";
    this.oldAccountId = oldAccountId;
    this.newAccountId = newAccountId;
  }
}

/**
 * Configuration file or environment failed validation
 */
export class ConfigError extends AnalyticsError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: ErrorContext) {
    super(ErrorCode.CONFIG_ERROR, message, { context });
    this.name = "ConfigError";
    this.issues = issues;
  }

  public getUserMessage(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    return `${this.message}\n${this.issues.map((issue) => `  - ${issue}`).join("\n")}`;
  }
}

/**
 * Factory for creating common errors
 */
export const AnalyticsErrors = {
  invalidConfiguration: (message: string, issues: string[] = [], context?: ErrorContext) =>
    new ConfigError(message, issues, context),

  invalidSnapshot: (message: string, context?: ErrorContext) =>
    new AnalyticsError(ErrorCode.INVALID_SNAPSHOT, message, { context }),

  invalidResponse: (message: string, context?: ErrorContext) =>
    new AnalyticsError(ErrorCode.INVALID_RESPONSE, message, { context }),

  userNotFound: (username: string, context?: ErrorContext) =>
    new AnalyticsError(ErrorCode.NOT_FOUND, `User not found: ${username}`, {
      context: { ...context, username },
    }),

  networkError: (message: string, context?: ErrorContext, originalError?: Error) =>
    new AnalyticsError(ErrorCode.NETWORK_ERROR, message, {
      retryable: true,
      context,
      originalError,
    }),

  timeout: (message: string, context?: ErrorContext, originalError?: Error) =>
    new AnalyticsError(ErrorCode.TIMEOUT, message, {
      retryable: true,
      context,
      originalError,
    }),

  fileSystem: (message: string, context?: ErrorContext, originalError?: Error) =>
    new AnalyticsError(ErrorCode.FILE_SYSTEM_ERROR, message, { context, originalError }),
};

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Utility to classify unknown errors
 */
export class ErrorClassifier {
  /**
   * Classify an unknown error into an AnalyticsError
   */
  public static classify(error: unknown, context?: ErrorContext): AnalyticsError {
    if (error instanceof AnalyticsError) {
      if (context) {
        Object.assign(error.context, context);
      }
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const originalError = error instanceof Error ? error : undefined;
    const lowerMessage = message.toLowerCase();
    const code = errnoCode(error);

    if (code === "ENOENT" || code === "EACCES" || code === "EISDIR" || code === "ENOTDIR") {
      return AnalyticsErrors.fileSystem(message, context, originalError);
    }

    if (code === "ECONNABORTED" || lowerMessage.includes("timeout") || lowerMessage.includes("timed out")) {
      return AnalyticsErrors.timeout(message, context, originalError);
    }

    if (
      code === "ECONNREFUSED" ||
      code === "ENOTFOUND" ||
      code === "ECONNRESET" ||
      lowerMessage.includes("network") ||
      lowerMessage.includes("socket hang up")
    ) {
      return AnalyticsErrors.networkError(message, context, originalError);
    }

    if (lowerMessage.includes("rate limit") || lowerMessage.includes("too many requests")) {
      return new AnalyticsError(ErrorCode.RATE_LIMIT_EXCEEDED, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    return new AnalyticsError(ErrorCode.UNKNOWN_ERROR, message, { context, originalError });
  }

  public static isNetworkError(error: unknown): boolean {
    const classified = this.classify(error);
    return classified.code === ErrorCode.NETWORK_ERROR || classified.code === ErrorCode.TIMEOUT;
  }
}
