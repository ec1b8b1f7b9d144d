/**
 * Error Handling System
 *
 * Provides a standardized error handling system with dual-message format:
 * - userMessage: Friendly message for end users (no technical details)
 * - developerMessage: Technical details for debugging
 *
 * Per-file parse failures use the same error type; the model assembler turns
 * them into diagnostics instead of letting them escape.
 */

import { getLogger } from '../utils/logger.js';
import { sanitizePath } from '../utils/paths.js';

/**
 * Error codes for all mapper errors
 */
export enum ErrorCode {
  /** A single source file could not be processed */
  UNIT_PARSE_FAILED = 'UNIT_PARSE_FAILED',
  /** Input path does not exist */
  INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
  /** Input path exists but is not a directory */
  INPUT_NOT_DIRECTORY = 'INPUT_NOT_DIRECTORY',
  /** Insufficient permissions to access path */
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  /** Requested file does not exist */
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  /** Source file exceeds the configured size limit */
  FILE_TOO_LARGE = 'FILE_TOO_LARGE',
  /** Report file could not be written */
  REPORT_WRITE_FAILED = 'REPORT_WRITE_FAILED',
  /** Invalid glob pattern */
  INVALID_PATTERN = 'INVALID_PATTERN',
}

/**
 * Interface for mapper error structure
 */
export interface MapperErrorOptions {
  code: ErrorCode;
  userMessage: string;
  developerMessage: string;
  cause?: Error;
}

/**
 * Custom error class with dual messages
 *
 * Extends Error to provide:
 * - Separate user-friendly and developer messages
 * - Proper stack trace capture
 * - JSON serialization for CLI output
 */
export class MapperError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** User-friendly message (safe to display to end users) */
  readonly userMessage: string;

  /** Technical message with debugging details */
  readonly developerMessage: string;

  /** Original error that caused this error */
  readonly cause?: Error;

  constructor(options: MapperErrorOptions) {
    // Use developerMessage as the Error.message for logging
    super(options.developerMessage);

    this.code = options.code;
    this.userMessage = options.userMessage;
    this.developerMessage = options.developerMessage;
    this.cause = options.cause;

    // Set the prototype explicitly for proper instanceof checks
    Object.setPrototypeOf(this, MapperError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MapperError);
    }

    this.name = `MapperError[${this.code}]`;

    this.logCreation();
  }

  /**
   * Record the error at DEBUG level. Callers decide whether it is reported
   * any louder.
   */
  private logCreation(): void {
    const meta: Record<string, unknown> = { code: this.code };
    if (this.cause) {
      meta.cause = { name: this.cause.name, message: this.cause.message };
    }
    getLogger().debug('MapperError', this.developerMessage, meta);
  }

  /**
   * Convert error to JSON for CLI output
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      userMessage: this.userMessage,
      developerMessage: this.developerMessage,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }

  /**
   * Get a string representation suitable for logging
   */
  toString(): string {
    return `${this.name}: ${this.developerMessage}`;
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create a UNIT_PARSE_FAILED error
 *
 * @param file - Identifier of the source unit
 * @param detail - What went wrong
 * @param cause - Underlying error, if any
 */
export function unitParseFailed(file: string, detail: string, cause?: Error): MapperError {
  return new MapperError({
    code: ErrorCode.UNIT_PARSE_FAILED,
    userMessage: `The file ${file} could not be read as C# source and was skipped.`,
    developerMessage: `Failed to parse ${file}: ${detail}`,
    cause,
  });
}

/**
 * Create an INPUT_NOT_FOUND error
 *
 * @param inputPath - The input directory that does not exist
 */
export function inputNotFound(inputPath: string): MapperError {
  return new MapperError({
    code: ErrorCode.INPUT_NOT_FOUND,
    userMessage: 'The input directory does not exist. Please check the path and try again.',
    developerMessage: `Input path not found: ${sanitizePath(inputPath)}`,
  });
}

/**
 * Create an INPUT_NOT_DIRECTORY error
 *
 * @param inputPath - The input path that is not a directory
 */
export function inputNotDirectory(inputPath: string): MapperError {
  return new MapperError({
    code: ErrorCode.INPUT_NOT_DIRECTORY,
    userMessage: 'The input path is not a directory. Please pass the folder that contains your scripts.',
    developerMessage: `Input path is not a directory: ${sanitizePath(inputPath)}`,
  });
}

/**
 * Create a PERMISSION_DENIED error
 *
 * @param filePath - The path that could not be accessed
 */
export function permissionDenied(filePath: string): MapperError {
  return new MapperError({
    code: ErrorCode.PERMISSION_DENIED,
    userMessage:
      'Access denied. Please check that you have permission to access this location.',
    developerMessage: `Permission denied accessing path: ${sanitizePath(filePath)}`,
  });
}

/**
 * Create a FILE_NOT_FOUND error
 *
 * @param filePath - The path to the missing file
 */
export function fileNotFound(filePath: string): MapperError {
  return new MapperError({
    code: ErrorCode.FILE_NOT_FOUND,
    userMessage: 'The requested file could not be found.',
    developerMessage: `File not found: ${sanitizePath(filePath)}`,
  });
}

/**
 * Create a FILE_TOO_LARGE error
 *
 * @param filePath - The oversized file
 * @param size - Its size in bytes
 * @param limit - The configured limit in bytes
 */
export function fileTooLarge(filePath: string, size: number, limit: number): MapperError {
  return new MapperError({
    code: ErrorCode.FILE_TOO_LARGE,
    userMessage: `The file ${sanitizePath(filePath)} is larger than the configured limit and was skipped.`,
    developerMessage: `File ${sanitizePath(filePath)} is ${size} bytes, limit is ${limit} bytes`,
  });
}

/**
 * Create a REPORT_WRITE_FAILED error
 *
 * @param targetPath - The report file that could not be written
 * @param error - The underlying error
 */
export function reportWriteFailed(targetPath: string, error: Error): MapperError {
  return new MapperError({
    code: ErrorCode.REPORT_WRITE_FAILED,
    userMessage: 'Failed to write the interface map. Please check the output directory permissions.',
    developerMessage: `Failed to write report ${sanitizePath(targetPath)}: ${error.message}`,
    cause: error,
  });
}

/**
 * Create an INVALID_PATTERN error
 *
 * @param pattern - The invalid pattern
 * @param errorDetail - Description of what's wrong with the pattern
 */
export function invalidPattern(pattern: string, errorDetail: string): MapperError {
  return new MapperError({
    code: ErrorCode.INVALID_PATTERN,
    userMessage: `The file pattern is invalid. Please check the syntax and try again.`,
    developerMessage: `Invalid pattern "${pattern}": ${errorDetail}`,
  });
}

// ============================================================================
// Type Guards and Utilities
// ============================================================================

/**
 * Type guard to check if an error is a MapperError
 */
export function isMapperError(error: unknown): error is MapperError {
  return error instanceof MapperError;
}

/**
 * The `code` of a Node.js system error (`ENOENT`, `EACCES`, ...), if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Wrap an unknown error as a MapperError if it isn't already
 *
 * @param error - The error to wrap
 * @param defaultCode - Error code to use if wrapping a non-MapperError
 * @param context - Additional context for the error message
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = ErrorCode.UNIT_PARSE_FAILED,
  context: string = 'An unexpected error occurred'
): MapperError {
  if (isMapperError(error)) {
    return error;
  }

  const originalError =
    error instanceof Error ? error : new Error(String(error));

  return new MapperError({
    code: defaultCode,
    userMessage: 'An unexpected error occurred. Please try again.',
    developerMessage: `${context}: ${originalError.message}`,
    cause: originalError,
  });
}
