/**
 * Error Classes for LS3 Export and Import
 *
 * Tagged error classes in the same shape for every failure kind, plus a
 * factory so call sites never construct them by hand.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base LS3 Error Class
 */
export abstract class BaseLs3Error extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Invalid `extras.zusi` metadata on a scene object.
 */
export class Ls3SchemaError extends BaseLs3Error {
  readonly _tag = 'Ls3SchemaError' as const;
  readonly code = ERROR_CODES.SCHEMA_VALIDATION_ERROR;
  readonly path: string;
  readonly zodError?: ZodError;

  constructor(message: string, path: string, zodError?: ZodError) {
    super(message, { path, issues: zodError?.issues });
    this.path = path;
    this.zodError = zodError;
  }

  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues ?? [];
  }

  getFormattedErrors(): string[] {
    return this.getValidationIssues().map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    );
  }
}

/**
 * Configuration Error
 *
 * Raised for invalid tolerances or scope selectors before anything is written.
 */
export class Ls3ConfigError extends BaseLs3Error {
  readonly _tag = 'Ls3ConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * Conversion Error
 */
export class Ls3ConversionError extends BaseLs3Error {
  readonly _tag = 'Ls3ConversionError' as const;
  readonly code = ERROR_CODES.CONVERSION_ERROR;
  readonly stage: string;

  constructor(message: string, stage: string, context?: Record<string, unknown>) {
    super(message, { stage, ...context });
    this.stage = stage;
  }
}

/**
 * File System Error
 */
export class Ls3FileSystemError extends BaseLs3Error {
  readonly _tag = 'Ls3FileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * A resource the current operation cannot do without is missing.
 */
export class Ls3MissingResourceError extends BaseLs3Error {
  readonly _tag = 'Ls3MissingResourceError' as const;
  readonly code = ERROR_CODES.MISSING_RESOURCE_ERROR;
  readonly resourcePath: string;

  constructor(message: string, resourcePath: string, context?: Record<string, unknown>) {
    super(message, { resourcePath, ...context });
    this.resourcePath = resourcePath;
  }
}

/**
 * Declared record counts do not fit the binary stream.
 */
export class Ls3MalformedRecordError extends BaseLs3Error {
  readonly _tag = 'Ls3MalformedRecordError' as const;
  readonly code = ERROR_CODES.MALFORMED_RECORD_ERROR;
  readonly expectedBytes: number;
  readonly availableBytes: number;

  constructor(message: string, expectedBytes: number, availableBytes: number, context?: Record<string, unknown>) {
    super(message, { expectedBytes, availableBytes, ...context });
    this.expectedBytes = expectedBytes;
    this.availableBytes = availableBytes;
  }
}

/**
 * Union type for all LS3 errors
 */
export type Ls3Error =
  | Ls3SchemaError
  | Ls3ConfigError
  | Ls3ConversionError
  | Ls3FileSystemError
  | Ls3MissingResourceError
  | Ls3MalformedRecordError;

export function isLs3Error(error: unknown): error is Ls3Error {
  return error instanceof BaseLs3Error;
}

/**
 * Error factory functions
 */
export const Ls3ErrorFactory = {
  schemaError(message: string, path: string, zodError?: ZodError): Ls3SchemaError {
    return new Ls3SchemaError(message, path, zodError);
  },

  configError(message: string, configKey: string, context?: Record<string, unknown>): Ls3ConfigError {
    return new Ls3ConfigError(message, configKey, context);
  },

  conversionError(message: string, stage: string, context?: Record<string, unknown>): Ls3ConversionError {
    return new Ls3ConversionError(message, stage, context);
  },

  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): Ls3FileSystemError {
    return new Ls3FileSystemError(message, filePath, operation, context);
  },

  missingResource(message: string, resourcePath: string, context?: Record<string, unknown>): Ls3MissingResourceError {
    return new Ls3MissingResourceError(message, resourcePath, context);
  },

  malformedRecord(message: string, expectedBytes: number, availableBytes: number, context?: Record<string, unknown>): Ls3MalformedRecordError {
    return new Ls3MalformedRecordError(message, expectedBytes, availableBytes, context);
  },
};
