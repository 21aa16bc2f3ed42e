/**
 * Custom Error Classes for Scaling Operations
 *
 * Tagged union error hierarchy with Zod validation details where relevant.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base Scaler Error Class
 *
 * Base error class for all scaling operations with tagged union pattern.
 */
export abstract class BaseScalerError extends Error {
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
 * Malformed Input Error
 *
 * Raised when a source file cannot be parsed. Carries the 1-based
 * line and column of the offending region.
 */
export class MalformedInputError extends BaseScalerError {
  readonly _tag = 'MalformedInputError' as const;
  readonly code = ERROR_CODES.MALFORMED_INPUT_ERROR;
  readonly source: string;
  readonly line: number;
  readonly column: number;

  constructor(message: string, source: string, line: number, column: number) {
    super(`${source}:${line}:${column}: ${message}`, { source, line, column });
    this.source = source;
    this.line = line;
    this.column = column;
  }
}

/**
 * Unsupported Scale Factor Error
 */
export class UnsupportedScaleFactorError extends BaseScalerError {
  readonly _tag = 'UnsupportedScaleFactorError' as const;
  readonly code = ERROR_CODES.UNSUPPORTED_SCALE_FACTOR_ERROR;
  readonly scaleTag: string;

  constructor(message: string, scaleTag: string, context?: Record<string, unknown>) {
    super(message, { scaleTag, ...context });
    this.scaleTag = scaleTag;
  }
}

/**
 * Template Load Error
 *
 * Fatal at startup. Keeps the Zod error when the template failed schema validation.
 */
export class TemplateLoadError extends BaseScalerError {
  readonly _tag = 'TemplateLoadError' as const;
  readonly code = ERROR_CODES.TEMPLATE_LOAD_ERROR;
  readonly templatePath: string;
  readonly zodError?: ZodError;

  constructor(message: string, templatePath: string, zodError?: ZodError, context?: Record<string, unknown>) {
    super(message, { templatePath, ...context });
    this.templatePath = templatePath;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Referential Integrity Error
 *
 * An object file references a material that has no output for the same scale.
 */
export class ReferentialIntegrityError extends BaseScalerError {
  readonly _tag = 'ReferentialIntegrityError' as const;
  readonly code = ERROR_CODES.REFERENTIAL_INTEGRITY_ERROR;
  readonly objectFile: string;
  readonly reference: string;
  readonly scaleTag: string;

  constructor(message: string, objectFile: string, reference: string, scaleTag: string) {
    super(message, { objectFile, reference, scaleTag });
    this.objectFile = objectFile;
    this.reference = reference;
    this.scaleTag = scaleTag;
  }
}

/**
 * IO Write Error
 */
export class IOWriteError extends BaseScalerError {
  readonly _tag = 'IOWriteError' as const;
  readonly code = ERROR_CODES.IO_WRITE_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Scaler Configuration Error
 */
export class ScalerConfigError extends BaseScalerError {
  readonly _tag = 'ScalerConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;
  readonly zodError?: ZodError;

  constructor(message: string, configKey: string, zodError?: ZodError) {
    super(message, { configKey });
    this.configKey = configKey;
    this.zodError = zodError;
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Union type for all scaler errors
 */
export type ScalerError =
  | MalformedInputError
  | UnsupportedScaleFactorError
  | TemplateLoadError
  | ReferentialIntegrityError
  | IOWriteError
  | ScalerConfigError;

/**
 * Narrow an unknown value to one of the scaler errors
 */
export function isScalerError(error: unknown): error is ScalerError {
  return error instanceof BaseScalerError;
}

/**
 * Message of any thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error factory functions
 */
export const ScalerErrorFactory = {
  malformedInput(message: string, source: string, line: number, column: number): MalformedInputError {
    return new MalformedInputError(message, source, line, column);
  },

  unsupportedScaleFactor(message: string, scaleTag: string, context?: Record<string, unknown>): UnsupportedScaleFactorError {
    return new UnsupportedScaleFactorError(message, scaleTag, context);
  },

  templateLoad(message: string, templatePath: string, zodError?: ZodError, context?: Record<string, unknown>): TemplateLoadError {
    return new TemplateLoadError(message, templatePath, zodError, context);
  },

  referentialIntegrity(message: string, objectFile: string, reference: string, scaleTag: string): ReferentialIntegrityError {
    return new ReferentialIntegrityError(message, objectFile, reference, scaleTag);
  },

  /**
   * Wrap a file system failure, keeping the errno code when there is one
   */
  ioWrite(message: string, filePath: string, operation: string, cause?: unknown): IOWriteError {
    const errno = cause instanceof Error && 'code' in cause ? String(cause.code) : undefined;
    return new IOWriteError(message, filePath, operation, errno ? { errno } : undefined);
  },

  configError(message: string, configKey: string, zodError?: ZodError): ScalerConfigError {
    return new ScalerConfigError(message, configKey, zodError);
  },
};
