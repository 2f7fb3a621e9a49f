/**
 * Error hierarchy for picklesmith
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  setting?: string; // Option name the error refers to (e.g., 'minOpcodes')
  value?: unknown; // Problematic value
  valueExcerpt?: string; // Printable excerpt of value
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all picklesmith errors
 */
export abstract class PicklesmithError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Configuration and setup errors (bad version, counts, mutator names, config files)
 */
export class ConfigError extends PicklesmithError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Fatal conditions raised while a generation pass runs
 */
export class GenerationError extends PicklesmithError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.GENERATION_FAILED,
    });
  }
}

/**
 * Failures persisting generated samples
 */
export class OutputError extends PicklesmithError {
  constructor(params: ErrorParams & { path?: string }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.OUTPUT_WRITE_FAILED,
      context: { ...params.context, path: params.path },
    });
  }

  get path(): string | undefined {
    const p = this.context?.path;
    return typeof p === 'string' ? p : undefined;
  }
}

/**
 * Broken internal invariants (a handle missing from the heap, and the like)
 */
export class InternalError extends PicklesmithError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INTERNAL_ERROR,
    });
  }
}

export function isPicklesmithError(error: unknown): error is PicklesmithError {
  return error instanceof PicklesmithError;
}
