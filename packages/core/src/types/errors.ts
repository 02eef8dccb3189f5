/**
 * Error hierarchy for varimodel
 * Provides structured error handling with stable codes and context
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
  schemaPath?: string; // Definition-qualified path (e.g. 'PodSpec/properties/containers')
  keyPath?: string; // Configuration key path (e.g. 'spec.containers[0].name')
  featureId?: string;
  ref?: string;
  documentId?: string;
  file?: string;
  value?: unknown; // Problematic value (may contain secrets)
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

export interface VarimodelErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'data',
  'stringData',
]);

/**
 * Base error class for all varimodel errors
 */
export abstract class VarimodelError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: VarimodelErrorParams) {
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
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts secret-bearing keys in context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
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

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;

    const redactValue = (val: unknown): unknown => {
      if (val && typeof val === 'object') {
        if (Array.isArray(val)) return val.map(redactValue);
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v);
        }
        return out;
      }
      return val;
    };

    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * Schema-related errors: unresolved references and unsupported vocabulary.
 * Recoverable; the resolver records them as warnings and degrades the branch.
 */
export class SchemaError extends VarimodelError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context: ErrorContext & { schemaPath: string };
    severity?: Severity;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_SCHEMA_DOCUMENT,
      context: params.context,
      severity: params.severity ?? 'warn',
      cause: params.cause,
    });
  }

  get schemaPath(): string | undefined {
    return this.context?.schemaPath;
  }
}

/**
 * Key mapping errors: ambiguous key paths and malformed mapping tables
 */
export class MappingError extends VarimodelError {
  public readonly conflicts: string[];

  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    conflicts?: string[];
    context?: ErrorContext;
    severity?: Severity;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.AMBIGUOUS_KEY_PATH,
      context: params.context,
      severity: params.severity,
      cause: params.cause,
    });
    this.conflicts = params.conflicts ?? [];
  }
}

/**
 * A configuration violated the model. This is an expected outcome and is
 * normally reported structurally; the error form exists for callers that
 * want to fail fast on an invalid selection.
 */
export class ValidationError extends VarimodelError {
  public readonly violations: string[];

  constructor(params: {
    message: string;
    violations: string[];
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONSTRAINT_VIOLATION,
      context: params.context,
      severity: 'info',
      cause: params.cause,
    });
    this.violations = params.violations;
  }
}

/**
 * Aborts the current unit of work (one schema load or one document),
 * never the whole batch.
 */
export class FatalError extends VarimodelError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INTERNAL_ERROR,
      context: params.context,
      severity: 'error',
      cause: params.cause,
    });
  }
}

/**
 * Configuration errors (invalid options, incompatible settings)
 */
export class ConfigError extends VarimodelError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { setting?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

export function isVarimodelError(error: unknown): error is VarimodelError {
  return error instanceof VarimodelError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
