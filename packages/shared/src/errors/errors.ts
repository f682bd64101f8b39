import type { ValidationIssue } from '@einvoice-tw/contracts';

/**
 * Base error class for the SDK.
 * Every error the client raises is an SdkError.
 */
export class SdkError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SdkError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error thrown when a request fails local validation.
 * Raised before any network call.
 */
export class ValidationError extends SdkError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[], context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends SdkError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the HTTP call itself fails:
 * connection refused, DNS failure, abort, or a non-2xx status.
 */
export class TransportError extends SdkError {
  readonly status?: number;

  constructor(
    message: string,
    options: { cause?: unknown; status?: number; context?: Record<string, unknown> } = {},
  ) {
    const context = options.status !== undefined ? { ...options.context, status: options.status } : options.context;
    super(message, 'TRANSPORT_ERROR', context, { cause: options.cause });
    this.name = 'TransportError';
    if (options.status !== undefined) {
      this.status = options.status;
    }
  }
}

/**
 * Error reported by the vendor.
 * Code and message are passed through verbatim.
 */
export class ApiError extends SdkError {
  readonly vendorCode: string;
  readonly vendorMessage?: string;

  constructor(vendorCode: string, vendorMessage?: string) {
    super(
      `API Error: ${vendorCode}` + (vendorMessage ? ` - ${vendorMessage}` : ''),
      'API_ERROR',
      { vendorCode },
    );
    this.name = 'ApiError';
    this.vendorCode = vendorCode;
    if (vendorMessage !== undefined) {
      this.vendorMessage = vendorMessage;
    }
  }
}

/**
 * Type guard for SDK errors
 */
export function isSdkError(error: unknown): error is SdkError {
  return error instanceof SdkError;
}
