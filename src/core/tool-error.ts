/**
 * ToolError: structured error class for tool handlers.
 *
 * Handlers throw ToolError (or one of its subclasses) to produce a
 * structured error response with a specific error code. The executor
 * discriminates ToolError from other throws: ToolError → structured error
 * response, anything else → generic INTERNAL_ERROR (no internals leaked).
 */

import type { ErrorCodeValue, ErrorPayload } from '../types/errors.js';
import { ERROR_RETRIABLE_DEFAULTS, ErrorCode } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Private symbol used to brand ToolError instances, so plain objects with
 * matching fields are not mistaken for one.
 */
const TOOL_ERROR_BRAND = Symbol.for('docs-bridge.ToolError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Options for constructing a ToolError. */
export interface ToolErrorOptions {
  /** Machine-readable error code. */
  code: ErrorCodeValue;
  /** Human-readable explanation. */
  message: string;
  /** Whether the same request might succeed if retried. Defaults to ERROR_RETRIABLE_DEFAULTS. */
  retriable?: boolean;
  /** Which argument field caused the error. */
  field?: string;
}

// ---------------------------------------------------------------------------
// ToolError class
// ---------------------------------------------------------------------------

export class ToolError extends Error {
  readonly code: ErrorCodeValue;
  readonly retriable: boolean;
  readonly field?: string;

  /** @internal */
  readonly [TOOL_ERROR_BRAND] = true as const;

  constructor(options: ToolErrorOptions) {
    super(options.message);
    this.name = 'ToolError';
    this.code = options.code;
    this.retriable = options.retriable ?? ERROR_RETRIABLE_DEFAULTS[this.code];

    if (options.field !== undefined) {
      this.field = options.field;
    }
  }

  /**
   * Convert to a sanitized ErrorPayload suitable for the response.
   * No stack traces or internal details are included.
   */
  toErrorPayload(): ErrorPayload {
    const payload: ErrorPayload = {
      code: this.code,
      message: this.message,
      retriable: this.retriable,
    };

    if (this.field !== undefined) {
      payload.field = this.field;
    }

    return payload;
  }
}

// ---------------------------------------------------------------------------
// Taxonomy
// ---------------------------------------------------------------------------

/** The configured encryption key is malformed or has the wrong length. */
export class EncryptionConfigError extends ToolError {
  constructor(message: string) {
    super({ code: ErrorCode.ENCRYPTION_CONFIG, message });
    this.name = 'EncryptionConfigError';
  }
}

/** A library name produced no catalog search hits. */
export class LibraryNotFoundError extends ToolError {
  constructor(message = 'No matching libraries found.') {
    super({ code: ErrorCode.LIBRARY_NOT_FOUND, message });
    this.name = 'LibraryNotFoundError';
  }
}

/** A library id produced no documentation text. */
export class DocumentationNotFoundError extends ToolError {
  constructor(message = 'Documentation not found.') {
    super({ code: ErrorCode.DOCUMENTATION_NOT_FOUND, message });
    this.name = 'DocumentationNotFoundError';
  }
}

/** A request was rejected before any upstream call was made. */
export class ValidationError extends ToolError {
  constructor(message: string, field?: string) {
    super(
      field === undefined
        ? { code: ErrorCode.VALIDATION_FAILED, message }
        : { code: ErrorCode.VALIDATION_FAILED, message, field },
    );
    this.name = 'ValidationError';
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

/**
 * Type guard for ToolError instances, including ones created by another
 * copy of this module (checked through the brand symbol).
 */
export function isToolError(value: unknown): value is ToolError {
  if (value instanceof ToolError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    TOOL_ERROR_BRAND in value &&
    value[TOOL_ERROR_BRAND] === true
  );
}
