/**
 * Error codes and payloads for docs-bridge tool responses.
 *
 * Every failed tool call carries an {@link ErrorPayload} whose `code` is one
 * of {@link ErrorCode}. The HTTP surface maps codes to status codes via
 * {@link ERROR_HTTP_STATUS}. A catalog status other than 200 has no code:
 * the client absorbs it into an empty result.
 */

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

export const ErrorCode = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_REQUEST: 'INVALID_REQUEST',
  UNKNOWN_TOOL: 'UNKNOWN_TOOL',
  LIBRARY_NOT_FOUND: 'LIBRARY_NOT_FOUND',
  DOCUMENTATION_NOT_FOUND: 'DOCUMENTATION_NOT_FOUND',
  ENCRYPTION_CONFIG: 'ENCRYPTION_CONFIG',
  TOOL_TIMEOUT: 'TOOL_TIMEOUT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Whether a request failing with the given code may succeed on retry. */
export const ERROR_RETRIABLE_DEFAULTS: Readonly<Record<ErrorCodeValue, boolean>> = {
  VALIDATION_FAILED: false,
  INVALID_REQUEST: false,
  UNKNOWN_TOOL: false,
  LIBRARY_NOT_FOUND: false,
  DOCUMENTATION_NOT_FOUND: false,
  ENCRYPTION_CONFIG: false,
  TOOL_TIMEOUT: true,
  INTERNAL_ERROR: false,
};

/** HTTP status returned by the tool server for each error code. */
export const ERROR_HTTP_STATUS: Readonly<Record<ErrorCodeValue, number>> = {
  VALIDATION_FAILED: 400,
  INVALID_REQUEST: 400,
  UNKNOWN_TOOL: 404,
  LIBRARY_NOT_FOUND: 404,
  DOCUMENTATION_NOT_FOUND: 404,
  ENCRYPTION_CONFIG: 500,
  TOOL_TIMEOUT: 504,
  INTERNAL_ERROR: 500,
};

// ---------------------------------------------------------------------------
// ErrorPayload
// ---------------------------------------------------------------------------

/** Structured error carried in a {@link ToolResponse}. */
export interface ErrorPayload {
  code: ErrorCodeValue;
  message: string;
  retriable: boolean;
  /** Which argument field caused the error. */
  field?: string;
}
