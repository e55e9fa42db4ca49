/**
 * Error discrimination and tool execution for docs-bridge.
 *
 * Wraps tool handler invocations with:
 * - Catalog lookup (→ UNKNOWN_TOOL)
 * - Argument schema validation (→ VALIDATION_FAILED)
 * - Timeout enforcement (→ TOOL_TIMEOUT)
 * - ToolError discrimination (→ structured error response)
 * - Generic error catch-all (→ INTERNAL_ERROR, no internals leaked)
 */

import type { ToolRequest, ToolResponse } from '../types/protocol.js';
import type { ErrorPayload } from '../types/errors.js';
import { ErrorCode, ERROR_RETRIABLE_DEFAULTS } from '../types/errors.js';
import type { ToolCatalog } from './tool-catalog.js';
import type { SchemaValidator } from './schema-validator.js';
import { isToolError } from './tool-error.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Options controlling handler execution behavior. */
export interface ExecutionOptions {
  /** Maximum time in milliseconds before TOOL_TIMEOUT. Default 120_000. */
  timeoutMs: number;
}

export const DEFAULT_EXECUTION_OPTIONS: Readonly<ExecutionOptions> = {
  timeoutMs: 120_000,
};

export interface ExecutorDeps {
  catalog: ToolCatalog;
  validator: SchemaValidator;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Timeout helper
// ---------------------------------------------------------------------------

class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`Handler for "${label}" timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function failure(error: ErrorPayload): ToolResponse {
  return { result: null, error };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Execute a tool request with full error discrimination. Never throws.
 *
 * Flow:
 * 1. Resolve the tool in the catalog
 * 2. Validate arguments against its compiled schema
 * 3. Call the handler with timeout enforcement
 * 4. If ToolError thrown: convert to structured error response
 * 5. If other error thrown: produce generic INTERNAL_ERROR (no internals)
 */
export async function executeTool(
  deps: ExecutorDeps,
  request: ToolRequest,
  options?: Partial<ExecutionOptions>,
): Promise<ToolResponse> {
  const opts: ExecutionOptions = { ...DEFAULT_EXECUTION_OPTIONS, ...options };
  const logger = (deps.logger ?? createLogger('executor')).withContext({
    correlation: request.correlation,
    tool: request.tool,
  });

  const entry = deps.catalog.get(request.tool);
  if (!entry) {
    logger.warn('unknown tool');
    return failure({
      code: ErrorCode.UNKNOWN_TOOL,
      message: `Unknown tool: "${request.tool}"`,
      retriable: ERROR_RETRIABLE_DEFAULTS[ErrorCode.UNKNOWN_TOOL],
    });
  }

  if (!deps.validator.has(request.tool)) {
    deps.validator.compile(request.tool, entry.tool.arguments_schema);
  }
  const validation = deps.validator.validate(request.tool, request.arguments);
  if (!validation.valid) {
    logger.debug('validation failed', { errors: validation.errors });
    const payload: ErrorPayload = {
      code: ErrorCode.VALIDATION_FAILED,
      message: `Argument validation failed: ${validation.errors.join('; ')}`,
      retriable: ERROR_RETRIABLE_DEFAULTS[ErrorCode.VALIDATION_FAILED],
    };
    if (validation.field !== undefined) payload.field = validation.field;
    return failure(payload);
  }

  const started = Date.now();
  try {
    const result = await withTimeout(entry.handler(request), opts.timeoutMs, request.tool);
    logger.info('tool completed', { ok: true, duration_ms: Date.now() - started });
    return { result, error: null };
  } catch (error: unknown) {
    const duration_ms = Date.now() - started;

    if (error instanceof TimeoutError) {
      logger.error('tool timed out', { ok: false, duration_ms, error_code: ErrorCode.TOOL_TIMEOUT });
      return failure({
        code: ErrorCode.TOOL_TIMEOUT,
        message: `Tool "${request.tool}" did not complete within ${opts.timeoutMs}ms`,
        retriable: ERROR_RETRIABLE_DEFAULTS[ErrorCode.TOOL_TIMEOUT],
      });
    }

    if (isToolError(error)) {
      logger.error(`[${error.name}] ${error.message}`, {
        ok: false,
        duration_ms,
        error_code: error.code,
      });
      return failure(error.toErrorPayload());
    }

    logger.error('tool failed with unexpected error', {
      ok: false,
      duration_ms,
      error_code: ErrorCode.INTERNAL_ERROR,
      error: error instanceof Error ? error : String(error),
    });
    return failure({
      code: ErrorCode.INTERNAL_ERROR,
      message: 'Tool handler encountered an internal error',
      retriable: ERROR_RETRIABLE_DEFAULTS[ErrorCode.INTERNAL_ERROR],
    });
  }
}
