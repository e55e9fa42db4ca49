/**
 * Request and response shapes for tool invocations.
 *
 * The HTTP surface turns each incoming call into a {@link ToolRequest};
 * the executor always answers with a {@link ToolResponse}, never a throw.
 */

import type { ErrorPayload } from './errors.js';

/** A single tool invocation after transport decoding. */
export interface ToolRequest {
  tool: string;
  arguments: Record<string, unknown>;
  /** Request id, echoed in logs and response headers. */
  correlation: string;
  /** ISO-8601 timestamp of when the request was received. */
  receivedAt: string;
  /** Caller network address, encrypted into outbound headers when present. */
  clientIp?: string;
}

/** Outcome of a tool invocation. Exactly one of `result` / `error` is set. */
export type ToolResponse =
  | { result: Record<string, unknown>; error: null }
  | { result: null; error: ErrorPayload };
