/**
 * HTTP tool server for docs-bridge.
 *
 * Exposes every catalog tool as `POST {api_path}/{tool}` with a JSON
 * object body, plus `GET {api_path}/tools`, `GET /health` and the MCP
 * endpoint at `mcp_path`. REST routing and response shaping live in
 * {@link ToolServer.handle}, which works on plain request/reply objects;
 * `start()` binds it to a `node:http` (or `node:https`, when a certificate
 * is configured) listener.
 */

import * as http from 'node:http';
import * as https from 'node:https';
import { randomUUID } from 'node:crypto';
import { readFileSync } from 'node:fs';
import type { Server } from 'node:net';

import type { ServerConfig } from '../types/config.js';
import type { ToolRequest } from '../types/protocol.js';
import { ErrorCode, ERROR_HTTP_STATUS } from '../types/errors.js';
import type { ToolCatalog } from './tool-catalog.js';
import type { SchemaValidator } from './schema-validator.js';
import { executeTool } from './error-handler.js';
import { McpEndpoint } from './mcp-endpoint.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Transport-independent view of an incoming request. */
export interface IncomingCall {
  method: string;
  /** Request target, possibly with a query string. */
  url: string;
  headers: Readonly<Record<string, string | undefined>>;
  body: string;
  remoteAddress?: string;
}

/** Transport-independent reply. */
export interface OutgoingReply {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface ToolServerDeps {
  catalog: ToolCatalog;
  validator: SchemaValidator;
  config: ServerConfig;
  version: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Request bodies above this size are rejected with 413. */
export const MAX_BODY_BYTES = 1_048_576;

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers':
    'Content-Type, Authorization, X-Request-Id, Mcp-Protocol-Version, Mcp-Session-Id',
};

// ---------------------------------------------------------------------------
// ToolServer
// ---------------------------------------------------------------------------

export class ToolServer {
  private readonly deps: ToolServerDeps;
  private readonly logger: Logger;
  private readonly mcp: McpEndpoint;
  private server: Server | null = null;

  constructor(deps: ToolServerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger('server');
    this.mcp = new McpEndpoint({
      catalog: deps.catalog,
      validator: deps.validator,
      name: 'docs-bridge',
      version: deps.version,
      timeoutMs: deps.config.tool_timeout_ms,
    });
  }

  /** Route one request and build its reply. Never throws. */
  async handle(call: IncomingCall): Promise<OutgoingReply> {
    const correlation = call.headers['x-request-id'] || randomUUID();
    const reply = (status: number, body?: unknown): OutgoingReply => ({
      status,
      headers: {
        ...CORS_HEADERS,
        'X-Request-Id': correlation,
        ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
      },
      body: body === undefined ? '' : JSON.stringify(body),
    });

    const { config, catalog } = this.deps;
    const path = this.stripRootPath(new URL(call.url, 'http://localhost').pathname);
    const method = call.method.toUpperCase();

    this.logger.debug('request', { correlation, method, path });

    if (method === 'OPTIONS') {
      return reply(204);
    }

    if (path === '/health') {
      return method === 'GET'
        ? reply(200, { status: 'ok', version: this.deps.version })
        : reply(405, { detail: 'Method not allowed' });
    }

    const prefix = config.api_path === '/' ? '/' : `${config.api_path}/`;
    if (!path.startsWith(prefix)) {
      return reply(404, { detail: 'Not found' });
    }
    const toolName = path.slice(prefix.length);

    if (toolName === 'tools') {
      return method === 'GET'
        ? reply(200, { tools: catalog.list() })
        : reply(405, { detail: 'Method not allowed' });
    }

    if (toolName.length === 0 || toolName.includes('/')) {
      return reply(404, { detail: 'Not found' });
    }
    if (method !== 'POST') {
      return reply(405, { detail: 'Method not allowed' });
    }

    const args = parseArguments(call.body);
    if (args === null) {
      return reply(ERROR_HTTP_STATUS[ErrorCode.INVALID_REQUEST], {
        detail: 'Request body must be a JSON object',
        code: ErrorCode.INVALID_REQUEST,
      });
    }

    const request: ToolRequest = {
      tool: toolName,
      arguments: args,
      correlation,
      receivedAt: new Date().toISOString(),
    };
    if (config.forward_client_ip && call.remoteAddress) {
      request.clientIp = call.remoteAddress;
    }

    const response = await executeTool({ catalog, validator: this.deps.validator }, request, {
      timeoutMs: config.tool_timeout_ms,
    });

    if (response.error !== null) {
      return reply(ERROR_HTTP_STATUS[response.error.code], {
        detail: response.error.message,
        code: response.error.code,
        ...(response.error.field !== undefined ? { field: response.error.field } : {}),
      });
    }
    return reply(200, response.result);
  }

  /**
   * Bind the listener. Uses TLS when both `cert_file` and `key_file` are
   * configured.
   *
   * @returns The bound address (useful when `port` is 0).
   */
  async start(): Promise<{ host: string; port: number; tls: boolean }> {
    if (this.server) {
      throw new Error('ToolServer already started');
    }

    const { config } = this.deps;
    const listener = (req: http.IncomingMessage, res: http.ServerResponse): void => {
      void this.serve(req, res);
    };

    let tls = false;
    let server: Server;
    if (config.cert_file !== undefined && config.key_file !== undefined) {
      tls = true;
      this.logger.info('using tls', { cert_file: config.cert_file });
      server = https.createServer(
        { cert: readFileSync(config.cert_file), key: readFileSync(config.key_file) },
        listener,
      );
    } else {
      this.logger.info('using no tls');
      server = http.createServer(listener);
    }
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(config.port, config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('ToolServer bound to a non-TCP address');
    }
    this.logger.info('server listening', {
      host: address.address,
      port: address.port,
      api_path: config.api_path,
      mcp_path: config.mcp_path,
    });
    return { host: address.address, port: address.port, tls };
  }

  /** Stop accepting connections and wait for open ones to finish. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.logger.info('server stopped');
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private stripRootPath(path: string): string {
    const root = this.deps.config.root_path;
    if (root.length > 0 && (path === root || path.startsWith(`${root}/`))) {
      return path.slice(root.length) || '/';
    }
    return path;
  }

  private async serve(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    try {
      const body = await readBody(req);
      if (body === null) {
        res.writeHead(413, {
          ...CORS_HEADERS,
          'Content-Type': 'application/json',
          Connection: 'close',
        });
        res.end(JSON.stringify({ detail: 'Request body too large' }), () => {
          req.socket.destroy();
        });
        return;
      }

      const headers: Record<string, string | undefined> = {};
      for (const [key, value] of Object.entries(req.headers)) {
        headers[key] = Array.isArray(value) ? value[0] : value;
      }
      const url = req.url ?? '/';
      const method = (req.method ?? 'GET').toUpperCase();
      const remoteAddress = req.socket.remoteAddress;

      const path = this.stripRootPath(new URL(url, 'http://localhost').pathname);
      if (path === this.deps.config.mcp_path && method !== 'OPTIONS') {
        const correlation = headers['x-request-id'] || randomUUID();
        for (const [name, value] of Object.entries(CORS_HEADERS)) res.setHeader(name, value);
        res.setHeader('X-Request-Id', correlation);
        await this.mcp.handle(req, res, body, {
          correlation,
          ...(this.deps.config.forward_client_ip && remoteAddress
            ? { clientIp: remoteAddress }
            : {}),
        });
        return;
      }

      const reply = await this.handle({ method, url, headers, body, remoteAddress });
      res.writeHead(reply.status, reply.headers);
      res.end(reply.body);
    } catch (err: unknown) {
      this.logger.error('request handling failed', {
        error: err instanceof Error ? err : String(err),
      });
      if (!res.headersSent) {
        res.writeHead(500, { ...CORS_HEADERS, 'Content-Type': 'application/json' });
      }
      res.end(JSON.stringify({ detail: 'Internal server error' }));
    }
  }
}

// ---------------------------------------------------------------------------
// Body helpers
// ---------------------------------------------------------------------------

/** Parse a request body into tool arguments. Empty body means `{}`. */
export function parseArguments(body: string): Record<string, unknown> | null {
  if (body.trim().length === 0) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Collect a request body, or `null` once it exceeds {@link MAX_BODY_BYTES}.
 * An oversized body is still read to the end so the 413 reply reaches a
 * client that is mid-upload.
 */
async function readBody(req: http.IncomingMessage): Promise<string | null> {
  const chunks: Buffer[] = [];
  let size = 0;
  let overflow = false;
  for await (const chunk of req) {
    if (overflow) continue;
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) {
      overflow = true;
      chunks.length = 0;
      continue;
    }
    chunks.push(buf);
  }
  return overflow ? null : Buffer.concat(chunks).toString('utf-8');
}
