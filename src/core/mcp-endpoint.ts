/**
 * MCP streamable-HTTP endpoint for docs-bridge.
 *
 * Publishes every catalog tool to MCP clients at `[server].mcp_path`.
 * Each HTTP request gets its own protocol server and stateless transport;
 * `tools/call` dispatches through {@link executeTool}, so validation,
 * timeouts and error classification match the REST surface.
 */

import type * as http from 'node:http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type ListToolsResult,
} from '@modelcontextprotocol/sdk/types.js';

import type { ToolRequest } from '../types/protocol.js';
import type { ToolCatalog } from './tool-catalog.js';
import type { SchemaValidator } from './schema-validator.js';
import { executeTool } from './error-handler.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface McpEndpointDeps {
  catalog: ToolCatalog;
  validator: SchemaValidator;
  name: string;
  version: string;
  timeoutMs: number;
  logger?: Logger;
}

/** Per-request details carried into every tool call of that request. */
export interface McpCallContext {
  correlation: string;
  clientIp?: string;
}

// JSON-RPC error codes answered without reaching the transport.
const PARSE_ERROR = -32700;
const SERVER_ERROR = -32000;

// ---------------------------------------------------------------------------
// McpEndpoint
// ---------------------------------------------------------------------------

export class McpEndpoint {
  private readonly deps: McpEndpointDeps;
  private readonly logger: Logger;

  constructor(deps: McpEndpointDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger('mcp');
  }

  /** Build a protocol server whose tool handlers use the catalog. */
  createServer(context: McpCallContext): McpServer {
    const mcp = new McpServer(
      { name: this.deps.name, version: this.deps.version },
      { capabilities: { tools: {} } },
    );

    mcp.server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => ({
      tools: this.deps.catalog.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.arguments_schema,
      })),
    }));

    mcp.server.setRequestHandler(
      CallToolRequestSchema,
      async (request): Promise<CallToolResult> => {
        const toolRequest: ToolRequest = {
          tool: request.params.name,
          arguments: request.params.arguments ?? {},
          correlation: context.correlation,
          receivedAt: new Date().toISOString(),
        };
        if (context.clientIp !== undefined) toolRequest.clientIp = context.clientIp;

        const response = await executeTool(
          { catalog: this.deps.catalog, validator: this.deps.validator },
          toolRequest,
          { timeoutMs: this.deps.timeoutMs },
        );
        if (response.error !== null) {
          return {
            content: [
              {
                type: 'text',
                text: JSON.stringify({ detail: response.error.message, code: response.error.code }),
              },
            ],
            isError: true,
          };
        }
        return {
          content: [{ type: 'text', text: JSON.stringify(response.result) }],
          structuredContent: response.result,
        };
      },
    );

    return mcp;
  }

  /**
   * Answer one HTTP request on the MCP path. `body` is the raw request
   * body, already read by the caller.
   */
  async handle(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    body: string,
    context: McpCallContext,
  ): Promise<void> {
    if (req.method !== 'POST') {
      writeRpcError(res, 405, SERVER_ERROR, 'Method not allowed.');
      return;
    }

    let message: unknown;
    try {
      message = JSON.parse(body);
    } catch {
      writeRpcError(res, 400, PARSE_ERROR, 'Parse error: Invalid JSON');
      return;
    }

    this.logger.debug('mcp request', { correlation: context.correlation });

    const server = this.createServer(context);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on('close', () => {
      server.close().catch((err: unknown) => {
        this.logger.warn('mcp server close failed', {
          error: err instanceof Error ? err : String(err),
        });
      });
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, message);
  }
}

function writeRpcError(
  res: http.ServerResponse,
  status: number,
  code: number,
  message: string,
): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ jsonrpc: '2.0', error: { code, message }, id: null }));
}
