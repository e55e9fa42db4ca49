import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';

import { McpEndpoint, type McpCallContext } from './mcp-endpoint.js';
import { ToolCatalog } from './tool-catalog.js';
import { SchemaValidator } from './schema-validator.js';
import { LibraryNotFoundError } from './tool-error.js';
import { configureLogging, resetLogging } from './logger.js';
import type { JsonSchema } from '../types/tool.js';
import { createTestSink, createToolDeclaration } from '../testing/factories.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ECHO_SCHEMA: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['input'],
  properties: { input: { type: 'string' } },
};

function createEndpoint(): McpEndpoint {
  const catalog = new ToolCatalog();
  catalog.register(
    createToolDeclaration({
      name: 'echo',
      description: 'Echo the input',
      arguments_schema: ECHO_SCHEMA,
    }),
    async (request) => ({
      echoed: request.arguments['input'],
      correlation: request.correlation,
      clientIp: request.clientIp ?? null,
    }),
  );
  catalog.register(createToolDeclaration({ name: 'missing' }), async () => {
    throw new LibraryNotFoundError();
  });

  return new McpEndpoint({
    catalog,
    validator: new SchemaValidator(),
    name: 'docs-bridge',
    version: '9.9.9',
    timeoutMs: 1000,
  });
}

async function connect(endpoint: McpEndpoint, context: McpCallContext) {
  const server = endpoint.createServer(context);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  return {
    client,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('McpEndpoint', () => {
  beforeEach(() => {
    configureLogging({ level: 'error', sink: createTestSink().sink });
  });

  afterEach(() => {
    resetLogging();
  });

  it('identifies itself with the configured name and version', async () => {
    const { client, close } = await connect(createEndpoint(), { correlation: 'mcp-1' });
    try {
      expect(client.getServerVersion()).toEqual({ name: 'docs-bridge', version: '9.9.9' });
    } finally {
      await close();
    }
  });

  it('lists catalog tools with their argument schemas', async () => {
    const { client, close } = await connect(createEndpoint(), { correlation: 'mcp-1' });
    try {
      const { tools } = await client.listTools();

      expect(tools.map((tool) => tool.name)).toEqual(['echo', 'missing']);
      expect(tools[0].description).toBe('Echo the input');
      expect(tools[0].inputSchema).toEqual(ECHO_SCHEMA);
    } finally {
      await close();
    }
  });

  it('returns the tool result as JSON text and structured content', async () => {
    const { client, close } = await connect(createEndpoint(), { correlation: 'mcp-1' });
    try {
      const result = await client.callTool({ name: 'echo', arguments: { input: 'hi' } });

      const expected = { echoed: 'hi', correlation: 'mcp-1', clientIp: null };
      expect(result.content).toEqual([{ type: 'text', text: JSON.stringify(expected) }]);
      expect(result.structuredContent).toEqual(expected);
      expect(result.isError).toBeUndefined();
    } finally {
      await close();
    }
  });

  it('passes the caller address through when the context carries one', async () => {
    const { client, close } = await connect(createEndpoint(), {
      correlation: 'mcp-2',
      clientIp: '198.51.100.7',
    });
    try {
      const result = await client.callTool({ name: 'echo', arguments: { input: 'x' } });
      expect(result.structuredContent).toEqual({
        echoed: 'x',
        correlation: 'mcp-2',
        clientIp: '198.51.100.7',
      });
    } finally {
      await close();
    }
  });

  it('reports a tool error as an error result', async () => {
    const { client, close } = await connect(createEndpoint(), { correlation: 'mcp-1' });
    try {
      const result = await client.callTool({ name: 'missing', arguments: {} });

      expect(result.isError).toBe(true);
      expect(result.content).toEqual([
        {
          type: 'text',
          text: '{"detail":"No matching libraries found.","code":"LIBRARY_NOT_FOUND"}',
        },
      ]);
    } finally {
      await close();
    }
  });

  it('validates arguments before running the handler', async () => {
    const { client, close } = await connect(createEndpoint(), { correlation: 'mcp-1' });
    try {
      const result = await client.callTool({ name: 'echo', arguments: {} });

      expect(result.isError).toBe(true);
      expect(result.content).toEqual([
        {
          type: 'text',
          text: JSON.stringify({
            detail: 'Argument validation failed: : required property "input" is missing',
            code: 'VALIDATION_FAILED',
          }),
        },
      ]);
    } finally {
      await close();
    }
  });

  it('reports an unknown tool as an error result', async () => {
    const { client, close } = await connect(createEndpoint(), { correlation: 'mcp-1' });
    try {
      const result = await client.callTool({ name: 'nope', arguments: {} });

      expect(result.isError).toBe(true);
      expect(result.content).toEqual([
        { type: 'text', text: '{"detail":"Unknown tool: \\"nope\\"","code":"UNKNOWN_TOOL"}' },
      ]);
    } finally {
      await close();
    }
  });
});
