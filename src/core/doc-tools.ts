/**
 * Documentation tools for docs-bridge.
 *
 * Five tool actions backed by the upstream catalog:
 *   - get_default_prompt: the instructional prompt for assistants
 *   - resolve_library_id: library name → formatted search summary
 *   - get_library_docs: library id → documentation text
 *   - resolve_multiple_library_ids: batch resolve, all-or-nothing
 *   - get_multiple_library_docs: batch fetch, best-effort
 */

import type { ToolDeclaration } from '../types/tool.js';
import type { ToolRequest } from '../types/protocol.js';
import type { CallerIdentity } from '../types/catalog.js';
import type { ToolCatalog, ToolHandler } from './tool-catalog.js';
import type { CatalogClient } from './catalog-client.js';
import type { FanOutCoordinator } from './fan-out.js';
import { formatSearchResults } from './result-formatter.js';
import { DEFAULT_PROMPT } from './default-prompt.js';
import { DocumentationNotFoundError, LibraryNotFoundError, ValidationError } from './tool-error.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DOC_TOOL_NAMES = [
  'get_default_prompt',
  'resolve_library_id',
  'get_library_docs',
  'resolve_multiple_library_ids',
  'get_multiple_library_docs',
] as const;

export type DocToolName = (typeof DOC_TOOL_NAMES)[number];

// ---------------------------------------------------------------------------
// Tool declarations
// ---------------------------------------------------------------------------

/** Build the five declarations; `defaultTokens` fills omitted budgets. */
export function createDocToolDeclarations(defaultTokens: number): ToolDeclaration[] {
  return [
    {
      name: 'get_default_prompt',
      description:
        'Returns the default instructional prompt: the query-resolution workflow, library ' +
        'matching strategy, multi-library handling and general answering guidelines.',
      arguments_schema: { type: 'object', additionalProperties: false, properties: {} },
    },
    {
      name: 'resolve_library_id',
      description:
        'Searches the documentation catalog for a single library name and returns a summary ' +
        'of the matches: canonical library ID, title, description, snippet count, trust ' +
        'score and available versions.',
      arguments_schema: {
        type: 'object',
        required: ['library_name'],
        additionalProperties: false,
        properties: {
          library_name: {
            type: 'string',
            minLength: 1,
            description: "Plain library name or keyword, e.g. 'FastAPI' or 'SQLAlchemy'.",
          },
        },
      },
    },
    {
      name: 'get_library_docs',
      description:
        'Retrieves documentation text for a canonical library ID, optionally narrowed to a ' +
        'topic and bounded by a token budget.',
      arguments_schema: {
        type: 'object',
        required: ['library_id'],
        additionalProperties: false,
        properties: {
          library_id: {
            type: 'string',
            minLength: 1,
            description: "Canonical library ID, e.g. '/tiangolo/fastapi'.",
          },
          tokens: {
            type: 'integer',
            default: defaultTokens,
            description:
              'Maximum token budget for the returned text. Values below the server minimum are raised to it.',
          },
          topic: {
            type: 'string',
            default: '',
            description: "Keyword narrowing the returned sections, e.g. 'dependency injection'.",
          },
        },
      },
    },
    {
      name: 'resolve_multiple_library_ids',
      description:
        'Resolves several library names concurrently. Results are aligned with the request ' +
        'order. Fails if any name has no match.',
      arguments_schema: {
        type: 'object',
        required: ['library_names'],
        additionalProperties: false,
        properties: {
          library_names: {
            type: 'array',
            minItems: 1,
            items: { type: 'string', minLength: 1 },
            description: 'Library names to resolve, one search per entry.',
          },
        },
      },
    },
    {
      name: 'get_multiple_library_docs',
      description:
        'Retrieves documentation for several libraries concurrently. Takes equal-length lists ' +
        'of library IDs, token budgets and topics; results are aligned with the input order, ' +
        'with a placeholder message for any library without documentation.',
      arguments_schema: {
        type: 'object',
        required: ['library_ids', 'tokens', 'topics'],
        additionalProperties: false,
        properties: {
          library_ids: {
            type: 'array',
            minItems: 1,
            items: { type: 'string', minLength: 1 },
            description: "Canonical library IDs, e.g. ['/tiangolo/fastapi', '/sqlalchemy/sqlalchemy'].",
          },
          tokens: {
            type: 'array',
            items: { type: 'integer' },
            description: 'One token budget per library ID.',
          },
          topics: {
            type: 'array',
            items: { type: 'string' },
            description: 'One topic per library ID.',
          },
        },
      },
    },
  ];
}

// ---------------------------------------------------------------------------
// Argument readers
// ---------------------------------------------------------------------------

function stringArg(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string`, key);
  }
  return value;
}

function integerArg(args: Record<string, unknown>, key: string): number {
  const value = args[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`${key} must be an integer`, key);
  }
  return value;
}

function stringListArg(args: Record<string, unknown>, key: string): string[] {
  const value = args[key];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ValidationError(`${key} must be an array of strings`, key);
  }
  return value;
}

function integerListArg(args: Record<string, unknown>, key: string): number[] {
  const value = args[key];
  if (!Array.isArray(value) || !value.every((v): v is number => Number.isInteger(v))) {
    throw new ValidationError(`${key} must be an array of integers`, key);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export interface DocToolsDeps {
  catalog: ToolCatalog;
  client: CatalogClient;
  coordinator: FanOutCoordinator;
  /** Bearer credential sent with every upstream call. */
  credential?: string;
  logger?: Logger;
}

/**
 * Register the five documentation tools in the tool catalog.
 * Throws if any of the names is already registered (via ToolCatalog).
 */
export function registerDocTools(deps: DocToolsDeps): void {
  const { catalog, client, coordinator, credential } = deps;
  const logger = deps.logger ?? createLogger('doc-tools');

  const identityFor = (request: ToolRequest): CallerIdentity => ({
    address: request.clientIp,
    credential,
  });

  const traced = (handler: ToolHandler): ToolHandler => async (request) => {
    const scoped = logger.withContext({ correlation: request.correlation, tool: request.tool });
    scoped.info('tool call');
    scoped.debug('tool arguments', { arguments: request.arguments });
    return handler(request);
  };

  const handlers: Record<DocToolName, ToolHandler> = {
    get_default_prompt: async () => ({ default_prompt: DEFAULT_PROMPT }),

    resolve_library_id: async (request) => {
      const name = stringArg(request.arguments, 'library_name');
      const result = await client.search(name, identityFor(request));
      if (result.results.length === 0) {
        throw new LibraryNotFoundError();
      }
      return { library_id: formatSearchResults(result) };
    },

    get_library_docs: async (request) => {
      const args = request.arguments;
      const tokens = args['tokens'] === undefined ? client.defaultTokens : integerArg(args, 'tokens');
      const topic = args['topic'] === undefined ? '' : stringArg(args, 'topic');
      const docs = await client.fetchDocs(
        stringArg(args, 'library_id'),
        tokens,
        topic,
        identityFor(request),
      );
      if (docs === null) {
        throw new DocumentationNotFoundError();
      }
      return { library_info: docs };
    },

    resolve_multiple_library_ids: async (request) => {
      const names = stringListArg(request.arguments, 'library_names');
      const libraryIds = await coordinator.resolveMany(names, identityFor(request));
      return { library_ids: libraryIds };
    },

    get_multiple_library_docs: async (request) => {
      const args = request.arguments;
      const infos = await coordinator.fetchMany(
        stringListArg(args, 'library_ids'),
        integerListArg(args, 'tokens'),
        stringListArg(args, 'topics'),
        identityFor(request),
      );
      return { library_infos: infos };
    },
  };

  const declarations = createDocToolDeclarations(client.defaultTokens);
  for (const name of DOC_TOOL_NAMES) {
    const tool = declarations.find((declaration) => declaration.name === name);
    if (!tool) {
      throw new Error(`Missing declaration for tool "${name}"`);
    }
    catalog.register(tool, traced(handlers[name]));
  }
}
