/**
 * docs-bridge public API.
 */

export const VERSION = '0.1.0';

export * from './types/index.js';

export { createLogger, configureLogging, resetLogging } from './core/logger.js';
export type { Logger, LogEntry, LogLevel, LogSink, LogContext } from './core/logger.js';
export {
  ToolError,
  EncryptionConfigError,
  LibraryNotFoundError,
  DocumentationNotFoundError,
  ValidationError,
  isToolError,
} from './core/tool-error.js';
export {
  CLIENT_IP_HEADER,
  AUTHORIZATION_HEADER,
  parseEncryptionKey,
  encryptIdentity,
  buildHeaders,
  type BuildHeadersOptions,
} from './core/identity-headers.js';
export {
  CatalogClient,
  NO_CONTENT_SENTINELS,
  normalizeLibraryId,
  type CatalogClientOptions,
  type FetchFn,
} from './core/catalog-client.js';
export { formatSearchResults, HIT_SEPARATOR } from './core/result-formatter.js';
export {
  FanOutCoordinator,
  runPool,
  missingDocsPlaceholder,
  type FanOutOptions,
  type PoolTask,
  type PoolResult,
} from './core/fan-out.js';
export { ToolCatalog, type ToolHandler, type RegisteredTool } from './core/tool-catalog.js';
export { SchemaValidator, type ValidationResult } from './core/schema-validator.js';
export { executeTool, type ExecutionOptions, type ExecutorDeps } from './core/error-handler.js';
export { registerDocTools, createDocToolDeclarations, DOC_TOOL_NAMES } from './core/doc-tools.js';
export type { DocToolName, DocToolsDeps } from './core/doc-tools.js';
export { DEFAULT_PROMPT } from './core/default-prompt.js';
export { loadConfig } from './core/config-loader.js';
export { ToolServer, parseArguments, type IncomingCall, type OutgoingReply } from './core/server.js';
export { McpEndpoint, type McpEndpointDeps, type McpCallContext } from './core/mcp-endpoint.js';
