export type { ToolRequest, ToolResponse } from './protocol.js';

export {
  ErrorCode,
  type ErrorCodeValue,
  type ErrorPayload,
  ERROR_RETRIABLE_DEFAULTS,
  ERROR_HTTP_STATUS,
} from './errors.js';

export type { JsonSchemaProperty, JsonSchema, ToolDeclaration } from './tool.js';

export type {
  CatalogSearchHit,
  CatalogSearchResult,
  CallerIdentity,
  LookupOutcome,
} from './catalog.js';

export {
  type UpstreamConfig,
  type IdentityConfig,
  type DocsConfig,
  type FanOutConfig,
  type ServerConfig,
  type LoggingConfig,
  type DocsBridgeConfig,
  DEFAULT_CONFIG,
  resolveHome,
  parseConfig,
  applyEnvOverrides,
} from './config.js';
