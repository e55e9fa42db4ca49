/**
 * docs-bridge configuration schema and DOCS_BRIDGE_HOME resolution.
 *
 * Defines the TypeScript types for config.toml sections, their defaults,
 * and the validation applied to a raw parsed TOML document.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import type { LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[upstream]` section of config.toml. */
export interface UpstreamConfig {
  base_url: string;
  api_key?: string;
}

/** `[identity]` section of config.toml. */
export interface IdentityConfig {
  /** Hex-encoded AES key (16, 24 or 32 bytes). */
  encryption_key?: string;
}

/** `[docs]` section of config.toml. */
export interface DocsConfig {
  default_tokens: number;
  minimum_tokens: number;
}

/** `[fanout]` section of config.toml. */
export interface FanOutConfig {
  max_concurrency: number;
}

/** `[server]` section of config.toml. */
export interface ServerConfig {
  host: string;
  port: number;
  api_path: string;
  /** Path of the MCP streamable-HTTP endpoint. */
  mcp_path: string;
  root_path: string;
  cert_file?: string;
  key_file?: string;
  tool_timeout_ms: number;
  /** Encrypt the caller's socket address into upstream calls. */
  forward_client_ip: boolean;
}

/** `[logging]` section of config.toml. */
export interface LoggingConfig {
  level: LogLevel;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

export interface DocsBridgeConfig {
  upstream: UpstreamConfig;
  identity: IdentityConfig;
  docs: DocsConfig;
  fanout: FanOutConfig;
  server: ServerConfig;
  logging: LoggingConfig;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Default configuration applied when config.toml is absent or partial. */
export const DEFAULT_CONFIG: DocsBridgeConfig = {
  upstream: { base_url: 'https://context7.com/api' },
  identity: {},
  docs: { default_tokens: 10_000, minimum_tokens: 1_000 },
  fanout: { max_concurrency: 8 },
  server: {
    host: '127.0.0.1',
    port: 8000,
    api_path: '/api',
    mcp_path: '/mcp',
    root_path: '',
    tool_timeout_ms: 120_000,
    forward_client_ip: false,
  },
  logging: { level: 'info' },
};

const KNOWN_SECTIONS = ['upstream', 'identity', 'docs', 'fanout', 'server', 'logging'];

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error']);

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

/**
 * Resolve the docs-bridge home directory.
 *
 * Precedence:
 *  1. `$DOCS_BRIDGE_HOME` environment variable (if non-empty)
 *  2. `~/.docs-bridge/` default
 *
 * Trailing slashes are stripped. A leading `~` is expanded to the
 * user's home directory.
 */
export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  const envValue = env['DOCS_BRIDGE_HOME'];
  if (envValue && envValue.length > 0) {
    let resolved = envValue;
    if (resolved.startsWith('~/') || resolved === '~') {
      resolved = join(homedir(), resolved.slice(2));
    }
    if (resolved.length > 1 && resolved.endsWith('/')) {
      resolved = resolved.slice(0, -1);
    }
    return resolved;
  }
  return join(homedir(), '.docs-bridge');
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`[${name}] must be a table`);
  }
  return Object.fromEntries(Object.entries(value));
}

function readString(
  sectionName: string,
  raw: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`${sectionName}.${key} must be a string`);
  }
  return value;
}

function readPositiveInt(
  sectionName: string,
  raw: Record<string, unknown>,
  key: string,
  fallback: number,
): number {
  const value = raw[key] ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`${sectionName}.${key} must be a positive integer`);
  }
  return value;
}

function readBoolean(
  sectionName: string,
  raw: Record<string, unknown>,
  key: string,
  fallback: boolean,
): boolean {
  const value = raw[key] ?? fallback;
  if (typeof value !== 'boolean') {
    throw new Error(`${sectionName}.${key} must be a boolean`);
  }
  return value;
}

function readPath(
  sectionName: string,
  raw: Record<string, unknown>,
  key: string,
  fallback: string,
): string {
  const value = readString(sectionName, raw, key) ?? fallback;
  if (!value.startsWith('/')) {
    throw new Error(`${sectionName}.${key} must start with "/"`);
  }
  return value.length > 1 ? value.replace(/\/+$/, '') : value;
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into
 * a fully typed `DocsBridgeConfig`. Applies defaults for missing sections
 * and keys; unknown top-level sections are rejected.
 */
export function parseConfig(raw: Record<string, unknown>): DocsBridgeConfig {
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.includes(key)) {
      throw new Error(`Unknown config section: [${key}]`);
    }
  }

  // --- upstream ---
  const rawUpstream = section(raw, 'upstream');
  const baseUrl = readString('upstream', rawUpstream, 'base_url') ?? DEFAULT_CONFIG.upstream.base_url;
  try {
    new URL(baseUrl);
  } catch {
    throw new Error(`upstream.base_url is not a valid URL: "${baseUrl}"`);
  }
  const upstream: UpstreamConfig = { base_url: baseUrl.replace(/\/+$/, '') };
  const apiKey = readString('upstream', rawUpstream, 'api_key');
  if (apiKey !== undefined && apiKey.length > 0) upstream.api_key = apiKey;

  // --- identity ---
  const rawIdentity = section(raw, 'identity');
  const identity: IdentityConfig = {};
  const encryptionKey = readString('identity', rawIdentity, 'encryption_key');
  if (encryptionKey !== undefined && encryptionKey.length > 0) {
    identity.encryption_key = encryptionKey;
  }

  // --- docs ---
  const rawDocs = section(raw, 'docs');
  const docs: DocsConfig = {
    default_tokens: readPositiveInt(
      'docs',
      rawDocs,
      'default_tokens',
      DEFAULT_CONFIG.docs.default_tokens,
    ),
    minimum_tokens: readPositiveInt(
      'docs',
      rawDocs,
      'minimum_tokens',
      DEFAULT_CONFIG.docs.minimum_tokens,
    ),
  };
  if (docs.default_tokens < docs.minimum_tokens) {
    throw new Error('docs.default_tokens must not be below docs.minimum_tokens');
  }

  // --- fanout ---
  const rawFanOut = section(raw, 'fanout');
  const fanout: FanOutConfig = {
    max_concurrency: readPositiveInt(
      'fanout',
      rawFanOut,
      'max_concurrency',
      DEFAULT_CONFIG.fanout.max_concurrency,
    ),
  };

  // --- server ---
  const rawServer = section(raw, 'server');
  const port = readPositiveInt('server', rawServer, 'port', DEFAULT_CONFIG.server.port);
  if (port > 65535) {
    throw new Error('server.port must be an integer between 1 and 65535');
  }
  const apiPath = readPath('server', rawServer, 'api_path', DEFAULT_CONFIG.server.api_path);
  const mcpPath = readPath('server', rawServer, 'mcp_path', DEFAULT_CONFIG.server.mcp_path);
  if (mcpPath === apiPath || mcpPath.startsWith(`${apiPath}/`) || mcpPath === '/') {
    throw new Error('server.mcp_path must not overlap server.api_path');
  }
  const server: ServerConfig = {
    host: readString('server', rawServer, 'host') ?? DEFAULT_CONFIG.server.host,
    port,
    api_path: apiPath,
    mcp_path: mcpPath,
    root_path: (readString('server', rawServer, 'root_path') ?? '').replace(/\/+$/, ''),
    tool_timeout_ms: readPositiveInt(
      'server',
      rawServer,
      'tool_timeout_ms',
      DEFAULT_CONFIG.server.tool_timeout_ms,
    ),
    forward_client_ip: readBoolean(
      'server',
      rawServer,
      'forward_client_ip',
      DEFAULT_CONFIG.server.forward_client_ip,
    ),
  };
  const certFile = readString('server', rawServer, 'cert_file');
  const keyFile = readString('server', rawServer, 'key_file');
  if (certFile) server.cert_file = certFile;
  if (keyFile) server.key_file = keyFile;

  // --- logging ---
  const rawLogging = section(raw, 'logging');
  const level = readString('logging', rawLogging, 'level') ?? DEFAULT_CONFIG.logging.level;
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: "${level}". Must be one of: ${[...VALID_LOG_LEVELS].join(', ')}`,
    );
  }

  return { upstream, identity, docs, fanout, server, logging: { level } };
}

// ---------------------------------------------------------------------------
// applyEnvOverrides()
// ---------------------------------------------------------------------------

/**
 * Overlay secrets from the environment onto a parsed config.
 *
 * `DOCS_BRIDGE_API_KEY` replaces `upstream.api_key` and
 * `DOCS_BRIDGE_ENCRYPTION_KEY` replaces `identity.encryption_key`.
 * Empty variables are ignored.
 */
export function applyEnvOverrides(
  config: DocsBridgeConfig,
  env: NodeJS.ProcessEnv = process.env,
): DocsBridgeConfig {
  const apiKey = env['DOCS_BRIDGE_API_KEY'];
  const encryptionKey = env['DOCS_BRIDGE_ENCRYPTION_KEY'];

  return {
    ...config,
    upstream:
      apiKey && apiKey.length > 0 ? { ...config.upstream, api_key: apiKey } : config.upstream,
    identity:
      encryptionKey && encryptionKey.length > 0
        ? { ...config.identity, encryption_key: encryptionKey }
        : config.identity,
  };
}
