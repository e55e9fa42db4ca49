#!/usr/bin/env node
/**
 * Production entry point for docs-bridge.
 *
 * Loads configuration from `$DOCS_BRIDGE_HOME`, wires the catalog client,
 * fan-out coordinator and documentation tools into a {@link ToolServer},
 * and serves until SIGINT or SIGTERM.
 *
 * Usage:
 *   node dist/main.js
 */

import { VERSION } from './index.js';
import { resolveHome } from './types/config.js';
import { loadConfig } from './core/config-loader.js';
import { configureLogging, createLogger } from './core/logger.js';
import { parseEncryptionKey } from './core/identity-headers.js';
import { CatalogClient } from './core/catalog-client.js';
import { FanOutCoordinator } from './core/fan-out.js';
import { ToolCatalog } from './core/tool-catalog.js';
import { SchemaValidator } from './core/schema-validator.js';
import { registerDocTools } from './core/doc-tools.js';
import { ToolServer } from './core/server.js';
import { EncryptionConfigError } from './core/tool-error.js';

const logger = createLogger('main');

async function main(): Promise<void> {
  const home = resolveHome();
  const config = loadConfig(home);
  configureLogging({ level: config.logging.level });

  const rawKey = config.identity.encryption_key;
  const encryptionKey = rawKey === undefined ? undefined : parseEncryptionKey(rawKey);
  if (config.server.forward_client_ip && encryptionKey === undefined) {
    throw new EncryptionConfigError(
      'server.forward_client_ip requires identity.encryption_key or DOCS_BRIDGE_ENCRYPTION_KEY',
    );
  }

  const client = new CatalogClient({
    baseUrl: config.upstream.base_url,
    minimumTokens: config.docs.minimum_tokens,
    defaultTokens: config.docs.default_tokens,
    encryptionKey,
  });
  const coordinator = new FanOutCoordinator({
    client,
    maxConcurrency: config.fanout.max_concurrency,
  });

  const catalog = new ToolCatalog();
  registerDocTools({ catalog, client, coordinator, credential: config.upstream.api_key });

  const validator = new SchemaValidator();
  validator.compileFromTools(catalog.list());

  const server = new ToolServer({ catalog, validator, config: config.server, version: VERSION });
  await server.start();
  logger.info('docs-bridge started', {
    version: VERSION,
    home,
    upstream: config.upstream.base_url,
    tools: catalog.list().length,
  });

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info('shutting down', { signal });
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('shutdown failed', { error: err instanceof Error ? err : String(err) });
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error('startup failed', { error: err instanceof Error ? err : String(err) });
  process.exit(1);
});
