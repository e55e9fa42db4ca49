/**
 * TOML-based configuration loader for docs-bridge.
 *
 * Reads `config.toml` from `$DOCS_BRIDGE_HOME`, parses it with smol-toml,
 * validates it, and overlays secrets from the environment. The result is a
 * deep-frozen copy that shares nothing with {@link DEFAULT_CONFIG}.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseConfig, applyEnvOverrides, DEFAULT_CONFIG } from '../types/config.js';
import type { DocsBridgeConfig } from '../types/config.js';

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null) deepFreeze(child);
  }
  return Object.freeze(value);
}

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate `config.toml` from a docs-bridge home directory.
 *
 * If `config.toml` does not exist or is empty, defaults are used.
 * Throws on invalid TOML syntax or schema validation errors.
 */
export function loadConfig(
  home: string,
  env: NodeJS.ProcessEnv = process.env,
): Readonly<DocsBridgeConfig> {
  const configPath = join(home, 'config.toml');

  let config: DocsBridgeConfig = DEFAULT_CONFIG;
  if (existsSync(configPath)) {
    const content = readFileSync(configPath, 'utf-8');
    if (content.trim().length > 0) {
      config = parseConfig(parseTOML(content));
    }
  }

  return deepFreeze(structuredClone(applyEnvOverrides(config, env)));
}
