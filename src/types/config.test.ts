import { describe, it, expect } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { resolveHome, parseConfig, applyEnvOverrides, DEFAULT_CONFIG } from './config.js';

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

describe('resolveHome', () => {
  it('returns $DOCS_BRIDGE_HOME when set', () => {
    expect(resolveHome({ DOCS_BRIDGE_HOME: '/custom/path' })).toBe('/custom/path');
  });

  it('strips a trailing slash', () => {
    expect(resolveHome({ DOCS_BRIDGE_HOME: '/custom/path/' })).toBe('/custom/path');
  });

  it('expands a leading ~', () => {
    expect(resolveHome({ DOCS_BRIDGE_HOME: '~/bridge' })).toBe(join(homedir(), 'bridge'));
  });

  it('falls back to ~/.docs-bridge', () => {
    expect(resolveHome({})).toBe(join(homedir(), '.docs-bridge'));
    expect(resolveHome({ DOCS_BRIDGE_HOME: '' })).toBe(join(homedir(), '.docs-bridge'));
  });
});

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('returns defaults for an empty document', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('defaults match the catalog service', () => {
    expect(DEFAULT_CONFIG.upstream.base_url).toBe('https://context7.com/api');
    expect(DEFAULT_CONFIG.docs).toEqual({ default_tokens: 10_000, minimum_tokens: 1_000 });
    expect(DEFAULT_CONFIG.fanout.max_concurrency).toBe(8);
    expect(DEFAULT_CONFIG.server.forward_client_ip).toBe(false);
  });

  it('reads every section', () => {
    const config = parseConfig({
      upstream: { base_url: 'https://catalog.test/api/', api_key: 'test-secret' },
      identity: { encryption_key: 'aa'.repeat(16) },
      docs: { default_tokens: 5000, minimum_tokens: 500 },
      fanout: { max_concurrency: 2 },
      server: {
        host: '0.0.0.0',
        port: 9000,
        api_path: '/tools/',
        mcp_path: '/docs-mcp/',
        root_path: '/bridge/',
        cert_file: '/etc/tls/cert.pem',
        key_file: '/etc/tls/key.pem',
        tool_timeout_ms: 30000,
        forward_client_ip: true,
      },
      logging: { level: 'debug' },
    });

    expect(config).toEqual({
      upstream: { base_url: 'https://catalog.test/api', api_key: 'test-secret' },
      identity: { encryption_key: 'aa'.repeat(16) },
      docs: { default_tokens: 5000, minimum_tokens: 500 },
      fanout: { max_concurrency: 2 },
      server: {
        host: '0.0.0.0',
        port: 9000,
        api_path: '/tools',
        mcp_path: '/docs-mcp',
        root_path: '/bridge',
        cert_file: '/etc/tls/cert.pem',
        key_file: '/etc/tls/key.pem',
        tool_timeout_ms: 30000,
        forward_client_ip: true,
      },
      logging: { level: 'debug' },
    });
  });

  it('drops empty secrets', () => {
    const config = parseConfig({ upstream: { api_key: '' }, identity: { encryption_key: '' } });
    expect(config.upstream).toEqual({ base_url: 'https://context7.com/api' });
    expect(config.identity).toEqual({});
  });

  it('rejects unknown sections', () => {
    expect(() => parseConfig({ plugins: {} })).toThrow('Unknown config section: [plugins]');
  });

  it('rejects a section that is not a table', () => {
    expect(() => parseConfig({ docs: 5 })).toThrow('[docs] must be a table');
  });

  it('rejects an invalid base URL', () => {
    expect(() => parseConfig({ upstream: { base_url: 'not a url' } })).toThrow(
      'upstream.base_url is not a valid URL: "not a url"',
    );
  });

  it('rejects a non-string value where a string is expected', () => {
    expect(() => parseConfig({ server: { host: 8 } })).toThrow('server.host must be a string');
  });

  it.each([0, -5, 1.5, '10'])('rejects max_concurrency = %s', (value) => {
    expect(() => parseConfig({ fanout: { max_concurrency: value } })).toThrow(
      'fanout.max_concurrency must be a positive integer',
    );
  });

  it('rejects a default budget below the minimum', () => {
    expect(() => parseConfig({ docs: { default_tokens: 100, minimum_tokens: 1000 } })).toThrow(
      'docs.default_tokens must not be below docs.minimum_tokens',
    );
  });

  it('rejects an out-of-range port', () => {
    expect(() => parseConfig({ server: { port: 70000 } })).toThrow(
      'server.port must be an integer between 1 and 65535',
    );
  });

  it('rejects an api_path without a leading slash', () => {
    expect(() => parseConfig({ server: { api_path: 'api' } })).toThrow(
      'server.api_path must start with "/"',
    );
  });

  it('defaults the MCP endpoint to /mcp', () => {
    expect(parseConfig({}).server.mcp_path).toBe('/mcp');
  });

  it('rejects an mcp_path without a leading slash', () => {
    expect(() => parseConfig({ server: { mcp_path: 'mcp' } })).toThrow(
      'server.mcp_path must start with "/"',
    );
  });

  it.each(['/api', '/api/mcp', '/'])('rejects mcp_path = %s overlapping the api path', (value) => {
    expect(() => parseConfig({ server: { mcp_path: value } })).toThrow(
      'server.mcp_path must not overlap server.api_path',
    );
  });

  it('rejects a non-boolean forward_client_ip', () => {
    expect(() => parseConfig({ server: { forward_client_ip: 'yes' } })).toThrow(
      'server.forward_client_ip must be a boolean',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => parseConfig({ logging: { level: 'trace' } })).toThrow(
      'Invalid logging.level: "trace". Must be one of: debug, info, warn, error',
    );
  });
});

// ---------------------------------------------------------------------------
// applyEnvOverrides()
// ---------------------------------------------------------------------------

describe('applyEnvOverrides', () => {
  it('replaces secrets from the environment', () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, {
      DOCS_BRIDGE_API_KEY: 'test-secret',
      DOCS_BRIDGE_ENCRYPTION_KEY: 'bb'.repeat(32),
    });
    expect(config.upstream.api_key).toBe('test-secret');
    expect(config.identity.encryption_key).toBe('bb'.repeat(32));
    expect(DEFAULT_CONFIG.upstream).not.toHaveProperty('api_key');
  });

  it('ignores empty variables', () => {
    const base = parseConfig({ upstream: { api_key: 'file-key' } });
    const config = applyEnvOverrides(base, { DOCS_BRIDGE_API_KEY: '' });
    expect(config.upstream.api_key).toBe('file-key');
  });
});
