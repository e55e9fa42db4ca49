/**
 * CatalogClient: HTTP client for the upstream documentation catalog.
 *
 * Two operations: `search` (library name → candidate hits) and `fetchDocs`
 * (library id → documentation text). Neither throws on a status other
 * than 200; callers inspect emptiness instead. Transport failures
 * (DNS, connection reset, abort) do propagate.
 */

import type {
  CallerIdentity,
  CatalogSearchHit,
  CatalogSearchResult,
  LookupOutcome,
} from '../types/catalog.js';
import { buildHeaders } from './identity-headers.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The subset of the global `fetch` the client relies on. */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface CatalogClientOptions {
  /** Catalog base URL without trailing slash, e.g. `https://context7.com/api`. */
  baseUrl: string;
  /** Token budgets below this are raised to it before sending. */
  minimumTokens: number;
  /** Budget used when a caller does not specify one. */
  defaultTokens: number;
  /** AES key for the caller-identity header. */
  encryptionKey?: Uint8Array;
  /** Defaults to the global `fetch`. */
  fetch?: FetchFn;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Bodies the catalog returns with a 200 status when it has nothing for the
 * requested id.
 */
export const NO_CONTENT_SENTINELS: ReadonlySet<string> = new Set([
  'No content available',
  'No context data available',
]);

/** Sent on every documentation fetch. */
export const SOURCE_HEADERS: Readonly<Record<string, string>> = {
  'X-Context7-Source': 'mcp-server',
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Strip a single leading `/` from a library id. */
export function normalizeLibraryId(libraryId: string): string {
  return libraryId.startsWith('/') ? libraryId.slice(1) : libraryId;
}

/** Release an unread body so the connection goes back to the pool. */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSearchResult(body: unknown): CatalogSearchResult {
  if (!isRecord(body)) return { results: [] };

  const results: CatalogSearchHit[] = [];
  if (Array.isArray(body['results'])) {
    for (const raw of body['results']) {
      if (!isRecord(raw)) continue;
      const hit: CatalogSearchHit = {
        title: typeof raw['title'] === 'string' ? raw['title'] : '',
        id: typeof raw['id'] === 'string' ? raw['id'] : '',
        description: typeof raw['description'] === 'string' ? raw['description'] : '',
      };
      if (typeof raw['totalSnippets'] === 'number') hit.totalSnippets = raw['totalSnippets'];
      if (typeof raw['trustScore'] === 'number') hit.trustScore = raw['trustScore'];
      if (Array.isArray(raw['versions'])) {
        hit.versions = raw['versions'].filter((v): v is string => typeof v === 'string');
      }
      results.push(hit);
    }
  }

  const result: CatalogSearchResult = { results };
  if (typeof body['error'] === 'string') result.error = body['error'];
  return result;
}

// ---------------------------------------------------------------------------
// CatalogClient
// ---------------------------------------------------------------------------

export class CatalogClient {
  private readonly baseUrl: string;
  private readonly minimumTokens: number;
  readonly defaultTokens: number;
  private readonly encryptionKey?: Uint8Array;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: CatalogClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.minimumTokens = options.minimumTokens;
    this.defaultTokens = options.defaultTokens;
    this.encryptionKey = options.encryptionKey;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? createLogger('catalog-client');
  }

  /** Clamp a requested token budget to the configured minimum. */
  clampTokens(tokenBudget: number): number {
    return Math.max(tokenBudget, this.minimumTokens);
  }

  /**
   * Search the catalog for libraries matching `name`.
   *
   * Any status other than 200 returns `{ results: [], error: "<status>" }`.
   */
  async search(
    name: string,
    identity: CallerIdentity = {},
    signal?: AbortSignal,
  ): Promise<CatalogSearchResult> {
    const url = new URL(`${this.baseUrl}/v1/search`);
    url.searchParams.set('query', name);

    const response = await this.fetchFn(url.toString(), {
      method: 'GET',
      headers: this.headersFor(identity),
      signal,
    });

    if (response.status !== 200) {
      await discardBody(response);
      this.logger.warn('search failed upstream', { query: name, status: response.status });
      return { results: [], error: String(response.status) };
    }

    const result = toSearchResult(await response.json());
    this.logger.debug('search', { query: name, hits: result.results.length });
    return result;
  }

  /**
   * Fetch documentation text for a library id.
   *
   * @returns The text, or `null` when the catalog has nothing: a status
   *   other than 200, an empty body, or one of {@link NO_CONTENT_SENTINELS}.
   */
  async fetchDocs(
    libraryId: string,
    tokenBudget: number,
    topic: string,
    identity: CallerIdentity = {},
    signal?: AbortSignal,
  ): Promise<string | null> {
    const id = normalizeLibraryId(libraryId);
    const url = new URL(`${this.baseUrl}/v1/${id}`);
    url.searchParams.set('tokens', String(this.clampTokens(tokenBudget)));
    url.searchParams.set('topic', topic);
    url.searchParams.set('type', 'txt');

    const response = await this.fetchFn(url.toString(), {
      method: 'GET',
      headers: this.headersFor(identity, SOURCE_HEADERS),
      signal,
    });

    if (response.status !== 200) {
      await discardBody(response);
      this.logger.warn('docs fetch failed upstream', { libraryId: id, status: response.status });
      return null;
    }

    const text = await response.text();
    if (text.length === 0 || NO_CONTENT_SENTINELS.has(text)) {
      this.logger.debug('no documentation', { libraryId: id, topic });
      return null;
    }
    return text;
  }

  /** {@link search}, classified: zero hits is `not_found`. */
  async lookupLibrary(
    name: string,
    identity: CallerIdentity = {},
    signal?: AbortSignal,
  ): Promise<LookupOutcome<CatalogSearchResult>> {
    try {
      const result = await this.search(name, identity, signal);
      return result.results.length > 0
        ? { status: 'found', value: result }
        : { status: 'not_found', key: name };
    } catch (error: unknown) {
      return { status: 'error', error };
    }
  }

  /** {@link fetchDocs}, classified: no text is `not_found`. */
  async lookupDocs(
    libraryId: string,
    tokenBudget: number,
    topic: string,
    identity: CallerIdentity = {},
    signal?: AbortSignal,
  ): Promise<LookupOutcome<string>> {
    try {
      const text = await this.fetchDocs(libraryId, tokenBudget, topic, identity, signal);
      return text === null ? { status: 'not_found', key: libraryId } : { status: 'found', value: text };
    } catch (error: unknown) {
      return { status: 'error', error };
    }
  }

  private headersFor(
    identity: CallerIdentity,
    extra?: Readonly<Record<string, string>>,
  ): Record<string, string> {
    return buildHeaders({
      address: identity.address,
      credential: identity.credential,
      extra,
      key: this.encryptionKey,
    });
  }
}
