/**
 * Upstream documentation catalog types.
 *
 * Field names on {@link CatalogSearchHit} mirror the catalog's JSON so that
 * search responses can be passed through untouched.
 */

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

/** A single library match returned by the catalog's search endpoint. */
export interface CatalogSearchHit {
  title: string;
  id: string;
  description: string;
  totalSnippets?: number;
  trustScore?: number;
  versions?: string[];
}

/**
 * Decoded search response. A non-success upstream status yields an empty
 * `results` list with the status code in `error`.
 */
export interface CatalogSearchResult {
  results: CatalogSearchHit[];
  error?: string;
}

// ---------------------------------------------------------------------------
// Caller identity
// ---------------------------------------------------------------------------

/** Who an outbound call is made on behalf of. Both fields are optional. */
export interface CallerIdentity {
  /** Caller network address; encrypted into the `mcp-client-ip` header. */
  address?: string;
  /** Bearer credential for the catalog. */
  credential?: string;
}

// ---------------------------------------------------------------------------
// Lookup outcome
// ---------------------------------------------------------------------------

/**
 * Result of a single catalog lookup. Fan-out policies are expressed over
 * this variant instead of over thrown errors.
 */
export type LookupOutcome<T> =
  | { status: 'found'; value: T }
  | { status: 'not_found'; key: string }
  | { status: 'error'; error: unknown };
