/**
 * Renders catalog search hits as the plain-text summary handed back to the
 * assistant.
 */

import type { CatalogSearchHit, CatalogSearchResult } from '../types/catalog.js';

/** Line placed between two hit blocks. */
export const HIT_SEPARATOR = '\n----------\n';

function formatHit(hit: CatalogSearchHit): string {
  const lines = [
    `- Title: ${hit.title}`,
    `- ID: ${hit.id}`,
    `- Description: ${hit.description}`,
  ];
  if ((hit.totalSnippets ?? -1) > 0) {
    lines.push(`- Code Snippets: ${hit.totalSnippets}`);
  }
  if (hit.trustScore) {
    lines.push(`- Trust Score: ${hit.trustScore}`);
  }
  if (hit.versions && hit.versions.length > 0) {
    lines.push(`- Versions: ${hit.versions.join(', ')}`);
  }
  return lines.join('\n');
}

/** One block per hit, joined by {@link HIT_SEPARATOR}. Empty input gives `''`. */
export function formatSearchResults(result: CatalogSearchResult): string {
  return result.results.map(formatHit).join(HIT_SEPARATOR);
}
