/**
 * Name → id lookup
 *
 * Script parameters and write operations want numeric references; agents
 * usually know names. Matching is NetBox's own `q` search.
 */

import type { NetBoxClient } from './netbox-client.js';

export const RESOLVER_LIMIT = 10;

export interface ObjectMatch {
  id: unknown;
  name: unknown;
  display: unknown;
  url: unknown;
}

export async function findByName(
  client: NetBoxClient,
  collection: string,
  query: string,
  nameField = 'name'
): Promise<ObjectMatch[]> {
  const matches = await client.get(collection, undefined, { q: query, limit: RESOLVER_LIMIT });

  return matches.map((match) => ({
    id: match.id ?? null,
    name: match[nameField] || match.display || null,
    display: match.display ?? null,
    url: match.url ?? null,
  }));
}
