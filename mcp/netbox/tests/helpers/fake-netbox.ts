/**
 * In-process stand-in for the NetBox REST API.
 *
 * Keeps collections in memory and answers the same URL shapes the client
 * produces (`/api/<collection>/[<id>|bulk]/`). Install with
 * `vi.stubGlobal('fetch', vi.fn(fake.fetch))`.
 */

import type { NetBoxConfig } from '../../src/lib/config.js';
import type { JsonObject } from '../../src/lib/netbox-client.js';

export const TEST_BASE_URL = 'https://netbox.test';

export const testConfig: NetBoxConfig = {
  url: TEST_BASE_URL,
  token: 'test-secret',
  authScheme: 'Token',
  verifySsl: true,
  timeoutMs: 5000,
};

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  204: 'No Content',
  400: 'Bad Request',
  404: 'Not Found',
  405: 'Method Not Allowed',
  500: 'Internal Server Error',
};

export function jsonResponse(status: number, body?: unknown): Response {
  return new Response(status === 204 || body === undefined ? null : JSON.stringify(body), {
    status,
    statusText: STATUS_TEXT[status] ?? '',
    headers: { 'Content-Type': 'application/json' },
  });
}

export interface RecordedCall {
  method: string;
  /** pathname, e.g. /api/dcim/sites/ */
  path: string;
  query: URLSearchParams;
  headers: Headers;
  body: unknown;
}

interface CannedResponse {
  method: string;
  path: string;
  status: number;
  body?: unknown;
}

interface Route {
  collection: string;
  id?: number;
  bulk: boolean;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

function parseRoute(pathname: string): Route | null {
  const segments = pathname.split('/').filter(Boolean);
  if (segments[0] !== 'api' || segments.length < 2) return null;
  const rest = segments.slice(1);
  const last = rest[rest.length - 1];

  if (last === 'bulk') {
    return { collection: rest.slice(0, -1).join('/'), bulk: true };
  }
  if (/^\d+$/.test(last)) {
    return { collection: rest.slice(0, -1).join('/'), id: Number(last), bulk: false };
  }
  return { collection: rest.join('/'), bulk: false };
}

function matchesQuery(object: JsonObject, q: string): boolean {
  const needle = q.toLowerCase();
  return Object.values(object).some((value) => typeof value === 'string' && value.toLowerCase().includes(needle));
}

export class FakeNetBox {
  readonly calls: RecordedCall[] = [];
  private readonly collections = new Map<string, Map<number, JsonObject>>();
  private readonly counters = new Map<string, number>();
  private readonly canned: CannedResponse[] = [];

  /** Add objects; objects without a numeric id get the next free one. */
  seed(collection: string, objects: JsonObject[]): JsonObject[] {
    return objects.map((object) => this.store(collection, object));
  }

  /** Answer `method path` with a fixed response instead of the in-memory behavior. */
  respondWith(method: string, path: string, status: number, body?: unknown): void {
    this.canned.push({ method, path, status, body });
  }

  objects(collection: string): JsonObject[] {
    return [...(this.collections.get(collection)?.values() ?? [])];
  }

  lastCall(): RecordedCall | undefined {
    return this.calls[this.calls.length - 1];
  }

  fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = requestUrl(input);
    const method = (init?.method ?? 'GET').toUpperCase();
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;

    this.calls.push({
      method,
      path: url.pathname,
      query: url.searchParams,
      headers: new Headers(init?.headers),
      body,
    });

    const canned = this.canned.find((entry) => entry.method === method && entry.path === url.pathname);
    if (canned) {
      return jsonResponse(canned.status, canned.body);
    }

    const route = parseRoute(url.pathname);
    if (!route) {
      return jsonResponse(404, { detail: 'Not found.' });
    }

    if (route.collection === 'status' && method === 'GET') {
      return jsonResponse(200, { 'netbox-version': '4.1.0', plugins: {} });
    }

    if (route.bulk) {
      return this.handleBulk(method, route.collection, body);
    }
    if (route.id !== undefined) {
      return this.handleObject(method, route.collection, route.id, body);
    }
    return this.handleCollection(method, route.collection, url.searchParams, body);
  };

  private table(collection: string): Map<number, JsonObject> {
    let table = this.collections.get(collection);
    if (!table) {
      table = new Map();
      this.collections.set(collection, table);
    }
    return table;
  }

  private store(collection: string, fields: JsonObject): JsonObject {
    const current = this.counters.get(collection) ?? 0;
    const id = typeof fields.id === 'number' ? fields.id : current + 1;
    this.counters.set(collection, Math.max(current, id));

    const object: JsonObject = {
      ...fields,
      id,
      url: `${TEST_BASE_URL}/api/${collection}/${id}/`,
      display: fields.display ?? fields.name ?? `${collection} ${id}`,
    };
    this.table(collection).set(id, object);
    return object;
  }

  private handleCollection(method: string, collection: string, query: URLSearchParams, body: unknown): Response {
    if (method === 'GET') {
      const q = query.get('q');
      const limit = Number(query.get('limit') ?? '50');
      const matching = this.objects(collection).filter((object) => q === null || matchesQuery(object, q));
      // limit=0 asks for everything
      return jsonResponse(200, {
        count: matching.length,
        next: null,
        previous: null,
        results: limit === 0 ? matching : matching.slice(0, limit),
      });
    }
    if (method === 'POST' && isObject(body)) {
      return jsonResponse(201, this.store(collection, body));
    }
    return jsonResponse(405, { detail: `Method "${method}" not allowed.` });
  }

  private handleObject(method: string, collection: string, id: number, body: unknown): Response {
    const table = this.table(collection);
    const existing = table.get(id);
    if (!existing) {
      return jsonResponse(404, { detail: 'Not found.' });
    }

    switch (method) {
      case 'GET':
        return jsonResponse(200, existing);
      case 'PATCH': {
        if (!isObject(body)) return jsonResponse(400, { detail: 'Expected an object.' });
        const updated = { ...existing, ...body, id };
        table.set(id, updated);
        return jsonResponse(200, updated);
      }
      case 'DELETE':
        table.delete(id);
        return jsonResponse(204);
      default:
        return jsonResponse(405, { detail: `Method "${method}" not allowed.` });
    }
  }

  private handleBulk(method: string, collection: string, body: unknown): Response {
    if (!Array.isArray(body) || !body.every(isObject)) {
      return jsonResponse(400, { detail: 'Expected a list of objects.' });
    }
    const table = this.table(collection);

    switch (method) {
      case 'POST':
        return jsonResponse(201, body.map((fields) => this.store(collection, fields)));
      case 'PATCH': {
        const updated: JsonObject[] = [];
        for (const fields of body) {
          const id = fields.id;
          const existing = typeof id === 'number' ? table.get(id) : undefined;
          if (typeof id !== 'number' || !existing) {
            return jsonResponse(400, { detail: `Object ${String(id)} does not exist.` });
          }
          const merged = { ...existing, ...fields };
          table.set(id, merged);
          updated.push(merged);
        }
        return jsonResponse(200, updated);
      }
      case 'DELETE':
        for (const { id } of body) {
          if (typeof id === 'number') table.delete(id);
        }
        return jsonResponse(204);
      default:
        return jsonResponse(405, { detail: `Method "${method}" not allowed.` });
    }
  }
}
