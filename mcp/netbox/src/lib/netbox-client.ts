/**
 * NetBox API Client
 *
 * `NetBoxClient` is the CRUD surface the tools depend on. `NetBoxRestClient`
 * implements it over the REST API with token authentication; another backend
 * (an in-process fake in tests, for example) only has to satisfy the interface.
 */

import type { NetBoxConfig } from './config.js';
import { MalformedResponseError, TransportError } from './errors.js';
import { log } from './logger.js';

export type JsonObject = Record<string, unknown>;

export type QueryScalar = string | number | boolean;
export type QueryValue = QueryScalar | QueryScalar[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

export type ObjectId = number;

export interface NetBoxClient {
  /** Fetch one object by id */
  get(collection: string, id: ObjectId, params?: QueryParams): Promise<JsonObject>;
  /** List a collection; page wrappers are unwrapped to the bare result list */
  get(collection: string, id?: undefined, params?: QueryParams): Promise<JsonObject[]>;
  create(collection: string, fields: JsonObject): Promise<JsonObject>;
  /** Partial update (PATCH): only the supplied fields change */
  update(collection: string, id: ObjectId, fields: JsonObject): Promise<JsonObject>;
  /** true when NetBox answers 204 No Content */
  delete(collection: string, id: ObjectId): Promise<boolean>;
  bulkCreate(collection: string, items: JsonObject[]): Promise<JsonObject[]>;
  /** Each item must carry its `id` */
  bulkUpdate(collection: string, items: JsonObject[]): Promise<JsonObject[]>;
  bulkDelete(collection: string, ids: ObjectId[]): Promise<boolean>;
  /** GET /api/status/ */
  status(): Promise<JsonObject>;
}

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

interface RawResponse {
  status: number;
  body: unknown;
}

const MAX_ERROR_DETAIL = 500;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonObjectArray(value: unknown): value is JsonObject[] {
  return Array.isArray(value) && value.every(isJsonObject);
}

/**
 * Accept either a bare array or a `{ results: [...] }` page.
 * Any other shape is logged and treated as an empty list.
 */
export function normalizeList(payload: unknown, source: string): JsonObject[] {
  if (isJsonObjectArray(payload)) {
    return payload;
  }
  const results = isJsonObject(payload) ? payload.results : undefined;
  if (isJsonObjectArray(results)) {
    return results;
  }
  const error = new MalformedResponseError(`Unexpected list payload from ${source}`);
  log.warn(error.message, {
    kind: error.name,
    shape: Array.isArray(payload) ? 'array' : typeof payload,
  });
  return [];
}

export function buildQuery(params: QueryParams | undefined): string {
  if (!params) return '';
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    if (Array.isArray(value)) {
      value.forEach((item) => search.append(key, String(item)));
    } else {
      search.append(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

function errorDetail(body: string): string {
  if (!body) return '';
  try {
    const parsed: unknown = JSON.parse(body);
    const detail = isJsonObject(parsed) ? parsed.detail : undefined;
    if (typeof detail === 'string') {
      return `: ${detail}`;
    }
  } catch {
    // not JSON, fall through to the raw text
  }
  const trimmed = body.trim();
  return trimmed.length > MAX_ERROR_DETAIL
    ? `: ${trimmed.slice(0, MAX_ERROR_DETAIL)}...`
    : `: ${trimmed}`;
}

export class NetBoxRestClient implements NetBoxClient {
  private readonly apiUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(config: NetBoxConfig) {
    if (!config.url) {
      throw new Error('NetBox URL is required');
    }
    this.apiUrl = `${config.url.replace(/\/+$/, '')}/api`;
    this.timeoutMs = config.timeoutMs;
    this.headers = {
      Authorization: `${config.authScheme} ${config.token}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }

  /**
   * `<base>/api/<collection>/[<id>/]`, always with a trailing slash
   */
  buildUrl(collection: string, id?: ObjectId): string {
    const path = collection.replace(/^\/+|\/+$/g, '');
    return id === undefined ? `${this.apiUrl}/${path}/` : `${this.apiUrl}/${path}/${id}/`;
  }

  private bulkUrl(collection: string): string {
    return `${this.buildUrl(collection)}bulk/`;
  }

  private async request(method: HttpMethod, url: string, body?: unknown): Promise<RawResponse> {
    log.debug('NetBox request', { method, url });

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new TransportError(`NetBox request timed out after ${this.timeoutMs}ms: ${method} ${url}`);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`NetBox request failed: ${method} ${url}: ${reason}`);
    }

    const text = await response.text();

    if (!response.ok) {
      throw new TransportError(
        `NetBox API error: ${response.status} ${response.statusText}${errorDetail(text)}`,
        response.status,
        response.statusText
      );
    }

    if (!text) {
      return { status: response.status, body: null };
    }

    try {
      return { status: response.status, body: JSON.parse(text) };
    } catch {
      throw new MalformedResponseError(`NetBox returned invalid JSON for ${method} ${url}`);
    }
  }

  private expectObject(payload: unknown, what: string): JsonObject {
    if (!isJsonObject(payload)) {
      throw new MalformedResponseError(`Expected a JSON object from ${what}`);
    }
    return payload;
  }

  get(collection: string, id: ObjectId, params?: QueryParams): Promise<JsonObject>;
  get(collection: string, id?: undefined, params?: QueryParams): Promise<JsonObject[]>;
  async get(collection: string, id?: ObjectId, params?: QueryParams): Promise<JsonObject | JsonObject[]> {
    const url = `${this.buildUrl(collection, id)}${buildQuery(params)}`;
    const { body } = await this.request('GET', url);
    if (id === undefined) {
      return normalizeList(body, collection);
    }
    return this.expectObject(body, `${collection}/${id}`);
  }

  async create(collection: string, fields: JsonObject): Promise<JsonObject> {
    const { body } = await this.request('POST', this.buildUrl(collection), fields);
    return this.expectObject(body, `POST ${collection}`);
  }

  async update(collection: string, id: ObjectId, fields: JsonObject): Promise<JsonObject> {
    const { body } = await this.request('PATCH', this.buildUrl(collection, id), fields);
    return this.expectObject(body, `PATCH ${collection}/${id}`);
  }

  async delete(collection: string, id: ObjectId): Promise<boolean> {
    const { status } = await this.request('DELETE', this.buildUrl(collection, id));
    return status === 204;
  }

  async bulkCreate(collection: string, items: JsonObject[]): Promise<JsonObject[]> {
    const { body } = await this.request('POST', this.bulkUrl(collection), items);
    return normalizeList(body, `${collection}/bulk`);
  }

  async bulkUpdate(collection: string, items: JsonObject[]): Promise<JsonObject[]> {
    const { body } = await this.request('PATCH', this.bulkUrl(collection), items);
    return normalizeList(body, `${collection}/bulk`);
  }

  async bulkDelete(collection: string, ids: ObjectId[]): Promise<boolean> {
    const { status } = await this.request(
      'DELETE',
      this.bulkUrl(collection),
      ids.map((id) => ({ id }))
    );
    return status === 204;
  }

  async status(): Promise<JsonObject> {
    const { body } = await this.request('GET', this.buildUrl('status'));
    return this.expectObject(body, 'status');
  }
}
