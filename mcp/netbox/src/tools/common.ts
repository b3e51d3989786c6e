/**
 * Shared pieces for tool modules
 *
 * Argument validation plus the generic list / get-by-id tools that most
 * DCIM and IPAM collections are built from.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { InvalidArgumentsError } from '../lib/errors.js';
import type { NetBoxClient, QueryParams } from '../lib/netbox-client.js';
import { ok, type ToolResult } from '../lib/result.js';

export const DEFAULT_LIST_LIMIT = 50;

export type ToolArgs = Record<string, unknown>;

export type ToolHandler = (name: string, args: ToolArgs, client: NetBoxClient) => Promise<ToolResult>;

const queryScalar = z.union([z.string(), z.number(), z.boolean()]);

export const queryParamsSchema = z.record(z.string(), z.union([queryScalar, z.array(queryScalar), z.null()]));

export const objectIdSchema = z.number().int().positive();

export const endpointSchema = z
  .string()
  .min(1)
  .regex(/^[a-z0-9_\-/]+$/i, 'must be a NetBox API path such as "dcim/sites"');

export const fieldsSchema = z.record(z.string(), z.unknown());

export function parseArgs<S extends z.ZodTypeAny>(
  tool: string,
  schema: S,
  value: unknown,
  path?: string
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentsError(
      tool,
      parsed.error.issues.map((issue) => ({
        path: [path, ...issue.path].filter((part) => part !== undefined && part !== '').join('.'),
        message: issue.message,
      }))
    );
  }
  return parsed.data;
}

/**
 * Named filters first, then the caller's raw params on top: a key present
 * in both ends up with the raw value.
 */
export function buildListQuery(
  limit: number,
  filters: Record<string, number | undefined>,
  params?: QueryParams
): QueryParams {
  const query: QueryParams = { limit };
  for (const [key, value] of Object.entries(filters)) {
    if (value !== undefined) {
      query[key] = value;
    }
  }
  return { ...query, ...params };
}

// === Generic list tools ===

export interface ListToolSpec {
  name: string;
  collection: string;
  description: string;
  /** numeric filter argument → description */
  filters?: Record<string, string>;
}

const listArgsSchema = z
  .object({
    limit: z.number().int().positive().default(DEFAULT_LIST_LIMIT),
    params: queryParamsSchema.optional(),
  })
  .passthrough();

export function listToolDefinition(spec: ListToolSpec): Tool {
  const filterProperties: Record<string, object> = {};
  for (const [filter, description] of Object.entries(spec.filters ?? {})) {
    filterProperties[filter] = { type: 'number', description };
  }

  return {
    name: spec.name,
    description: spec.description,
    inputSchema: {
      type: 'object',
      properties: {
        limit: {
          type: 'number',
          description: `Maximum number of results (default: ${DEFAULT_LIST_LIMIT})`,
          default: DEFAULT_LIST_LIMIT,
        },
        ...filterProperties,
        params: {
          type: 'object',
          description:
            'Extra NetBox filters, e.g. {"status": "active", "tag": ["core"]}. Applied after the named filters, so they win on conflicts.',
          additionalProperties: true,
        },
      },
    },
  };
}

export async function listResources(client: NetBoxClient, spec: ListToolSpec, args: ToolArgs): Promise<ToolResult> {
  const { limit, params } = parseArgs(spec.name, listArgsSchema, args);

  const filters: Record<string, number | undefined> = {};
  for (const filter of Object.keys(spec.filters ?? {})) {
    const raw = args[filter];
    // 0 means "no filter"
    filters[filter] =
      raw === undefined || raw === null || raw === 0 ? undefined : parseArgs(spec.name, objectIdSchema, raw, filter);
  }

  return ok(await client.get(spec.collection, undefined, buildListQuery(limit, filters, params)));
}

// === Generic get-by-id tools ===

export interface GetToolSpec {
  name: string;
  collection: string;
  idArg: string;
  description: string;
}

export function getToolDefinition(spec: GetToolSpec): Tool {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: {
      type: 'object',
      properties: {
        [spec.idArg]: { type: 'number', description: 'Numeric NetBox object ID' },
      },
      required: [spec.idArg],
    },
  };
}

export async function getResource(client: NetBoxClient, spec: GetToolSpec, args: ToolArgs): Promise<ToolResult> {
  const id = parseArgs(spec.name, objectIdSchema, args[spec.idArg], spec.idArg);
  return ok(await client.get(spec.collection, id));
}
