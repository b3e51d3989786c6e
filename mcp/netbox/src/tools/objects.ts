/**
 * Generic Object Tools
 *
 * Endpoint-agnostic search, update, delete and bulk operations for any
 * NetBox collection ("dcim/sites", "ipam/vlans", "tenancy/tenants", ...).
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { NetBoxClient } from '../lib/netbox-client.js';
import { findByName } from '../lib/resolver.js';
import { fail, ok, type ToolResult } from '../lib/result.js';
import { endpointSchema, fieldsSchema, objectIdSchema, parseArgs, type ToolArgs } from './common.js';

export const DEFAULT_SEARCH_LIMIT = 25;

const endpointProperty = {
  type: 'string',
  description: 'NetBox API endpoint, e.g. "dcim/sites", "dcim/devices", "ipam/prefixes", "tenancy/tenants"',
};

const searchSchema = z.object({
  endpoint: endpointSchema,
  query: z.string().min(1),
  limit: z.number().int().positive().default(DEFAULT_SEARCH_LIMIT),
});

const searchIdSchema = z.object({
  endpoint: endpointSchema,
  search_name: z.string().min(1),
  name_field: z.string().min(1).default('name'),
});

const updateSchema = z.object({
  endpoint: endpointSchema,
  object_id: objectIdSchema,
  data: fieldsSchema,
});

const deleteSchema = z.object({
  endpoint: endpointSchema,
  object_id: objectIdSchema,
});

const bulkCreateSchema = z.object({
  endpoint: endpointSchema,
  objects: z.array(fieldsSchema).min(1),
});

const bulkUpdateSchema = z.object({
  endpoint: endpointSchema,
  objects: z.array(z.object({ id: objectIdSchema }).passthrough()).min(1),
});

const bulkDeleteSchema = z.object({
  endpoint: endpointSchema,
  object_ids: z.array(objectIdSchema).min(1),
});

export const objectTools: Tool[] = [
  {
    name: 'search_objects',
    description: `Free-text search within any NetBox endpoint (NetBox's "q" filter).

Use for:
- Finding objects when you only know part of a name, description or address
- Quick lookups across collections that have no dedicated tool

Related tools:
- search_for_object_id: Same search, trimmed to id/name/display/url`,
    inputSchema: {
      type: 'object',
      properties: {
        endpoint: endpointProperty,
        query: { type: 'string', description: 'Search text' },
        limit: {
          type: 'number',
          description: `Maximum number of results (default: ${DEFAULT_SEARCH_LIMIT})`,
          default: DEFAULT_SEARCH_LIMIT,
        },
      },
      required: ['endpoint', 'query'],
    },
  },
  {
    name: 'search_for_object_id',
    description: `Resolve an object name to its numeric NetBox ID.

ObjectVar script parameters and most write operations need IDs, not names.
Returns up to 10 matches as { id, name, display, url }.

Example:
  search_for_object_id("tenancy/tenants", "Acme Corp")  -> matches[0].id
  search_for_object_id("dcim/regions", "Europe")

Related tools:
- get_script_variables: Tells which parameters need an ID and which endpoint to search
- execute_custom_script: Pass the IDs found here`,
    inputSchema: {
      type: 'object',
      properties: {
        endpoint: endpointProperty,
        search_name: { type: 'string', description: 'Name (or part of it) to search for' },
        name_field: {
          type: 'string',
          description: 'Field reported as "name" in the matches, e.g. "address" for IP addresses (default: name)',
          default: 'name',
        },
      },
      required: ['endpoint', 'search_name'],
    },
  },
  {
    name: 'update_object',
    description: `Update fields of an existing NetBox object (partial update).

Only the supplied fields change. References to other objects take IDs,
e.g. {"site": 3, "status": "offline"}.

Related tools:
- bulk_update_objects: Same change on many objects in one request`,
    inputSchema: {
      type: 'object',
      properties: {
        endpoint: endpointProperty,
        object_id: { type: 'number', description: 'ID of the object to update' },
        data: { type: 'object', description: 'Fields to change', additionalProperties: true },
      },
      required: ['endpoint', 'object_id', 'data'],
    },
  },
  {
    name: 'delete_object',
    description: `Delete a NetBox object.

WARNING: Permanent. NetBox may cascade the delete to dependent objects
(e.g. deleting a device removes its interfaces).

Related tools:
- bulk_delete_objects: Delete several objects of one endpoint at once`,
    inputSchema: {
      type: 'object',
      properties: {
        endpoint: endpointProperty,
        object_id: { type: 'number', description: 'ID of the object to delete' },
      },
      required: ['endpoint', 'object_id'],
    },
  },
  {
    name: 'bulk_create_objects',
    description: `Create several objects of one endpoint in a single request.

NetBox validates the whole batch; if any object is rejected nothing is created.

Related tools:
- create_site, create_device, create_ip_address: Single-object shortcuts`,
    inputSchema: {
      type: 'object',
      properties: {
        endpoint: endpointProperty,
        objects: {
          type: 'array',
          items: { type: 'object', additionalProperties: true },
          description: 'Objects to create',
        },
      },
      required: ['endpoint', 'objects'],
    },
  },
  {
    name: 'bulk_update_objects',
    description: `Update several objects of one endpoint in a single request.

Each entry must carry the object's "id" plus the fields to change.

Related tools:
- update_object: Single-object update`,
    inputSchema: {
      type: 'object',
      properties: {
        endpoint: endpointProperty,
        objects: {
          type: 'array',
          items: {
            type: 'object',
            properties: { id: { type: 'number' } },
            required: ['id'],
            additionalProperties: true,
          },
          description: 'Partial objects, each with its id',
        },
      },
      required: ['endpoint', 'objects'],
    },
  },
  {
    name: 'bulk_delete_objects',
    description: `Delete several objects of one endpoint in a single request.

WARNING: Permanent.

Related tools:
- delete_object: Single-object delete`,
    inputSchema: {
      type: 'object',
      properties: {
        endpoint: endpointProperty,
        object_ids: { type: 'array', items: { type: 'number' }, description: 'IDs to delete' },
      },
      required: ['endpoint', 'object_ids'],
    },
  },
];

export async function handleObjectTool(name: string, args: ToolArgs, client: NetBoxClient): Promise<ToolResult> {
  switch (name) {
    case 'search_objects': {
      const { endpoint, query, limit } = parseArgs(name, searchSchema, args);
      return ok(await client.get(endpoint, undefined, { q: query, limit }));
    }

    case 'search_for_object_id': {
      const { endpoint, search_name, name_field } = parseArgs(name, searchIdSchema, args);
      const matches = await findByName(client, endpoint, search_name, name_field);
      return ok(matches, { endpoint, search_name, count: matches.length });
    }

    case 'update_object': {
      const { endpoint, object_id, data } = parseArgs(name, updateSchema, args);
      return ok(await client.update(endpoint, object_id, data));
    }

    case 'delete_object': {
      const { endpoint, object_id } = parseArgs(name, deleteSchema, args);
      const deleted = await client.delete(endpoint, object_id);
      if (!deleted) {
        return fail(`Deletion of ${endpoint} ${object_id} was not confirmed: NetBox did not answer 204 No Content`);
      }
      return ok({ endpoint, object_id, deleted }, { message: `Object ${object_id} deleted` });
    }

    case 'bulk_create_objects': {
      const { endpoint, objects } = parseArgs(name, bulkCreateSchema, args);
      const created = await client.bulkCreate(endpoint, objects);
      return ok(created, { count: created.length });
    }

    case 'bulk_update_objects': {
      const { endpoint, objects } = parseArgs(name, bulkUpdateSchema, args);
      const updated = await client.bulkUpdate(endpoint, objects);
      return ok(updated, { count: updated.length });
    }

    case 'bulk_delete_objects': {
      const { endpoint, object_ids } = parseArgs(name, bulkDeleteSchema, args);
      const deleted = await client.bulkDelete(endpoint, object_ids);
      if (!deleted) {
        return fail(`Bulk deletion on ${endpoint} was not confirmed: NetBox did not answer 204 No Content`);
      }
      return ok({ endpoint, object_ids, deleted }, { message: `${object_ids.length} objects deleted` });
    }

    default:
      throw new Error(`Unknown object tool: ${name}`);
  }
}
