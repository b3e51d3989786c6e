/**
 * DCIM Tools
 *
 * Sites, devices and device types.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { NetBoxClient } from '../lib/netbox-client.js';
import { ok, type ToolResult } from '../lib/result.js';
import {
  getResource,
  getToolDefinition,
  listResources,
  listToolDefinition,
  objectIdSchema,
  parseArgs,
  type GetToolSpec,
  type ListToolSpec,
  type ToolArgs,
} from './common.js';

const SITES: ListToolSpec = {
  name: 'get_sites',
  collection: 'dcim/sites',
  description: `List sites from NetBox DCIM.

Use for:
- Inventory of locations before placing devices
- Finding a site ID for create_device or script parameters
- Filtering by status, region or tenant via params (e.g. {"region": "europe"})

Returns the site objects of one page (id, name, slug, status, region, tenant, ...).

Related tools:
- get_site_by_id: Full record of one site
- search_for_object_id: Resolve a site name to its ID
- get_devices: Devices at a site (site_id filter)`,
};

const SITE_BY_ID: GetToolSpec = {
  name: 'get_site_by_id',
  collection: 'dcim/sites',
  idArg: 'site_id',
  description: `Get a single site by its numeric ID.

Related tools:
- get_sites: List sites to find IDs
- update_object: Change fields of the site (endpoint "dcim/sites")`,
};

const DEVICES: ListToolSpec = {
  name: 'get_devices',
  collection: 'dcim/devices',
  filters: { site_id: 'Only devices at this site (site ID)' },
  description: `List devices from NetBox DCIM.

Use for:
- Device inventory for a site (site_id)
- Finding a device ID for script parameters or updates
- Filtering by role, status, platform or tag via params

Related tools:
- get_device_by_id: Full record of one device
- get_sites: Find the site ID to filter on
- create_device: Add a device`,
};

const DEVICE_BY_ID: GetToolSpec = {
  name: 'get_device_by_id',
  collection: 'dcim/devices',
  idArg: 'device_id',
  description: `Get a single device by its numeric ID.

Related tools:
- get_devices: List devices to find IDs
- update_object: Change fields of the device (endpoint "dcim/devices")`,
};

const DEVICE_TYPES: ListToolSpec = {
  name: 'get_device_types',
  collection: 'dcim/device-types',
  filters: { manufacturer_id: 'Only device types from this manufacturer (manufacturer ID)' },
  description: `List device types (hardware models) from NetBox DCIM.

Use for:
- Finding the device_type_id required by create_device
- Checking which models of a manufacturer are modelled

Related tools:
- create_device: Needs a device type ID`,
};

const createSiteSchema = z.object({
  name: z.string().min(1),
  slug: z.string().min(1),
  status: z.string().min(1).default('active'),
  description: z.string().default(''),
});

const createDeviceSchema = z.object({
  name: z.string().min(1),
  device_type_id: objectIdSchema,
  site_id: objectIdSchema,
  role_id: objectIdSchema.optional(),
  status: z.string().min(1).default('active'),
});

export const dcimTools: Tool[] = [
  listToolDefinition(SITES),
  getToolDefinition(SITE_BY_ID),
  {
    name: 'create_site',
    description: `Create a new site in NetBox.

The slug must be unique and URL-safe (lowercase, digits, hyphens).

Related tools:
- get_sites: Check the site does not already exist
- find_custom_script: A provisioning script may create the site with floors, VLANs, prefixes`,
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Site name' },
        slug: { type: 'string', description: 'URL-friendly unique identifier, e.g. "dc-east-01"' },
        status: {
          type: 'string',
          description: 'planned, staging, active, decommissioning or retired (default: active)',
          default: 'active',
        },
        description: { type: 'string', description: 'Free-text description' },
      },
      required: ['name', 'slug'],
    },
  },
  listToolDefinition(DEVICES),
  getToolDefinition(DEVICE_BY_ID),
  {
    name: 'create_device',
    description: `Create a new device in NetBox.

Requires numeric IDs, not names:
- device_type_id: from get_device_types
- site_id: from get_sites or search_for_object_id("dcim/sites", name)
- role_id: from search_for_object_id("dcim/device-roles", name); mandatory on NetBox 4.x

Related tools:
- get_devices: Verify the device after creation`,
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Device name' },
        device_type_id: { type: 'number', description: 'Device type ID' },
        site_id: { type: 'number', description: 'Site ID' },
        role_id: { type: 'number', description: 'Device role ID' },
        status: { type: 'string', description: 'Device status (default: active)', default: 'active' },
      },
      required: ['name', 'device_type_id', 'site_id'],
    },
  },
  listToolDefinition(DEVICE_TYPES),
];

const LIST_TOOLS = new Map([SITES, DEVICES, DEVICE_TYPES].map((spec) => [spec.name, spec]));
const GET_TOOLS = new Map([SITE_BY_ID, DEVICE_BY_ID].map((spec) => [spec.name, spec]));

export async function handleDcimTool(name: string, args: ToolArgs, client: NetBoxClient): Promise<ToolResult> {
  const list = LIST_TOOLS.get(name);
  if (list) return listResources(client, list, args);

  const byId = GET_TOOLS.get(name);
  if (byId) return getResource(client, byId, args);

  switch (name) {
    case 'create_site': {
      const site = parseArgs(name, createSiteSchema, args);
      return ok(await client.create('dcim/sites', site));
    }

    case 'create_device': {
      const input = parseArgs(name, createDeviceSchema, args);
      const device: Record<string, unknown> = {
        name: input.name,
        device_type: input.device_type_id,
        site: input.site_id,
        status: input.status,
      };
      if (input.role_id !== undefined) {
        device.role = input.role_id;
      }
      return ok(await client.create('dcim/devices', device));
    }

    default:
      throw new Error(`Unknown DCIM tool: ${name}`);
  }
}
