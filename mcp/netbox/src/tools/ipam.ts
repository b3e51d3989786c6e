/**
 * IPAM Tools
 *
 * IP addresses, prefixes and VLANs.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { NetBoxClient } from '../lib/netbox-client.js';
import { ok, type ToolResult } from '../lib/result.js';
import { listResources, listToolDefinition, parseArgs, type ListToolSpec, type ToolArgs } from './common.js';

const IP_ADDRESSES: ListToolSpec = {
  name: 'get_ip_addresses',
  collection: 'ipam/ip-addresses',
  filters: { vrf_id: 'Only addresses in this VRF (VRF ID)' },
  description: `List IP addresses from NetBox IPAM.

Use for:
- Checking whether an address is already allocated (params: {"address": "10.0.0.1/24"})
- Addresses of a device (params: {"device_id": 12})
- Addresses inside a VRF (vrf_id)

Related tools:
- create_ip_address: Allocate a new address
- get_prefixes: Find the parent prefix`,
};

const PREFIXES: ListToolSpec = {
  name: 'get_prefixes',
  collection: 'ipam/prefixes',
  filters: { vrf_id: 'Only prefixes in this VRF (VRF ID)' },
  description: `List prefixes (subnets) from NetBox IPAM.

Use for:
- Subnet planning and utilization review
- Prefixes of a site (params: {"site_id": 3})
- Prefixes inside a VRF (vrf_id)

Related tools:
- get_ip_addresses: Addresses within a prefix (params: {"parent": "10.0.0.0/24"})
- get_vlans: VLANs bound to prefixes`,
};

const VLANS: ListToolSpec = {
  name: 'get_vlans',
  collection: 'ipam/vlans',
  filters: { site_id: 'Only VLANs at this site (site ID)' },
  description: `List VLANs from NetBox IPAM.

Use for:
- VLAN inventory of a site (site_id)
- Checking whether a VLAN ID is taken (params: {"vid": 100})

Related tools:
- get_sites: Find the site ID to filter on
- get_prefixes: Prefixes assigned to VLANs`,
};

const createIpAddressSchema = z.object({
  address: z.string().min(1),
  status: z.string().min(1).default('active'),
  description: z.string().default(''),
});

export const ipamTools: Tool[] = [
  listToolDefinition(IP_ADDRESSES),
  {
    name: 'create_ip_address',
    description: `Create a new IP address in NetBox.

The address must include its mask length (CIDR), e.g. "10.1.20.5/24".

Related tools:
- get_ip_addresses: Check the address is free first
- update_object: Assign it to an interface afterwards (endpoint "ipam/ip-addresses")`,
    inputSchema: {
      type: 'object',
      properties: {
        address: { type: 'string', description: 'Address with mask, e.g. "192.0.2.10/24"' },
        status: {
          type: 'string',
          description: 'active, reserved, deprecated, dhcp or slaac (default: active)',
          default: 'active',
        },
        description: { type: 'string', description: 'Free-text description' },
      },
      required: ['address'],
    },
  },
  listToolDefinition(PREFIXES),
  listToolDefinition(VLANS),
];

const LIST_TOOLS = new Map([IP_ADDRESSES, PREFIXES, VLANS].map((spec) => [spec.name, spec]));

export async function handleIpamTool(name: string, args: ToolArgs, client: NetBoxClient): Promise<ToolResult> {
  const list = LIST_TOOLS.get(name);
  if (list) return listResources(client, list, args);

  switch (name) {
    case 'create_ip_address': {
      const address = parseArgs(name, createIpAddressSchema, args);
      return ok(await client.create('ipam/ip-addresses', address));
    }

    default:
      throw new Error(`Unknown IPAM tool: ${name}`);
  }
}
