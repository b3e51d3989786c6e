/**
 * Custom script catalog
 *
 * Normalizes NetBox's script list, explains each script variable to the
 * agent (ObjectVar parameters need ids, not names) and ranks scripts
 * against a free-text query. The catalog is fetched on every call.
 */

import { NotFoundError } from './errors.js';
import { isJsonObject, type JsonObject, type NetBoxClient } from './netbox-client.js';

export const SCRIPTS_ENDPOINT = 'extras/scripts';

/** Numeric on NetBox 4.x, "module.ClassName" on older releases */
export type ScriptId = number | string;

export interface ScriptDescriptor {
  id: ScriptId | null;
  name: string;
  description: string;
  display: string;
  module: string | number | null;
  /** variable name → NetBox variable class, e.g. { tenant: 'ObjectVar' } */
  vars: Record<string, string>;
  is_executable: boolean;
  last_result: unknown;
}

export type VariableKind = 'object-reference' | 'string' | 'integer' | 'boolean' | 'other';

export interface VariableGuidance {
  type: string;
  kind: VariableKind;
  required: true;
  help: string;
  example: string;
  lookup_endpoint?: string;
}

export interface ScriptVariables {
  script_id: ScriptId;
  script_name: string;
  description: string;
  variables: Record<string, VariableGuidance>;
}

const KIND_BY_TYPE = new Map<string, VariableKind>([
  ['ObjectVar', 'object-reference'],
  ['MultiObjectVar', 'object-reference'],
  ['StringVar', 'string'],
  ['TextVar', 'string'],
  ['IntegerVar', 'integer'],
  ['BooleanVar', 'boolean'],
]);

interface ObjectLookup {
  keyword: string;
  endpoint: string;
  listTool?: string;
}

// Checked in order; the first keyword found in the variable name wins.
const OBJECT_LOOKUPS: readonly ObjectLookup[] = [
  { keyword: 'tenant', endpoint: 'tenancy/tenants' },
  { keyword: 'region', endpoint: 'dcim/regions' },
  { keyword: 'site', endpoint: 'dcim/sites', listTool: 'get_sites()' },
  { keyword: 'device', endpoint: 'dcim/devices', listTool: 'get_devices()' },
];

function asString(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function asScriptId(value: unknown): ScriptId | null {
  return typeof value === 'number' || typeof value === 'string' ? value : null;
}

function asVars(value: unknown): Record<string, string> {
  if (!isJsonObject(value)) return {};
  const vars: Record<string, string> = {};
  for (const [name, type] of Object.entries(value)) {
    vars[name] = typeof type === 'string' ? type : String(type);
  }
  return vars;
}

export function normalizeScript(raw: JsonObject): ScriptDescriptor {
  const module = raw.module;
  return {
    id: asScriptId(raw.id),
    name: asString(raw.name),
    description: asString(raw.description),
    display: asString(raw.display),
    module: typeof module === 'string' || typeof module === 'number' ? module : null,
    vars: asVars(raw.vars),
    is_executable: raw.is_executable === true,
    last_result: raw.result ?? null,
  };
}

export async function listScripts(client: NetBoxClient): Promise<ScriptDescriptor[]> {
  // limit=0: the whole catalog, up to NetBox's MAX_PAGE_SIZE
  const scripts = await client.get(SCRIPTS_ENDPOINT, undefined, { limit: 0 });
  return scripts.map(normalizeScript);
}

export function variableKind(type: string): VariableKind {
  return KIND_BY_TYPE.get(type) ?? 'other';
}

function objectReferenceGuidance(name: string, type: string): VariableGuidance {
  const lowered = name.toLowerCase();
  const lookup = OBJECT_LOOKUPS.find((candidate) => lowered.includes(candidate.keyword));

  if (!lookup) {
    return {
      type,
      kind: 'object-reference',
      required: true,
      help: `Use search_for_object_id() on the matching endpoint to find the ${name} object ID`,
      example: "Search by name and use the 'id' field from results",
    };
  }

  const search = `search_for_object_id('${lookup.endpoint}', '<name>')`;
  return {
    type,
    kind: 'object-reference',
    required: true,
    help: lookup.listTool
      ? `Use ${lookup.listTool} or ${search} to find the ${lookup.keyword} ID`
      : `Use ${search} to find the ${lookup.keyword} ID`,
    example: `Search for the ${lookup.keyword} name and use the 'id' field`,
    lookup_endpoint: lookup.endpoint,
  };
}

export function describeVariable(name: string, type: string): VariableGuidance {
  const kind = variableKind(type);
  switch (kind) {
    case 'object-reference':
      return objectReferenceGuidance(name, type);
    case 'string':
      return { type, kind, required: true, help: 'Provide as a string value', example: `"example_${name}"` };
    case 'integer':
      return { type, kind, required: true, help: 'Provide as an integer value', example: '10' };
    case 'boolean':
      return { type, kind, required: true, help: 'Provide as true or false', example: 'true' };
    case 'other':
      return {
        type,
        kind,
        required: true,
        help: `Provide value for ${type}`,
        example: 'See the NetBox custom script documentation',
      };
  }
}

export async function getScriptVariables(client: NetBoxClient, scriptId: ScriptId): Promise<ScriptVariables> {
  const scripts = await listScripts(client);
  const script = scripts.find((candidate) => candidate.id !== null && String(candidate.id) === String(scriptId));

  if (!script) {
    throw new NotFoundError(`Script ${scriptId} not found`);
  }

  const variables: Record<string, VariableGuidance> = {};
  for (const [name, type] of Object.entries(script.vars)) {
    variables[name] = describeVariable(name, type);
  }

  return {
    script_id: scriptId,
    script_name: script.name,
    description: script.description,
    variables,
  };
}

/**
 * Relevance of one script to a query. Whole-query hits weigh more than
 * single-word hits; words of two characters or fewer are ignored.
 */
export function scoreScript(script: ScriptDescriptor, query: string): number {
  const needle = query.toLowerCase();
  const name = script.name.toLowerCase();
  const description = script.description.toLowerCase();
  const display = script.display.toLowerCase();

  let score = 0;
  if (name.includes(needle)) score += 10;
  if (description.includes(needle)) score += 5;
  if (display.includes(needle)) score += 3;

  for (const word of needle.split(/\s+/)) {
    if (word.length <= 2) continue;
    if (name.includes(word)) score += 2;
    if (description.includes(word)) score += 1;
  }

  return score;
}

export function rankScripts(scripts: ScriptDescriptor[], query: string): ScriptDescriptor[] {
  return scripts
    .map((script) => ({ script, score: scoreScript(script, query) }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score)
    .map((entry) => entry.script);
}

export async function findScript(client: NetBoxClient, query: string): Promise<ScriptDescriptor[]> {
  return rankScripts(await listScripts(client), query);
}
