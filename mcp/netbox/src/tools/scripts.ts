/**
 * Custom Script Tools
 *
 * Guided workflow for NetBox custom scripts:
 *   1. get_custom_scripts / find_custom_script - pick the script
 *   2. get_script_variables                    - learn its parameters
 *   3. search_for_object_id                    - resolve ObjectVar names to IDs
 *   4. execute_custom_script                   - run it
 *   5. get_script_job_status                   - check the job
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { DEFAULT_JOB_LIMIT, executeScript, getJobStatus, listJobs } from '../lib/jobs.js';
import type { NetBoxClient } from '../lib/netbox-client.js';
import { guard, ok, type ToolResult } from '../lib/result.js';
import { findScript, getScriptVariables, listScripts } from '../lib/scripts.js';
import { fieldsSchema, objectIdSchema, parseArgs, type ToolArgs } from './common.js';

const scriptIdSchema = z.union([z.number().int().positive(), z.string().min(1)]);

const scriptIdProperty = {
  type: ['number', 'string'],
  description: 'Script ID from get_custom_scripts (older NetBox releases use "module.ClassName" strings)',
};

const variablesSchema = z.object({ script_id: scriptIdSchema });

const findSchema = z.object({ query: z.string().trim().min(1) });

const executeSchema = z.object({
  script_id: scriptIdSchema,
  data: fieldsSchema.default({}),
  commit: z.boolean().default(true),
});

const jobStatusSchema = z.object({ job_id: objectIdSchema });

const listJobsSchema = z.object({
  limit: z.number().int().positive().default(DEFAULT_JOB_LIMIT),
  script_name: z.string().min(1).optional(),
});

export const scriptTools: Tool[] = [
  {
    name: 'get_custom_scripts',
    description: `List all custom scripts available in NetBox.

Custom scripts are user-defined workflows: provisioning sites, onboarding
devices, allocating IP space, compliance checks.

Returns for each script:
- id, name, description, display, module
- vars: parameter name -> variable type (ObjectVar, StringVar, IntegerVar, BooleanVar, ...)
- is_executable, last_result

Related tools:
- find_custom_script: Search scripts by intent ("create site")
- get_script_variables: Parameter guidance for one script`,
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'get_script_variables',
    description: `Explain the parameters a custom script expects.

For every variable returns its type, a hint and an example value.
ObjectVar parameters (tenant, region, site, device, ...) need numeric
object IDs; the hint names the endpoint to search.

Example: tenant (ObjectVar) -> use search_for_object_id('tenancy/tenants', '<name>')

Related tools:
- search_for_object_id: Resolve the ObjectVar values
- execute_custom_script: Run the script with the values`,
    inputSchema: {
      type: 'object',
      properties: {
        script_id: scriptIdProperty,
      },
      required: ['script_id'],
    },
  },
  {
    name: 'find_custom_script',
    description: `Find custom scripts matching a natural-language description.

Searches script names, descriptions and display labels; best matches first.
Scripts with no overlap are left out.

Examples: "create site", "add switches", "provision"

Related tools:
- get_custom_scripts: Full, unranked catalog`,
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'What you want to do' },
      },
      required: ['query'],
    },
  },
  {
    name: 'execute_custom_script',
    description: `Run a NetBox custom script.

IMPORTANT - ObjectVar parameters take object IDs, not names.

Workflow:
1. get_script_variables(script_id) - see the required parameters
2. search_for_object_id(endpoint, name) - look up IDs for ObjectVar parameters
3. execute_custom_script(script_id, data) - run
4. get_script_job_status(job_id) - check completion

data values by variable type:
- ObjectVar: integer ID
- StringVar: string
- IntegerVar: integer
- BooleanVar: true/false

Set commit=false for a dry run (NetBox rolls back all changes).

Returns the job_id to track; job_id is null when NetBox queued the run
without returning a handle (use list_script_jobs to find it).`,
    inputSchema: {
      type: 'object',
      properties: {
        script_id: scriptIdProperty,
        data: {
          type: 'object',
          description: 'Script parameters, keyed by the names in the script\'s "vars"',
          additionalProperties: true,
        },
        commit: {
          type: 'boolean',
          description: 'Commit changes (default: true; false = dry run)',
          default: true,
        },
      },
      required: ['script_id'],
    },
  },
  {
    name: 'get_script_job_status',
    description: `Get status and results of a script job.

Returns the job record plus:
- status: pending, running, completed, errored or failed
- completed: completion timestamp, null while the job runs

Poll again later while status is pending or running.

Related tools:
- execute_custom_script: Returns the job_id
- list_script_jobs: Recent runs`,
    inputSchema: {
      type: 'object',
      properties: {
        job_id: { type: 'number', description: 'Job ID returned by execute_custom_script' },
      },
      required: ['job_id'],
    },
  },
  {
    name: 'list_script_jobs',
    description: `List recent custom script jobs.

Use for:
- Execution history of automation workflows
- Finding a job when execute_custom_script returned no job_id
- Troubleshooting failed runs

Related tools:
- get_script_job_status: Details of one job`,
    inputSchema: {
      type: 'object',
      properties: {
        limit: {
          type: 'number',
          description: `Maximum number of jobs (default: ${DEFAULT_JOB_LIMIT})`,
          default: DEFAULT_JOB_LIMIT,
        },
        script_name: { type: 'string', description: 'Only jobs of this script name' },
      },
    },
  },
];

export async function handleScriptTool(name: string, args: ToolArgs, client: NetBoxClient): Promise<ToolResult> {
  switch (name) {
    case 'get_custom_scripts': {
      const scripts = await listScripts(client);
      return ok(scripts, { count: scripts.length });
    }

    case 'get_script_variables': {
      const { script_id } = parseArgs(name, variablesSchema, args);
      const { variables, ...script } = await getScriptVariables(client, script_id);
      return ok(variables, script);
    }

    case 'find_custom_script': {
      const { query } = parseArgs(name, findSchema, args);
      const matches = await findScript(client, query);
      return ok(matches, { query, count: matches.length });
    }

    case 'execute_custom_script': {
      const { script_id, data, commit } = parseArgs(name, executeSchema, args);
      return guard(async () => {
        const execution = await executeScript(client, script_id, data, commit);
        return ok(execution.response, {
          message:
            execution.job_id === null
              ? 'Script execution started, but NetBox returned no job handle; use list_script_jobs to follow it'
              : 'Script execution started successfully',
          script_id: execution.script_id,
          job_id: execution.job_id,
          job_info: execution.job_info,
        });
      }, `Failed to execute script ${script_id}. Check that the script ID is valid and all required parameters are provided.`);
    }

    case 'get_script_job_status': {
      const { job_id } = parseArgs(name, jobStatusSchema, args);
      const { job, status, completed } = await getJobStatus(client, job_id);
      return ok(job, { status, completed });
    }

    case 'list_script_jobs': {
      const { limit, script_name } = parseArgs(name, listJobsSchema, args);
      return ok(await listJobs(client, limit, script_name));
    }

    default:
      throw new Error(`Unknown script tool: ${name}`);
  }
}
