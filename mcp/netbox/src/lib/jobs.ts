/**
 * Custom script execution and job tracking
 *
 * Submitting a script hands work to NetBox's job queue. This module only
 * submits and reads; polling a job to completion is up to the caller.
 */

import { isJsonObject, type JsonObject, type NetBoxClient, type ObjectId } from './netbox-client.js';
import { SCRIPTS_ENDPOINT, type ScriptId } from './scripts.js';

export const JOBS_ENDPOINT = 'core/jobs';
export const SCRIPT_JOB_OBJECT_TYPE = 'extras.script';
export const DEFAULT_JOB_LIMIT = 50;

export type JobId = number | string;

export interface ScriptExecution {
  script_id: ScriptId;
  /** null when NetBox accepted the run without returning a job handle */
  job_id: JobId | null;
  job_info: JsonObject | null;
  response: JsonObject;
}

export interface JobStatus {
  job: JsonObject;
  /** `status.value`: pending, running, completed, errored, failed */
  status: string | null;
  completed: unknown;
}

function asJobId(value: unknown): JobId | null {
  return typeof value === 'number' || typeof value === 'string' ? value : null;
}

/**
 * Job handle from a script submission response: nested `job.id` first,
 * then a top-level `id`.
 */
export function extractJob(response: JsonObject): { jobId: JobId | null; jobInfo: JsonObject | null } {
  const job = response.job;
  if (isJsonObject(job)) {
    return { jobId: asJobId(job.id), jobInfo: job };
  }
  return { jobId: asJobId(response.id), jobInfo: null };
}

export async function executeScript(
  client: NetBoxClient,
  scriptId: ScriptId,
  params: JsonObject = {},
  commit = true
): Promise<ScriptExecution> {
  const response = await client.create(`${SCRIPTS_ENDPOINT}/${scriptId}`, { data: params, commit });
  const { jobId, jobInfo } = extractJob(response);

  return {
    script_id: scriptId,
    job_id: jobId,
    job_info: jobInfo,
    response,
  };
}

export async function getJobStatus(client: NetBoxClient, jobId: ObjectId): Promise<JobStatus> {
  const job = await client.get(JOBS_ENDPOINT, jobId);
  const rawStatus = job.status;
  const status = isJsonObject(rawStatus) ? rawStatus.value : rawStatus;

  return {
    job,
    status: typeof status === 'string' ? status : null,
    completed: job.completed ?? null,
  };
}

export async function listJobs(
  client: NetBoxClient,
  limit = DEFAULT_JOB_LIMIT,
  scriptName?: string
): Promise<JsonObject[]> {
  return client.get(JOBS_ENDPOINT, undefined, {
    limit,
    object_type: SCRIPT_JOB_OBJECT_TYPE,
    name: scriptName,
  });
}
