import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { executeScript, extractJob, getJobStatus, listJobs } from '../src/lib/jobs.js';
import { NetBoxRestClient } from '../src/lib/netbox-client.js';
import { FakeNetBox, testConfig } from './helpers/fake-netbox.js';

describe('extractJob', () => {
  it('should prefer the nested job object', () => {
    expect(extractJob({ id: 5, job: { id: 42, status: { value: 'pending' } } })).toEqual({
      jobId: 42,
      jobInfo: { id: 42, status: { value: 'pending' } },
    });
  });

  it('should fall back to a top-level id', () => {
    expect(extractJob({ id: 99 })).toEqual({ jobId: 99, jobInfo: null });
  });

  it('should report null without either shape', () => {
    expect(extractJob({ detail: 'queued' })).toEqual({ jobId: null, jobInfo: null });
  });
});

describe('script jobs', () => {
  let fake: FakeNetBox;
  let client: NetBoxRestClient;

  beforeEach(() => {
    fake = new FakeNetBox();
    vi.stubGlobal('fetch', vi.fn(fake.fetch));
    client = new NetBoxRestClient(testConfig);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should submit data and commit flag to the script endpoint', async () => {
    fake.respondWith('POST', '/api/extras/scripts/5/', 200, { job: { id: 42 } });

    const execution = await executeScript(client, 5, { site_name: 'Lab' }, false);

    expect(execution).toEqual({
      script_id: 5,
      job_id: 42,
      job_info: { id: 42 },
      response: { job: { id: 42 } },
    });
    expect(fake.lastCall()).toMatchObject({
      method: 'POST',
      path: '/api/extras/scripts/5/',
      body: { data: { site_name: 'Lab' }, commit: false },
    });
  });

  it('should default to empty data with commit enabled', async () => {
    fake.respondWith('POST', '/api/extras/scripts/dcim.CreateSite/', 200, { id: 99 });

    const execution = await executeScript(client, 'dcim.CreateSite');

    expect(execution.job_id).toBe(99);
    expect(fake.lastCall()?.body).toEqual({ data: {}, commit: true });
  });

  it('should read status value and completion time', async () => {
    fake.seed('core/jobs', [
      { id: 42, name: 'CreateSite', status: { value: 'completed', label: 'Completed' }, completed: '2026-01-01T00:00:00Z' },
    ]);

    const result = await getJobStatus(client, 42);

    expect(result.status).toBe('completed');
    expect(result.completed).toBe('2026-01-01T00:00:00Z');
    expect(result.job).toMatchObject({ id: 42, name: 'CreateSite' });
  });

  it('should accept a plain status string on a running job', async () => {
    fake.seed('core/jobs', [{ id: 7, name: 'Audit', status: 'running' }]);

    await expect(getJobStatus(client, 7)).resolves.toMatchObject({ status: 'running', completed: null });
  });

  it('should list script jobs filtered by object type and name', async () => {
    fake.seed('core/jobs', [{ id: 1, name: 'CreateSite' }]);

    const jobs = await listJobs(client, 10, 'CreateSite');

    expect(jobs).toHaveLength(1);
    const query = fake.lastCall()?.query;
    expect(query?.get('limit')).toBe('10');
    expect(query?.get('object_type')).toBe('extras.script');
    expect(query?.get('name')).toBe('CreateSite');
  });

  it('should leave out the name filter when no script is given', async () => {
    await listJobs(client);

    const query = fake.lastCall()?.query;
    expect(query?.get('limit')).toBe('50');
    expect(query?.has('name')).toBe(false);
  });
});
