import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MalformedResponseError, TransportError } from '../src/lib/errors.js';
import { buildQuery, NetBoxRestClient, normalizeList } from '../src/lib/netbox-client.js';
import { FakeNetBox, jsonResponse, testConfig } from './helpers/fake-netbox.js';

describe('buildQuery', () => {
  it('should repeat array values and skip null or undefined', () => {
    expect(buildQuery({ limit: 2, tag: ['core', 'edge'], site_id: undefined, q: null })).toBe(
      '?limit=2&tag=core&tag=edge'
    );
  });

  it('should return an empty string without parameters', () => {
    expect(buildQuery({})).toBe('');
    expect(buildQuery(undefined)).toBe('');
  });
});

describe('normalizeList', () => {
  it('should pass a bare array through', () => {
    expect(normalizeList([{ id: 1 }], 'dcim/sites')).toEqual([{ id: 1 }]);
  });

  it('should unwrap a results page', () => {
    expect(normalizeList({ count: 1, results: [{ id: 1 }] }, 'dcim/sites')).toEqual([{ id: 1 }]);
  });

  it('should treat any other shape as an empty list', () => {
    expect(normalizeList({ detail: 'odd' }, 'dcim/sites')).toEqual([]);
    expect(normalizeList(null, 'dcim/sites')).toEqual([]);
  });
});

describe('NetBoxRestClient', () => {
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

  it('should build collection and object URLs with trailing slashes', () => {
    expect(client.buildUrl('/dcim/sites/')).toBe('https://netbox.test/api/dcim/sites/');
    expect(client.buildUrl('dcim/sites', 7)).toBe('https://netbox.test/api/dcim/sites/7/');
  });

  it('should send token authentication and JSON headers', async () => {
    await client.get('dcim/sites');

    const call = fake.lastCall();
    expect(call?.headers.get('authorization')).toBe('Token test-secret');
    expect(call?.headers.get('content-type')).toBe('application/json');
    expect(call?.headers.get('accept')).toBe('application/json');
  });

  it('should use the Bearer scheme when configured', async () => {
    const bearer = new NetBoxRestClient({ ...testConfig, authScheme: 'Bearer' });
    await bearer.get('dcim/sites');

    expect(fake.lastCall()?.headers.get('authorization')).toBe('Bearer test-secret');
  });

  it('should return a created object by id', async () => {
    const created = await client.create('dcim/sites', { name: 'Alpha', slug: 'alpha' });
    const fetched = await client.get('dcim/sites', 1);

    expect(created.id).toBe(1);
    expect(fetched).toMatchObject({ id: 1, name: 'Alpha', slug: 'alpha' });
  });

  it('should return a list for a page-wrapped payload', async () => {
    fake.seed('dcim/sites', [{ name: 'A' }, { name: 'B' }]);

    const sites = await client.get('dcim/sites', undefined, { limit: 1 });

    expect(sites).toHaveLength(1);
    expect(sites[0]).toMatchObject({ id: 1, name: 'A' });
    expect(fake.lastCall()?.query.get('limit')).toBe('1');
  });

  it('should return a list for a bare array payload', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse(200, [{ id: 3, name: 'C' }])));

    await expect(client.get('dcim/sites')).resolves.toEqual([{ id: 3, name: 'C' }]);
  });

  it('should apply a partial update', async () => {
    fake.seed('dcim/sites', [{ name: 'Alpha', status: 'active' }]);

    const updated = await client.update('dcim/sites', 1, { status: 'retired' });

    expect(updated).toMatchObject({ id: 1, name: 'Alpha', status: 'retired' });
    expect(fake.lastCall()).toMatchObject({ method: 'PATCH', path: '/api/dcim/sites/1/', body: { status: 'retired' } });
  });

  it('should report true when a delete answers 204', async () => {
    fake.seed('dcim/sites', [{ name: 'Alpha' }]);

    await expect(client.delete('dcim/sites', 1)).resolves.toBe(true);
    expect(fake.objects('dcim/sites')).toEqual([]);
  });

  it('should report false when a delete answers 200', async () => {
    fake.respondWith('DELETE', '/api/dcim/sites/1/', 200, {});

    await expect(client.delete('dcim/sites', 1)).resolves.toBe(false);
  });

  it('should raise a TransportError when a delete fails', async () => {
    const error = await client.delete('dcim/sites', 5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      status: 404,
      message: 'NetBox API error: 404 Not Found: Not found.',
    });
  });

  it('should send bulk operations to the bulk endpoint', async () => {
    const created = await client.bulkCreate('ipam/vlans', [
      { vid: 10, name: 'users' },
      { vid: 20, name: 'voice' },
    ]);
    expect(created.map((vlan) => vlan.id)).toEqual([1, 2]);

    const updated = await client.bulkUpdate('ipam/vlans', [{ id: 2, name: 'voip' }]);
    expect(updated).toEqual([expect.objectContaining({ id: 2, vid: 20, name: 'voip' })]);

    await expect(client.bulkDelete('ipam/vlans', [1, 2])).resolves.toBe(true);
    expect(fake.lastCall()).toMatchObject({
      method: 'DELETE',
      path: '/api/ipam/vlans/bulk/',
      body: [{ id: 1 }, { id: 2 }],
    });
  });

  it('should read the NetBox status endpoint', async () => {
    await expect(client.status()).resolves.toMatchObject({ 'netbox-version': '4.1.0' });
    expect(fake.lastCall()?.path).toBe('/api/status/');
  });

  it('should truncate long non-JSON error bodies', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        new Response('x'.repeat(600), { status: 500, statusText: 'Internal Server Error' })
      )
    );

    await expect(client.get('dcim/sites')).rejects.toThrow(
      `NetBox API error: 500 Internal Server Error: ${'x'.repeat(500)}...`
    );
  });

  it('should wrap network failures', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    await expect(client.get('dcim/sites')).rejects.toThrow(
      'NetBox request failed: GET https://netbox.test/api/dcim/sites/: fetch failed'
    );
  });

  it('should report timeouts with the configured limit', async () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(timeout));

    await expect(client.get('dcim/sites')).rejects.toThrow(
      'NetBox request timed out after 5000ms: GET https://netbox.test/api/dcim/sites/'
    );
  });

  it('should reject invalid JSON bodies', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('<html>', { status: 200 })));

    await expect(client.get('dcim/sites', 1)).rejects.toBeInstanceOf(MalformedResponseError);
  });
});
