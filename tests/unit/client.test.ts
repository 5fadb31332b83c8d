/**
 * Unit Tests: Registry API Client
 *
 * Runs the REST client against a stubbed fetch:
 * - Pagination and scope parameters
 * - Response mapping to remote records
 * - Reference resolution on write (sites, roles, device types)
 * - Error mapping and retry
 *
 * @see src/api/client.ts
 */

import { describe, it, expect, vi } from 'vitest';
import { createRegistryClient, RegistryLookupError, slugify } from '../../src/api/client.js';
import { RegistryRequestError } from '../../src/api/retry.js';
import { captureLogger } from '../helpers/logger.js';

// =============================================================================
// Fake Transport
// =============================================================================

interface Call {
  method: string;
  path: string;
  query: string;
  body: unknown;
}

type Route = (call: Call) => { status?: number; body?: unknown; headers?: Record<string, string> } | undefined;

/**
 * Stubbed fetch answering from a list of routes; unmatched requests get a 404
 */
function fakeFetch(...routes: Route[]) {
  const calls: Call[] = [];
  const fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const call: Call = {
      method: init?.method ?? 'GET',
      path: url.pathname,
      query: url.search,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    calls.push(call);
    for (const route of routes) {
      const answer = route(call);
      if (answer) {
        const status = answer.status ?? 200;
        return new Response(answer.body === undefined ? null : JSON.stringify(answer.body), {
          status,
          headers: answer.headers,
        });
      }
    }
    return new Response(JSON.stringify({ detail: 'Not found.' }), { status: 404 });
  });
  return { fetch, calls };
}

function page(results: unknown[], next: string | null = null) {
  return { count: results.length, next, results };
}

function on(method: string, path: string, query: string | null, answer: ReturnType<Route>): Route {
  return (call) =>
    call.method === method && call.path === path && (query === null || call.query === query) ? answer : undefined;
}

const DEVICE_PAYLOAD = {
  id: 1,
  name: 'core-sw1',
  serial: 'SN1',
  device_type: { id: 5, model: 'C9300-48P', manufacturer: { id: 2, name: 'Cisco' } },
  role: { id: 3, name: 'Switch' },
  site: { id: 4, name: 'DC1' },
  tenant: { id: 6, name: 'Lab', slug: 'lab' },
  status: { value: 'active', label: 'Active' },
  primary_ip4: null,
};

function client(fetch: ReturnType<typeof fakeFetch>['fetch'], pageSize?: number) {
  return createRegistryClient({
    url: 'https://registry.test/',
    token: 'test-secret',
    pageSize,
    fetch,
    retry: { baseDelayMs: 1, jitterFactor: 0 },
    logger: captureLogger().logger,
  });
}

// =============================================================================
// Configuration
// =============================================================================

describe('createRegistryClient', () => {
  it('requires a URL', () => {
    expect(() => createRegistryClient({ token: 'test-secret' })).toThrow('Registry URL is required');
  });

  it('reports its configuration without the token', () => {
    const { fetch } = fakeFetch();
    expect(client(fetch).getConfig()).toEqual({ url: 'https://registry.test', hasToken: true });
  });

  it('sends the token header', async () => {
    const { fetch } = fakeFetch(on('GET', '/api/dcim/devices/', null, { body: page([]) }));

    await client(fetch).devices.list({ tenant: 'lab' });

    const init = fetch.mock.calls[0][1];
    expect(init?.headers).toMatchObject({ Authorization: 'Token test-secret', Accept: 'application/json' });
  });
});

// =============================================================================
// Reads
// =============================================================================

describe('list operations', () => {
  it('follows pages until there is no next page', async () => {
    const { fetch, calls } = fakeFetch(
      on('GET', '/api/dcim/devices/', '?tenant=lab&limit=2&offset=0', {
        body: page([DEVICE_PAYLOAD, { ...DEVICE_PAYLOAD, id: 2, name: 'access-sw1' }], 'next'),
      }),
      on('GET', '/api/dcim/devices/', '?tenant=lab&limit=2&offset=2', {
        body: page([{ ...DEVICE_PAYLOAD, id: 3, name: 'access-sw2' }]),
      })
    );

    const devices = await client(fetch, 2).devices.list({ tenant: 'lab' });

    expect(devices.map((device) => device.name)).toEqual(['core-sw1', 'access-sw1', 'access-sw2']);
    expect(calls).toHaveLength(2);
  });

  it('looks devices up by name without regard to case', async () => {
    const { fetch, calls } = fakeFetch(
      on('GET', '/api/dcim/devices/', '?name__ie=sw1&name__ie=core-sw1&limit=1000&offset=0', {
        body: page([{ ...DEVICE_PAYLOAD, name: 'SW1' }]),
      })
    );

    const devices = await client(fetch).devices.list({ names: ['sw1', 'core-sw1'] });

    expect(devices.map((device) => device.name)).toEqual(['SW1']);
    expect(calls).toHaveLength(1);
  });

  it('maps device payloads to remote records', async () => {
    const { fetch } = fakeFetch(on('GET', '/api/dcim/devices/', null, { body: page([DEVICE_PAYLOAD]) }));

    const [device] = await client(fetch).devices.list({ names: ['core-sw1'] });

    expect(device).toEqual({
      id: 1,
      name: 'core-sw1',
      serial: 'SN1',
      model: 'C9300-48P',
      manufacturer: 'Cisco',
      platform: null,
      site: 'DC1',
      role: 'Switch',
      tenant: 'lab',
      status: 'active',
      primaryIp4Id: null,
    });
  });

  it('repeats list parameters', async () => {
    const { fetch, calls } = fakeFetch(on('GET', '/api/dcim/cables/', null, { body: page([]) }));

    await client(fetch).cables.list({ deviceIds: [1, 2] });

    expect(calls[0].query).toBe('?device_id=1&device_id=2&limit=1000&offset=0');
  });

  it('maps interfaces with VLANs and LAG', async () => {
    const { fetch } = fakeFetch(
      on('GET', '/api/dcim/interfaces/', null, {
        body: page([
          {
            id: 11,
            device: { id: 1, name: 'core-sw1' },
            name: 'GigabitEthernet0/1',
            type: { value: '1000base-t', label: '1000BASE-T' },
            enabled: true,
            mode: { value: 'tagged', label: 'Tagged' },
            untagged_vlan: { id: 21, vid: 1 },
            tagged_vlans: [
              { id: 22, vid: 10 },
              { id: 23, vid: 20 },
            ],
            lag: { id: 12, name: 'Port-channel1' },
            mac_address: 'AA:BB:CC:DD:EE:FF',
          },
        ]),
      })
    );

    const [iface] = await client(fetch).interfaces.list({ deviceId: 1 });

    expect(iface).toEqual({
      id: 11,
      deviceId: 1,
      device: 'core-sw1',
      name: 'GigabitEthernet0/1',
      type: '1000base-t',
      enabled: true,
      description: '',
      mtu: null,
      speed: null,
      duplex: null,
      mode: 'tagged',
      untaggedVlan: 1,
      taggedVlans: [10, 20],
      lagId: 12,
      lag: 'Port-channel1',
      macAddress: 'aa:bb:cc:dd:ee:ff',
    });
  });

  it('falls back to a case-insensitive device lookup', async () => {
    const { fetch, calls } = fakeFetch(
      on('GET', '/api/dcim/devices/', '?name=CORE-SW1&limit=1000&offset=0', { body: page([]) }),
      on('GET', '/api/dcim/devices/', '?name__ie=CORE-SW1&limit=1000&offset=0', { body: page([DEVICE_PAYLOAD]) })
    );

    const device = await client(fetch).devices.getByName('CORE-SW1');

    expect(device?.id).toBe(1);
    expect(calls).toHaveLength(2);
  });

  it('rejects responses that do not match the schema', async () => {
    const { fetch } = fakeFetch(on('GET', '/api/ipam/vlans/', null, { body: page([{ id: 1, name: 'users' }]) }));

    await expect(client(fetch).vlans.list({ siteId: 4 })).rejects.toThrow('vid');
  });
});

// =============================================================================
// Writes
// =============================================================================

describe('write operations', () => {
  it('resolves references and creates a missing device type', async () => {
    const { fetch, calls } = fakeFetch(
      on('GET', '/api/dcim/sites/', null, { body: page([{ id: 4, name: 'DC1', slug: 'dc1' }]) }),
      on('GET', '/api/dcim/device-roles/', '?name=Access+Switch&limit=1000&offset=0', { body: page([]) }),
      on('GET', '/api/dcim/device-roles/', '?slug=access-switch&limit=1000&offset=0', {
        body: page([{ id: 3, name: 'access switch', slug: 'access-switch' }]),
      }),
      on('GET', '/api/dcim/manufacturers/', null, { body: page([{ id: 2, name: 'Cisco' }]) }),
      on('GET', '/api/dcim/device-types/', null, { body: page([]) }),
      on('POST', '/api/dcim/device-types/', null, { status: 201, body: { id: 7, model: 'C9300-48P' } }),
      on('POST', '/api/dcim/devices/', null, { status: 201, body: [DEVICE_PAYLOAD] })
    );

    const created = await client(fetch).devices.createMany([
      { name: 'core-sw1', site: 'DC1', role: 'Access Switch', model: 'C9300-48P', manufacturer: 'Cisco', status: 'active' },
    ]);

    expect(created.map((device) => device.id)).toEqual([1]);
    expect(calls.find((call) => call.method === 'POST' && call.path === '/api/dcim/device-types/')?.body).toEqual({
      model: 'C9300-48P',
      slug: 'c9300-48p',
      manufacturer: 2,
    });
    expect(calls[calls.length - 1].body).toEqual([
      { name: 'core-sw1', status: 'active', site: 4, role: 3, device_type: 7 },
    ]);
  });

  it('fails the write when a referenced site does not exist', async () => {
    const { fetch, calls } = fakeFetch(on('GET', '/api/dcim/sites/', null, { body: page([]) }));

    const write = client(fetch).devices.create({
      name: 'core-sw1',
      site: 'DC9',
      role: 'switch',
      model: 'C9300-48P',
      manufacturer: 'Cisco',
    });

    await expect(write).rejects.toBeInstanceOf(RegistryLookupError);
    await expect(write).rejects.toThrow('Site not found in registry: DC9');
    expect(calls.some((call) => call.method === 'POST')).toBe(false);
  });

  it('updates a single record by id', async () => {
    const { fetch, calls } = fakeFetch(
      on('PATCH', '/api/dcim/interfaces/11/', null, {
        body: { id: 11, device: { id: 1, name: 'core-sw1' }, name: 'GigabitEthernet0/1', description: 'uplink' },
      })
    );

    const updated = await client(fetch).interfaces.update({ id: 11, description: 'uplink', enabled: undefined });

    expect(updated.description).toBe('uplink');
    expect(calls[0].body).toEqual({ description: 'uplink' });
  });

  it('deletes in bulk with an id list', async () => {
    const { fetch, calls } = fakeFetch(on('DELETE', '/api/dcim/cables/', null, { status: 204 }));

    await expect(client(fetch).cables.deleteMany([5, 6])).resolves.toBe(true);
    expect(calls[0].body).toEqual([{ id: 5 }, { id: 6 }]);
  });

  it('writes cable terminations', async () => {
    const { fetch, calls } = fakeFetch(
      on('POST', '/api/dcim/cables/', null, { status: 201, body: { id: 9, a_terminations: [], b_terminations: [] } })
    );

    await client(fetch).cables.create({ aInterfaceId: 11, bInterfaceId: 31, status: 'connected' });

    expect(calls[0].body).toEqual({
      status: 'connected',
      a_terminations: [{ object_type: 'dcim.interface', object_id: 11 }],
      b_terminations: [{ object_type: 'dcim.interface', object_id: 31 }],
    });
  });
});

// =============================================================================
// Errors
// =============================================================================

describe('error handling', () => {
  it('uses the detail of an error body', async () => {
    const { fetch } = fakeFetch(
      on('POST', '/api/ipam/vlans/', null, { status: 400, body: { detail: 'VLAN 10 already exists' } })
    );

    const write = client(fetch).vlans.create({ vid: 10, name: 'users', siteId: 4 });

    await expect(write).rejects.toBeInstanceOf(RegistryRequestError);
    await expect(write).rejects.toMatchObject({ status: 400, message: 'VLAN 10 already exists' });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('retries transient failures', async () => {
    let attempts = 0;
    const { fetch } = fakeFetch((call) => {
      if (call.path !== '/api/dcim/sites/') return undefined;
      attempts++;
      return attempts === 1 ? { status: 503, body: { detail: 'busy' } } : { body: page([{ id: 4, name: 'DC1', slug: 'dc1' }]) };
    });

    const site = await client(fetch).sites.getByName('DC1');

    expect(site).toEqual({ id: 4, name: 'DC1', slug: 'dc1' });
    expect(fetch).toHaveBeenCalledTimes(2);
  });
});

describe('slugify', () => {
  it.each([
    ['Access Switch', 'access-switch'],
    ['DC1 / Row 2', 'dc1-row-2'],
    ['--Lab--', 'lab'],
  ])('%s → %s', (name, slug) => {
    expect(slugify(name)).toBe(slug);
  });
});
