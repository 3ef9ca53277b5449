import { AxiosError, AxiosHeaders } from 'axios';
import { describe, expect, it } from 'vitest';
import { KeystoneSession } from './keystone-session';
import { OpenStackApi, createHttpClient, toServiceError } from './openstack-api';
import {
  AuthenticationError,
  InventoryError,
  MalformedResponseError,
  NotFoundError,
  ServiceError,
  TransportError,
} from '../lib/errors';
import {
  CINDER,
  type Handler,
  LOGIN,
  NEUTRON,
  NOVA,
  type Reply,
  fakePlatform,
  loginRoute,
  sessionOptions,
} from '../testing/fake-platform';

// Tokens from loginRoute expire an hour after this.
const clock = () => Date.parse('2026-03-01T12:00:00.000Z');

function apiWith(routes: Record<string, Handler | Reply>) {
  const platform = fakePlatform({ [LOGIN]: loginRoute(), ...routes });
  const http = createHttpClient({ insecureTls: false, requestTimeoutMs: 1000, adapter: platform.adapter });
  return { api: new OpenStackApi(new KeystoneSession(sessionOptions, http, clock), http), platform };
}

describe('OpenStackApi listings', () => {
  it('sends the session token and unwraps the envelope', async () => {
    let token: unknown;
    const { api } = apiWith({
      [`GET ${NOVA}/servers/detail`]: (config) => {
        token = config.headers.get('x-auth-token');
        return { status: 200, data: { servers: [{ id: 's1' }, 'junk', { id: 's2' }] } };
      },
    });

    await expect(api.listServers()).resolves.toEqual([{ id: 's1' }, { id: 's2' }]);
    expect(token).toBe('tok-1');
  });

  it('routes each kind to its service endpoint', async () => {
    const { api, platform } = apiWith({
      [`GET ${CINDER}/types`]: { status: 200, data: { volume_types: [] } },
      [`GET ${NEUTRON}/v2.0/routers`]: { status: 200, data: { routers: [] } },
      [`GET ${NOVA}/os-hypervisors/detail`]: { status: 200, data: { hypervisors: [] } },
    });

    await api.listVolumeTypes();
    await api.listRouters();
    await api.listHypervisors();

    expect(platform.requests).toEqual([
      LOGIN,
      `GET ${CINDER}/types`,
      `GET ${NEUTRON}/v2.0/routers`,
      `GET ${NOVA}/os-hypervisors/detail`,
    ]);
  });

  it('rejects a body without the expected list', async () => {
    const { api } = apiWith({ [`GET ${NOVA}/flavors/detail`]: { status: 200, data: { items: [] } } });

    const err = await api.listFlavors().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MalformedResponseError);
    expect(err).toMatchObject({ kind: 'flavor', message: "/flavors/detail response has no 'flavors' list" });
  });

  it('tags an HTTP failure with the resource kind', async () => {
    const { api } = apiWith({ [`GET ${CINDER}/volumes/detail`]: { status: 503 } });

    const err = await api.listVolumes().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServiceError);
    expect(err).toMatchObject({ kind: 'volume', code: 'SERVICE_ERROR', message: 'volume request failed with HTTP 503' });
  });

  it('reports an unreachable endpoint as a transport error', async () => {
    const { api } = apiWith({});

    const err = await api.listNetworks().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      kind: 'network',
      message: `network request failed: connect ECONNREFUSED for GET ${NEUTRON}/v2.0/networks`,
    });
  });

  it('re-authenticates once when a token is rejected', async () => {
    const seen: unknown[] = [];
    const { api, platform } = apiWith({
      [`GET ${NEUTRON}/v2.0/subnets`]: (config) => {
        seen.push(config.headers.get('x-auth-token'));
        return seen.length === 1 ? { status: 401 } : { status: 200, data: { subnets: [{ id: 'sb1' }] } };
      },
    });

    await expect(api.listSubnets()).resolves.toEqual([{ id: 'sb1' }]);
    expect(seen).toEqual(['tok-1', 'tok-2']);
    expect(platform.requests.filter((r) => r === LOGIN)).toHaveLength(2);
  });

  it('treats 403 as an authentication error without retrying', async () => {
    const { api, platform } = apiWith({ [`GET ${NEUTRON}/v2.0/routers`]: { status: 403 } });

    const err = await api.listRouters().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthenticationError);
    expect(err).toMatchObject({ message: 'router request rejected with HTTP 403' });
    expect(platform.requests).toEqual([LOGIN, `GET ${NEUTRON}/v2.0/routers`]);
  });

  it('gives up after a second rejection', async () => {
    const { api } = apiWith({ [`GET ${CINDER}/volumes/detail`]: { status: 401 } });

    const err = await api.listVolumes().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthenticationError);
    expect(err).toMatchObject({ message: 'volume request rejected with HTTP 401' });
  });

  it('surfaces a failed login as an authentication error for the kind', async () => {
    const platform = fakePlatform({ [LOGIN]: { status: 401 } });
    const http = createHttpClient({ insecureTls: false, requestTimeoutMs: 1000, adapter: platform.adapter });
    const api = new OpenStackApi(new KeystoneSession(sessionOptions, http, clock), http);

    const err = await api.listImages().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthenticationError);
    expect(err).toMatchObject({ kind: 'image', message: 'Authentication failed: HTTP 401' });
  });
});

describe('OpenStackApi details', () => {
  it('returns null for an unknown id', async () => {
    const { api } = apiWith({ [`GET ${NOVA}/servers/missing`]: { status: 404 } });
    await expect(api.getServerDetails('missing')).resolves.toBeNull();
  });

  it('encodes the id into the path', async () => {
    const { api, platform } = apiWith({
      [`GET ${NOVA}/images/a%2Fb`]: { status: 200, data: { image: { id: 'a/b' } } },
    });

    await expect(api.getImageDetails('a/b')).resolves.toEqual({ id: 'a/b' });
    expect(platform.requests[1]).toBe(`GET ${NOVA}/images/a%2Fb`);
  });

  it('fetches flavor extra specs when the flavor body lacks them', async () => {
    const { api } = apiWith({
      [`GET ${NOVA}/flavors/m1.small`]: { status: 200, data: { flavor: { id: 'm1.small', vcpus: 1 } } },
      [`GET ${NOVA}/flavors/m1.small/os-extra_specs`]: {
        status: 200,
        data: { extra_specs: { 'hw:mem_page_size': 'large' } },
      },
    });

    await expect(api.getFlavorDetails('m1.small')).resolves.toEqual({
      id: 'm1.small',
      vcpus: 1,
      extra_specs: { 'hw:mem_page_size': 'large' },
    });
  });

  it('keeps the flavor when its extra specs cannot be read', async () => {
    const { api } = apiWith({
      [`GET ${NOVA}/flavors/m1.small`]: { status: 200, data: { flavor: { id: 'm1.small' } } },
      [`GET ${NOVA}/flavors/m1.small/os-extra_specs`]: { status: 403 },
    });

    await expect(api.getFlavorDetails('m1.small')).resolves.toEqual({ id: 'm1.small' });
  });

  it('skips the specs call when the flavor embeds them', async () => {
    const { api, platform } = apiWith({
      [`GET ${NOVA}/flavors/m1.tiny`]: {
        status: 200,
        data: { flavor: { id: 'm1.tiny', 'OS-FLV-WITH-EXT-SPECS:extra_specs': {} } },
      },
    });

    await api.getFlavorDetails('m1.tiny');
    expect(platform.requests).toEqual([LOGIN, `GET ${NOVA}/flavors/m1.tiny`]);
  });
});

describe('toServiceError', () => {
  it('passes service errors through untouched', () => {
    const original = new TransportError('router', 'router request aborted');
    expect(toServiceError('server', original)).toBe(original);
  });

  it('wraps anything else as a generic service error', () => {
    const err = toServiceError('subnet', new InventoryError('TIMEOUT', 'subnets timed out after 10ms'));
    expect(err).toBeInstanceOf(ServiceError);
    expect(err.message).toBe('subnets timed out after 10ms');
    expect(err.kind).toBe('subnet');
  });

  it('maps HTTP 404 to a not-found error for the requested id', () => {
    const config = { headers: new AxiosHeaders(), url: `${NOVA}/servers/missing` };
    const response = { data: {}, status: 404, statusText: 'Not Found', headers: {}, config };
    const err = toServiceError(
      'server',
      new AxiosError('Request failed with status code 404', AxiosError.ERR_BAD_REQUEST, config, null, response),
      'missing'
    );

    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ code: 'NOT_FOUND', kind: 'server', id: 'missing', message: "server 'missing' not found" });
  });

  it('names the request URL when a listing answers 404', async () => {
    const { api } = apiWith({ [`GET ${NEUTRON}/v2.0/routers`]: { status: 404 } });

    const err = await api.listRouters().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ id: `${NEUTRON}/v2.0/routers` });
  });
});
