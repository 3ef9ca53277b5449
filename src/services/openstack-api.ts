import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import https from 'https';
import type { OpenStackConfig } from '../config';
import {
  AuthenticationError,
  InventoryError,
  MalformedResponseError,
  NotFoundError,
  ServiceError,
  TransportError,
  errorMessage,
} from '../lib/errors';
import logger from '../lib/logger';
import type { CallOptions, CloudResourceClient } from '../types/client';
import type { RawResource, ResourceKind } from '../types/resources';
import type { KeystoneSession, PlatformService } from './keystone-session';

const log = logger.child('openstack');

export type HttpClientOptions = Pick<OpenStackConfig, 'insecureTls' | 'requestTimeoutMs'> & {
  /** Replace the network layer (used by tests). */
  adapter?: AxiosAdapter;
};

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const httpsAgent = options.insecureTls ? new https.Agent({ rejectUnauthorized: false }) : undefined;
  return axios.create({
    timeout: options.requestTimeoutMs,
    httpsAgent,
    adapter: options.adapter,
    headers: {
      Accept: 'application/json',
    },
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Fold anything thrown while talking to the platform into the ServiceError
 * family, tagged with the resource kind being fetched. `id` names the
 * resource a 404 refers to; listings fall back to the request URL.
 */
export function toServiceError(kind: ResourceKind, err: unknown, id?: string): ServiceError {
  if (err instanceof ServiceError) return err;
  if (err instanceof InventoryError && err.code === 'AUTHENTICATION_ERROR') {
    return new AuthenticationError(kind, err.message, err.context, err);
  }
  if (axios.isCancel(err)) {
    return new TransportError(kind, `${kind} request aborted`, {}, err);
  }
  if (axios.isAxiosError(err)) {
    const url = err.config?.url;
    const status = err.response?.status;
    if (status === undefined) {
      return new TransportError(kind, `${kind} request failed: ${err.message}`, { url, code: err.code }, err);
    }
    if (status === 401 || status === 403) {
      return new AuthenticationError(kind, `${kind} request rejected with HTTP ${status}`, { url, status }, err);
    }
    if (status === 404) {
      return new NotFoundError(kind, id ?? url ?? kind, err);
    }
    return new ServiceError(kind, `${kind} request failed with HTTP ${status}`, { url, status }, err);
  }
  return new ServiceError(kind, errorMessage(err), {}, err);
}

const isHttpStatus = (err: unknown, status: number): boolean =>
  axios.isAxiosError(err) && err.response?.status === status;

/**
 * Read-only client for Nova, Cinder and Neutron, authenticated through a
 * shared Keystone session.
 */
export class OpenStackApi implements CloudResourceClient {
  constructor(
    private readonly session: KeystoneSession,
    private readonly http: AxiosInstance
  ) {}

  /**
   * GET `path` on `service`. A 401 drops the session token and retries once
   * with a fresh one.
   */
  private async get(
    kind: ResourceKind,
    service: PlatformService,
    path: string,
    options: CallOptions = {},
    retryOnUnauthorized = true
  ): Promise<unknown> {
    try {
      const token = await this.session.getToken();
      const res = await this.http.get<unknown>(`${token.endpoints[service]}${path}`, {
        headers: { 'X-Auth-Token': token.id },
        signal: options.signal,
      });
      return res.data;
    } catch (err) {
      if (retryOnUnauthorized && isHttpStatus(err, 401)) {
        log.warn('token rejected, re-authenticating', { kind, path });
        this.session.invalidate();
        return this.get(kind, service, path, options, false);
      }
      throw err;
    }
  }

  private async list(
    kind: ResourceKind,
    service: PlatformService,
    path: string,
    envelopeKey: string,
    options?: CallOptions
  ): Promise<RawResource[]> {
    let body: unknown;
    try {
      body = await this.get(kind, service, path, options);
    } catch (err) {
      throw toServiceError(kind, err);
    }

    const items = isRecord(body) ? body[envelopeKey] : undefined;
    if (!Array.isArray(items)) {
      throw new MalformedResponseError(kind, `${path} response has no '${envelopeKey}' list`, {
        keys: isRecord(body) ? Object.keys(body).slice(0, 10) : typeof body,
      });
    }
    const resources = items.filter(isRecord);
    log.debug('listed resources', { kind, count: resources.length, dropped: items.length - resources.length });
    return resources;
  }

  private async detail(
    kind: ResourceKind,
    service: PlatformService,
    path: string,
    envelopeKey: string,
    id: string,
    options?: CallOptions
  ): Promise<RawResource | null> {
    let body: unknown;
    try {
      body = await this.get(kind, service, path, options);
    } catch (err) {
      const failure = toServiceError(kind, err, id);
      if (failure instanceof NotFoundError) {
        log.debug('resource not found', { kind, id });
        return null;
      }
      throw failure;
    }

    const item = isRecord(body) ? body[envelopeKey] : undefined;
    if (!isRecord(item)) {
      throw new MalformedResponseError(kind, `${path} response has no '${envelopeKey}' object`, { id });
    }
    return item;
  }

  // ---- Compute (Nova) ----

  listServers(options?: CallOptions): Promise<RawResource[]> {
    return this.list('server', 'compute', '/servers/detail', 'servers', options);
  }

  getServerDetails(id: string, options?: CallOptions): Promise<RawResource | null> {
    return this.detail('server', 'compute', `/servers/${encodeURIComponent(id)}`, 'server', id, options);
  }

  listHypervisors(options?: CallOptions): Promise<RawResource[]> {
    return this.list('hypervisor', 'compute', '/os-hypervisors/detail', 'hypervisors', options);
  }

  listFlavors(options?: CallOptions): Promise<RawResource[]> {
    return this.list('flavor', 'compute', '/flavors/detail', 'flavors', options);
  }

  /**
   * Flavor plus its extra specs. Older microversions omit the specs from the
   * flavor body, so they are fetched separately when missing.
   */
  async getFlavorDetails(id: string, options?: CallOptions): Promise<RawResource | null> {
    const path = `/flavors/${encodeURIComponent(id)}`;
    const flavor = await this.detail('flavor', 'compute', path, 'flavor', id, options);
    if (!flavor || flavor['OS-FLV-WITH-EXT-SPECS:extra_specs'] !== undefined) {
      return flavor;
    }

    try {
      const specs = await this.get('flavor', 'compute', `${path}/os-extra_specs`, options);
      return isRecord(specs) ? { ...flavor, extra_specs: specs.extra_specs } : flavor;
    } catch (err) {
      log.warn('flavor extra specs unavailable', { id, err: toServiceError('flavor', err) });
      return flavor;
    }
  }

  listImages(options?: CallOptions): Promise<RawResource[]> {
    return this.list('image', 'compute', '/images/detail', 'images', options);
  }

  getImageDetails(id: string, options?: CallOptions): Promise<RawResource | null> {
    return this.detail('image', 'compute', `/images/${encodeURIComponent(id)}`, 'image', id, options);
  }

  // ---- Block storage (Cinder) ----

  listVolumes(options?: CallOptions): Promise<RawResource[]> {
    return this.list('volume', 'volume', '/volumes/detail', 'volumes', options);
  }

  listVolumeTypes(options?: CallOptions): Promise<RawResource[]> {
    return this.list('volume_type', 'volume', '/types', 'volume_types', options);
  }

  // ---- Networking (Neutron) ----

  listNetworks(options?: CallOptions): Promise<RawResource[]> {
    return this.list('network', 'network', '/v2.0/networks', 'networks', options);
  }

  listSubnets(options?: CallOptions): Promise<RawResource[]> {
    return this.list('subnet', 'network', '/v2.0/subnets', 'subnets', options);
  }

  listRouters(options?: CallOptions): Promise<RawResource[]> {
    return this.list('router', 'network', '/v2.0/routers', 'routers', options);
  }
}
