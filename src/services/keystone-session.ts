import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import type { OpenStackConfig } from '../config';
import { InventoryError, errorMessage } from '../lib/errors';
import logger from '../lib/logger';

const log = logger.child('keystone');

/** Refresh this long before Keystone's own expiry to avoid racing it. */
const EXPIRY_SKEW_MS = 60_000;

export type PlatformService = 'compute' | 'volume' | 'network';

/** Catalog types accepted per service, in preference order. */
const CATALOG_TYPES: Record<PlatformService, string[]> = {
  compute: ['compute'],
  volume: ['volumev3', 'block-storage', 'volume'],
  network: ['network'],
};

const endpointSchema = z.object({
  interface: z.string(),
  url: z.string(),
  region: z.string().nullish(),
  region_id: z.string().nullish(),
});

const tokenBodySchema = z.object({
  token: z.object({
    expires_at: z.string().optional(),
    project: z.object({ id: z.string() }).optional(),
    catalog: z
      .array(z.object({ type: z.string(), endpoints: z.array(endpointSchema) }))
      .optional()
      .default([]),
  }),
});

type CatalogEntry = z.infer<typeof tokenBodySchema>['token']['catalog'][number];

export type SessionToken = {
  id: string;
  projectId: string | null;
  expiresAt: number | null;
  endpoints: Record<PlatformService, string>;
};

export type SessionOptions = Pick<
  OpenStackConfig,
  'authUrl' | 'username' | 'password' | 'projectName' | 'userDomain' | 'projectDomain' | 'region' | 'interface'
>;

/**
 * Keystone v3 password session shared by every platform call.
 *
 * `getToken()` reuses a live token and collapses concurrent logins into a
 * single request; `invalidate()` forces the next call to log in again.
 */
export class KeystoneSession {
  private current?: SessionToken;
  private pending?: Promise<SessionToken>;

  constructor(
    private readonly options: SessionOptions,
    private readonly http: AxiosInstance,
    private readonly now: () => number = Date.now
  ) {}

  async getToken(): Promise<SessionToken> {
    if (this.current && !this.isExpiring(this.current)) {
      return this.current;
    }
    if (!this.pending) {
      this.pending = this.login().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    if (this.current) {
      log.info('session invalidated', { projectId: this.current.projectId });
    }
    this.current = undefined;
  }

  private isExpiring(token: SessionToken): boolean {
    return token.expiresAt !== null && token.expiresAt - EXPIRY_SKEW_MS <= this.now();
  }

  private async login(): Promise<SessionToken> {
    const authUrl = this.options.authUrl.replace(/\/$/, '');
    log.debug('requesting token', { authUrl, user: this.options.username, project: this.options.projectName });

    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.post<unknown>(`${authUrl}/auth/tokens`, {
        auth: {
          identity: {
            methods: ['password'],
            password: {
              user: {
                name: this.options.username,
                domain: { name: this.options.userDomain },
                password: this.options.password,
              },
            },
          },
          scope: {
            project: {
              name: this.options.projectName,
              domain: { name: this.options.projectDomain },
            },
          },
        },
      });
    } catch (err) {
      throw new InventoryError(
        'AUTHENTICATION_ERROR',
        `Authentication failed: ${describeHttpFailure(err)}`,
        { authUrl },
        err
      );
    }

    const tokenId: unknown = res.headers['x-subject-token'];
    if (typeof tokenId !== 'string' || tokenId.length === 0) {
      throw new InventoryError('AUTHENTICATION_ERROR', 'Authentication failed: response carried no X-Subject-Token');
    }

    const body = tokenBodySchema.safeParse(res.data);
    if (!body.success) {
      throw new InventoryError('AUTHENTICATION_ERROR', 'Authentication failed: unexpected token body', {
        issues: body.error.issues.map((i) => i.message),
      });
    }

    const projectId = body.data.token.project?.id ?? null;
    const expiresAt = body.data.token.expires_at ? Date.parse(body.data.token.expires_at) : NaN;
    const token: SessionToken = {
      id: tokenId,
      projectId,
      expiresAt: Number.isFinite(expiresAt) ? expiresAt : null,
      endpoints: {
        compute: this.resolveEndpoint('compute', body.data.token.catalog, projectId),
        volume: this.resolveEndpoint('volume', body.data.token.catalog, projectId),
        network: this.resolveEndpoint('network', body.data.token.catalog, projectId),
      },
    };

    log.info('session established', { projectId, endpoints: token.endpoints });
    this.current = token;
    return token;
  }

  /**
   * Pick the catalog endpoint matching the configured interface and region.
   * Without one, fall back to the conventional paths under the auth host.
   */
  private resolveEndpoint(service: PlatformService, catalog: CatalogEntry[], projectId: string | null): string {
    for (const type of CATALOG_TYPES[service]) {
      const entry = catalog.find((c) => c.type === type);
      const match = entry?.endpoints.find((e) => {
        const anyRegion = !e.region && !e.region_id;
        const sameRegion = e.region === this.options.region || e.region_id === this.options.region;
        return e.interface === this.options.interface && (anyRegion || sameRegion);
      });
      if (match) return match.url.replace(/\/$/, '');
    }

    const { protocol, host } = new URL(this.options.authUrl);
    const root = `${protocol}//${host}`;
    const project = projectId ? `/${projectId}` : '';
    const fallback: Record<PlatformService, string> = {
      compute: `${root}/compute/v2.1${project}`,
      volume: `${root}/volume/v3${project}`,
      network: `${root}/networking`,
    };
    log.warn('service missing from catalog, using conventional endpoint', { service, url: fallback[service] });
    return fallback[service];
  }
}

export function describeHttpFailure(err: unknown): string {
  if (axios.isAxiosError(err) && err.response) {
    return `HTTP ${err.response.status}`;
  }
  return errorMessage(err);
}
