import { TaskGroup, deadlineSignal } from '../lib/concurrency';
import { NotFoundError, errorMessage } from '../lib/errors';
import logger from '../lib/logger';
import { Result } from '../lib/result';
import { aggregateCapacity, highUtilizationHosts, hypervisorUtilization, isHighUtilizationHost, capacityMetric } from '../inventory/capacity';
import { classifyServer } from '../inventory/classify';
import { platformProbes, probeServices } from '../inventory/health';
import {
  normalizeFlavor,
  normalizeHypervisor,
  normalizeImage,
  normalizeNetwork,
  normalizeRouter,
  normalizeServer,
  normalizeSubnet,
  normalizeVolume,
  normalizeVolumeType,
} from '../inventory/normalize';
import { assembleReport } from '../inventory/report';
import { countWhere, tabulate } from '../inventory/status';
import type { CloudResourceClient } from '../types/client';
import type {
  CollectionDiagnostic,
  CollectionName,
  CollectionRecords,
  ErrorDocument,
  InfrastructureSummary,
  InventoryCollections,
  InventoryReport,
  LookupResult,
  ReportFormat,
  ResourceUtilizationReport,
  ServerResourceAnalysis,
  ServiceHealthReport,
} from '../types/report';
import type { HypervisorRecord, RawResource, ResourceRecordByKind } from '../types/resources';

const log = logger.child('inventory');

export type InventoryControllerOptions = {
  /** Budget for one collection fetch or detail lookup. */
  fetchTimeoutMs: number;
  /** Budget for one service health probe. */
  probeTimeoutMs: number;
  /** Budget for a whole inventory report; finished sections survive expiry. */
  reportDeadlineMs: number;
  now?: () => Date;
};

type Fetchers = { [C in CollectionName]: (signal: AbortSignal) => Promise<CollectionRecords[C][]> };

type DetailKind = 'server' | 'flavor' | 'image';

export type MissingResource<K extends DetailKind> = Exclude<LookupResult<K>, { status: 'found' }>;

/**
 * Orchestrates the inventory engine over a CloudResourceClient: fetches
 * collections concurrently with per-collection fault isolation, then hands
 * the normalized records to the pure aggregation modules.
 */
export class InventoryController {
  private readonly now: () => Date;

  private readonly fetchers: Fetchers = {
    servers: async (signal) => (await this.client.listServers({ signal })).map(normalizeServer),
    hypervisors: async (signal) => (await this.client.listHypervisors({ signal })).map(normalizeHypervisor),
    flavors: async (signal) => (await this.client.listFlavors({ signal })).map(normalizeFlavor),
    images: async (signal) => (await this.client.listImages({ signal })).map(normalizeImage),
    volumes: async (signal) => (await this.client.listVolumes({ signal })).map(normalizeVolume),
    volume_types: async (signal) => (await this.client.listVolumeTypes({ signal })).map(normalizeVolumeType),
    networks: async (signal) => (await this.client.listNetworks({ signal })).map(normalizeNetwork),
    subnets: async (signal) => (await this.client.listSubnets({ signal })).map(normalizeSubnet),
    routers: async (signal) => (await this.client.listRouters({ signal })).map(normalizeRouter),
  };

  constructor(
    private readonly client: CloudResourceClient,
    private readonly options: InventoryControllerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  // ---- listings ----

  /**
   * Normalized listing of one collection. A failing backend yields an empty
   * list; the cause is logged, never thrown.
   */
  async list<C extends CollectionName>(name: C): Promise<CollectionRecords[C][]> {
    const group = new TaskGroup({ concurrency: 1, timeoutMs: this.options.fetchTimeoutMs });
    const fetcher: Fetchers[C] = this.fetchers[name];
    return this.unwrap(name, await group.run<CollectionRecords[C][]>(name, fetcher), []);
  }

  // ---- detail lookups ----

  getServerDetails(id: string): Promise<LookupResult<'server'>> {
    return this.lookup('server', id, (signal) => this.client.getServerDetails(id, { signal }), normalizeServer);
  }

  getFlavorDetails(id: string): Promise<LookupResult<'flavor'>> {
    return this.lookup('flavor', id, (signal) => this.client.getFlavorDetails(id, { signal }), normalizeFlavor);
  }

  getImageDetails(id: string): Promise<LookupResult<'image'>> {
    return this.lookup('image', id, (signal) => this.client.getImageDetails(id, { signal }), normalizeImage);
  }

  private async lookup<K extends DetailKind>(
    kind: K,
    id: string,
    load: (signal: AbortSignal) => Promise<RawResource | null>,
    normalize: (raw: RawResource) => ResourceRecordByKind[K]
  ): Promise<LookupResult<K>> {
    const group = new TaskGroup({ concurrency: 1, timeoutMs: this.options.fetchTimeoutMs });
    const result = await group.run(`${kind} ${id}`, load);

    if (result.ok && result.value) {
      return { status: 'found', kind, resource: normalize(result.value) };
    }
    if (result.ok || result.error instanceof NotFoundError) {
      return { status: 'not_found', kind, id, message: new NotFoundError(kind, id).message };
    }
    log.warn('detail lookup failed', { kind, id, diagnostic: result.diagnostic });
    return { status: 'unavailable', kind, id, message: result.diagnostic };
  }

  /**
   * Where a server runs, what its flavor grants it, and whether it is healthy.
   */
  async analyzeServerResources(id: string): Promise<ServerResourceAnalysis | MissingResource<'server'>> {
    const lookup = await this.getServerDetails(id);
    if (lookup.status !== 'found') return lookup;

    const server = lookup.resource;
    const diagnostics: string[] = [];
    const group = new TaskGroup({ concurrency: 2, timeoutMs: this.options.fetchTimeoutMs });

    const [flavor, hypervisors] = await Promise.all([
      server.flavor ? this.getFlavorDetails(server.flavor) : Promise.resolve(null),
      server.host ? group.run('hypervisors', this.fetchers.hypervisors) : Promise.resolve(null),
    ]);

    if (flavor && flavor.status !== 'found') diagnostics.push(flavor.message);
    if (hypervisors && !hypervisors.ok) diagnostics.push(`hypervisors: ${hypervisors.diagnostic}`);

    const host = server.host;
    const hypervisor =
      host && hypervisors?.ok ? hypervisors.value.find((h) => matchesHost(h, host)) ?? null : null;

    return {
      server_info: {
        id: server.id,
        name: server.name,
        status: server.status,
        power_state: server.power_state,
        host: server.host,
        created: server.created,
      },
      resource_allocation:
        flavor?.status === 'found'
          ? {
              flavor_id: flavor.resource.id,
              vcpus: flavor.resource.vcpus,
              ram_mb: flavor.resource.ram,
              disk_gb: flavor.resource.disk,
              ephemeral_gb: flavor.resource.ephemeral,
            }
          : null,
      host_analysis: hypervisor
        ? {
            hypervisor: hypervisor.hypervisor_hostname ?? hypervisor.id,
            hypervisor_status: hypervisor.status,
            hypervisor_state: hypervisor.state,
            cpu: capacityMetric(hypervisor.vcpus, hypervisor.vcpus_used),
            memory_mb: capacityMetric(hypervisor.memory_mb, hypervisor.memory_mb_used),
            running_vms: hypervisor.running_vms,
            high_utilization: isHighUtilizationHost(hypervisor),
          }
        : null,
      health_status: classifyServer(server),
      diagnostics,
    };
  }

  // ---- aggregates ----

  getInfrastructureSummary(): Promise<InfrastructureSummary | ErrorDocument> {
    return this.guard('get infrastructure summary', async () => {
      const group = new TaskGroup({ concurrency: 4, timeoutMs: this.options.fetchTimeoutMs });
      const [servers, hypervisors, volumes, networks] = await Promise.all([
        group.run('servers', this.fetchers.servers),
        group.run('hypervisors', this.fetchers.hypervisors),
        group.run('volumes', this.fetchers.volumes),
        group.run('networks', this.fetchers.networks),
      ]);

      const diagnostics: CollectionDiagnostic[] = [];
      const serverList = this.unwrap('servers', servers, diagnostics);
      const hypervisorList = this.unwrap('hypervisors', hypervisors, diagnostics);
      const volumeList = this.unwrap('volumes', volumes, diagnostics);
      const networkList = this.unwrap('networks', networks, diagnostics);
      const capacity = aggregateCapacity(hypervisorList);

      return {
        timestamp: this.now().toISOString(),
        compute: {
          servers: { total: serverList.length, by_status: tabulate(serverList, 'status') },
          hypervisors: { total: hypervisorList.length, vcpus: capacity.vcpus, memory_mb: capacity.memory_mb },
        },
        storage: {
          volumes: { total: volumeList.length, total_size_gb: volumeList.reduce((acc, v) => acc + v.size, 0) },
        },
        networking: {
          networks: { total: networkList.length, external: countWhere(networkList, (n) => n.external) },
        },
        diagnostics,
      };
    });
  }

  getResourceUtilization(): Promise<ResourceUtilizationReport | ErrorDocument> {
    return this.guard('get resource utilization', async () => {
      const diagnostics: CollectionDiagnostic[] = [];
      const group = new TaskGroup({ concurrency: 1, timeoutMs: this.options.fetchTimeoutMs });
      const hypervisors = this.unwrap('hypervisors', await group.run('hypervisors', this.fetchers.hypervisors), diagnostics);

      return {
        timestamp: this.now().toISOString(),
        hypervisors: hypervisors.map(hypervisorUtilization),
        summary: {
          total_hypervisors: hypervisors.length,
          active_hypervisors: countWhere(hypervisors, (h) => h.status === 'enabled'),
          total_vms: hypervisors.reduce((acc, h) => acc + h.running_vms, 0),
          high_utilization_hypervisors: highUtilizationHosts(hypervisors),
        },
        diagnostics,
      };
    });
  }

  checkServiceHealth(): Promise<ServiceHealthReport | ErrorDocument> {
    return this.guard('check service health', () =>
      probeServices(platformProbes(this.client), { timeoutMs: this.options.probeTimeoutMs, now: this.now })
    );
  }

  /**
   * Fetch all nine collections concurrently under one deadline and assemble
   * the report. Collections that fail or miss the deadline are reported empty
   * with a diagnostic; the rest of the report is unaffected.
   */
  generateInventoryReport(format: ReportFormat): Promise<InventoryReport | ErrorDocument> {
    return this.guard('generate inventory report', async () => {
      const deadline = deadlineSignal(this.options.reportDeadlineMs);
      const group = new TaskGroup({ concurrency: 9, timeoutMs: this.options.fetchTimeoutMs, signal: deadline });

      const [servers, hypervisors, flavors, images, volumes, volumeTypes, networks, subnets, routers] =
        await Promise.all([
          group.run('servers', this.fetchers.servers),
          group.run('hypervisors', this.fetchers.hypervisors),
          group.run('flavors', this.fetchers.flavors),
          group.run('images', this.fetchers.images),
          group.run('volumes', this.fetchers.volumes),
          group.run('volume_types', this.fetchers.volume_types),
          group.run('networks', this.fetchers.networks),
          group.run('subnets', this.fetchers.subnets),
          group.run('routers', this.fetchers.routers),
        ]);

      const diagnostics: CollectionDiagnostic[] = [];
      const collections: InventoryCollections = {
        servers: this.unwrap('servers', servers, diagnostics),
        hypervisors: this.unwrap('hypervisors', hypervisors, diagnostics),
        flavors: this.unwrap('flavors', flavors, diagnostics),
        images: this.unwrap('images', images, diagnostics),
        volumes: this.unwrap('volumes', volumes, diagnostics),
        volume_types: this.unwrap('volume_types', volumeTypes, diagnostics),
        networks: this.unwrap('networks', networks, diagnostics),
        subnets: this.unwrap('subnets', subnets, diagnostics),
        routers: this.unwrap('routers', routers, diagnostics),
      };

      const report = assembleReport(collections, {
        format,
        generatedAt: this.now(),
        diagnostics,
        deadlineExceeded: deadline.aborted,
      });
      log.info('inventory report generated', {
        format,
        partial: report.metadata.partial,
        recommendations: report.recommendations.length,
      });
      return report;
    });
  }

  // ---- helpers ----

  private unwrap<T>(name: CollectionName, result: Result<T[]>, diagnostics: CollectionDiagnostic[]): T[] {
    if (result.ok) return result.value;
    log.warn('collection unavailable, continuing without it', { collection: name, diagnostic: result.diagnostic });
    diagnostics.push({ collection: name, message: result.diagnostic });
    return [];
  }

  /**
   * Run an aggregate operation; an unexpected fault becomes an error document
   * with its own timestamp so callers always receive JSON.
   */
  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T | ErrorDocument> {
    try {
      return await run();
    } catch (err) {
      log.error(`failed to ${operation}`, { err });
      return {
        error: `Failed to ${operation}: ${errorMessage(err)}`,
        timestamp: new Date().toISOString(),
      };
    }
  }
}

/** Nova reports the short host name; hypervisors are often listed by FQDN. */
function matchesHost(h: HypervisorRecord, host: string): boolean {
  const name = h.hypervisor_hostname;
  return name === host || (name !== null && name.startsWith(`${host}.`));
}
