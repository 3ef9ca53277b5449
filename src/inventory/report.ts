import type {
  CollectionDiagnostic,
  CollectionName,
  ComputeCapacity,
  ComputeSection,
  InventoryCollections,
  InventoryReport,
  NetworkingSection,
  ReportFormat,
  ResourceUtilizationSection,
  StorageSection,
} from '../types/report';
import { aggregateCapacity, highUtilizationHosts, utilizationPercent } from './capacity';
import { recommend } from './recommendations';
import { countWhere, tabulate } from './status';

export const REPORT_SERVICES = ['nova', 'cinder', 'neutron', 'keystone'];

export type AssembleOptions = {
  format: ReportFormat;
  generatedAt: Date;
  diagnostics?: CollectionDiagnostic[];
  deadlineExceeded?: boolean;
};

/** Anything other than "detailed" means summary. */
export function resolveFormat(value: unknown): ReportFormat {
  return value === 'detailed' ? 'detailed' : 'summary';
}

const minOf = (values: number[]): number => (values.length > 0 ? Math.min(...values) : 0);
const maxOf = (values: number[]): number => (values.length > 0 ? Math.max(...values) : 0);

function computeSection(c: InventoryCollections, capacity: ComputeCapacity, detailed: boolean): ComputeSection {
  const section: ComputeSection = {
    servers: {
      total: c.servers.length,
      by_status: tabulate(c.servers, 'status'),
      active: countWhere(c.servers, (s) => s.status === 'ACTIVE'),
      error_servers: c.servers.filter((s) => s.status === 'ERROR').map((s) => s.name ?? s.id),
    },
    hypervisors: {
      total: c.hypervisors.length,
      enabled: countWhere(c.hypervisors, (h) => h.status === 'enabled'),
      capacity,
    },
    flavors: {
      total: c.flavors.length,
      public_flavors: countWhere(c.flavors, (f) => f.is_public),
      resource_specs: {
        smallest_vcpu: minOf(c.flavors.map((f) => f.vcpus)),
        largest_vcpu: maxOf(c.flavors.map((f) => f.vcpus)),
        smallest_ram_mb: minOf(c.flavors.map((f) => f.ram)),
        largest_ram_mb: maxOf(c.flavors.map((f) => f.ram)),
      },
    },
    images: {
      total: c.images.length,
      by_status: tabulate(c.images, 'status'),
    },
  };
  if (detailed) {
    section.server_details = c.servers;
    section.hypervisor_details = c.hypervisors;
    section.flavor_details = c.flavors;
    section.image_details = c.images;
  }
  return section;
}

function storageSection(c: InventoryCollections, detailed: boolean): StorageSection {
  const inUse = countWhere(c.volumes, (v) => v.status === 'in-use');
  const section: StorageSection = {
    volumes: {
      total: c.volumes.length,
      total_size_gb: c.volumes.reduce((acc, v) => acc + v.size, 0),
      by_status: tabulate(c.volumes, 'status'),
      available: countWhere(c.volumes, (v) => v.status === 'available'),
      in_use: inUse,
      attachment_rate: utilizationPercent(inUse, c.volumes.length),
    },
    volume_types: {
      total: c.volume_types.length,
      public_types: countWhere(c.volume_types, (t) => t.is_public),
    },
  };
  if (detailed) {
    section.volume_details = c.volumes;
    section.volume_type_details = c.volume_types;
  }
  return section;
}

function networkingSection(c: InventoryCollections, detailed: boolean): NetworkingSection {
  const external = countWhere(c.networks, (n) => n.external);
  const section: NetworkingSection = {
    networks: {
      total: c.networks.length,
      external,
      internal: c.networks.length - external,
      shared: countWhere(c.networks, (n) => n.shared),
      by_status: tabulate(c.networks, 'status'),
    },
    subnets: {
      total: c.subnets.length,
      ipv4: countWhere(c.subnets, (s) => s.ip_version === 4),
      ipv6: countWhere(c.subnets, (s) => s.ip_version === 6),
      dhcp_enabled: countWhere(c.subnets, (s) => s.enable_dhcp),
    },
    routers: {
      total: c.routers.length,
      active: countWhere(c.routers, (r) => r.status === 'ACTIVE'),
      with_external_gateway: countWhere(c.routers, (r) => r.external_gateway_info !== null),
    },
  };
  if (detailed) {
    section.network_details = c.networks;
    section.subnet_details = c.subnets;
    section.router_details = c.routers;
  }
  return section;
}

function utilizationSection(c: InventoryCollections, capacity: ComputeCapacity): ResourceUtilizationSection {
  const serversPerHypervisor: Record<string, number> = {};
  for (const h of c.hypervisors) {
    serversPerHypervisor[h.hypervisor_hostname ?? h.id] = h.running_vms;
  }
  return {
    compute_utilization: {
      cpu_percent: capacity.vcpus.utilization_percent,
      memory_percent: capacity.memory_mb.utilization_percent,
      disk_percent: capacity.local_storage_gb.utilization_percent,
    },
    high_utilization_hypervisors: highUtilizationHosts(c.hypervisors),
    servers_per_hypervisor: serversPerHypervisor,
  };
}

function totals(c: InventoryCollections): Record<CollectionName, number> {
  return {
    servers: c.servers.length,
    hypervisors: c.hypervisors.length,
    flavors: c.flavors.length,
    images: c.images.length,
    volumes: c.volumes.length,
    volume_types: c.volume_types.length,
    networks: c.networks.length,
    subnets: c.subnets.length,
    routers: c.routers.length,
  };
}

/**
 * Build the inventory report from already-normalized collections. Any
 * collection may be empty; nothing here assumes cross-collection references
 * resolve (a server's flavor id need not name a listed flavor).
 */
export function assembleReport(collections: InventoryCollections, options: AssembleOptions): InventoryReport {
  const detailed = options.format === 'detailed';
  const diagnostics = options.diagnostics ?? [];
  const capacity = aggregateCapacity(collections.hypervisors);

  return {
    metadata: {
      generated_at: options.generatedAt.toISOString(),
      format: options.format,
      services: [...REPORT_SERVICES],
      partial: diagnostics.length > 0,
      deadline_exceeded: options.deadlineExceeded ?? false,
      diagnostics,
    },
    summary: {
      total_resources: totals(collections),
      server_status_breakdown: tabulate(collections.servers, 'status'),
      hypervisor_status_breakdown: tabulate(collections.hypervisors, 'status'),
    },
    compute: computeSection(collections, capacity, detailed),
    storage: storageSection(collections, detailed),
    networking: networkingSection(collections, detailed),
    resource_utilization: utilizationSection(collections, capacity),
    recommendations: recommend({
      capacity,
      servers: collections.servers,
      hypervisors: collections.hypervisors,
      flavors: collections.flavors,
    }),
  };
}
