import type {
  FlavorRecord,
  HypervisorRecord,
  ImageRecord,
  NetworkRecord,
  ResourceKind,
  ResourceRecordByKind,
  RouterRecord,
  ServerRecord,
  SubnetRecord,
  VolumeRecord,
  VolumeTypeRecord,
} from './resources';

// ---- capacity ----

export type CapacityMetric = {
  total: number;
  used: number;
  available: number;
  utilization_percent: number;
};

export type ComputeCapacity = {
  vcpus: CapacityMetric;
  memory_mb: CapacityMetric;
  local_storage_gb: CapacityMetric;
};

export type HypervisorUtilization = {
  hypervisor: string;
  status: string;
  state: string | null;
  running_vms: number;
  cpu: CapacityMetric;
  memory_mb: CapacityMetric;
  disk_gb: CapacityMetric;
};

/** Status value -> number of resources carrying it. */
export type StatusBreakdown = Record<string, number>;

// ---- health ----

export type ResourceHealth = 'healthy' | 'error' | 'stopped' | 'transitioning';

export type ServiceHealthStatus = 'healthy' | 'unhealthy';

export type OverallHealth = 'healthy' | 'degraded' | 'critical';

export type ServiceHealthEntry = {
  service_name: string;
  service_type: 'compute' | 'storage' | 'networking';
  status: ServiceHealthStatus;
  message: string;
  last_check: string;
};

export type ServiceHealthReport = {
  timestamp: string;
  overall_status: OverallHealth;
  services: ServiceHealthEntry[];
  summary: {
    healthy_services: number;
    unhealthy_services: number;
    total_services: number;
  };
};

// ---- recommendations ----

export type RecommendationPriority = 'low' | 'medium' | 'high' | 'critical';

export type RecommendationType = 'capacity_warning' | 'health_issue' | 'infrastructure_issue' | 'optimization';

export type Recommendation = {
  type: RecommendationType;
  resource: string;
  message: string;
  priority: RecommendationPriority;
  affected?: string[];
  /** Same list as `affected`, kept under its historical name for flavor cleanup hints. */
  unused_flavors?: string[];
};

// ---- inventory report ----

export type ReportFormat = 'summary' | 'detailed';

export type CollectionName =
  | 'servers'
  | 'hypervisors'
  | 'flavors'
  | 'images'
  | 'volumes'
  | 'volume_types'
  | 'networks'
  | 'subnets'
  | 'routers';

/** Why a collection came back empty. */
export type CollectionDiagnostic = {
  collection: CollectionName;
  message: string;
};

/** Record type held by each collection. */
export type CollectionRecords = {
  servers: ServerRecord;
  hypervisors: HypervisorRecord;
  flavors: FlavorRecord;
  images: ImageRecord;
  volumes: VolumeRecord;
  volume_types: VolumeTypeRecord;
  networks: NetworkRecord;
  subnets: SubnetRecord;
  routers: RouterRecord;
};

export type InventoryCollections = { [C in CollectionName]: CollectionRecords[C][] };

export type ReportMetadata = {
  generated_at: string;
  format: ReportFormat;
  services: string[];
  partial: boolean;
  deadline_exceeded: boolean;
  diagnostics: CollectionDiagnostic[];
};

export type ReportSummary = {
  total_resources: Record<CollectionName, number>;
  server_status_breakdown: StatusBreakdown;
  hypervisor_status_breakdown: StatusBreakdown;
};

export type ComputeSection = {
  servers: {
    total: number;
    by_status: StatusBreakdown;
    active: number;
    error_servers: string[];
  };
  hypervisors: {
    total: number;
    enabled: number;
    capacity: ComputeCapacity;
  };
  flavors: {
    total: number;
    public_flavors: number;
    resource_specs: {
      smallest_vcpu: number;
      largest_vcpu: number;
      smallest_ram_mb: number;
      largest_ram_mb: number;
    };
  };
  images: {
    total: number;
    by_status: StatusBreakdown;
  };
  server_details?: ServerRecord[];
  hypervisor_details?: HypervisorRecord[];
  flavor_details?: FlavorRecord[];
  image_details?: ImageRecord[];
};

export type StorageSection = {
  volumes: {
    total: number;
    total_size_gb: number;
    by_status: StatusBreakdown;
    available: number;
    in_use: number;
    attachment_rate: number;
  };
  volume_types: {
    total: number;
    public_types: number;
  };
  volume_details?: VolumeRecord[];
  volume_type_details?: VolumeTypeRecord[];
};

export type NetworkingSection = {
  networks: {
    total: number;
    external: number;
    internal: number;
    shared: number;
    by_status: StatusBreakdown;
  };
  subnets: {
    total: number;
    ipv4: number;
    ipv6: number;
    dhcp_enabled: number;
  };
  routers: {
    total: number;
    active: number;
    with_external_gateway: number;
  };
  network_details?: NetworkRecord[];
  subnet_details?: SubnetRecord[];
  router_details?: RouterRecord[];
};

export type ResourceUtilizationSection = {
  compute_utilization: {
    cpu_percent: number;
    memory_percent: number;
    disk_percent: number;
  };
  high_utilization_hypervisors: string[];
  servers_per_hypervisor: Record<string, number>;
};

export type InventoryReport = {
  metadata: ReportMetadata;
  summary: ReportSummary;
  compute: ComputeSection;
  storage: StorageSection;
  networking: NetworkingSection;
  resource_utilization: ResourceUtilizationSection;
  recommendations: Recommendation[];
};

/** Returned instead of a document when an aggregate operation faults outright. */
export type ErrorDocument = {
  error: string;
  timestamp: string;
};

// ---- per-operation documents ----

export type LookupResult<K extends ResourceKind> =
  | { status: 'found'; kind: K; resource: ResourceRecordByKind[K] }
  | { status: 'not_found'; kind: K; id: string; message: string }
  | { status: 'unavailable'; kind: K; id: string; message: string };

export type InfrastructureSummary = {
  timestamp: string;
  compute: {
    servers: { total: number; by_status: StatusBreakdown };
    hypervisors: { total: number; vcpus: CapacityMetric; memory_mb: CapacityMetric };
  };
  storage: {
    volumes: { total: number; total_size_gb: number };
  };
  networking: {
    networks: { total: number; external: number };
  };
  diagnostics: CollectionDiagnostic[];
};

export type ResourceUtilizationReport = {
  timestamp: string;
  hypervisors: HypervisorUtilization[];
  summary: {
    total_hypervisors: number;
    active_hypervisors: number;
    total_vms: number;
    high_utilization_hypervisors: string[];
  };
  diagnostics: CollectionDiagnostic[];
};

export type ServerResourceAnalysis = {
  server_info: {
    id: string;
    name: string | null;
    status: string;
    power_state: number | null;
    host: string | null;
    created: string | null;
  };
  resource_allocation: {
    flavor_id: string;
    vcpus: number;
    ram_mb: number;
    disk_gb: number;
    ephemeral_gb: number;
  } | null;
  host_analysis: {
    hypervisor: string;
    hypervisor_status: string;
    hypervisor_state: string | null;
    cpu: CapacityMetric;
    memory_mb: CapacityMetric;
    running_vms: number;
    high_utilization: boolean;
  } | null;
  health_status: ResourceHealth;
  diagnostics: string[];
};
