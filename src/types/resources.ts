// Canonical resource records built from raw Nova / Cinder / Neutron payloads.
// Records are plain values: built once per fetch and never mutated.

export type ResourceKind =
  | 'server'
  | 'hypervisor'
  | 'flavor'
  | 'image'
  | 'volume'
  | 'volume_type'
  | 'network'
  | 'subnet'
  | 'router';

/** A resource exactly as the platform returned it (vendor-prefixed keys and all). */
export type RawResource = Record<string, unknown>;

type BaseRecord<K extends ResourceKind> = {
  kind: K;
  id: string;
  name: string | null;
  /** Platform status string; "unknown" when the payload had none. */
  status: string;
};

export type ServerAddress = {
  addr: string;
  version: number | null;
  type: string | null;
  mac_addr: string | null;
};

export type ServerFault = {
  code: number | null;
  message: string;
  created: string | null;
};

export type ServerRecord = BaseRecord<'server'> & {
  host: string | null;
  availability_zone: string | null;
  created: string | null;
  updated: string | null;
  /** Flavor id, null when the payload embeds the flavor without an id. */
  flavor: string | null;
  /** Image id, null for boot-from-volume servers. */
  image: string | null;
  power_state: number | null;
  task_state: string | null;
  vm_state: string | null;
  addresses: Record<string, ServerAddress[]>;
  metadata: Record<string, string>;
  fault: ServerFault | null;
};

export type HypervisorRecord = BaseRecord<'hypervisor'> & {
  hypervisor_hostname: string | null;
  host_ip: string | null;
  state: string | null;
  hypervisor_type: string | null;
  hypervisor_version: number | null;
  vcpus: number;
  vcpus_used: number;
  memory_mb: number;
  memory_mb_used: number;
  local_gb: number;
  local_gb_used: number;
  free_ram_mb: number;
  free_disk_gb: number;
  running_vms: number;
};

export type FlavorRecord = BaseRecord<'flavor'> & {
  vcpus: number;
  ram: number;
  disk: number;
  ephemeral: number;
  swap: number;
  is_public: boolean;
  extra_specs: Record<string, string>;
};

export type ImageRecord = BaseRecord<'image'> & {
  created: string | null;
  updated: string | null;
  size: number;
  min_disk: number;
  min_ram: number;
  progress: number | null;
  metadata: Record<string, string>;
};

export type VolumeAttachment = {
  attachment_id: string | null;
  server_id: string | null;
  device: string | null;
  host_name: string | null;
};

export type VolumeRecord = BaseRecord<'volume'> & {
  size: number;
  volume_type: string | null;
  bootable: boolean;
  created_at: string | null;
  availability_zone: string | null;
  attachments: VolumeAttachment[];
};

export type VolumeTypeRecord = BaseRecord<'volume_type'> & {
  description: string | null;
  is_public: boolean;
  extra_specs: Record<string, string>;
};

export type NetworkRecord = BaseRecord<'network'> & {
  admin_state_up: boolean;
  shared: boolean;
  external: boolean;
  provider_network_type: string | null;
  mtu: number | null;
  subnets: string[];
};

export type AllocationPool = { start: string; end: string };

export type SubnetRecord = BaseRecord<'subnet'> & {
  network_id: string | null;
  cidr: string | null;
  ip_version: number | null;
  gateway_ip: string | null;
  enable_dhcp: boolean;
  allocation_pools: AllocationPool[];
};

export type ExternalGateway = {
  network_id: string | null;
  enable_snat: boolean | null;
};

export type RouterRecord = BaseRecord<'router'> & {
  admin_state_up: boolean;
  external_gateway_info: ExternalGateway | null;
  ha: boolean | null;
  distributed: boolean | null;
};

export type ResourceRecordByKind = {
  server: ServerRecord;
  hypervisor: HypervisorRecord;
  flavor: FlavorRecord;
  image: ImageRecord;
  volume: VolumeRecord;
  volume_type: VolumeTypeRecord;
  network: NetworkRecord;
  subnet: SubnetRecord;
  router: RouterRecord;
};
