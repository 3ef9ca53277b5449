import type {
  AllocationPool,
  ExternalGateway,
  FlavorRecord,
  HypervisorRecord,
  ImageRecord,
  NetworkRecord,
  RawResource,
  RouterRecord,
  ServerAddress,
  ServerFault,
  ServerRecord,
  SubnetRecord,
  VolumeAttachment,
  VolumeRecord,
  VolumeTypeRecord,
} from '../types/resources';

// ---- raw value coercion ----

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First key present with a non-null value. */
function pick(raw: RawResource, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function toStr(value: unknown): string | null {
  if (typeof value === 'string') return value.length > 0 ? value : null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function toNullableInt(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
  }
  return null;
}

function toInt(value: unknown, fallback = 0): number {
  return toNullableInt(value) ?? fallback;
}

function toNullableBool(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
  }
  return null;
}

function toBool(value: unknown, fallback = false): boolean {
  return toNullableBool(value) ?? fallback;
}

/** Reduce a nested reference (`{ id, links }`) or bare id string to the id. */
function refId(value: unknown): string | null {
  if (isRecord(value)) return toStr(value.id);
  return toStr(value);
}

/** String-valued map with keys sorted so output does not depend on raw key order. */
function stringMap(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {};
  const out: Record<string, string> = {};
  for (const key of Object.keys(value).sort()) {
    const entry = value[key];
    if (entry === undefined || entry === null) continue;
    out[key] = typeof entry === 'string' ? entry : JSON.stringify(entry);
  }
  return out;
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.map(toStr).filter((v): v is string => v !== null) : [];
}

function base(raw: RawResource) {
  return {
    id: toStr(raw.id) ?? '',
    name: toStr(raw.name),
    status: toStr(raw.status) ?? 'unknown',
  };
}

// ---- per-kind normalizers ----

function serverAddresses(value: unknown): Record<string, ServerAddress[]> {
  if (!isRecord(value)) return {};
  const out: Record<string, ServerAddress[]> = {};
  for (const network of Object.keys(value).sort()) {
    out[network] = records(value[network]).flatMap((entry) => {
      const addr = toStr(entry.addr);
      if (!addr) return [];
      return [
        {
          addr,
          version: toNullableInt(entry.version),
          type: toStr(entry['OS-EXT-IPS:type']),
          mac_addr: toStr(entry['OS-EXT-IPS-MAC:mac_addr']),
        },
      ];
    });
  }
  return out;
}

function serverFault(value: unknown): ServerFault | null {
  if (!isRecord(value)) return null;
  return {
    code: toNullableInt(value.code),
    message: toStr(value.message) ?? '',
    created: toStr(value.created),
  };
}

export function normalizeServer(raw: RawResource): ServerRecord {
  return {
    kind: 'server',
    ...base(raw),
    host: toStr(pick(raw, 'OS-EXT-SRV-ATTR:host')),
    availability_zone: toStr(pick(raw, 'OS-EXT-AZ:availability_zone')),
    created: toStr(raw.created),
    updated: toStr(raw.updated),
    flavor: refId(raw.flavor),
    image: refId(raw.image),
    power_state: toNullableInt(pick(raw, 'OS-EXT-STS:power_state')),
    task_state: toStr(pick(raw, 'OS-EXT-STS:task_state')),
    vm_state: toStr(pick(raw, 'OS-EXT-STS:vm_state')),
    addresses: serverAddresses(raw.addresses),
    metadata: stringMap(raw.metadata),
    fault: serverFault(raw.fault),
  };
}

export function normalizeHypervisor(raw: RawResource): HypervisorRecord {
  const hostname = toStr(raw.hypervisor_hostname);
  return {
    kind: 'hypervisor',
    ...base(raw),
    name: hostname,
    hypervisor_hostname: hostname,
    host_ip: toStr(raw.host_ip),
    state: toStr(raw.state),
    hypervisor_type: toStr(raw.hypervisor_type),
    hypervisor_version: toNullableInt(raw.hypervisor_version),
    vcpus: toInt(raw.vcpus),
    vcpus_used: toInt(raw.vcpus_used),
    memory_mb: toInt(raw.memory_mb),
    memory_mb_used: toInt(raw.memory_mb_used),
    local_gb: toInt(raw.local_gb),
    local_gb_used: toInt(raw.local_gb_used),
    free_ram_mb: toInt(raw.free_ram_mb),
    free_disk_gb: toInt(raw.free_disk_gb),
    running_vms: toInt(raw.running_vms),
  };
}

export function normalizeFlavor(raw: RawResource): FlavorRecord {
  return {
    kind: 'flavor',
    ...base(raw),
    vcpus: toInt(raw.vcpus),
    ram: toInt(raw.ram),
    disk: toInt(raw.disk),
    ephemeral: toInt(pick(raw, 'OS-FLV-EXT-DATA:ephemeral', 'ephemeral')),
    // Nova reports "no swap" as an empty string.
    swap: toInt(raw.swap),
    is_public: toBool(pick(raw, 'os-flavor-access:is_public', 'is_public')),
    extra_specs: stringMap(pick(raw, 'OS-FLV-WITH-EXT-SPECS:extra_specs', 'extra_specs')),
  };
}

export function normalizeImage(raw: RawResource): ImageRecord {
  return {
    kind: 'image',
    ...base(raw),
    created: toStr(pick(raw, 'created', 'created_at')),
    updated: toStr(pick(raw, 'updated', 'updated_at')),
    size: toInt(pick(raw, 'OS-EXT-IMG-SIZE:size', 'size')),
    min_disk: toInt(pick(raw, 'minDisk', 'min_disk')),
    min_ram: toInt(pick(raw, 'minRam', 'min_ram')),
    progress: toNullableInt(raw.progress),
    metadata: stringMap(raw.metadata),
  };
}

function volumeAttachments(value: unknown): VolumeAttachment[] {
  return records(value).map((entry) => ({
    attachment_id: toStr(entry.attachment_id),
    server_id: toStr(entry.server_id),
    device: toStr(entry.device),
    host_name: toStr(entry.host_name),
  }));
}

export function normalizeVolume(raw: RawResource): VolumeRecord {
  return {
    kind: 'volume',
    ...base(raw),
    size: toInt(raw.size),
    volume_type: toStr(raw.volume_type),
    bootable: toBool(raw.bootable),
    created_at: toStr(raw.created_at),
    availability_zone: toStr(raw.availability_zone),
    attachments: volumeAttachments(raw.attachments),
  };
}

export function normalizeVolumeType(raw: RawResource): VolumeTypeRecord {
  return {
    kind: 'volume_type',
    ...base(raw),
    description: toStr(raw.description),
    is_public: toBool(pick(raw, 'os-volume-type-access:is_public', 'is_public')),
    extra_specs: stringMap(raw.extra_specs),
  };
}

export function normalizeNetwork(raw: RawResource): NetworkRecord {
  return {
    kind: 'network',
    ...base(raw),
    admin_state_up: toBool(raw.admin_state_up),
    shared: toBool(raw.shared),
    external: toBool(raw['router:external']),
    provider_network_type: toStr(raw['provider:network_type']),
    mtu: toNullableInt(raw.mtu),
    subnets: strings(raw.subnets),
  };
}

function allocationPools(value: unknown): AllocationPool[] {
  return records(value).flatMap((pool) => {
    const start = toStr(pool.start);
    const end = toStr(pool.end);
    return start && end ? [{ start, end }] : [];
  });
}

export function normalizeSubnet(raw: RawResource): SubnetRecord {
  return {
    kind: 'subnet',
    ...base(raw),
    network_id: toStr(raw.network_id),
    cidr: toStr(raw.cidr),
    ip_version: toNullableInt(raw.ip_version),
    gateway_ip: toStr(raw.gateway_ip),
    enable_dhcp: toBool(raw.enable_dhcp),
    allocation_pools: allocationPools(raw.allocation_pools),
  };
}

function externalGateway(value: unknown): ExternalGateway | null {
  if (!isRecord(value)) return null;
  return {
    network_id: toStr(value.network_id),
    enable_snat: toNullableBool(value.enable_snat),
  };
}

export function normalizeRouter(raw: RawResource): RouterRecord {
  return {
    kind: 'router',
    ...base(raw),
    admin_state_up: toBool(raw.admin_state_up),
    external_gateway_info: externalGateway(raw.external_gateway_info),
    ha: toNullableBool(raw.ha),
    distributed: toNullableBool(raw.distributed),
  };
}
