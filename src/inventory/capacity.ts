import type { HypervisorRecord } from '../types/resources';
import type { CapacityMetric, ComputeCapacity, HypervisorUtilization } from '../types/report';

/** Share of vCPUs in use above which a single host counts as saturated. */
export const HIGH_UTILIZATION_RATIO = 0.8;

export const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Percentage of `total` consumed by `used`, two decimals, 0 when there is no
 * capacity. Over-commit (used > total) is preserved, never clamped.
 */
export function utilizationPercent(used: number, total: number): number {
  if (total <= 0) return 0;
  return round2((used / total) * 100);
}

export function capacityMetric(total: number, used: number): CapacityMetric {
  return {
    total,
    used,
    available: total - used,
    utilization_percent: utilizationPercent(used, total),
  };
}

type NumericField = {
  [K in keyof HypervisorRecord]: HypervisorRecord[K] extends number ? K : never;
}[keyof HypervisorRecord];

function sumField(hypervisors: readonly HypervisorRecord[], field: NumericField): number {
  return hypervisors.reduce((acc, h) => acc + (Number.isFinite(h[field]) ? h[field] : 0), 0);
}

export function aggregateCapacity(hypervisors: readonly HypervisorRecord[]): ComputeCapacity {
  return {
    vcpus: capacityMetric(sumField(hypervisors, 'vcpus'), sumField(hypervisors, 'vcpus_used')),
    memory_mb: capacityMetric(sumField(hypervisors, 'memory_mb'), sumField(hypervisors, 'memory_mb_used')),
    local_storage_gb: capacityMetric(sumField(hypervisors, 'local_gb'), sumField(hypervisors, 'local_gb_used')),
  };
}

export function hypervisorUtilization(h: HypervisorRecord): HypervisorUtilization {
  return {
    hypervisor: h.hypervisor_hostname ?? h.id,
    status: h.status,
    state: h.state,
    running_vms: h.running_vms,
    cpu: capacityMetric(h.vcpus, h.vcpus_used),
    memory_mb: capacityMetric(h.memory_mb, h.memory_mb_used),
    disk_gb: capacityMetric(h.local_gb, h.local_gb_used),
  };
}

/**
 * Host-level saturation check. A host reporting zero vCPUs is measured
 * against a floor of one, so any usage on it flags the host.
 */
export function isHighUtilizationHost(h: HypervisorRecord): boolean {
  return h.vcpus_used / Math.max(h.vcpus, 1) > HIGH_UTILIZATION_RATIO;
}

export function highUtilizationHosts(hypervisors: readonly HypervisorRecord[]): string[] {
  return hypervisors.filter(isHighUtilizationHost).map((h) => h.hypervisor_hostname ?? h.id);
}
