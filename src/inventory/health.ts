import { TaskGroup } from '../lib/concurrency';
import type { CloudResourceClient } from '../types/client';
import type { OverallHealth, ServiceHealthEntry, ServiceHealthReport } from '../types/report';

export type ServiceProbe = {
  service_name: string;
  service_type: ServiceHealthEntry['service_type'];
  /** Plural noun for the listed resources, used in the success message. */
  noun: string;
  probe: (signal: AbortSignal) => Promise<readonly unknown[]>;
};

export type ProbeOptions = {
  timeoutMs: number;
  now?: () => Date;
};

/** One lightweight listing per backing service. */
export function platformProbes(client: CloudResourceClient): ServiceProbe[] {
  return [
    {
      service_name: 'nova',
      service_type: 'compute',
      noun: 'servers',
      probe: (signal) => client.listServers({ signal }),
    },
    {
      service_name: 'cinder',
      service_type: 'storage',
      noun: 'volumes',
      probe: (signal) => client.listVolumes({ signal }),
    },
    {
      service_name: 'neutron',
      service_type: 'networking',
      noun: 'networks',
      probe: (signal) => client.listNetworks({ signal }),
    },
  ];
}

export function overallHealth(entries: readonly ServiceHealthEntry[]): OverallHealth {
  const unhealthy = entries.filter((e) => e.status === 'unhealthy').length;
  if (unhealthy === 0) return 'healthy';
  if (unhealthy === 1) return 'degraded';
  return 'critical';
}

/**
 * Run every probe concurrently. A failing or hanging probe becomes that
 * service's unhealthy entry; the others still report.
 */
export async function probeServices(
  probes: readonly ServiceProbe[],
  options: ProbeOptions
): Promise<ServiceHealthReport> {
  const now = options.now ?? (() => new Date());
  const group = new TaskGroup({ concurrency: Math.max(probes.length, 1), timeoutMs: options.timeoutMs });

  const services = await Promise.all(
    probes.map(async (p): Promise<ServiceHealthEntry> => {
      const result = await group.run(p.service_name, p.probe);
      const base = { service_name: p.service_name, service_type: p.service_type, last_check: now().toISOString() };
      return result.ok
        ? { ...base, status: 'healthy', message: `Successfully retrieved ${result.value.length} ${p.noun}` }
        : { ...base, status: 'unhealthy', message: `${p.service_name} service error: ${result.diagnostic}` };
    })
  );

  const unhealthy = services.filter((s) => s.status === 'unhealthy').length;
  return {
    timestamp: now().toISOString(),
    overall_status: overallHealth(services),
    services,
    summary: {
      healthy_services: services.length - unhealthy,
      unhealthy_services: unhealthy,
      total_services: services.length,
    },
  };
}
