import type { CapacityMetric, ComputeCapacity, Recommendation } from '../types/report';
import type { FlavorRecord, HypervisorRecord, ServerRecord } from '../types/resources';

export const CAPACITY_WARNING_RATIO = 0.8;
export const MAX_UNUSED_FLAVORS_LISTED = 5;

export type RecommendationInput = {
  capacity: ComputeCapacity;
  servers: readonly ServerRecord[];
  hypervisors: readonly HypervisorRecord[];
  flavors: readonly FlavorRecord[];
};

type Rule = (input: RecommendationInput) => Recommendation | null;

const isSaturated = (metric: CapacityMetric): boolean =>
  metric.total > 0 && metric.used / metric.total > CAPACITY_WARNING_RATIO;

export const cpuRule: Rule = ({ capacity }) => {
  if (!isSaturated(capacity.vcpus)) return null;
  return {
    type: 'capacity_warning',
    resource: 'CPU',
    message: `CPU utilization is high (${capacity.vcpus.utilization_percent}%). Consider adding more compute capacity.`,
    priority: 'high',
  };
};

export const memoryRule: Rule = ({ capacity }) => {
  if (!isSaturated(capacity.memory_mb)) return null;
  return {
    type: 'capacity_warning',
    resource: 'Memory',
    message: `Memory utilization is high (${capacity.memory_mb.utilization_percent}%). Consider adding more memory or nodes.`,
    priority: 'high',
  };
};

export const errorServersRule: Rule = ({ servers }) => {
  const failed = servers.filter((s) => s.status === 'ERROR');
  if (failed.length === 0) return null;
  return {
    type: 'health_issue',
    resource: 'Servers',
    message: `${failed.length} servers are in ERROR state. Investigation required.`,
    priority: 'critical',
    affected: failed.map((s) => s.name ?? s.id),
  };
};

export const disabledHypervisorsRule: Rule = ({ hypervisors }) => {
  const disabled = hypervisors.filter((h) => h.status !== 'enabled');
  if (disabled.length === 0) return null;
  return {
    type: 'infrastructure_issue',
    resource: 'Hypervisors',
    message: `${disabled.length} hypervisors are not enabled. Check hypervisor health.`,
    priority: 'medium',
    affected: disabled.map((h) => h.hypervisor_hostname ?? h.id),
  };
};

export const unusedFlavorsRule: Rule = ({ servers, flavors }) => {
  const referenced = new Set(servers.map((s) => s.flavor).filter((id): id is string => id !== null));
  const unused = flavors.filter((f) => f.is_public && !referenced.has(f.id));
  if (unused.length === 0) return null;
  const listed = unused.slice(0, MAX_UNUSED_FLAVORS_LISTED).map((f) => f.name ?? f.id);
  return {
    type: 'optimization',
    resource: 'Flavors',
    message: `${unused.length} public flavors are unused. Consider cleanup.`,
    priority: 'low',
    affected: listed,
    unused_flavors: listed,
  };
};

/** Evaluation order is also output order; entries are not re-sorted by priority. */
export const RULES: readonly Rule[] = [cpuRule, memoryRule, errorServersRule, disabledHypervisorsRule, unusedFlavorsRule];

export function recommend(input: RecommendationInput): Recommendation[] {
  return RULES.map((rule) => rule(input)).filter((r): r is Recommendation => r !== null);
}
