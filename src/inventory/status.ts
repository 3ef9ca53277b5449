import type { StatusBreakdown } from '../types/report';

/**
 * Count resources per value of `field`. Resources lacking the field (or
 * carrying null / an empty string) land in the "unknown" bucket.
 */
export function tabulate<T extends object>(resources: readonly T[], field: keyof T): StatusBreakdown {
  const counts: StatusBreakdown = {};
  for (const resource of resources) {
    const raw: unknown = resource[field];
    const key = raw === undefined || raw === null || raw === '' ? 'unknown' : String(raw);
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

export function countWhere<T>(resources: readonly T[], predicate: (resource: T) => boolean): number {
  return resources.reduce((acc, resource) => (predicate(resource) ? acc + 1 : acc), 0);
}
