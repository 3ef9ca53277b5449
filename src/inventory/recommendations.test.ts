import { describe, expect, it } from 'vitest';
import { aggregateCapacity } from './capacity';
import { normalizeFlavor, normalizeHypervisor, normalizeServer } from './normalize';
import { recommend } from './recommendations';
import { rawFlavor, rawHypervisor, rawServer } from '../testing/fake-client';
import type { RawResource } from '../types/resources';

const input = (opts: { hypervisors?: RawResource[]; servers?: RawResource[]; flavors?: RawResource[] }) => {
  const hypervisors = (opts.hypervisors ?? []).map(normalizeHypervisor);
  return {
    capacity: aggregateCapacity(hypervisors),
    hypervisors,
    servers: (opts.servers ?? []).map(normalizeServer),
    flavors: (opts.flavors ?? []).map(normalizeFlavor),
  };
};

describe('recommend', () => {
  it('emits one high-priority CPU warning at 85% vCPU usage', () => {
    const recs = recommend(input({ hypervisors: [rawHypervisor('1', { vcpus: 100, vcpus_used: 85 })] }));

    expect(recs).toEqual([
      {
        type: 'capacity_warning',
        resource: 'CPU',
        message: 'CPU utilization is high (85%). Consider adding more compute capacity.',
        priority: 'high',
      },
    ]);
  });

  it('stays quiet at 70% vCPU usage', () => {
    const recs = recommend(input({ hypervisors: [rawHypervisor('1', { vcpus: 100, vcpus_used: 70 })] }));
    expect(recs.filter((r) => r.resource === 'CPU')).toEqual([]);
  });

  it('does not warn at exactly 80%', () => {
    const recs = recommend(input({ hypervisors: [rawHypervisor('1', { vcpus: 100, vcpus_used: 80 })] }));
    expect(recs).toEqual([]);
  });

  it('warns on memory pressure', () => {
    const recs = recommend(input({ hypervisors: [rawHypervisor('1', { memory_mb: 1000, memory_mb_used: 900 })] }));
    expect(recs.map((r) => r.message)).toEqual([
      'Memory utilization is high (90%). Consider adding more memory or nodes.',
    ]);
  });

  it('lists servers in ERROR, falling back to the id when unnamed', () => {
    const recs = recommend(
      input({
        servers: [
          rawServer('a', { status: 'ERROR', name: 'db-1' }),
          rawServer('b'),
          { id: 'c', status: 'ERROR' },
        ],
        flavors: [rawFlavor('m1.small')],
      })
    );

    expect(recs).toEqual([
      {
        type: 'health_issue',
        resource: 'Servers',
        message: '2 servers are in ERROR state. Investigation required.',
        priority: 'critical',
        affected: ['db-1', 'c'],
      },
    ]);
  });

  it('counts hypervisors without an enabled status', () => {
    const recs = recommend(
      input({
        hypervisors: [rawHypervisor('1'), rawHypervisor('2', { status: 'disabled' }), rawHypervisor('3', { status: null })],
      })
    );

    expect(recs).toHaveLength(1);
    expect(recs[0]).toMatchObject({
      type: 'infrastructure_issue',
      priority: 'medium',
      message: '2 hypervisors are not enabled. Check hypervisor health.',
      affected: ['compute-2.example.test', 'compute-3.example.test'],
    });
  });

  it('names only the first five unused public flavors', () => {
    const flavors = ['f1', 'f2', 'f3', 'f4', 'f5', 'f6'].map((id) => rawFlavor(id));
    const recs = recommend(input({ flavors }));

    expect(recs).toHaveLength(1);
    expect(recs[0].message).toBe('6 public flavors are unused. Consider cleanup.');
    expect(recs[0].priority).toBe('low');
    expect(recs[0].unused_flavors).toEqual(['f1', 'f2', 'f3', 'f4', 'f5']);
  });

  it('ignores private and referenced flavors', () => {
    const recs = recommend(
      input({
        servers: [rawServer('s1', { flavor: { id: 'used' } })],
        flavors: [rawFlavor('used'), rawFlavor('private', { 'os-flavor-access:is_public': false })],
      })
    );
    expect(recs).toEqual([]);
  });

  it('keeps rule order when several fire', () => {
    const recs = recommend(
      input({
        hypervisors: [
          rawHypervisor('1', { vcpus: 10, vcpus_used: 10, memory_mb: 10, memory_mb_used: 10, status: 'disabled' }),
        ],
        servers: [rawServer('s1', { status: 'ERROR' })],
        flavors: [rawFlavor('spare')],
      })
    );

    expect(recs.map((r) => r.resource)).toEqual(['CPU', 'Memory', 'Servers', 'Hypervisors', 'Flavors']);
  });
});
