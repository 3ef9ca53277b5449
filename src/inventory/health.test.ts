import { describe, expect, it } from 'vitest';
import { overallHealth, platformProbes, probeServices } from './health';
import { FakeCloudClient, rawServer } from '../testing/fake-client';
import type { CollectionName } from '../types/report';

const now = () => new Date('2026-03-01T12:00:00.000Z');

function clientFailing(...names: CollectionName[]): FakeCloudClient {
  const client = new FakeCloudClient({
    servers: [rawServer('s1'), rawServer('s2')],
    volumes: [{ id: 'v1' }],
    networks: [],
  });
  for (const name of names) {
    client.failures[name] = new Error(`${name} endpoint refused connection`);
  }
  return client;
}

describe('probeServices', () => {
  it('reports every service healthy when all probes succeed', async () => {
    const report = await probeServices(platformProbes(clientFailing()), { timeoutMs: 1000, now });

    expect(report).toEqual({
      timestamp: '2026-03-01T12:00:00.000Z',
      overall_status: 'healthy',
      services: [
        {
          service_name: 'nova',
          service_type: 'compute',
          status: 'healthy',
          message: 'Successfully retrieved 2 servers',
          last_check: '2026-03-01T12:00:00.000Z',
        },
        {
          service_name: 'cinder',
          service_type: 'storage',
          status: 'healthy',
          message: 'Successfully retrieved 1 volumes',
          last_check: '2026-03-01T12:00:00.000Z',
        },
        {
          service_name: 'neutron',
          service_type: 'networking',
          status: 'healthy',
          message: 'Successfully retrieved 0 networks',
          last_check: '2026-03-01T12:00:00.000Z',
        },
      ],
      summary: { healthy_services: 3, unhealthy_services: 0, total_services: 3 },
    });
  });

  it('degrades on a single failing service and keeps the others', async () => {
    const report = await probeServices(platformProbes(clientFailing('volumes')), { timeoutMs: 1000, now });

    expect(report.overall_status).toBe('degraded');
    expect(report.services.map((s) => s.status)).toEqual(['healthy', 'unhealthy', 'healthy']);
    expect(report.services[1].message).toBe('cinder service error: volumes endpoint refused connection');
    expect(report.summary).toEqual({ healthy_services: 2, unhealthy_services: 1, total_services: 3 });
  });

  it.each<[CollectionName[], number]>([
    [['servers', 'volumes'], 2],
    [['servers', 'volumes', 'networks'], 3],
  ])('is critical with failing %j', async (failing, count) => {
    const report = await probeServices(platformProbes(clientFailing(...failing)), { timeoutMs: 1000, now });

    expect(report.overall_status).toBe('critical');
    expect(report.summary.unhealthy_services).toBe(count);
    expect(report.services.filter((s) => s.status === 'unhealthy')).toHaveLength(count);
  });

  it('marks a probe that never answers as unhealthy once it times out', async () => {
    const client = clientFailing();
    client.hanging.add('networks');

    const report = await probeServices(platformProbes(client), { timeoutMs: 20, now });

    expect(report.services[2]).toMatchObject({
      service_name: 'neutron',
      status: 'unhealthy',
      message: 'neutron service error: neutron timed out after 20ms',
    });
    expect(report.overall_status).toBe('degraded');
  });
});

describe('overallHealth', () => {
  it('is healthy for no services at all', () => {
    expect(overallHealth([])).toBe('healthy');
  });
});
