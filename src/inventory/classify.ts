import type { ResourceHealth } from '../types/report';
import type { ServerRecord } from '../types/resources';

/** Nova power state code for a running guest. */
export const POWER_STATE_RUNNING = 1;

const STOPPED_STATUSES: ReadonlySet<string> = new Set(['SHUTOFF', 'SUSPENDED']);

/**
 * Coarse health of one server. First match wins: ACTIVE is only healthy when
 * the power state confirms the guest is running.
 */
export function classifyServer(server: Pick<ServerRecord, 'status' | 'power_state'>): ResourceHealth {
  if (server.status === 'ACTIVE' && server.power_state === POWER_STATE_RUNNING) return 'healthy';
  if (server.status === 'ERROR') return 'error';
  if (STOPPED_STATUSES.has(server.status)) return 'stopped';
  return 'transitioning';
}
