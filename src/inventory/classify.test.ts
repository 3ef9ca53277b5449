import { describe, expect, it } from 'vitest';
import { classifyServer } from './classify';

describe('classifyServer', () => {
  it.each([
    [{ status: 'ACTIVE', power_state: 1 }, 'healthy'],
    [{ status: 'ERROR', power_state: null }, 'error'],
    [{ status: 'ERROR', power_state: 1 }, 'error'],
    [{ status: 'SHUTOFF', power_state: 4 }, 'stopped'],
    [{ status: 'SUSPENDED', power_state: 7 }, 'stopped'],
    [{ status: 'BUILD', power_state: 0 }, 'transitioning'],
    [{ status: 'ACTIVE', power_state: 0 }, 'transitioning'],
    [{ status: 'ACTIVE', power_state: null }, 'transitioning'],
    [{ status: 'unknown', power_state: null }, 'transitioning'],
  ])('%o is %s', (server, expected) => {
    expect(classifyServer(server)).toBe(expected);
  });
});
