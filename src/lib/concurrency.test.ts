import { afterEach, describe, expect, it, vi } from 'vitest';
import { TaskGroup, deadlineSignal } from './concurrency';
import { InventoryError } from './errors';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const never = (signal: AbortSignal) =>
  new Promise<never>((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });

describe('TaskGroup', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('wraps a resolved task in a success', async () => {
    const group = new TaskGroup({ concurrency: 1, timeoutMs: 1000 });
    await expect(group.run('answer', async () => 42)).resolves.toEqual({ ok: true, value: 42 });
  });

  it('turns a rejection into a failure with its message', async () => {
    const group = new TaskGroup({ concurrency: 1, timeoutMs: 1000 });
    const boom = new Error('boom');

    await expect(group.run('bad', () => Promise.reject(boom))).resolves.toEqual({
      ok: false,
      error: boom,
      diagnostic: 'boom',
    });
  });

  it('times out a task and aborts its signal', async () => {
    const group = new TaskGroup({ concurrency: 1, timeoutMs: 10 });
    let seen: AbortSignal | undefined;

    const result = await group.run('slow', (signal) => {
      seen = signal;
      return never(signal);
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.diagnostic).toBe('slow timed out after 10ms');
    expect(result.error).toBeInstanceOf(InventoryError);
    expect(seen?.aborted).toBe(true);
  });

  it('never runs more tasks than its concurrency', async () => {
    const group = new TaskGroup({ concurrency: 2, timeoutMs: 1000 });
    let inFlight = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        group.run(`t${n}`, async () => {
          inFlight += 1;
          peak = Math.max(peak, inFlight);
          await sleep(5);
          inFlight -= 1;
          return n;
        })
      )
    );

    expect(peak).toBe(2);
    expect(results.map((r) => (r.ok ? r.value : null))).toEqual([1, 2, 3, 4, 5]);
  });

  it('cancels running and queued tasks when the parent signal aborts', async () => {
    const parent = new AbortController();
    const group = new TaskGroup({ concurrency: 1, timeoutMs: 1000, signal: parent.signal });

    const running = group.run('servers', never);
    const queued = group.run('volumes', async () => 'late');
    parent.abort();

    const [first, second] = await Promise.all([running, queued]);
    expect(first.ok ? null : first.diagnostic).toBe('servers cancelled: deadline exceeded');
    expect(second.ok ? null : second.diagnostic).toBe('volumes cancelled: deadline exceeded');
  });

  it('cleans up after a task that throws before returning a promise', async () => {
    vi.useFakeTimers();
    const parent = new AbortController();
    const removed = vi.spyOn(parent.signal, 'removeEventListener');
    const group = new TaskGroup({ concurrency: 1, timeoutMs: 1000, signal: parent.signal });

    const result = await group.run('sync', () => {
      throw new Error('bad request body');
    });

    expect(result).toMatchObject({ ok: false, diagnostic: 'bad request body' });
    expect(removed).toHaveBeenCalledWith('abort', expect.any(Function));
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects a concurrency below one', () => {
    expect(() => new TaskGroup({ concurrency: 0, timeoutMs: 10 })).toThrow(RangeError);
  });
});

describe('deadlineSignal', () => {
  it('aborts once the deadline passes', async () => {
    const signal = deadlineSignal(5);
    expect(signal.aborted).toBe(false);
    await sleep(20);
    expect(signal.aborted).toBe(true);
  });
});
