import { describe, expect, it } from 'vitest';
import { failure, settle } from './result';

describe('settle', () => {
  it('never rejects', async () => {
    await expect(settle(Promise.resolve('ok'))).resolves.toEqual({ ok: true, value: 'ok' });
    await expect(settle(Promise.reject(new Error('nope')))).resolves.toMatchObject({
      ok: false,
      diagnostic: 'nope',
    });
  });

  it('describes non-Error rejections', async () => {
    await expect(settle(Promise.reject('plain text'))).resolves.toMatchObject({ diagnostic: 'plain text' });
  });
});

describe('failure', () => {
  it('accepts an explicit diagnostic', () => {
    expect(failure(new Error('raw'), 'servers unavailable').diagnostic).toBe('servers unavailable');
  });
});
