import { describe, expect, it, vi } from 'vitest';
import { CompositionError, JobCancelledError } from './errors';
import { describeFailures, runFallbackChain } from './fallback-chain';

describe('runFallbackChain', () => {
  it('returns the first success and records earlier failures', async () => {
    const third = vi.fn(async () => 'never');
    const outcome = await runFallbackChain([
      { name: 'primary', attempt: async () => Promise.reject(new Error('xfade rejected')) },
      { name: 'secondary', attempt: async () => 'joined' },
      { name: 'tertiary', attempt: third },
    ]);

    expect(outcome).toEqual({
      ok: true,
      value: 'joined',
      strategy: 'secondary',
      failures: [{ strategy: 'primary', message: 'xfade rejected' }],
    });
    expect(third).not.toHaveBeenCalled();
  });

  it('reports every failure when nothing succeeds', async () => {
    const outcome = await runFallbackChain<string>([
      { name: 'a', attempt: async () => Promise.reject(new CompositionError('stage', 'concatenating', 'bad graph')) },
      { name: 'b', attempt: async () => Promise.reject(new Error('no output')) },
    ]);

    expect(outcome.ok).toBe(false);
    expect(describeFailures(outcome.failures)).toBe('a: bad graph; b: no output');
  });

  it('rethrows cancellation without trying the next strategy', async () => {
    const next = vi.fn(async () => 'x');
    await expect(
      runFallbackChain([
        { name: 'a', attempt: async () => Promise.reject(new JobCancelledError('job-1')) },
        { name: 'b', attempt: next },
      ])
    ).rejects.toBeInstanceOf(JobCancelledError);
    expect(next).not.toHaveBeenCalled();
  });

  it('rethrows resource failures', async () => {
    await expect(
      runFallbackChain([
        { name: 'a', attempt: async () => Promise.reject(new CompositionError('resource', 'processing', 'ENOSPC')) },
        { name: 'b', attempt: async () => 'x' },
      ])
    ).rejects.toThrow('ENOSPC');
  });
});
