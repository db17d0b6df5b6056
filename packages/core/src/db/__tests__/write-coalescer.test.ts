import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger } from '@menu-editor/shared';

import { WriteCoalescer, type StoreWriters } from '../write-coalescer';

describe('WriteCoalescer', () => {
  let writes: string[];
  let writers: StoreWriters;
  let coalescer: WriteCoalescer;

  beforeEach(() => {
    vi.useFakeTimers();
    writes = [];
    writers = {
      graph: vi.fn(async () => {
        writes.push('graph');
      }),
      users: vi.fn(async () => {
        writes.push('users');
      }),
      analytics: vi.fn(async () => {
        writes.push('analytics');
      }),
    };
    coalescer = new WriteCoalescer(writers, { debounceMs: 1000, logger: createLogger('test') });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should coalesce repeated changes into one write per store', async () => {
    coalescer.schedule('graph');
    coalescer.schedule('users');
    coalescer.schedule('graph');
    expect(coalescer.pending).toEqual(['graph', 'users']);

    await vi.advanceTimersByTimeAsync(999);
    expect(writes).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    await coalescer.flush();
    expect(writes).toEqual(['graph', 'users']);
    expect(coalescer.pending).toEqual([]);
  });

  it('should not extend the window on later changes', async () => {
    coalescer.schedule('graph');
    await vi.advanceTimersByTimeAsync(600);
    coalescer.schedule('analytics');
    await vi.advanceTimersByTimeAsync(400);
    expect(coalescer.pending).toEqual([]);
    await coalescer.flush();
    expect(writes).toEqual(['graph', 'analytics']);
  });

  it('should write pending stores immediately on flush', async () => {
    coalescer.schedule('analytics');
    await coalescer.flush();
    expect(writes).toEqual(['analytics']);

    await vi.advanceTimersByTimeAsync(1000);
    expect(writes).toEqual(['analytics']);
  });

  it('should do nothing on flush when nothing is pending', async () => {
    await coalescer.flush();
    expect(writes).toEqual([]);
  });

  it('should keep writing other stores when one fails', async () => {
    writers.graph = vi.fn(async () => {
      throw new Error('disk full');
    });
    coalescer = new WriteCoalescer(writers, { debounceMs: 1000, logger: createLogger('test') });
    coalescer.schedule('graph');
    coalescer.schedule('users');

    await expect(coalescer.flush()).resolves.toBeUndefined();
    expect(writes).toEqual(['users']);
  });
});
