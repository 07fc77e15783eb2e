import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { executeTask } from '../../src/periodical/execute.js';
import { TaskTimeoutError } from '../../src/periodical/errors.js';
import { TaskRegistry } from '../../src/periodical/registry.js';
import type { ResourceScope, TaskOptions, WorkFunction } from '../../src/periodical/types.js';

/**
 * 注册单个任务并返回其配置。
 *
 * @param work - 工作单元。
 * @param options - 任务选项。
 * @returns 任务配置。
 */
function makeTask(work: WorkFunction, options?: TaskOptions) {
  const registry = new TaskRegistry({ overrides: new Map() });
  return registry.register('sync', 'Sync records', work, options);
}

/**
 * 记录获取和释放次数的资源作用域。
 *
 * @returns 作用域和事件列表。
 */
function trackingScope(): { scope: ResourceScope; events: string[] } {
  const events: string[] = [];
  const scope: ResourceScope = {
    async use(fn) {
      events.push('acquire');
      try {
        return await fn();
      } finally {
        events.push('release');
      }
    },
  };
  return { scope, events };
}

describe('executeTask', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should report success when the work returns', async () => {
    const outcome = await executeTask(makeTask(() => {}));
    expect(outcome.status).toBe('success');
  });

  it('should report success when async work resolves', async () => {
    const work = vi.fn(() => new Promise<void>((resolve) => setTimeout(resolve, 2000)));
    const pending = executeTask(makeTask(work, { timeoutInterval: 5 }));

    await vi.advanceTimersByTimeAsync(2000);
    const outcome = await pending;

    expect(outcome).toEqual({ status: 'success', durationMs: 2000 });
    expect(work).toHaveBeenCalledTimes(1);
  });

  it('should capture a thrown error', async () => {
    const error = new Error('db unavailable');
    const outcome = await executeTask(
      makeTask(() => {
        throw error;
      }),
    );

    expect(outcome.status).toBe('failed');
    expect(outcome.status !== 'success' && outcome.error).toBe(error);
  });

  it('should wrap a non-Error throwable', async () => {
    const outcome = await executeTask(
      makeTask(() => Promise.reject('plain string')),
    );

    expect(outcome.status).toBe('failed');
    expect(outcome.status !== 'success' && outcome.error.message).toBe('plain string');
  });

  it('should time out and abort the signal after timeoutInterval', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = executeTask(
      makeTask(
        (signal) => {
          seen.signal = signal;
          return new Promise<void>(() => {});
        },
        { timeoutInterval: 3 },
      ),
    );

    await vi.advanceTimersByTimeAsync(2999);
    expect(seen.signal?.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    const outcome = await pending;

    expect(outcome.status).toBe('timeout');
    expect(outcome.status === 'timeout' && outcome.error).toBeInstanceOf(TaskTimeoutError);
    expect(outcome.status === 'timeout' && outcome.error.message).toBe(
      'Periodical task sync timed out after 3s',
    );
    expect(seen.signal?.aborted).toBe(true);
    expect(seen.signal?.reason).toBeInstanceOf(TaskTimeoutError);
  });

  it('should not time out before a timeout longer than the timer limit', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = executeTask(
      makeTask(
        (signal) => {
          seen.signal = signal;
          return new Promise<void>(() => {});
        },
        { timeoutInterval: 2_592_000 },
      ),
    );

    await vi.advanceTimersByTimeAsync(2_591_999_999);
    expect(seen.signal?.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect((await pending).status).toBe('timeout');
  });

  it('should release the resource on success', async () => {
    const { scope, events } = trackingScope();
    await executeTask(makeTask(() => {}), { scope });
    expect(events).toEqual(['acquire', 'release']);
  });

  it('should release the resource when the work throws', async () => {
    const { scope, events } = trackingScope();
    await executeTask(
      makeTask(() => {
        throw new Error('boom');
      }),
      { scope },
    );
    expect(events).toEqual(['acquire', 'release']);
  });

  it('should release the resource on timeout', async () => {
    const { scope, events } = trackingScope();
    const pending = executeTask(
      makeTask(() => new Promise<void>(() => {}), { timeoutInterval: 1 }),
      { scope },
    );

    await vi.advanceTimersByTimeAsync(1000);
    await pending;
    expect(events).toEqual(['acquire', 'release']);
  });

  it('should report a failure to acquire the resource', async () => {
    const work = vi.fn();
    const scope: ResourceScope = {
      use: () => Promise.reject(new Error('pool exhausted')),
    };

    const outcome = await executeTask(makeTask(work), { scope });

    expect(outcome.status === 'failed' && outcome.error.message).toBe('pool exhausted');
    expect(work).not.toHaveBeenCalled();
  });
});

describe('executeTask with real timers', () => {
  it('should let work finish under a timeout longer than the timer limit', async () => {
    const work = () => new Promise<void>((resolve) => setTimeout(resolve, 50));
    const outcome = await executeTask(makeTask(work, { timeoutInterval: 2_592_000 }));
    expect(outcome.status).toBe('success');
  });
});
