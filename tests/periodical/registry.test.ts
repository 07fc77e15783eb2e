import { describe, it, expect, vi, afterEach } from 'vitest';
import { TaskRegistry } from '../../src/periodical/registry.js';
import { parseOverrides, resetEnvOverrides, PERIODICAL_ENV } from '../../src/periodical/env.js';
import { UnknownTaskError } from '../../src/periodical/errors.js';
import type { WorkUnit } from '../../src/periodical/types.js';

/**
 * 任务注册表测试。
 */
describe('TaskRegistry', () => {
  afterEach(() => {
    delete process.env[PERIODICAL_ENV];
    resetEnvOverrides();
  });

  it('should register a task with the built-in defaults', () => {
    const registry = new TaskRegistry({ overrides: new Map() });
    const config = registry.register('cleanup', 'Remove stale rows', () => {});

    expect(config).toMatchObject({
      name: 'cleanup',
      description: 'Remove stale rows',
      executionInterval: 60,
      timeoutInterval: 10,
      active: false,
      runImmediately: true,
      consistentStartTime: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should wrap a work function so it receives the abort signal', async () => {
    const registry = new TaskRegistry({ overrides: new Map() });
    const fn = vi.fn();
    registry.register('cleanup', 'desc', fn);

    const { signal } = new AbortController();
    await registry.get('cleanup').work.execute(signal);
    expect(fn).toHaveBeenCalledWith(signal);
  });

  it('should keep a work unit object as is', () => {
    const registry = new TaskRegistry({ overrides: new Map() });
    const work: WorkUnit = { execute: () => {} };
    registry.register('cleanup', 'desc', work);
    expect(registry.get('cleanup').work).toBe(work);
  });

  it('should replace an earlier registration without merging', () => {
    const registry = new TaskRegistry({ overrides: new Map() });
    registry.register('cleanup', 'first', () => {}, { active: true, timeoutInterval: 5 });
    registry.register('cleanup', 'second', () => {});

    const config = registry.get('cleanup');
    expect(config.description).toBe('second');
    expect(config.active).toBe(false);
    expect(config.timeoutInterval).toBe(10);
    expect(registry.all()).toHaveLength(1);
  });

  it('should throw UnknownTaskError for an unregistered name', () => {
    const registry = new TaskRegistry({ overrides: new Map() });
    expect(() => registry.get('missing')).toThrow(UnknownTaskError);
    expect(() => registry.get('missing')).toThrow('Unknown periodical task: missing');
    expect(registry.has('missing')).toBe(false);
  });

  it('should list every registered task', () => {
    const registry = new TaskRegistry({ overrides: new Map() });
    registry.register('a', 'A', () => {});
    registry.register('b', 'B', () => {});
    expect(registry.all().map((task) => task.name).sort()).toEqual(['a', 'b']);
  });

  it('should apply configured defaults below overrides and options', () => {
    const registry = new TaskRegistry({
      defaults: { executionInterval: 120, timeoutInterval: 30 },
      overrides: parseOverrides('b:15'),
    });
    const a = registry.register('a', 'A', () => {});
    const b = registry.register('b', 'B', () => {});
    const c = registry.register('c', 'C', () => {}, { timeoutInterval: 2 });

    expect(a.executionInterval).toBe(120);
    expect(a.timeoutInterval).toBe(30);
    expect(b.executionInterval).toBe(15);
    expect(b.active).toBe(true);
    expect(c.timeoutInterval).toBe(2);
  });

  it('should ignore undefined configured defaults', () => {
    const registry = new TaskRegistry({
      defaults: { executionInterval: undefined },
      overrides: new Map(),
    });
    expect(registry.register('a', 'A', () => {}).executionInterval).toBe(60);
  });

  it('should read PERIODICAL when no overrides are given', () => {
    process.env[PERIODICAL_ENV] = 'cleanup:15';
    resetEnvOverrides();

    const registry = new TaskRegistry();
    const config = registry.register('cleanup', 'desc', () => {});
    expect(config.active).toBe(true);
    expect(config.executionInterval).toBe(15);
  });
});
