import type { TaskRegistry } from './registry.js';

/**
 * 判断任务是否逾期：since 早于 now - 2 * executionInterval。
 *
 * 两倍间隔允许错过一次执行；恰好等于边界时不算逾期。
 *
 * @param registry - 任务注册表。
 * @param name - 任务名。
 * @param since - 最近一次观察到任务执行的时间。
 * @param now - 当前时间。
 * @returns 是否逾期。
 * @throws UnknownTaskError 任务未注册时。
 */
export function overdue(
  registry: TaskRegistry,
  name: string,
  since: Date,
  now: Date = new Date(),
): boolean {
  const { executionInterval } = registry.get(name);
  return since.getTime() < now.getTime() - executionInterval * 2 * 1000;
}

/**
 * 激活任务的执行间隔（秒），未激活时返回 false。
 *
 * @param registry - 任务注册表。
 * @param name - 任务名。
 * @returns 间隔秒数或 false。
 * @throws UnknownTaskError 任务未注册时。
 */
export function interval(registry: TaskRegistry, name: string): number | false {
  const config = registry.get(name);
  return config.active && config.executionInterval;
}
