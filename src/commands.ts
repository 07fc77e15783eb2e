import type { AppLogger } from './logger/index.js';
import { runOnce, type RunOnceOptions } from './periodical/invoker.js';
import { overdue } from './periodical/liveness.js';
import type { TaskRegistry } from './periodical/registry.js';

/** CLI 退出码。 */
export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  OVERDUE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * 执行一次任务并返回退出码。
 *
 * 超时后工作单元可能仍在后台运行，调用方应以返回值直接退出进程。
 */
export async function runOnceCommand(
  registry: TaskRegistry,
  log: AppLogger,
  name: string,
  options: RunOnceOptions = {},
): Promise<ExitCode> {
  try {
    await runOnce(registry, name, options);
    log.info({ task: name }, 'Periodical task completed');
    return ExitCode.OK;
  } catch (err) {
    console.error(`Task ${name} failed: ${err instanceof Error ? err.message : String(err)}`);
    return ExitCode.FAILURE;
  }
}

/**
 * 检查任务是否逾期，输出 overdue / ok。
 *
 * @param registry - 任务注册表。
 * @param name - 任务名。
 * @param sinceArg - 上次执行时间（ISO 8601）。
 * @param now - 当前时间。
 * @returns 逾期为 2，正常为 0，参数错误为 1。
 */
export function overdueCommand(
  registry: TaskRegistry,
  name: string,
  sinceArg: string,
  now: Date = new Date(),
): ExitCode {
  const since = new Date(sinceArg);
  if (Number.isNaN(since.getTime())) {
    console.error(`Invalid timestamp: ${sinceArg}`);
    return ExitCode.FAILURE;
  }

  if (!registry.has(name)) {
    console.error(`Unknown task: ${name}`);
    return ExitCode.FAILURE;
  }

  if (overdue(registry, name, since, now)) {
    console.log('overdue');
    return ExitCode.OVERDUE;
  }
  console.log('ok');
  return ExitCode.OK;
}
