import { executeTask } from './execute.js';
import { createFailureReporter, type FailureReporter } from './reporter.js';
import type { TaskRegistry } from './registry.js';
import type { ResourceScope } from './types.js';

/** runOnce 选项。 */
export interface RunOnceOptions {
  reporter?: FailureReporter;
  scope?: ResourceScope;
}

/**
 * 手动执行一次任务（供系统 cron 等外部触发使用），不论任务是否激活。
 *
 * 失败或超时时先上报，再把原始错误抛给调用方，使进程以非零状态退出。
 *
 * @param registry - 任务注册表。
 * @param name - 任务名。
 * @param options - 执行选项。
 * @throws UnknownTaskError 任务未注册时（不上报）。
 * @throws 工作单元抛出的错误，或超时时的 TaskTimeoutError。
 */
export async function runOnce(
  registry: TaskRegistry,
  name: string,
  options: RunOnceOptions = {},
): Promise<void> {
  const config = registry.get(name);
  const reporter = options.reporter ?? createFailureReporter();

  const outcome = await executeTask(config, { scope: options.scope });
  if (outcome.status !== 'success') {
    await reporter.report(name, null, outcome);
    throw outcome.error;
  }
}
