import { TaskTimeoutError, toError } from './errors.js';
import { setLongTimeout, type CancelTimer } from '../utils/timer.js';
import type { ResourceScope, RunOutcome, TaskConfig } from './types.js';

/** 不持有任何资源的作用域，直接执行。 */
export const directScope: ResourceScope = {
  use: (fn) => fn(),
};

/** executeTask 选项。 */
export interface ExecuteOptions {
  /** 每次执行前后获取、释放的资源。 */
  scope?: ResourceScope;
}

/**
 * 执行工作单元，超过 timeoutInterval 时 abort signal 并以 TaskTimeoutError 结束。
 *
 * @param config - 任务配置。
 * @param controller - 用于通知工作单元取消。
 */
async function runWithTimeout(config: TaskConfig, controller: AbortController): Promise<void> {
  const timer: { cancel: CancelTimer } = { cancel: () => {} };

  const timeout = new Promise<never>((_, reject) => {
    timer.cancel = setLongTimeout(() => {
      const error = new TaskTimeoutError(config.name, config.timeoutInterval);
      controller.abort(error);
      reject(error);
    }, config.timeoutInterval * 1000);
  });

  const work = (async () => {
    await config.work.execute(controller.signal);
  })();

  try {
    await Promise.race([work, timeout]);
  } finally {
    timer.cancel();
  }
}

/**
 * 在资源作用域内执行一次工作单元，并以 timeoutInterval 为上限。
 *
 * 超时后作用域随即释放，之后工作单元的结果不再被观察。
 * 该函数不会 reject，所有失败都以 RunOutcome 返回。
 *
 * @param config - 任务配置。
 * @param options - 执行选项。
 * @returns 执行结果。
 */
export async function executeTask(
  config: TaskConfig,
  options: ExecuteOptions = {},
): Promise<RunOutcome> {
  const scope = options.scope ?? directScope;
  const controller = new AbortController();
  const startedAt = Date.now();

  try {
    await scope.use(() => runWithTimeout(config, controller));
    return { status: 'success', durationMs: Date.now() - startedAt };
  } catch (err) {
    const durationMs = Date.now() - startedAt;
    if (err instanceof TaskTimeoutError) {
      return { status: 'timeout', error: err, durationMs };
    }
    return { status: 'failed', error: toError(err), durationMs };
  }
}
