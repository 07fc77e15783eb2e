import { getLogger, taskLogger, type AppLogger } from '../logger/index.js';
import { setLongTimeout, type CancelTimer } from '../utils/timer.js';
import { generateId } from '../utils/token.js';
import { executeTask } from './execute.js';
import { createFailureReporter, type FailureReporter } from './reporter.js';
import type { TaskRegistry } from './registry.js';
import type { ResourceScope, TaskConfig, TaskHandle } from './types.js';

/** startScheduler 选项。 */
export interface SchedulerOptions {
  /** 执行结果观察者，默认写日志。 */
  reporter?: FailureReporter;
  /** 每次执行前后获取、释放的资源。 */
  scope?: ResourceScope;
  logger?: AppLogger;
}

/**
 * 计算对齐到 interval 整数倍（自 Unix 纪元起）所需的等待时间。
 *
 * @param intervalSeconds - 执行间隔（秒）。
 * @param now - 当前时间（毫秒）。
 * @returns 等待毫秒数，范围 (0, interval]。
 */
export function consistentStartDelay(intervalSeconds: number, now: number = Date.now()): number {
  const intervalMs = intervalSeconds * 1000;
  return intervalMs - (now % intervalMs);
}

/**
 * 为单个任务启动固定延迟的定时执行链。
 *
 * 每次执行结束（成功、失败或超时）后才安排下一次，同一任务不会并发执行。
 *
 * @param config - 任务配置。
 * @param reporter - 执行结果观察者。
 * @param scope - 资源作用域。
 * @param parentLog - 父 logger，派生出带 task 字段的 child。
 * @returns 任务句柄。
 */
function startTask(
  config: TaskConfig,
  reporter: FailureReporter,
  scope: ResourceScope | undefined,
  parentLog: AppLogger,
): TaskHandle {
  const log = taskLogger(parentLog, config.name);
  const intervalMs = config.executionInterval * 1000;
  let cancelTimer: CancelTimer | null = null;
  let inFlight: Promise<void> | null = null;
  let stopped = false;

  const arm = (delayMs: number, fn: () => void): void => {
    cancelTimer = setLongTimeout(() => {
      cancelTimer = null;
      fn();
    }, delayMs);
  };

  const runAndReport = async (): Promise<void> => {
    const runId = generateId();
    log.debug({ runId }, 'Periodical task started');

    const outcome = await executeTask(config, { scope });
    await reporter.report(config.name, new Date(), outcome);

    log.debug(
      { runId, status: outcome.status, durationMs: outcome.durationMs },
      'Periodical task finished',
    );
  };

  const tick = (): void => {
    inFlight = runAndReport()
      .catch((err: unknown) => {
        log.error({ err }, 'Periodical task run crashed');
      })
      .finally(() => {
        inFlight = null;
        if (!stopped) {
          arm(intervalMs, tick);
        }
      });
  };

  const activate = (): void => {
    if (config.runImmediately) {
      tick();
    } else {
      arm(intervalMs, tick);
    }
  };

  if (config.consistentStartTime) {
    const delayMs = consistentStartDelay(config.executionInterval);
    log.info({ delayMs }, 'Periodical task delayed for consistent start time');
    arm(delayMs, activate);
  } else {
    activate();
  }

  return {
    name: config.name,
    async stop() {
      stopped = true;
      if (cancelTimer) {
        cancelTimer();
        cancelTimer = null;
      }
      if (inFlight) {
        await inFlight;
      }
    },
  };
}

/**
 * 启动注册表中所有激活任务的定时执行。
 *
 * @param registry - 任务注册表。
 * @param options - 调度选项。
 * @returns 激活任务的句柄；未激活任务不产生句柄。
 */
export function startScheduler(registry: TaskRegistry, options: SchedulerOptions = {}): TaskHandle[] {
  const log = options.logger ?? getLogger();
  const reporter = options.reporter ?? createFailureReporter({ logger: log });
  const handles: TaskHandle[] = [];

  for (const config of registry.all()) {
    if (!config.active) {
      continue;
    }
    handles.push(startTask(config, reporter, options.scope, log));
    log.info(
      {
        task: config.name,
        executionInterval: config.executionInterval,
        timeoutInterval: config.timeoutInterval,
      },
      'Periodical task scheduled',
    );
  }

  log.info({ totalScheduled: handles.length }, 'Periodical scheduler started');
  return handles;
}

/**
 * 停止所有任务，等待正在进行的执行结束。用于优雅关闭。
 *
 * @param handles - startScheduler 返回的句柄。
 */
export async function stopScheduler(handles: TaskHandle[]): Promise<void> {
  await Promise.all(handles.map((handle) => handle.stop()));
}
