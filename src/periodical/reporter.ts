import { getLogger, type AppLogger } from '../logger/index.js';
import type { ErrorTracker, RunOutcome } from './types.js';

/** 默认的错误追踪服务：不做任何事。 */
export const noopErrorTracker: ErrorTracker = {
  notify: () => {},
};

/** 执行结果观察者，调度器和手动触发共用。 */
export interface FailureReporter {
  /**
   * 上报一次执行结果。成功时不做任何事；永不 reject。
   *
   * @param taskName - 任务名。
   * @param time - 失败时间，手动触发路径下为 null。
   * @param outcome - 执行结果。
   */
  report(taskName: string, time: Date | null, outcome: RunOutcome): Promise<void>;
}

/** createFailureReporter 选项。 */
export interface FailureReporterOptions {
  tracker?: ErrorTracker;
  logger?: AppLogger;
}

/**
 * 创建失败上报器：写结构化错误日志并转发给错误追踪服务。
 *
 * 上报本身尽力而为，内部失败只记录不抛出。
 *
 * @param options - 上报器选项。
 * @returns FailureReporter。
 */
export function createFailureReporter(options: FailureReporterOptions = {}): FailureReporter {
  const tracker = options.tracker ?? noopErrorTracker;

  return {
    async report(taskName, time, outcome) {
      if (outcome.status === 'success') {
        return;
      }

      const { error } = outcome;
      let log: AppLogger | null = null;

      try {
        log = options.logger ?? getLogger();
        log.error(
          {
            task: taskName,
            failedAt: time ? time.toISOString() : null,
            status: outcome.status,
            durationMs: outcome.durationMs,
            err: error,
          },
          `Periodical task ${taskName} failed: ${error.message}`,
        );
      } catch (logErr) {
        process.stderr.write(
          `Failed to log periodical failure of ${taskName}: ${String(logErr)}\n`,
        );
      }

      try {
        await tracker.notify(error, {
          taskName,
          time,
          errorMessage: `Periodical ${taskName} failed`,
        });
      } catch (notifyErr) {
        if (log) {
          log.warn({ task: taskName, err: notifyErr }, 'Error tracker notification failed');
        } else {
          process.stderr.write(
            `Error tracker notification failed for ${taskName}: ${String(notifyErr)}\n`,
          );
        }
      }
    },
  };
}
