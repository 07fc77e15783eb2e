import { getLogger, type AppLogger } from '../logger/index.js';
import type { AppConfig } from '../config/schema.js';
import type { TaskRegistry } from '../periodical/registry.js';
import { checkHeartbeat, HEARTBEAT_TASK, writeHeartbeat } from './heartbeat.js';

/** 心跳看门狗任务名。 */
export const HEARTBEAT_WATCHDOG_TASK = 'heartbeat_watchdog';

/** registerBuiltinTasks 选项。 */
export interface BuiltinTaskOptions {
  /** 看门狗告警使用的 logger，默认 getLogger()。 */
  logger?: AppLogger;
}

/**
 * 注册内置任务。所有内置任务默认不激活，通过 PERIODICAL 环境变量开启。
 *
 * @param registry - 任务注册表。
 * @param config - 应用配置。
 * @param options - 可选 logger。
 */
export function registerBuiltinTasks(
  registry: TaskRegistry,
  config: AppConfig,
  options: BuiltinTaskOptions = {},
): void {
  registry.register(
    HEARTBEAT_TASK,
    'Write the current time to heartbeat.json',
    () => {
      writeHeartbeat(config.dataDir);
    },
  );

  registry.register(
    HEARTBEAT_WATCHDOG_TASK,
    'Warn when the heartbeat task has stopped running',
    () => {
      const status = checkHeartbeat(registry, config.dataDir);
      if (status === 'overdue' || status === 'missing') {
        const log = options.logger ?? getLogger();
        log.warn({ task: HEARTBEAT_TASK, status }, 'Heartbeat is not being written');
      }
    },
    { executionInterval: 300, consistentStartTime: true },
  );
}
