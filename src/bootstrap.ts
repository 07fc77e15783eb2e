import { loadConfig } from './config/index.js';
import type { AppConfig } from './config/schema.js';
import { createLogger, type AppLogger } from './logger/index.js';
import { TaskRegistry } from './periodical/registry.js';
import { registerBuiltinTasks } from './tasks/index.js';

/** 初始化后的运行环境。 */
export interface AppContext {
  config: AppConfig;
  logger: AppLogger;
  registry: TaskRegistry;
}

/**
 * 初始化运行环境（配置 + 日志 + 任务注册）。
 *
 * PERIODICAL 环境变量在此处首次解析，格式错误会直接抛出。
 *
 * @param dataDir - CLI 指定的数据目录，优先于 yaml 配置。
 * @returns 运行环境。
 */
export function initApp(dataDir?: string): AppContext {
  const config = loadConfig({ dataDir });
  const logger = createLogger(config.logging);
  const registry = new TaskRegistry({ defaults: config.periodical.defaults });
  registerBuiltinTasks(registry, config);
  return { config, logger, registry };
}
