import { mkdirSync } from 'fs';
import pino from 'pino';
import pinoPretty from 'pino-pretty';
import type { AppConfig } from '../config/schema.js';

/** 应用内统一使用的 logger 类型。 */
export type AppLogger = pino.Logger;

let logger: AppLogger | null = null;

/**
 * 控制台输出流：交互使用时为 pino-pretty，守护进程下可切换为原始 JSON 行。
 */
function consoleStream(pretty: boolean): pino.DestinationStream {
  return pretty ? pinoPretty({ destination: 1 }) : pino.destination(1);
}

/**
 * 创建进程级 logger：控制台 + pino-roll 轮转文件（{directory}/periodical）。
 *
 * @param config - 日志配置。
 * @returns 新 logger，同时成为 getLogger() 的返回值。
 */
export function createLogger(config: AppConfig['logging']): AppLogger {
  mkdirSync(config.directory, { recursive: true });

  const fileTransport = pino.transport({
    target: 'pino-roll',
    level: config.level,
    options: {
      file: `${config.directory}/periodical`,
      size: config.maxSize,
      limit: { count: config.maxFiles },
    },
  });

  logger = pino(
    { level: config.level },
    pino.multistream([
      { level: config.level, stream: consoleStream(config.pretty) },
      { level: config.level, stream: fileTransport },
    ]),
  );
  return logger;
}

/**
 * 替换进程级 logger。嵌入到其他应用时可传入宿主的 pino 实例。
 */
export function setLogger(instance: AppLogger): void {
  logger = instance;
}

/**
 * 获取进程级 logger。
 *
 * @throws 尚未调用 createLogger() 或 setLogger() 时。
 */
export function getLogger(): AppLogger {
  if (!logger) {
    throw new Error('Logger not initialized. Call createLogger() first.');
  }
  return logger;
}

/**
 * 为单个任务派生 child logger，每行日志都带 task 字段。
 *
 * @param parent - 父 logger。
 * @param taskName - 任务名。
 */
export function taskLogger(parent: AppLogger, taskName: string): AppLogger {
  return parent.child({ task: taskName });
}
