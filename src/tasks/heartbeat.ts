import { join } from 'path';
import { z } from 'zod';
import { interval, overdue } from '../periodical/liveness.js';
import type { TaskRegistry } from '../periodical/registry.js';
import { readJsonFile, writeJsonFile } from '../utils/file.js';

/** 心跳任务名。 */
export const HEARTBEAT_TASK = 'heartbeat';

/** 心跳文件名，位于 dataDir 下。 */
const HEARTBEAT_FILENAME = 'heartbeat.json';

/** 心跳文件内容。 */
const HeartbeatSchema = z.object({
  /** 最近一次心跳时间（ISO 8601）。 */
  timestamp: z.string().datetime(),
});

/** 心跳检查结果。 */
export type HeartbeatStatus = 'inactive' | 'missing' | 'overdue' | 'ok';

/**
 * 获取心跳文件路径。
 *
 * @param dataDir - 数据目录。
 * @returns 文件路径。
 */
export function heartbeatPath(dataDir: string): string {
  return join(dataDir, HEARTBEAT_FILENAME);
}

/**
 * 写入心跳。
 *
 * @param dataDir - 数据目录。
 * @param now - 心跳时间。
 */
export function writeHeartbeat(dataDir: string, now: Date = new Date()): void {
  writeJsonFile(heartbeatPath(dataDir), { timestamp: now.toISOString() });
}

/**
 * 读取最近一次心跳时间。
 *
 * @param dataDir - 数据目录。
 * @returns 心跳时间；文件不存在或内容无效时返回 null。
 */
export function readHeartbeat(dataDir: string): Date | null {
  const heartbeat = readJsonFile(heartbeatPath(dataDir), HeartbeatSchema);
  return heartbeat ? new Date(heartbeat.timestamp) : null;
}

/**
 * 根据心跳文件判断心跳任务是否仍在按时执行。
 *
 * @param registry - 任务注册表，必须已注册心跳任务。
 * @param dataDir - 数据目录。
 * @param now - 当前时间。
 * @returns 检查结果。
 */
export function checkHeartbeat(
  registry: TaskRegistry,
  dataDir: string,
  now: Date = new Date(),
): HeartbeatStatus {
  if (interval(registry, HEARTBEAT_TASK) === false) {
    return 'inactive';
  }

  const last = readHeartbeat(dataDir);
  if (!last) {
    return 'missing';
  }
  return overdue(registry, HEARTBEAT_TASK, last, now) ? 'overdue' : 'ok';
}
