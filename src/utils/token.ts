import { nanoid } from 'nanoid';

/**
 * 生成短 ID（用于标记单次任务执行）。
 *
 * @returns 12 字符的随机 ID。
 */
export function generateId(): string {
  return nanoid(12);
}
