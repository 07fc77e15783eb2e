import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'fs';
import { dirname } from 'path';
import type { z } from 'zod';

/**
 * 读取 JSON 文件并用 schema 校验。
 *
 * @param filePath - 文件路径。
 * @param schema - 内容 schema。
 * @returns 校验通过的内容；文件不存在、不是合法 JSON 或不符合 schema 时返回 null。
 */
export function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S> | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch {
    return null;
  }

  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * 写入 JSON 文件，自动创建目录。
 *
 * 先写临时文件再 rename，其他进程不会读到写了一半的内容。
 *
 * @param filePath - 文件路径。
 * @param data - 要写入的对象。
 */
export function writeJsonFile<T>(filePath: string, data: T): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
  renameSync(tmpPath, filePath);
}
