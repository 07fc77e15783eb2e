import { z } from 'zod';
import { PeriodicalConfigError } from './errors.js';
import type { TaskOverride } from './types.js';

/** 环境变量名：逗号分隔的 name[:interval] 列表。 */
export const PERIODICAL_ENV = 'PERIODICAL';

/** 间隔必须是正整数秒。 */
const IntervalSchema = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().positive());

/** 首次访问时解析并缓存，进程内不再重新读取环境变量。 */
let cachedOverrides: ReadonlyMap<string, TaskOverride> | null = null;

/**
 * 解析 PERIODICAL 格式的字符串。
 *
 * 每个条目都会激活对应任务；带间隔时同时覆盖 executionInterval。
 * 空条目被忽略。
 *
 * @param value - 环境变量值，未设置时为 undefined。
 * @returns 任务名 → 覆盖值。
 * @throws PeriodicalConfigError 间隔不是正整数时。
 */
export function parseOverrides(value: string | undefined): Map<string, TaskOverride> {
  const overrides = new Map<string, TaskOverride>();

  for (const item of (value ?? '').split(',')) {
    const entry = item.trim();
    if (!entry) {
      continue;
    }

    const sep = entry.indexOf(':');
    const name = sep === -1 ? entry : entry.slice(0, sep);
    const override: TaskOverride = { active: true };

    if (sep !== -1) {
      const raw = entry.slice(sep + 1);
      const parsed = IntervalSchema.safeParse(raw);
      if (!parsed.success) {
        throw new PeriodicalConfigError(
          `Invalid ${PERIODICAL_ENV} interval for ${name}: "${raw}" is not a positive integer`,
        );
      }
      override.executionInterval = parsed.data;
    }

    overrides.set(name, override);
  }

  return overrides;
}

/**
 * 获取 PERIODICAL 环境变量的解析结果（惰性解析，永久缓存）。
 *
 * @returns 任务名 → 覆盖值。
 */
export function getEnvOverrides(): ReadonlyMap<string, TaskOverride> {
  if (!cachedOverrides) {
    cachedOverrides = parseOverrides(process.env[PERIODICAL_ENV]);
  }
  return cachedOverrides;
}

/**
 * 清除缓存的解析结果（仅用于测试）。
 */
export function resetEnvOverrides(): void {
  cachedOverrides = null;
}
