import { z } from 'zod';
import { PeriodicalConfigError } from './errors.js';
import type { TaskOptions, TaskOverride, TaskSettings } from './types.js';

/** 内置默认值，所有层中优先级最低。 */
export const TASK_DEFAULTS: Readonly<TaskSettings> = Object.freeze({
  executionInterval: 60,
  timeoutInterval: 10,
  active: false,
  runImmediately: true,
  consistentStartTime: false,
});

/** 合并后的任务参数 schema。 */
const TaskSettingsSchema = z.object({
  executionInterval: z.number().int().positive(),
  timeoutInterval: z.number().positive(),
  active: z.boolean(),
  runImmediately: z.boolean(),
  consistentStartTime: z.boolean(),
});

/**
 * 在 base 之上叠加一层选项；值为 undefined 的字段不覆盖 base。
 *
 * @param base - 低优先级层。
 * @param layer - 高优先级层。
 * @returns 合并结果。
 */
export function applyOptions(base: TaskSettings, layer: TaskOptions): TaskSettings {
  return {
    executionInterval: layer.executionInterval ?? base.executionInterval,
    timeoutInterval: layer.timeoutInterval ?? base.timeoutInterval,
    active: layer.active ?? base.active,
    runImmediately: layer.runImmediately ?? base.runImmediately,
    consistentStartTime: layer.consistentStartTime ?? base.consistentStartTime,
  };
}

/**
 * 按优先级合并任务参数：defaults < 环境变量覆盖 < 调用方选项。
 *
 * @param name - 任务名，用于查找环境变量覆盖。
 * @param defaults - 默认值。
 * @param overrides - PERIODICAL 环境变量的解析结果。
 * @param callOptions - 注册时传入的选项。
 * @returns 校验后的任务参数。
 * @throws PeriodicalConfigError 合并结果不合法时。
 */
export function resolveTaskSettings(
  name: string,
  defaults: TaskSettings,
  overrides: ReadonlyMap<string, TaskOverride>,
  callOptions: TaskOptions = {},
): TaskSettings {
  const merged = applyOptions(
    applyOptions(defaults, overrides.get(name) ?? {}),
    callOptions,
  );

  const result = TaskSettingsSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new PeriodicalConfigError(`Invalid settings for periodical task ${name}: ${issues}`);
  }
  return result.data;
}
