import { z } from 'zod';

/** 日志配置。 */
const LoggingConfigSchema = z.object({
  /** 日志级别。 */
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  /** 日志文件目录（相对路径基于 dataDir 解析）。 */
  directory: z.string().default('logs'),
  /** 单个日志文件最大体积（pino-roll 格式：数字 + k/m/g，如 10m）。 */
  maxSize: z.string().default('10m'),
  /** 保留的轮转文件数量。 */
  maxFiles: z.number().default(10),
  /** 控制台输出是否使用 pino-pretty；false 时输出 JSON 行。 */
  pretty: z.boolean().default(true),
});

/** 周期任务的全局默认值，优先级低于 PERIODICAL 环境变量和注册时的选项。 */
const PeriodicalDefaultsSchema = z.object({
  /** 两次执行之间的间隔（秒）。 */
  executionInterval: z.number().int().positive().optional(),
  /** 单次执行的超时时间（秒）。 */
  timeoutInterval: z.number().positive().optional(),
});

/** 周期任务配置。 */
const PeriodicalConfigSchema = z.object({
  defaults: PeriodicalDefaultsSchema.default(() => ({})),
});

/** 应用全局配置 schema。 */
export const AppConfigSchema = z.object({
  /** 数据目录路径。 */
  dataDir: z.string().default('data'),
  /** 日志配置。 */
  logging: LoggingConfigSchema.default(() => ({
    level: 'info' as const,
    directory: 'logs',
    maxSize: '10m',
    maxFiles: 10,
    pretty: true,
  })),
  /** 周期任务配置。 */
  periodical: PeriodicalConfigSchema.default(() => ({ defaults: {} })),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
