import { getEnvOverrides } from './env.js';
import { UnknownTaskError } from './errors.js';
import { applyOptions, resolveTaskSettings, TASK_DEFAULTS } from './resolver.js';
import type {
  TaskConfig,
  TaskOptions,
  TaskOverride,
  TaskSettings,
  WorkFunction,
  WorkUnit,
} from './types.js';

/** TaskRegistry 构造选项。 */
export interface TaskRegistryOptions {
  /** 覆盖内置默认值（如配置文件中的 periodical.defaults）。 */
  defaults?: Partial<TaskSettings>;
  /** 环境变量覆盖，默认在首次注册时读取 PERIODICAL。 */
  overrides?: ReadonlyMap<string, TaskOverride>;
}

/**
 * 把函数形式的工作单元包装为 WorkUnit。
 *
 * @param work - 函数或 WorkUnit。
 * @returns WorkUnit。
 */
function toWorkUnit(work: WorkUnit | WorkFunction): WorkUnit {
  return typeof work === 'function' ? { execute: work } : work;
}

/**
 * 任务注册表：任务名 → 完整配置。
 *
 * 进程启动阶段单线程注册，之后只读。由入口创建一次，
 * 再注入到调度器、手动触发和存活检查中。
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskConfig>();
  private readonly defaults: TaskSettings;
  private overrides: ReadonlyMap<string, TaskOverride> | null;

  constructor(options: TaskRegistryOptions = {}) {
    this.defaults = applyOptions(TASK_DEFAULTS, options.defaults ?? {});
    this.overrides = options.overrides ?? null;
  }

  /**
   * 注册任务。同名任务会被整体替换，不与之前的注册合并。
   *
   * @param name - 任务名。
   * @param description - 人类可读描述。
   * @param work - 工作单元。
   * @param options - 调用方选项，优先级最高。
   * @returns 合并后的任务配置。
   * @throws PeriodicalConfigError 配置不合法时。
   */
  register(
    name: string,
    description: string,
    work: WorkUnit | WorkFunction,
    options?: TaskOptions,
  ): TaskConfig {
    if (!this.overrides) {
      this.overrides = getEnvOverrides();
    }

    const settings = resolveTaskSettings(name, this.defaults, this.overrides, options);
    const config: TaskConfig = Object.freeze({
      ...settings,
      name,
      description,
      work: toWorkUnit(work),
    });

    this.tasks.set(name, config);
    return config;
  }

  /**
   * 获取任务配置。
   *
   * @param name - 任务名。
   * @returns 任务配置。
   * @throws UnknownTaskError 任务未注册时。
   */
  get(name: string): TaskConfig {
    const config = this.tasks.get(name);
    if (!config) {
      throw new UnknownTaskError(name);
    }
    return config;
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  /** 所有已注册任务，顺序无意义。 */
  all(): TaskConfig[] {
    return [...this.tasks.values()];
  }
}
