/**
 * 周期任务的工作单元。调度核心只负责调用 execute，不关心其内容。
 *
 * 执行超时时 signal 会被 abort，工作单元应尽量据此提前结束。
 */
export interface WorkUnit {
  execute(signal: AbortSignal): void | Promise<void>;
}

/** 注册时可直接传入的函数形式工作单元。 */
export type WorkFunction = (signal: AbortSignal) => void | Promise<void>;

/** 任务调度参数（不含名称、描述和工作单元）。 */
export interface TaskSettings {
  /** 两次执行之间的间隔（秒），从上一次执行结束开始计算。 */
  executionInterval: number;
  /** 单次执行的超时时间（秒）。 */
  timeoutInterval: number;
  /** 是否由调度器运行。未激活的任务仍在注册表中，但不会被调度。 */
  active: boolean;
  /** 激活时立即执行一次，而不是先等待一个间隔。 */
  runImmediately: boolean;
  /** 首次执行对齐到 executionInterval 的整数倍（如每小时任务对齐到整点）。 */
  consistentStartTime: boolean;
}

/** 注册时的调用方选项，优先级最高。 */
export type TaskOptions = Partial<TaskSettings>;

/** PERIODICAL 环境变量中单个条目解析出的覆盖值。 */
export interface TaskOverride {
  active: true;
  executionInterval?: number;
}

/** 注册表中保存的完整任务配置。 */
export interface TaskConfig extends TaskSettings {
  readonly name: string;
  readonly description: string;
  readonly work: WorkUnit;
}

/** 单次执行的结果。 */
export type RunOutcome =
  | { status: 'success'; durationMs: number }
  | { status: 'failed'; error: Error; durationMs: number }
  | { status: 'timeout'; error: Error; durationMs: number };

/** 外部错误追踪服务收到的上下文。 */
export interface ErrorContext {
  taskName: string;
  /** 失败发生的时间；手动触发路径下为 null。 */
  time: Date | null;
  errorMessage: string;
}

/** 外部错误追踪服务（告警系统）。 */
export interface ErrorTracker {
  notify(error: Error, context: ErrorContext): void | Promise<void>;
}

/**
 * 每次执行前后获取、释放的共享资源（如连接池中的连接）。
 *
 * use 必须保证 fn 以任何方式结束（包括超时）后都释放资源。
 */
export interface ResourceScope {
  use<T>(fn: () => Promise<T>): Promise<T>;
}

/** 调度器为每个激活任务返回的句柄。 */
export interface TaskHandle {
  readonly name: string;
  /** 取消后续执行；若有正在进行的执行，等待其结束后 resolve。 */
  stop(): Promise<void>;
}
