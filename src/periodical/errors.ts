/** 配置值非法（PERIODICAL 环境变量或注册选项）。启动阶段抛出，应中止进程。 */
export class PeriodicalConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PeriodicalConfigError';
  }
}

/** 查询了未注册的任务名，属于编程错误。 */
export class UnknownTaskError extends Error {
  constructor(readonly taskName: string) {
    super(`Unknown periodical task: ${taskName}`);
    this.name = 'UnknownTaskError';
  }
}

/** 单次执行超过 timeoutInterval。 */
export class TaskTimeoutError extends Error {
  constructor(
    readonly taskName: string,
    readonly timeoutInterval: number,
  ) {
    super(`Periodical task ${taskName} timed out after ${timeoutInterval}s`);
    this.name = 'TaskTimeoutError';
  }
}

/**
 * 将任意抛出值规范化为 Error。
 *
 * @param err - catch 到的值。
 * @returns Error 实例。
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
