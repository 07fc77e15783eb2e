/** setTimeout 能接受的最大延迟（毫秒），超过会被 Node 截成 1ms。 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** 取消一个尚未触发的定时器。 */
export type CancelTimer = () => void;

/**
 * 支持任意长度延迟的 setTimeout。
 *
 * 超过 MAX_TIMEOUT_MS 的延迟拆成多段依次等待。
 *
 * @param fn - 到期后调用。
 * @param delayMs - 延迟毫秒数。
 * @returns 取消函数。
 */
export function setLongTimeout(fn: () => void, delayMs: number): CancelTimer {
  let timer: ReturnType<typeof setTimeout> | null = null;

  const wait = (remainingMs: number): void => {
    const stepMs = Math.min(remainingMs, MAX_TIMEOUT_MS);
    timer = setTimeout(() => {
      const rest = remainingMs - stepMs;
      if (rest > 0) {
        wait(rest);
      } else {
        timer = null;
        fn();
      }
    }, stepMs);
  };

  wait(Math.max(delayMs, 0));

  return () => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };
}
