/**
 * Bounded waiting for backend calls.
 */

/**
 * Raised by withTimeout when the deadline passes first.
 */
export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, label = 'Operation') {
    super(`${label} timed out after ${timeoutMs}ms`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs`, or earlier
 * if `parent` aborts. The task is expected to honour the signal; whether
 * it does or not, the returned promise rejects with TimeoutError once the
 * deadline passes.
 *
 * A non-positive `timeoutMs` disables the deadline.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: { parent?: AbortSignal; label?: string } = {}
): Promise<T> {
  const controller = new AbortController();
  const { parent, label } = options;

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        const error = new TimeoutError(timeoutMs, label);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    }
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    if (timer) clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
