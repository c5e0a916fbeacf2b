/**
 * Run an abortable task under a deadline and an optional caller signal.
 *
 * The task gets a signal that fires on timeout or cancellation. The returned
 * promise settles as soon as either fires, even if the task ignores its signal.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: {
    timeoutMs: number;
    signal?: AbortSignal;
    onTimeout: () => Error;
    onCancel: () => Error;
  },
): Promise<T> {
  const { timeoutMs, signal: outer, onTimeout, onCancel } = options;
  if (outer?.aborted) throw onCancel();

  const controller = new AbortController();
  let reject: (err: Error) => void = () => {};
  const aborted = new Promise<never>((_, rej) => { reject = rej; });

  const timer = setTimeout(() => {
    const err = onTimeout();
    controller.abort(err);
    reject(err);
  }, timeoutMs);

  const cancel = (): void => {
    const err = onCancel();
    controller.abort(err);
    reject(err);
  };
  outer?.addEventListener('abort', cancel, { once: true });

  const running = task(controller.signal);
  // Only the first outcome counts; a task settling after the deadline is dropped.
  running.catch(() => undefined);

  try {
    return await Promise.race([running, aborted]);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener('abort', cancel);
  }
}
