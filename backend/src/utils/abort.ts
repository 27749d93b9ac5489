import { GenerationTimeoutError } from '../errors.js';

/**
 * Run task with its own AbortSignal that fires when timeoutMs elapses or the
 * parent signal aborts, whichever comes first. The returned promise settles
 * with the abort reason even if the task ignores its signal.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();

  const aborted = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });
  // The race below is the only consumer; an abort after settlement is expected
  aborted.catch(() => undefined);

  const timer = setTimeout(() => controller.abort(new GenerationTimeoutError(timeoutMs)), timeoutMs);
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let running: Promise<T> | undefined;
  try {
    if (controller.signal.aborted) throw controller.signal.reason;
    running = task(controller.signal);
    return await Promise.race([running, aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
    if (controller.signal.aborted) {
      // The task lost the race; its eventual rejection has no one waiting for it
      running?.catch(() => undefined);
    }
  }
}
