import { TimeoutError, TurnCancelledError } from '../ai/core/errors';

/**
 * Runs `task` with its own abort signal that fires on timeout or when the
 * parent signal aborts. Timeout rejects with TimeoutError; parent abort rejects
 * with TurnCancelledError.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: { ms: number; label: string; signal?: AbortSignal; turnId?: string }
): Promise<T> {
  const { ms, label, signal: parent, turnId = 'unknown' } = options;

  if (parent?.aborted) {
    throw new TurnCancelledError(turnId);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, ms));
    }, ms);

    if (parent) {
      onParentAbort = () => {
        controller.abort();
        reject(new TurnCancelledError(turnId));
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}
