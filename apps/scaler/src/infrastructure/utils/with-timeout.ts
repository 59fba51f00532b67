import { TransientIOError } from '@las/domain';

/**
 * Runs `operation` with its own AbortSignal, aborted after `timeoutMs` or when
 * `parent` aborts. Any rejection, including the timeout, surfaces as a
 * TransientIOError tagged with `operation`.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const deadline = new Promise<never>((_, reject) => {
    const fail = (message: string) => reject(new TransientIOError(label, message));
    if (controller.signal.aborted) {
      fail('aborted');
      return;
    }
    timer = setTimeout(() => {
      // Reject first: the abort listener below would otherwise report a plain abort.
      fail(`timed out after ${timeoutMs}ms`);
      controller.abort(new Error(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    controller.signal.addEventListener('abort', () => fail('aborted'), { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } catch (error) {
    if (error instanceof TransientIOError) {
      throw error;
    }
    throw new TransientIOError(label, error instanceof Error ? error.message : String(error), { cause: error });
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    parent?.removeEventListener('abort', onParentAbort);
  }
}
