/**
 * Serial runner for stack operations within one process.
 *
 * Bring-up, repair and restarts all mutate the same environment, so at most
 * one runs at a time. A second operation is refused instead of lining up.
 */

import PQueue from "p-queue";

import { ConcurrentRunError } from "@/lib/errors";

export interface OperationQueue {
  /** Start now, or reject with ConcurrentRunError if another operation is running. */
  runExclusive: <T>(operation: string, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal) => Promise<T>;
  /** Abort the running operation's signal. */
  cancelAll: () => void;
}

export const createOperationQueue = (): OperationQueue => {
  const queue = new PQueue({ concurrency: 1 });
  const controllers = new Set<AbortController>();

  const runExclusive = async <T>(
    operation: string,
    fn: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> => {
    if (queue.size > 0 || queue.pending > 0) {
      throw new ConcurrentRunError(operation);
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener("abort", onAbort, { once: true });
    controllers.add(controller);

    try {
      return await queue.add(() => fn(controller.signal), { throwOnTimeout: true });
    } finally {
      controllers.delete(controller);
      signal?.removeEventListener("abort", onAbort);
    }
  };

  const cancelAll = (): void => {
    for (const controller of controllers) {
      controller.abort();
    }
  };

  return { runExclusive, cancelAll };
};
