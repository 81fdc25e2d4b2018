/**
 * Timeout and retry policy for a single tool invocation.
 *
 * Each attempt gets its own AbortSignal, aborted when the attempt times out or
 * the caller cancels. Handlers that honour the signal stop early; handlers
 * that ignore it keep running in the background and their result is dropped.
 */

import {
  AttemptFailure,
  CancelledError,
  ExecutionError,
  TimeoutError,
  toError,
} from "../errors";
import type { Logger } from "../logger";
import type { ArgumentValue, ToolArguments, ToolHandler } from "../types";

export interface RetryPolicyOptions {
  toolName: string;
  requestId: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  logger: Logger;
  /** External cancellation (caller disconnect, shutdown). */
  signal?: AbortSignal;
  /** Called for each failed attempt that will be retried. */
  onRetry?: (failure: AttemptFailure) => void;
}

/**
 * Run `fn` under a deadline. Rejects with TimeoutError when the deadline
 * passes and with CancelledError when `outer` aborts first.
 */
export function runWithTimeout<T>(
  fn: (signal: AbortSignal) => T | Promise<T>,
  timeoutMs: number,
  attempt: number,
  outer?: AbortSignal
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = () => {
      settled = true;
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    };

    const onAbort = () => {
      if (settled) return;
      finish();
      const error = new CancelledError("Invocation cancelled", attempt);
      controller.abort(error);
      reject(error);
    };

    const timer = setTimeout(() => {
      if (settled) return;
      finish();
      const error = new TimeoutError(timeoutMs, attempt);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    if (outer) {
      if (outer.aborted) {
        onAbort();
        return;
      }
      outer.addEventListener("abort", onAbort, { once: true });
    }

    const run = async (): Promise<T> => fn(controller.signal);

    // Deferred so that a synchronous throw is handled like a rejection.
    queueMicrotask(() => {
      if (settled) return;
      run().then(
        (value) => {
          if (settled) return;
          finish();
          resolve(value);
        },
        (error: unknown) => {
          if (settled) return;
          finish();
          reject(error);
        }
      );
    });
  });
}

/**
 * Cancellable fixed delay.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Invoke `handler` with up to `maxRetries` re-attempts after the first one,
 * waiting a fixed `retryDelayMs` between attempts.
 *
 * @throws ExecutionError once attempts are exhausted
 * @throws CancelledError when `signal` aborts
 */
export async function executeWithPolicy(
  handler: ToolHandler,
  args: ToolArguments,
  options: RetryPolicyOptions
): Promise<ArgumentValue> {
  const failures: AttemptFailure[] = [];
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= options.maxRetries + 1; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError("Invocation cancelled", failures.length);
    }

    try {
      return await runWithTimeout(
        (signal) =>
          handler(args, {
            signal,
            attempt,
            requestId: options.requestId,
            logger: options.logger,
          }),
        options.timeoutMs,
        attempt,
        options.signal
      );
    } catch (error: unknown) {
      if (options.signal?.aborted) {
        throw new CancelledError("Invocation cancelled", failures.length);
      }

      lastError = toError(error);
      const failure: AttemptFailure = {
        attempt,
        kind: error instanceof TimeoutError ? "TimeoutError" : "ExecutionError",
        message: lastError.message,
      };
      failures.push(failure);

      if (attempt > options.maxRetries) break;

      options.onRetry?.(failure);
      try {
        await sleep(options.retryDelayMs, options.signal);
      } catch {
        throw new CancelledError("Invocation cancelled during retry delay", failures.length);
      }
    }
  }

  throw new ExecutionError(
    options.toolName,
    failures.length,
    lastError ?? new Error("no attempt was made"),
    failures
  );
}
