import { setTimeout as sleepFor } from 'timers/promises';
import { DeploymentNotFoundError, OperationCancelledError } from '../errors/index.js';
import type { Logger } from '../logger.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  /** Total attempts, including the first */
  maxAttempts?: number;
  initialDelayMs?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  logger?: Logger;
}

export const DEFAULT_MAX_ATTEMPTS = 10;
export const DEFAULT_INITIAL_DELAY_MS = 1000;

export const defaultSleep: Sleep = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/**
 * Runs `operation` until it stops failing with DeploymentNotFoundError, doubling the delay
 * between attempts. Any other error is rethrown at once; when the attempts run out the
 * error built by `onExhausted` is thrown.
 */
export async function retryWhileNotFound<T>(
  operation: () => Promise<T>,
  onExhausted: (attempts: number, lastError: DeploymentNotFoundError) => Error,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const sleep = options.sleep ?? defaultSleep;
  let delay = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);

    try {
      return { value: await operation(), attempts: attempt };
    } catch (error) {
      if (!(error instanceof DeploymentNotFoundError)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw onExhausted(attempt, error);
      }
      options.logger?.debug(`Attempt ${attempt} of ${maxAttempts} not found yet, retrying in ${delay}ms`);
    }

    try {
      await sleep(delay, options.signal);
    } catch (error) {
      if (options.signal?.aborted) {
        throw new OperationCancelledError('Operation cancelled while waiting for the deployment', error);
      }
      throw error;
    }
    delay *= 2;
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError('Operation cancelled while waiting for the deployment', signal.reason);
  }
}

/**
 * Stops waiting on `run` once `signal` aborts, whether or not the call itself honours
 * the signal. The call is not started when the signal has already aborted.
 */
export function untilAborted<T>(
  run: (signal?: AbortSignal) => Promise<T>,
  signal: AbortSignal | undefined,
  message: string
): Promise<T> {
  if (!signal) {
    return run();
  }
  if (signal.aborted) {
    return Promise.reject(new OperationCancelledError(message, signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new OperationCancelledError(message, signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    run(signal).then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(signal.aborted ? new OperationCancelledError(message, error) : error);
      }
    );
  });
}
