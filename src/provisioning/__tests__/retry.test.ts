import { describe, it, expect, vi } from 'vitest';
import {
  DeploymentNotFoundError,
  DeploymentTimeoutError,
  OperationCancelledError
} from '../../errors/index.js';
import { DEFAULT_MAX_ATTEMPTS, retryWhileNotFound, untilAborted } from '../retry.js';

const timeout = (attempts: number, lastError: DeploymentNotFoundError): Error =>
  new DeploymentTimeoutError('dev-1', attempts, lastError);

describe('retryWhileNotFound', () => {
  it('should retry not-found reads with a doubling delay', async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => undefined);
    let calls = 0;
    const operation = vi.fn(async () => {
      calls++;
      if (calls <= 3) {
        throw new DeploymentNotFoundError('dev-1');
      }
      return 'found';
    });

    const outcome = await retryWhileNotFound(operation, timeout, { sleep });

    expect(outcome).toEqual({ value: 'found', attempts: 4 });
    expect(sleep.mock.calls.map(call => call[0])).toEqual([1000, 2000, 4000]);
  });

  it('should give up after the last attempt', async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => undefined);
    const operation = vi.fn(async (): Promise<string> => {
      throw new DeploymentNotFoundError('dev-1');
    });

    await expect(retryWhileNotFound(operation, timeout, { sleep })).rejects.toMatchObject({
      code: 'DEPLOYMENT_TIMEOUT',
      attempts: DEFAULT_MAX_ATTEMPTS
    });
    expect(operation).toHaveBeenCalledTimes(10);
    expect(sleep).toHaveBeenCalledTimes(9);
  });

  it('should rethrow other errors at once', async () => {
    const operation = vi.fn(async (): Promise<string> => {
      throw new Error('forbidden');
    });

    await expect(retryWhileNotFound(operation, timeout, { sleep: async () => undefined })).rejects.toThrow(
      'forbidden'
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'found');

    await expect(retryWhileNotFound(operation, timeout, { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(operation).not.toHaveBeenCalled();
  });

  it('should stop waiting when cancelled during the backoff', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async (): Promise<string> => {
      throw new DeploymentNotFoundError('dev-1');
    });
    const sleep = async (): Promise<void> => {
      controller.abort();
      throw new Error('The operation was aborted');
    };

    await expect(
      retryWhileNotFound(operation, timeout, { sleep, signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should honour a custom number of attempts', async () => {
    const operation = vi.fn(async (): Promise<string> => {
      throw new DeploymentNotFoundError('dev-1');
    });

    await expect(
      retryWhileNotFound(operation, timeout, { maxAttempts: 3, initialDelayMs: 0, sleep: async () => undefined })
    ).rejects.toBeInstanceOf(DeploymentTimeoutError);
    expect(operation).toHaveBeenCalledTimes(3);
  });
});

describe('untilAborted', () => {
  it('should return the result when nothing aborts', async () => {
    const controller = new AbortController();
    const run = vi.fn(async () => 'done');

    await expect(untilAborted(run, controller.signal, 'Stopped')).resolves.toBe('done');
    expect(run).toHaveBeenCalledWith(controller.signal);
  });

  it('should not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const run = vi.fn(async () => 'done');

    await expect(untilAborted(run, controller.signal, 'Stopped')).rejects.toThrow(new OperationCancelledError('Stopped'));
    expect(run).not.toHaveBeenCalled();
  });

  it('should stop waiting on a call that ignores the signal', async () => {
    const controller = new AbortController();
    const pending = untilAborted(() => new Promise<string>(() => undefined), controller.signal, 'Stopped');

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('should rethrow failures that happen before any abort', async () => {
    const failure = new Error('Conflict');

    await expect(
      untilAborted(
        async () => {
          throw failure;
        },
        new AbortController().signal,
        'Stopped'
      )
    ).rejects.toBe(failure);
  });

  it('should run the call directly without a signal', async () => {
    await expect(untilAborted(async signal => signal === undefined, undefined, 'Stopped')).resolves.toBe(true);
  });
});
