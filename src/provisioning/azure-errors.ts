import { OperationCancelledError } from '../errors/index.js';

/** Matches the `statusCode` the Azure SDK puts on a RestError */
export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === 404;
}

/**
 * Runs an SDK call and translates its failures: a 404 becomes the error built by
 * `notFound`, and any failure after `signal` aborted becomes OperationCancelledError.
 * Everything else is rethrown unchanged.
 */
export async function callAzure<T>(
  call: () => Promise<T>,
  mapping: { notFound?: (cause: unknown) => Error; signal?: AbortSignal; cancelled?: string } = {}
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (mapping.signal?.aborted) {
      throw new OperationCancelledError(mapping.cancelled, error);
    }
    if (mapping.notFound && isNotFound(error)) {
      throw mapping.notFound(error);
    }
    throw error;
  }
}
