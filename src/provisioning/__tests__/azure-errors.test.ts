import { describe, it, expect } from 'vitest';
import { DeploymentNotFoundError, OperationCancelledError } from '../../errors/index.js';
import { callAzure, isNotFound } from '../azure-errors.js';

function restError(statusCode: number): Error & { statusCode: number } {
  return Object.assign(new Error(`status ${statusCode}`), { statusCode });
}

describe('callAzure', () => {
  it('should return the result of the call', async () => {
    await expect(callAzure(async () => 'dev-1')).resolves.toBe('dev-1');
  });

  it('should map a 404 to the error built for it', async () => {
    const missing = restError(404);

    const call = callAzure(
      async () => {
        throw missing;
      },
      { notFound: cause => new DeploymentNotFoundError('dev-1', cause) }
    );

    await expect(call).rejects.toThrow(new DeploymentNotFoundError('dev-1'));
    await expect(call).rejects.toHaveProperty('cause', missing);
  });

  it('should rethrow other failures unchanged', async () => {
    const conflict = restError(409);

    await expect(
      callAzure(
        async () => {
          throw conflict;
        },
        { notFound: cause => new DeploymentNotFoundError('dev-1', cause) }
      )
    ).rejects.toBe(conflict);
  });

  it('should report a failure after the signal aborted as cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      callAzure(
        async () => {
          throw restError(404);
        },
        {
          signal: controller.signal,
          cancelled: 'Deployment dev-1 was cancelled',
          notFound: cause => new DeploymentNotFoundError('dev-1', cause)
        }
      )
    ).rejects.toThrow(new OperationCancelledError('Deployment dev-1 was cancelled'));
  });
});

describe('isNotFound', () => {
  it('should only match errors carrying a 404 status code', () => {
    expect(isNotFound(restError(404))).toBe(true);
    expect(isNotFound(restError(500))).toBe(false);
    expect(isNotFound(new Error('not found'))).toBe(false);
    expect(isNotFound(undefined)).toBe(false);
  });
});
