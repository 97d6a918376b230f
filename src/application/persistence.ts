import { AppError, StorageUnavailableError, logger } from '@makerspace/shared';

/**
 * Runs a repository call, turning infrastructure faults into
 * `StorageUnavailableError`. Domain errors raised by the store pass through.
 */
export async function persist<T>(
  operation: string,
  work: () => Promise<T>,
  context: Record<string, unknown> = {}
): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }

    logger.error({ err: error, operation, ...context }, 'Storage operation failed');
    throw new StorageUnavailableError(`Storage unavailable during ${operation}`, error);
  }
}
