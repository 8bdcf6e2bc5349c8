import { logger } from './logger.js';

/**
 * Delay helper - prefer pollUntil where a condition can be observed
 */
export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Poll a condition until it holds or the timeout elapses.
 *
 * Errors thrown by the condition count as "not yet" and are retried.
 * Resolves to true when the condition held, false on timeout.
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Maximum time to wait in ms
 * @param interval - Polling interval in ms
 */
export async function pollUntil(
  condition: () => boolean | Promise<boolean>,
  timeout: number,
  interval: number
): Promise<boolean> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    try {
      if (await condition()) {
        return true;
      }
    } catch (error) {
      // Condition threw, continue waiting
      logger.debug('[Wait] condition threw, retrying', { error: String(error) });
    }
    await delay(interval);
  }

  return false;
}
