import { ArchiveResponse } from '../session/ArchiveResponse';
import { RetryOptions } from '../types';
import { delay } from '../utils/delay';
import { logger } from '../utils/logger';

export interface RetryOutcome {
  response: ArchiveResponse;
  retriesUsed: number;
}

/**
 * Send until the response is anything other than a 503 SlowDown or the
 * budget runs out. The last response is returned either way; timeouts and
 * network errors are thrown by `attempt` and never retried here.
 */
export async function retryOnSlowDown(
  attempt: () => Promise<ArchiveResponse>,
  options: RetryOptions,
  label: string
): Promise<RetryOutcome> {
  let remaining = options.retries ?? 0;
  const sleepSeconds = options.retriesSleep ?? 0;
  let retriesUsed = 0;

  for (;;) {
    const response = await attempt();
    if (!response.isSlowDown) {
      return { response, retriesUsed };
    }
    if (remaining <= 0) {
      if (retriesUsed > 0) {
        logger.warn(`${label}: maximum retries exceeded, giving up`);
      }
      return { response, retriesUsed };
    }

    logger.warn(
      `${label}: s3 is overloaded, sleeping for ${sleepSeconds} seconds and retrying. ` +
        `${remaining} retries left.`
    );
    await delay(sleepSeconds * 1000);
    remaining--;
    retriesUsed++;
  }
}
