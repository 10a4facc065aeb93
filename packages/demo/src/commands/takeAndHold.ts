// SPDX-License-Identifier: Apache-2.0

import { DistributedLockFactory } from '@applock/lock';
import { Logger } from 'pino';

import { delay, stopwatch } from '../utils';

/**
 * Progress events of {@link takeAndHold}, logged as the `event` field.
 * Other processes follow a holder through them.
 */
export type TakeAndHoldEvent = 'attempting' | 'acquired' | 'holding' | 'releasing' | 'failed' | 'completed';

export interface TakeAndHoldOptions {
  key: string;
  holdMs: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Takes the lock on `key`, holds it for `holdMs` and releases it.
 *
 * @returns whether the lock was acquired and held for the whole period
 */
export const takeAndHold = async (
  factory: DistributedLockFactory,
  logger: Logger,
  options: TakeAndHoldOptions,
): Promise<boolean> => {
  const { key, holdMs, timeoutMs, signal } = options;
  const elapsed = stopwatch();
  const log = (event: TakeAndHoldEvent, message: string) => logger.info({ event, key, elapsedMs: elapsed() }, message);

  log('attempting', `Attempting to take lock '${key}'`);

  try {
    await factory.runExclusive(
      key,
      async () => {
        log('acquired', `Acquired lock '${key}'`);
        log('holding', `Holding lock '${key}' for ${holdMs}ms`);
        await delay(holdMs, undefined, { signal });
        log('releasing', `Releasing lock '${key}'`);
      },
      { timeoutMs, signal },
    );
    return true;
  } catch (error) {
    logger.error({ event: 'failed', key, elapsedMs: elapsed(), err: error }, `Failed to take and hold lock '${key}'`);
    return false;
  } finally {
    log('completed', 'Operation completed');
  }
};
