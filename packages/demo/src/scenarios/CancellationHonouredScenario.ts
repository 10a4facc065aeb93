// SPDX-License-Identifier: Apache-2.0

import { LockError } from '@applock/lock';

import { createSignal, delay, stopwatch } from '../utils';
import { LockScenario, ScenarioContext, ScenarioStatus } from './LockScenario';

export interface CancellationHonouredOptions {
  cancelAfterMs: number;
  /**
   * How long the holder keeps the lock; longer than `cancelAfterMs`.
   */
  holdMs: number;
  maxElapsedMs: number;
}

/**
 * A take waiting on a busy key stops soon after its signal aborts and leaves no grant behind.
 */
export class CancellationHonouredScenario extends LockScenario {
  readonly name = 'cancellation-honoured';
  readonly description = 'a take waiting on a held key aborts promptly when its signal fires and leaves no grant';

  private readonly options: CancellationHonouredOptions;

  constructor(options: Partial<CancellationHonouredOptions> = {}) {
    super();
    this.options = { cancelAfterMs: 50, holdMs: 500, maxElapsedMs: 250, ...options };
  }

  protected async execute({ factory, logger }: ScenarioContext, details: string[]): Promise<ScenarioStatus> {
    const { cancelAfterMs, holdMs, maxElapsedMs } = this.options;
    const key = this.uniqueKey('cancel_test');
    const holderAcquired = createSignal();

    const holder = factory.runExclusive(key, async () => {
      logger.info(`Holder: lock acquired, holding for ${holdMs}ms`);
      holderAcquired.resolve();
      await delay(holdMs);
    });
    await Promise.race([holderAcquired.promise, holder]);

    logger.info(`Contender: taking the lock with a signal that aborts after ${cancelAfterMs}ms`);
    const contender = factory.newLock(key);
    const elapsed = stopwatch();
    let canceled = false;
    let contenderHeld = false;
    let elapsedMs = 0;
    try {
      canceled = await contender.take({ timeoutMs: 5000, signal: AbortSignal.timeout(cancelAfterMs) }).then(
        () => false,
        (error: unknown) => {
          if (error instanceof LockError && error.isOperationCanceled()) {
            return true;
          }
          throw error;
        },
      );
      elapsedMs = elapsed();
      contenderHeld = contender.isHeld;
    } finally {
      await contender.release();
    }
    logger.info(`Contender: finished after ${elapsedMs}ms`);

    await holder;
    const grantedAfterHolder = await factory.isGranted(key);

    const checks = [
      this.check(details, canceled, 'take rejected with OPERATION_CANCELED', 'take was not canceled'),
      this.check(
        details,
        elapsedMs < maxElapsedMs,
        `canceled after ${elapsedMs}ms (< ${maxElapsedMs}ms)`,
        `took ${elapsedMs}ms to return (expected < ${maxElapsedMs}ms)`,
      ),
      this.check(details, !contenderHeld, 'contender was never granted the lock', 'contender holds the lock'),
      this.check(details, !grantedAfterHolder, 'no grant left once the holder released', 'lock still granted'),
    ];

    return checks.every(Boolean) ? 'passed' : 'failed';
  }
}
