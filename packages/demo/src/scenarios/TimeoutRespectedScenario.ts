// SPDX-License-Identifier: Apache-2.0

import { createSignal, delay, stopwatch } from '../utils';
import { LockScenario, ScenarioContext, ScenarioStatus } from './LockScenario';

export interface TimeoutRespectedOptions {
  holdMs: number;
  timeoutMs: number;
  /**
   * Largest accepted difference between the observed wait and `timeoutMs`.
   */
  toleranceMs: number;
}

/**
 * tryTake on a busy key gives up after about the requested timeout and is never granted.
 */
export class TimeoutRespectedScenario extends LockScenario {
  readonly name = 'timeout-respected';
  readonly description = 'tryTake on a held key returns false after about the requested timeout without a grant';

  private readonly options: TimeoutRespectedOptions;

  constructor(options: Partial<TimeoutRespectedOptions> = {}) {
    super();
    this.options = { holdMs: 4000, timeoutMs: 1500, toleranceMs: 500, ...options };
  }

  protected async execute({ factory, logger }: ScenarioContext, details: string[]): Promise<ScenarioStatus> {
    const { holdMs, timeoutMs, toleranceMs } = this.options;
    const key = this.uniqueKey('timeout_test');
    const holderAcquired = createSignal();

    const holder = factory.runExclusive(key, async () => {
      logger.info(`Holder: lock acquired, holding for ${holdMs}ms`);
      holderAcquired.resolve();
      await delay(holdMs);
    });
    await Promise.race([holderAcquired.promise, holder]);

    const contender = factory.newLock(key);
    const elapsed = stopwatch();
    let acquired = false;
    let contenderHeld = false;
    let elapsedMs = 0;
    try {
      acquired = await contender.tryTake({ timeoutMs });
      elapsedMs = elapsed();
      contenderHeld = contender.isHeld;
    } finally {
      await contender.release();
    }
    logger.info(`Contender: tryTake returned ${acquired} after ${elapsedMs}ms (timeout ${timeoutMs}ms)`);

    await holder;

    const checks = [
      this.check(details, !acquired, 'tryTake returned false', 'tryTake unexpectedly acquired the lock'),
      this.check(details, !contenderHeld, 'contender was never granted the lock', 'contender holds the lock'),
      this.check(
        details,
        Math.abs(elapsedMs - timeoutMs) < toleranceMs,
        `gave up after ${elapsedMs}ms, within ${toleranceMs}ms of the ${timeoutMs}ms timeout`,
        `gave up after ${elapsedMs}ms, not within ${toleranceMs}ms of the ${timeoutMs}ms timeout`,
      ),
    ];

    return checks.every(Boolean) ? 'passed' : 'failed';
  }
}
