// SPDX-License-Identifier: Apache-2.0

import { createSignal, delay, stopwatch } from '../utils';
import { LockScenario, ScenarioContext, ScenarioStatus } from './LockScenario';

export interface MutualExclusionOptions {
  /**
   * How long the first task holds the lock once the second one started waiting.
   */
  holdMs: number;
  /**
   * How long the second task holds the lock once it gets it.
   */
  contenderHoldMs: number;
}

/**
 * Two tasks of this process take the same key; the second must wait for the first to release.
 */
export class MutualExclusionScenario extends LockScenario {
  readonly name = 'mutual-exclusion-threads';
  readonly description = 'a second task taking the same key waits until the first one releases it';

  private readonly options: MutualExclusionOptions;

  constructor(options: Partial<MutualExclusionOptions> = {}) {
    super();
    this.options = { holdMs: 2000, contenderHoldMs: 500, ...options };
  }

  protected async execute({ factory, logger }: ScenarioContext, details: string[]): Promise<ScenarioStatus> {
    const { holdMs, contenderHoldMs } = this.options;
    const key = this.uniqueKey('mutual_exclusion');
    const elapsed = stopwatch();
    const holderAcquired = createSignal();
    const contenderStarted = createSignal();
    let holderReleasedAt = Number.POSITIVE_INFINITY;
    let contenderAcquiredAt = Number.NEGATIVE_INFINITY;

    const holder = factory.runExclusive(key, async () => {
      logger.info(`Holder: lock acquired at ${elapsed()}ms`);
      holderAcquired.resolve();
      await contenderStarted.promise;

      logger.info(`Holder: holding lock for ${holdMs}ms`);
      await delay(holdMs);
      holderReleasedAt = elapsed();
      logger.info(`Holder: releasing lock at ${holderReleasedAt}ms`);
    });

    const contender = (async () => {
      await Promise.race([holderAcquired.promise, holder]);
      logger.info(`Contender: attempt started at ${elapsed()}ms`);
      contenderStarted.resolve();

      await factory.runExclusive(key, async () => {
        contenderAcquiredAt = elapsed();
        logger.info(`Contender: lock acquired at ${contenderAcquiredAt}ms`);
        await delay(contenderHoldMs);
      });
    })();

    await Promise.all([holder, contender]);

    details.push(`holder released at ${holderReleasedAt}ms, contender acquired at ${contenderAcquiredAt}ms`);
    const waited = this.check(
      details,
      contenderAcquiredAt >= holderReleasedAt,
      'contender waited for the holder to release',
      'contender acquired the lock while the holder still had it',
    );

    return waited ? 'passed' : 'failed';
  }
}
