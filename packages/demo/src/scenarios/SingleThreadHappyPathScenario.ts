// SPDX-License-Identifier: Apache-2.0

import { LockScenario, ScenarioContext, ScenarioStatus } from './LockScenario';

export class SingleThreadHappyPathScenario extends LockScenario {
  readonly name = 'single-thread-happy-path';
  readonly description = 'take succeeds, the service reports the lock as granted, and after release no grant remains';

  protected async execute({ factory, logger }: ScenarioContext, details: string[]): Promise<ScenarioStatus> {
    const key = this.uniqueKey('happy_path');
    const lock = factory.newLock(key);

    let grantedWhileHeld = false;
    try {
      logger.info(`Acquiring lock '${key}'`);
      await lock.take();
      grantedWhileHeld = await factory.isGranted(key);
    } finally {
      logger.info(`Releasing lock '${key}'`);
      await lock.release();
    }

    const grantedAfterRelease = await factory.isGranted(key);

    const checks = [
      this.check(details, grantedWhileHeld, 'lock granted while held', 'lock not reported as granted while held'),
      this.check(details, !grantedAfterRelease, 'no grant left after release', 'lock still granted after release'),
    ];

    return checks.every(Boolean) ? 'passed' : 'failed';
  }
}
