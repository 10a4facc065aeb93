// SPDX-License-Identifier: Apache-2.0

import { DistributedLockFactory } from '@applock/lock';
import { expect } from 'chai';

import { takeAndHold } from '../../src/commands/takeAndHold';
import { createCapturingLogger, createLocalFactory } from '../helpers';

describe('takeAndHold', function () {
  this.timeout(10000);

  let factory: DistributedLockFactory;

  beforeEach(() => {
    factory = createLocalFactory();
  });

  it('should take, hold and release the lock', async () => {
    const { logger, entries } = createCapturingLogger();

    const succeeded = await takeAndHold(factory, logger, { key: 'orders:1', holdMs: 10 });

    expect(succeeded).to.be.true;
    expect(entries.map((e) => e.event)).to.deep.equal(['attempting', 'acquired', 'holding', 'releasing', 'completed']);
    expect(entries.map((e) => e.key)).to.deep.equal(['orders:1', 'orders:1', 'orders:1', 'orders:1', 'orders:1']);
    expect(entries[2].msg).to.equal("Holding lock 'orders:1' for 10ms");
    expect(await factory.isGranted('orders:1')).to.be.false;
  });

  it('should report every event with the elapsed time', async () => {
    const { logger, entries } = createCapturingLogger();

    await takeAndHold(factory, logger, { key: 'orders:1', holdMs: 10 });

    for (const entry of entries) {
      expect(entry.elapsedMs).to.be.a('number');
    }
  });

  it('should fail when the lock stays busy past the timeout', async () => {
    const { logger, entries } = createCapturingLogger();
    const holder = await factory.newLockAndTake('orders:1');

    try {
      const succeeded = await takeAndHold(factory, logger, { key: 'orders:1', holdMs: 10, timeoutMs: 20 });

      expect(succeeded).to.be.false;
      expect(entries.map((e) => e.event)).to.deep.equal(['attempting', 'failed', 'completed']);
      expect(entries[1].level).to.equal(50);
      expect(entries[1].msg).to.equal("Failed to take and hold lock 'orders:1'");
    } finally {
      await holder.release();
    }
  });

  it('should stop holding and release the lock when the signal aborts', async () => {
    const { logger, entries } = createCapturingLogger();

    const succeeded = await takeAndHold(factory, logger, {
      key: 'orders:1',
      holdMs: 5000,
      signal: AbortSignal.timeout(30),
    });

    expect(succeeded).to.be.false;
    expect(entries.map((e) => e.event)).to.deep.equal(['attempting', 'acquired', 'holding', 'failed', 'completed']);
    expect(await factory.isGranted('orders:1')).to.be.false;
  });
});
