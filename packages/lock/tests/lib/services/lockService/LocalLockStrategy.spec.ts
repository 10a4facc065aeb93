// SPDX-License-Identifier: Apache-2.0

import chai, { expect } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import { pino } from 'pino';
import sinon from 'sinon';

import { LockError } from '../../../../src/lib/errors/LockError';
import { LocalLockStrategy } from '../../../../src/lib/services/lockService/LocalLockStrategy';
import { LockSession } from '../../../../src/lib/types';
import { wait } from '../../../helpers';

chai.use(chaiAsPromised);

describe('LocalLockStrategy', function () {
  this.timeout(10000);

  let lockStrategy: LocalLockStrategy;

  beforeEach(() => {
    lockStrategy = new LocalLockStrategy(pino({ level: 'silent' }));
  });

  afterEach(() => {
    sinon.restore();
  });

  async function openSession(): Promise<LockSession> {
    const session = lockStrategy.createSession();
    await session.open();
    return session;
  }

  it('should grant a free resource and release it', async () => {
    const session = await openSession();

    expect(await session.acquire('orders:1', 100)).to.deep.equal({ status: 'granted' });
    expect(lockStrategy.getOwner('orders:1')).to.equal(session.id);
    expect(await lockStrategy.isGranted('orders:1')).to.be.true;

    expect(await session.release('orders:1')).to.deep.equal({ status: 'ok' });
    expect(lockStrategy.getOwner('orders:1')).to.be.null;
    expect(await lockStrategy.isGranted('orders:1')).to.be.false;
    expect(lockStrategy['lockEntries'].has('orders:1')).to.be.false;
  });

  it('should report timedOut when another session keeps the resource', async () => {
    const holder = await openSession();
    const contender = await openSession();
    await holder.acquire('orders:1', 100);

    expect(await contender.acquire('orders:1', 50)).to.deep.equal({ status: 'timedOut' });
    expect(lockStrategy.getOwner('orders:1')).to.equal(holder.id);
    expect(lockStrategy['lockEntries'].get('orders:1')?.waiters).to.equal(0);
  });

  it('should block a second session until the first releases', async () => {
    const holder = await openSession();
    const contender = await openSession();
    await holder.acquire('orders:1', 100);

    let contenderGranted = false;
    const contenderAcquire = contender.acquire('orders:1', 1000).then((outcome) => {
      contenderGranted = true;
      return outcome;
    });

    await wait(50);
    expect(contenderGranted).to.be.false;

    await holder.release('orders:1');

    expect(await contenderAcquire).to.deep.equal({ status: 'granted' });
    expect(lockStrategy.getOwner('orders:1')).to.equal(contender.id);
  });

  it('should not contend on different resources', async () => {
    const first = await openSession();
    const second = await openSession();

    expect(await first.acquire('orders:1', 0)).to.deep.equal({ status: 'granted' });
    expect(await second.acquire('orders:2', 0)).to.deep.equal({ status: 'granted' });
  });

  it('should count repeated grants to the same session', async () => {
    const session = await openSession();

    await session.acquire('orders:1', 100);
    await session.acquire('orders:1', 100);
    expect(lockStrategy['lockEntries'].get('orders:1')?.holdCount).to.equal(2);

    await session.release('orders:1');
    expect(lockStrategy.getOwner('orders:1')).to.equal(session.id);

    await session.release('orders:1');
    expect(lockStrategy.getOwner('orders:1')).to.be.null;
  });

  it('should not allow a non-owner to release a lock', async () => {
    const holder = await openSession();
    const other = await openSession();
    await holder.acquire('orders:1', 100);

    const outcome = await other.release('orders:1');

    expect(outcome).to.deep.equal({
      status: 'error',
      detail: `lock 'orders:1' is not held by session ${other.id}`,
    });
    expect(lockStrategy.getOwner('orders:1')).to.equal(holder.id);
  });

  it('should release every hold of a session when it closes', async () => {
    const session = await openSession();
    await session.acquire('orders:1', 100);
    await session.acquire('orders:1', 100);
    await session.acquire('orders:2', 100);

    await session.close();

    expect(session.isOpen).to.be.false;
    expect(lockStrategy.getOwner('orders:1')).to.be.null;
    expect(lockStrategy.getOwner('orders:2')).to.be.null;
    expect(lockStrategy['lockEntries'].size).to.equal(0);
  });

  it('should end a pending wait with an error outcome when its session closes', async () => {
    const holder = await openSession();
    const contender = await openSession();
    await holder.acquire('orders:1', 100);

    const contenderAcquire = contender.acquire('orders:1', 5000);
    await wait(20);
    await contender.close();

    expect(await contenderAcquire).to.deep.equal({
      status: 'error',
      detail: `session ${contender.id} closed while waiting`,
    });
    expect(lockStrategy.getOwner('orders:1')).to.equal(holder.id);
  });

  it('should reject with a cancellation error when the signal aborts', async () => {
    const holder = await openSession();
    const contender = await openSession();
    await holder.acquire('orders:1', 100);

    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);

    const error = await contender.acquire('orders:1', 5000, controller.signal).catch((e: unknown) => e);

    expect(error).to.be.instanceOf(LockError);
    expect(error).to.have.property('code', 'OPERATION_CANCELED');
    expect(lockStrategy.getOwner('orders:1')).to.equal(holder.id);
    expect(lockStrategy['lockEntries'].get('orders:1')?.waiters).to.equal(0);
  });

  it('should not wait at all when the signal is already aborted', async () => {
    const session = await openSession();

    await expect(session.acquire('orders:1', 5000, AbortSignal.abort())).to.be.rejectedWith(
      LockError,
      "Acquisition of lock 'orders:1' was canceled.",
    );
    expect(lockStrategy['lockEntries'].has('orders:1')).to.be.false;
  });

  it('should release a grant that arrives after the wait timed out', async () => {
    const holder = await openSession();
    const contender = await openSession();
    const latecomer = await openSession();
    await holder.acquire('orders:1', 100);

    expect(await contender.acquire('orders:1', 30)).to.deep.equal({ status: 'timedOut' });

    const latecomerAcquire = latecomer.acquire('orders:1', 1000);
    await holder.release('orders:1');

    expect(await latecomerAcquire).to.deep.equal({ status: 'granted' });
    expect(lockStrategy.getOwner('orders:1')).to.equal(latecomer.id);
  });

  it('should refuse requests on a session that is not open', async () => {
    const session = lockStrategy.createSession();

    expect(session.isOpen).to.be.false;
    await expect(session.acquire('orders:1', 100)).to.be.rejectedWith(Error, `Session ${session.id} is not open`);
    await expect(session.release('orders:1')).to.be.rejectedWith(Error, `Session ${session.id} is not open`);
  });

  it('should reuse existing lock entry for same resource', () => {
    const entry1 = lockStrategy['getOrCreateEntry']('orders:1');
    const entry2 = lockStrategy['getOrCreateEntry']('orders:1');

    expect(entry1).to.equal(entry2);
  });

  it('should create a new lock entry for new resources', () => {
    const entryA = lockStrategy['getOrCreateEntry']('a');
    const entryB = lockStrategy['getOrCreateEntry']('b');

    expect(entryA).to.not.equal(entryB);
  });
});
