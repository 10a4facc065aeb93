// SPDX-License-Identifier: Apache-2.0

import { DistributedLockFactory } from '@applock/lock';
import { expect } from 'chai';
import path from 'path';
import sinon from 'sinon';

import { CancellationHonouredScenario } from '../../src/scenarios/CancellationHonouredScenario';
import { InterProcessScenario } from '../../src/scenarios/InterProcessScenario';
import { ScenarioContext } from '../../src/scenarios/LockScenario';
import { MutualExclusionScenario } from '../../src/scenarios/MutualExclusionScenario';
import { SingleThreadHappyPathScenario } from '../../src/scenarios/SingleThreadHappyPathScenario';
import { TimeoutRespectedScenario } from '../../src/scenarios/TimeoutRespectedScenario';
import { createLocalFactory, silentLogger } from '../helpers';

describe('Lock scenarios', function () {
  this.timeout(10000);

  let factory: DistributedLockFactory;
  let context: ScenarioContext;

  beforeEach(() => {
    factory = createLocalFactory();
    context = { factory, backend: 'local', logger: silentLogger };
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('SingleThreadHappyPathScenario', () => {
    it('should pass on a working lock service', async () => {
      const result = await new SingleThreadHappyPathScenario().run(context);

      expect(result.name).to.equal('single-thread-happy-path');
      expect(result.status).to.equal('passed');
      expect(result.details).to.deep.equal(['lock granted while held', 'no grant left after release']);
    });

    it('should fail when the service does not report the grant', async () => {
      const blindFactory = createLocalFactory();
      sinon.stub(blindFactory, 'isGranted').resolves(false);

      const result = await new SingleThreadHappyPathScenario().run({ ...context, factory: blindFactory });

      expect(result.status).to.equal('failed');
      expect(result.details).to.deep.equal(['lock not reported as granted while held', 'no grant left after release']);
    });
  });

  describe('MutualExclusionScenario', () => {
    it('should see the contender acquire only after the holder released', async () => {
      const result = await new MutualExclusionScenario({ holdMs: 100, contenderHoldMs: 10 }).run(context);

      expect(result.name).to.equal('mutual-exclusion-threads');
      expect(result.status).to.equal('passed');
      expect(result.details).to.have.lengthOf(2);
      expect(result.details[1]).to.equal('contender waited for the holder to release');
    });
  });

  describe('TimeoutRespectedScenario', () => {
    it('should give up close to the requested timeout without a grant', async () => {
      const result = await new TimeoutRespectedScenario({ holdMs: 300, timeoutMs: 100, toleranceMs: 80 }).run(context);

      expect(result.name).to.equal('timeout-respected');
      expect(result.status).to.equal('passed');
      expect(result.details.slice(0, 2)).to.deep.equal([
        'tryTake returned false',
        'contender was never granted the lock',
      ]);
    });
  });

  describe('CancellationHonouredScenario', () => {
    it('should cancel the waiting take promptly', async () => {
      const result = await new CancellationHonouredScenario({ cancelAfterMs: 30, holdMs: 200, maxElapsedMs: 150 }).run(
        context,
      );

      expect(result.name).to.equal('cancellation-honoured');
      expect(result.status).to.equal('passed');
      expect(result.details).to.have.lengthOf(4);
      expect(result.details[0]).to.equal('take rejected with OPERATION_CANCELED');
      expect(result.details[2]).to.equal('contender was never granted the lock');
      expect(result.details[3]).to.equal('no grant left once the holder released');
    });
  });

  describe('InterProcessScenario', () => {
    it('should be skipped on the local backend', async () => {
      const result = await new InterProcessScenario().run(context);

      expect(result.name).to.equal('inter-process-mutual-exclusion');
      expect(result.status).to.equal('skipped');
      expect(result.details).to.deep.equal(['the local backend cannot coordinate separate processes']);
    });

    it('should fail when the child process exits before reporting its grant', async () => {
      const scenario = new InterProcessScenario({
        entryScript: path.join(__dirname, '..', 'fixtures', 'exitEarly.js'),
        startupTimeoutMs: 5000,
      });

      const result = await scenario.run({ ...context, backend: 'mssql' });

      expect(result.status).to.equal('failed');
      expect(result.details).to.deep.equal(["unexpected error: child exited with code 3 before reporting 'acquired'"]);
    });
  });
});
