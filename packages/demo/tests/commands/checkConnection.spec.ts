// SPDX-License-Identifier: Apache-2.0

import { LocalLockStrategy, LockStrategy } from '@applock/lock';
import { expect } from 'chai';
import sinon from 'sinon';

import { overrideEnvsInMochaDescribe } from '../../../lock/tests/helpers';
import { checkConnection } from '../../src/commands/checkConnection';
import { createCapturingLogger, silentLogger } from '../helpers';

describe('checkConnection', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('should report the in-process lock table as reachable', async () => {
    const { logger, entries } = createCapturingLogger();

    expect(await checkConnection(new LocalLockStrategy(silentLogger), logger)).to.be.true;
    expect(entries.map((e) => e.msg)).to.deep.equal([
      'Connection to the local lock service (in-process lock table) succeeded',
    ]);
  });

  describe('against SQL Server', () => {
    overrideEnvsInMochaDescribe({ SQL_SERVER_HOST: 'db.test', SQL_SERVER_PORT: 1444, SQL_DATABASE: 'locks' });

    const unreachable: LockStrategy = {
      backend: 'mssql',
      createSession: () => new LocalLockStrategy(silentLogger).createSession(),
      isGranted: async () => false,
      testConnection: async () => false,
      close: async () => undefined,
    };

    it('should log an error naming the server when it is unreachable', async () => {
      const { logger, entries } = createCapturingLogger();
      const testConnection = sinon.spy(unreachable, 'testConnection');

      expect(await checkConnection(unreachable, logger)).to.be.false;
      expect(testConnection.calledOnce).to.be.true;
      expect(entries).to.have.lengthOf(1);
      expect(entries[0].level).to.equal(50);
      expect(entries[0].msg).to.equal('Failed to connect to the mssql lock service (db.test:1444/locks)');
    });
  });
});
