// SPDX-License-Identifier: Apache-2.0

import { ConfigService, LockBackend } from '@applock/config-service';
import { Logger } from 'pino';

import { LockStrategy } from '../../types';
import { LocalLockStrategy } from './LocalLockStrategy';
import { SqlServerLockStrategy } from './SqlServerLockStrategy';

/**
 * Factory for creating LockStrategy instances.
 *
 * Selects the lock strategy implementation from the configured backend (SQL Server vs in-memory).
 */
export class LockStrategyFactory {
  /**
   * Creates a LockStrategy instance.
   *
   * @param logger - Logger instance for the lock strategy.
   * @param backend - Backend to use; defaults to `LOCK_BACKEND`.
   */
  static create(logger: Logger, backend: LockBackend = ConfigService.get('LOCK_BACKEND')): LockStrategy {
    switch (backend) {
      case 'mssql':
        return new SqlServerLockStrategy(logger.child({ name: 'sql-server-lock-strategy' }));
      case 'local':
        return new LocalLockStrategy(logger.child({ name: 'local-lock-strategy' }));
    }
  }
}
