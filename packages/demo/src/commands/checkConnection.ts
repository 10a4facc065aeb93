// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@applock/config-service';
import { LockStrategy } from '@applock/lock';
import { Logger } from 'pino';

/**
 * Checks that the lock service of `strategy` is reachable.
 */
export const checkConnection = async (strategy: LockStrategy, logger: Logger): Promise<boolean> => {
  const target =
    strategy.backend === 'mssql'
      ? `${ConfigService.get('SQL_SERVER_HOST')}:${ConfigService.get('SQL_SERVER_PORT')}/${ConfigService.get('SQL_DATABASE')}`
      : 'in-process lock table';

  const reachable = await strategy.testConnection();
  if (reachable) {
    logger.info(`Connection to the ${strategy.backend} lock service (${target}) succeeded`);
  } else {
    logger.error(`Failed to connect to the ${strategy.backend} lock service (${target})`);
  }

  return reachable;
};
