// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@applock/config-service';
import pino, { Logger } from 'pino';

export const createLogger = (): Logger => {
  const prettyLogsEnabled = ConfigService.get('PRETTY_LOGS_ENABLED');

  return pino({
    name: 'applock-demo',
    level: ConfigService.get('LOG_LEVEL'),
    // Use pino-pretty when PRETTY_LOGS_ENABLED is true (default), otherwise use JSON format
    ...(prettyLogsEnabled && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: true,
          ignore: 'pid,hostname',
        },
      },
    }),
  });
};
