// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@applock/config-service';
import { config as SqlConfig, ConnectionPool } from 'mssql';
import { Logger } from 'pino';

import constants from '../constants';

export class SqlServerClientManager {
  /**
   * Connection settings from the `SQL_*` configuration keys.
   *
   * @param overrides - settings replacing the configured ones
   */
  public static buildConfig(overrides: Partial<SqlConfig> = {}): SqlConfig {
    return {
      server: ConfigService.get('SQL_SERVER_HOST'),
      port: ConfigService.get('SQL_SERVER_PORT'),
      database: ConfigService.get('SQL_DATABASE'),
      user: ConfigService.get('SQL_USER'),
      password: ConfigService.get('SQL_PASSWORD'),
      connectionTimeout: ConfigService.get('SQL_CONNECT_TIMEOUT_MS'),
      requestTimeout: ConfigService.get('SQL_REQUEST_TIMEOUT_MS'),
      options: {
        encrypt: ConfigService.get('SQL_ENCRYPT'),
        trustServerCertificate: ConfigService.get('SQL_TRUST_SERVER_CERTIFICATE'),
      },
      ...overrides,
    };
  }

  /**
   * A pool pinned to exactly one physical connection, so that every request runs on the same
   * server session. Session-owned application locks live as long as that connection.
   */
  public static createSessionPool(logger: Logger): ConnectionPool {
    return this.createPool(
      logger,
      this.buildConfig({
        requestTimeout: constants.SQL_SESSION_REQUEST_TIMEOUT_MS,
        pool: { min: 1, max: 1 },
      }),
    );
  }

  /**
   * A small shared pool for lock inspection and connectivity checks.
   */
  public static createInspectionPool(logger: Logger): ConnectionPool {
    return this.createPool(logger, this.buildConfig({ pool: { min: 0, max: 2 } }));
  }

  private static createPool(logger: Logger, config: SqlConfig): ConnectionPool {
    const pool = new ConnectionPool(config);

    pool.on('error', (error: unknown) => {
      logger.error(error, `Error occurred with SQL Server connection to ${config.server}:${config.port}`);
    });

    return pool;
  }
}
