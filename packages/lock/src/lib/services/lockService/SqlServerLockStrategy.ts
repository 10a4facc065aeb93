// SPDX-License-Identifier: Apache-2.0

import { randomUUID } from 'crypto';
import { Int, ISqlType, NVarChar, VarChar } from 'mssql';
import { Logger } from 'pino';

import { SqlServerClientManager } from '../../clients/sqlServerClientManager';
import constants from '../../constants';
import { LockErrors } from '../../errors/LockError';
import { AcquireOutcome, LockSession, LockStrategy, ReleaseOutcome } from '../../types';

/**
 * The part of an `mssql` request the lock strategy uses.
 */
export interface SqlLockRequest {
  input(name: string, type: ISqlType, value: string | number): unknown;
  execute(procedure: string): Promise<{ returnValue: unknown }>;
  query(command: string): Promise<{ recordset: unknown[] }>;
  cancel(): void;
}

/**
 * The part of an `mssql` connection pool the lock strategy uses.
 */
export interface SqlLockConnection {
  connect(): Promise<unknown>;
  close(): Promise<void>;
  request(): SqlLockRequest;
}

export type SqlLockConnectionFactory = () => SqlLockConnection;

const APPLOCK_FAILURES: Record<number, string> = {
  [constants.SQL_APPLOCK_RESULT.CANCELED]: 'the lock request was canceled',
  [constants.SQL_APPLOCK_RESULT.DEADLOCK_VICTIM]: 'the lock request was chosen as a deadlock victim',
  [constants.SQL_APPLOCK_RESULT.CALL_ERROR]: 'parameter validation or other call error',
};

/**
 * Lock strategy backed by SQL Server application locks (`sp_getapplock` with `@LockOwner = 'Session'`).
 *
 * @remarks
 * - Every session is a dedicated single-connection pool; the server releases the session's
 *   locks when that connection ends, including when the process dies.
 * - Grant inspection goes through a separate shared pool with `APPLOCK_TEST`.
 */
export class SqlServerLockStrategy implements LockStrategy {
  public readonly backend = 'mssql';

  private readonly logger: Logger;
  private readonly sessionConnectionFactory: SqlLockConnectionFactory;
  private readonly inspectionConnectionFactory: SqlLockConnectionFactory;

  /**
   * Lazily connected pool used by {@link isGranted} and {@link testConnection}.
   */
  private inspectionConnection: Promise<SqlLockConnection> | null = null;

  constructor(
    logger: Logger,
    sessionConnectionFactory: SqlLockConnectionFactory = () => SqlServerClientManager.createSessionPool(logger),
    inspectionConnectionFactory: SqlLockConnectionFactory = () => SqlServerClientManager.createInspectionPool(logger),
  ) {
    this.logger = logger;
    this.sessionConnectionFactory = sessionConnectionFactory;
    this.inspectionConnectionFactory = inspectionConnectionFactory;
  }

  createSession(): LockSession {
    return new SqlServerLockSession(this.sessionConnectionFactory, this.logger);
  }

  /**
   * Whether some session currently holds `resource`.
   * `APPLOCK_TEST` answers 0 when the exclusive lock could not be granted right now.
   */
  async isGranted(resource: string): Promise<boolean> {
    const request = (await this.getInspectionConnection()).request();
    request.input('Resource', NVarChar(constants.LOCK_KEY_MAX_LENGTH), resource);

    const result = await request.query(
      `SELECT APPLOCK_TEST('${constants.SQL_APPLOCK.DB_PRINCIPAL}', @Resource, ` +
        `'${constants.SQL_APPLOCK.LOCK_MODE}', '${constants.SQL_APPLOCK.LOCK_OWNER}') AS grantable`,
    );

    const row: unknown = result.recordset[0];
    if (typeof row !== 'object' || row === null || !('grantable' in row) || typeof row.grantable !== 'number') {
      throw new Error(`Unexpected APPLOCK_TEST result for '${resource}'`);
    }

    return row.grantable === 0;
  }

  /**
   * Runs a trivial query to prove the server is reachable with the configured credentials.
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await (await this.getInspectionConnection()).request().query('SELECT 1 AS ok');
      return result.recordset.length === 1;
    } catch (error) {
      this.logger.error(error, 'SQL Server connection test failed');
      this.inspectionConnection = null;
      return false;
    }
  }

  async close(): Promise<void> {
    const pending = this.inspectionConnection;
    this.inspectionConnection = null;
    if (pending) {
      await (await pending).close();
    }
  }

  private getInspectionConnection(): Promise<SqlLockConnection> {
    if (!this.inspectionConnection) {
      const connection = this.inspectionConnectionFactory();
      this.inspectionConnection = connection.connect().then(() => connection);
      this.inspectionConnection.catch(() => {
        this.inspectionConnection = null;
      });
    }

    return this.inspectionConnection;
  }
}

/**
 * One SQL Server connection used as a lock session.
 */
export class SqlServerLockSession implements LockSession {
  public readonly id: string = randomUUID();

  private connection: SqlLockConnection | null = null;

  private readonly connectionFactory: SqlLockConnectionFactory;
  private readonly logger: Logger;

  constructor(connectionFactory: SqlLockConnectionFactory, logger: Logger) {
    this.connectionFactory = connectionFactory;
    this.logger = logger;
  }

  get isOpen(): boolean {
    return this.connection !== null;
  }

  async open(signal?: AbortSignal): Promise<void> {
    if (this.connection) {
      return;
    }

    signal?.throwIfAborted();
    const connection = this.connectionFactory();

    try {
      await connection.connect();
      signal?.throwIfAborted();
    } catch (error) {
      await this.closeConnection(connection);
      throw error;
    }

    this.connection = connection;
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`SQL Server lock session ${this.id} opened`);
    }
  }

  /**
   * Calls `sp_getapplock`. An abort cancels the running request on the server.
   */
  async acquire(resource: string, timeoutMs: number, signal?: AbortSignal): Promise<AcquireOutcome> {
    if (signal?.aborted) {
      throw LockErrors.OPERATION_CANCELED(resource, signal.reason);
    }

    const request = this.requireOpen().request();
    request.input('Resource', NVarChar(constants.LOCK_KEY_MAX_LENGTH), resource);
    request.input('LockMode', VarChar(32), constants.SQL_APPLOCK.LOCK_MODE);
    request.input('LockOwner', VarChar(32), constants.SQL_APPLOCK.LOCK_OWNER);
    request.input('LockTimeout', Int(), timeoutMs);

    const onAbort = () => request.cancel();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await request.execute(constants.SQL_APPLOCK.GET_PROCEDURE);
      return SqlServerLockSession.toAcquireOutcome(result.returnValue);
    } catch (error) {
      if (signal?.aborted) {
        throw LockErrors.OPERATION_CANCELED(resource, signal.reason);
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async release(resource: string): Promise<ReleaseOutcome> {
    const request = this.requireOpen().request();
    request.input('Resource', NVarChar(constants.LOCK_KEY_MAX_LENGTH), resource);
    request.input('LockOwner', VarChar(32), constants.SQL_APPLOCK.LOCK_OWNER);

    const result = await request.execute(constants.SQL_APPLOCK.RELEASE_PROCEDURE);
    if (result.returnValue === constants.SQL_RELEASE_RESULT.RELEASED) {
      return { status: 'ok' };
    }

    return { status: 'error', detail: `${constants.SQL_APPLOCK.RELEASE_PROCEDURE} returned ${String(result.returnValue)}` };
  }

  async close(): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      return;
    }

    this.connection = null;
    await connection.close();
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`SQL Server lock session ${this.id} closed`);
    }
  }

  /**
   * Maps an `sp_getapplock` return value: 0 and 1 are grants, -1 is a timeout, anything else is an error.
   */
  static toAcquireOutcome(returnValue: unknown): AcquireOutcome {
    if (typeof returnValue !== 'number') {
      return {
        status: 'error',
        detail: `${constants.SQL_APPLOCK.GET_PROCEDURE} returned an unexpected value: ${String(returnValue)}`,
      };
    }

    if (returnValue >= constants.SQL_APPLOCK_RESULT.GRANTED) {
      return { status: 'granted' };
    }

    if (returnValue === constants.SQL_APPLOCK_RESULT.TIMEOUT) {
      return { status: 'timedOut' };
    }

    const reason = APPLOCK_FAILURES[returnValue] ?? 'unknown result';
    return { status: 'error', detail: `${constants.SQL_APPLOCK.GET_PROCEDURE} returned ${returnValue}: ${reason}` };
  }

  private requireOpen(): SqlLockConnection {
    if (!this.connection) {
      throw new Error(`Session ${this.id} is not open`);
    }

    return this.connection;
  }

  private async closeConnection(connection: SqlLockConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      this.logger.debug(error, `Failed to close SQL Server connection of session ${this.id}`);
    }
  }
}
