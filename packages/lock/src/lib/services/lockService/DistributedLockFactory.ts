// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@applock/config-service';
import { Logger } from 'pino';

import constants from '../../constants';
import { LockErrors } from '../../errors/LockError';
import { LockStrategy, TakeOptions } from '../../types';
import { DistributedLock } from './DistributedLock';
import { LockMetricsService } from './LockMetricsService';

export interface DistributedLockFactoryOptions {
  metrics?: LockMetricsService;
  /**
   * Defaults to `LOCK_DEFAULT_TIMEOUT_MS`.
   */
  defaultTimeoutMs?: number;
  /**
   * Defaults to `LOCK_ACQUIRE_GRACE_MS`.
   */
  acquireGraceMs?: number;
}

/**
 * Creates {@link DistributedLock} instances, each with a fresh session of the given strategy.
 */
export class DistributedLockFactory {
  private readonly strategy: LockStrategy;
  private readonly logger: Logger;
  private readonly options: DistributedLockFactoryOptions;

  constructor(strategy: LockStrategy, logger: Logger, options: DistributedLockFactoryOptions = {}) {
    this.strategy = strategy;
    this.logger = logger;
    this.options = options;
  }

  /**
   * Composes the key of an entity record: `{entityName}:{id}`.
   */
  static composeKey(entityName: string, id: number): string {
    if (entityName.trim() === '') {
      throw LockErrors.INVALID_KEY(entityName, 'entity name cannot be empty or whitespace');
    }
    if (!Number.isSafeInteger(id)) {
      throw LockErrors.INVALID_KEY(`${entityName}${constants.LOCK_KEY_SEPARATOR}${id}`, 'id must be an integer');
    }

    return `${entityName}${constants.LOCK_KEY_SEPARATOR}${id}`;
  }

  /**
   * Creates an idle lock on `key`. No I/O happens until the lock is taken.
   */
  newLock(key: string): DistributedLock;
  /**
   * Creates an idle lock on the record `id` of `entityName`.
   */
  newLock(entityName: string, id: number): DistributedLock;
  newLock(keyOrEntityName: string, id?: number): DistributedLock {
    const key = id === undefined ? keyOrEntityName : DistributedLockFactory.composeKey(keyOrEntityName, id);
    DistributedLockFactory.validateKey(key);

    return new DistributedLock(key, this.strategy.createSession(), {
      backend: this.strategy.backend,
      logger: this.logger,
      metrics: this.options.metrics,
      defaultTimeoutMs: this.options.defaultTimeoutMs ?? ConfigService.get('LOCK_DEFAULT_TIMEOUT_MS'),
      acquireGraceMs: this.options.acquireGraceMs ?? ConfigService.get('LOCK_ACQUIRE_GRACE_MS'),
    });
  }

  /**
   * Creates a lock on `key` and takes it. On failure the lock's session is already closed.
   */
  async newLockAndTake(key: string, options?: TakeOptions): Promise<DistributedLock> {
    const lock = this.newLock(key);
    await lock.take(options);

    return lock;
  }

  /**
   * Runs `fn` while holding the lock on `key`. The lock is released when `fn` settles, whether it resolves or throws.
   */
  async runExclusive<T>(key: string, fn: (lock: DistributedLock) => Promise<T> | T, options?: TakeOptions): Promise<T> {
    const lock = await this.newLockAndTake(key, options);
    try {
      return await fn(lock);
    } finally {
      await lock.release();
    }
  }

  /**
   * Whether any session currently holds `key` on the backing service.
   */
  isGranted(key: string): Promise<boolean> {
    return this.strategy.isGranted(key);
  }

  private static validateKey(key: string): void {
    if (key.length === 0) {
      throw LockErrors.INVALID_KEY(key, 'key cannot be empty');
    }
    if (key.length > constants.LOCK_KEY_MAX_LENGTH) {
      throw LockErrors.INVALID_KEY(key, `key cannot be longer than ${constants.LOCK_KEY_MAX_LENGTH} characters`);
    }
  }
}
