// SPDX-License-Identifier: Apache-2.0

import { Mutex, MutexInterface } from 'async-mutex';
import { randomUUID } from 'crypto';
import { Logger } from 'pino';

import { LockErrors } from '../../errors/LockError';
import { AcquireOutcome, LockSession, LockStrategy, ReleaseOutcome } from '../../types';

/**
 * Represents the internal state of the lock table for a given resource.
 */
export interface LocalLockEntry {
  mutex: Mutex;
  owner: string | null;
  holdCount: number;
  acquiredAt: number | null;
  releaser: MutexInterface.Releaser | null;
  waiters: number;
}

/**
 * Implements an in-process lock service with the semantics of a session-scoped
 * application lock: exclusive grants owned by a session, bounded waits and
 * release of every grant when the owning session closes.
 *
 * Each resource gets its own mutex. Entries are dropped once nobody holds or waits for them.
 * It coordinates the sessions of one process only.
 */
export class LocalLockStrategy implements LockStrategy {
  public readonly backend = 'local';

  /**
   * Lock table, keyed by resource.
   */
  private readonly lockEntries = new Map<string, LocalLockEntry>();

  private readonly logger: Logger;

  /**
   * Creates a new LocalLockStrategy instance.
   *
   * @param logger - The logger
   */
  constructor(logger: Logger) {
    this.logger = logger;
  }

  createSession(): LockSession {
    return new LocalLockSession(this);
  }

  async isGranted(resource: string): Promise<boolean> {
    return this.getOwner(resource) !== null;
  }

  /**
   * Session currently holding `resource`, or null.
   */
  getOwner(resource: string): string | null {
    return this.lockEntries.get(resource)?.owner ?? null;
  }

  async testConnection(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // sessions own every grant; nothing to free here
  }

  /**
   * Waits for the exclusive lock on `resource` on behalf of `sessionId`.
   *
   * Resolves `timedOut` once `timeoutMs` elapses and rejects with a cancellation error when `signal` aborts.
   * When `sessionLifetime` aborts (the session closed) the wait ends with an `error` outcome.
   * A grant arriving after the wait ended is released immediately and never recorded.
   */
  acquireForSession(
    sessionId: string,
    resource: string,
    timeoutMs: number,
    sessionLifetime: AbortSignal,
    signal?: AbortSignal,
  ): Promise<AcquireOutcome> {
    const entry = this.getOrCreateEntry(resource);

    if (entry.owner === sessionId) {
      entry.holdCount++;
      return Promise.resolve({ status: 'granted' });
    }

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`Waiting for local lock ${resource}: session=${sessionId}, timeout=${timeoutMs}ms`);
    }

    entry.waiters++;

    return new Promise<AcquireOutcome>((resolve, reject) => {
      let settled = false;

      const settle = (finish: () => void): boolean => {
        if (settled) {
          return false;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        sessionLifetime.removeEventListener('abort', onSessionClosed);
        entry.waiters--;
        finish();
        return true;
      };

      const onAbort = () => {
        settle(() => reject(LockErrors.OPERATION_CANCELED(resource, signal?.reason)));
        this.dropIfUnused(resource, entry);
      };
      const onSessionClosed = () => {
        settle(() => resolve({ status: 'error', detail: `session ${sessionId} closed while waiting` }));
        this.dropIfUnused(resource, entry);
      };
      const timer = setTimeout(() => {
        settle(() => resolve({ status: 'timedOut' }));
        this.dropIfUnused(resource, entry);
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      sessionLifetime.addEventListener('abort', onSessionClosed, { once: true });
      if (signal?.aborted) {
        onAbort();
        return;
      }

      entry.mutex.acquire().then(
        (releaser) => {
          const granted = settle(() => {
            entry.owner = sessionId;
            entry.holdCount = 1;
            entry.acquiredAt = Date.now();
            entry.releaser = releaser;
            resolve({ status: 'granted' });
          });

          if (!granted) {
            releaser();
            this.dropIfUnused(resource, entry);
          }
        },
        (error: unknown) => {
          settle(() => reject(error));
        },
      );
    });
  }

  /**
   * Releases one hold of `sessionId` on `resource`.
   */
  releaseForSession(sessionId: string, resource: string): ReleaseOutcome {
    const entry = this.lockEntries.get(resource);
    if (!entry || entry.owner !== sessionId) {
      return { status: 'error', detail: `lock '${resource}' is not held by session ${sessionId}` };
    }

    entry.holdCount--;
    if (entry.holdCount === 0) {
      this.doRelease(resource, entry);
    }

    return { status: 'ok' };
  }

  /**
   * Releases every lock held by `sessionId`, whatever its hold count.
   */
  releaseSession(sessionId: string): void {
    for (const [resource, entry] of [...this.lockEntries]) {
      if (entry.owner === sessionId) {
        this.doRelease(resource, entry);
      }
    }
  }

  /**
   * Retrieve an existing lock entry for the given resource, or create a new one if it doesn't exist.
   */
  private getOrCreateEntry(resource: string): LocalLockEntry {
    let entry = this.lockEntries.get(resource);
    if (!entry) {
      entry = {
        mutex: new Mutex(),
        owner: null,
        holdCount: 0,
        acquiredAt: null,
        releaser: null,
        waiters: 0,
      };
      this.lockEntries.set(resource, entry);
    }

    return entry;
  }

  /**
   * Resets the entry and releases its mutex to the next waiter.
   */
  private doRelease(resource: string, entry: LocalLockEntry): void {
    if (this.logger.isLevelEnabled('debug')) {
      const holdTime = entry.acquiredAt === null ? 0 : Date.now() - entry.acquiredAt;
      this.logger.debug(`Releasing local lock ${resource} held by session ${entry.owner} for ${holdTime}ms.`);
    }

    const releaser = entry.releaser;
    entry.owner = null;
    entry.holdCount = 0;
    entry.acquiredAt = null;
    entry.releaser = null;
    releaser?.();

    this.dropIfUnused(resource, entry);
  }

  private dropIfUnused(resource: string, entry: LocalLockEntry): void {
    if (entry.owner === null && entry.waiters === 0 && this.lockEntries.get(resource) === entry) {
      this.lockEntries.delete(resource);
    }
  }
}

/**
 * A session on a {@link LocalLockStrategy}. Opening and closing are instantaneous.
 */
export class LocalLockSession implements LockSession {
  public readonly id: string = randomUUID();

  /**
   * Aborted when the session closes; null while closed.
   */
  private lifetime: AbortController | null = null;

  constructor(private readonly strategy: LocalLockStrategy) {}

  get isOpen(): boolean {
    return this.lifetime !== null;
  }

  async open(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (!this.lifetime) {
      this.lifetime = new AbortController();
    }
  }

  async acquire(resource: string, timeoutMs: number, signal?: AbortSignal): Promise<AcquireOutcome> {
    const lifetime = this.requireOpen();
    return this.strategy.acquireForSession(this.id, resource, timeoutMs, lifetime.signal, signal);
  }

  async release(resource: string): Promise<ReleaseOutcome> {
    this.requireOpen();
    return this.strategy.releaseForSession(this.id, resource);
  }

  async close(): Promise<void> {
    const lifetime = this.lifetime;
    if (!lifetime) {
      return;
    }

    this.lifetime = null;
    lifetime.abort();
    this.strategy.releaseSession(this.id);
  }

  private requireOpen(): AbortController {
    if (!this.lifetime) {
      throw new Error(`Session ${this.id} is not open`);
    }

    return this.lifetime;
  }
}
