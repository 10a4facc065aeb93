// SPDX-License-Identifier: Apache-2.0

import { Logger } from 'pino';

import constants from '../../constants';
import { LockError, LockErrors } from '../../errors/LockError';
import { AcquireOutcome, LockBackendLabel, LockSession, LockState, TakeOptions } from '../../types';
import { LockAcquisitionStatus, LockMetricsService } from './LockMetricsService';

export interface DistributedLockOptions {
  backend: LockBackendLabel;
  logger: Logger;
  /**
   * Timeout used when `take`/`tryTake` get none.
   */
  defaultTimeoutMs: number;
  /**
   * Extra time the lock service gets to answer past the requested timeout
   * before the attempt is abandoned as a transport failure.
   */
  acquireGraceMs: number;
  metrics?: LockMetricsService;
}

/**
 * An acquire attempt in flight: its abort controller and a promise settling when the attempt has unwound.
 */
interface InFlightAttempt {
  controller: AbortController;
  settled: Promise<void>;
}

/**
 * Exclusive lock on one key, held by the backing lock service on behalf of one session.
 *
 * The instance owns its session for its whole life. The session is opened by the first acquire
 * attempt, closed after any failed attempt and closed for good on release. A grant is only valid
 * while the session lives, so closing the session is the backstop for every exit path.
 *
 * State machine: `idle → acquiring → held → released`; a failed attempt returns to `idle`;
 * releasing an `idle` lock goes straight to `released`. `released` is terminal.
 */
export class DistributedLock {
  public readonly key: string;

  private readonly session: LockSession;
  private readonly backend: LockBackendLabel;
  private readonly logger: Logger;
  private readonly metrics: LockMetricsService | undefined;
  private readonly defaultTimeoutMs: number;
  private readonly acquireGraceMs: number;

  private currentState: LockState = 'idle';
  private inFlight: InFlightAttempt | null = null;
  private acquiredAt: number | null = null;
  private releasing: Promise<void> | null = null;

  constructor(key: string, session: LockSession, options: DistributedLockOptions) {
    this.key = key;
    this.session = session;
    this.backend = options.backend;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.acquireGraceMs = options.acquireGraceMs;
  }

  get state(): LockState {
    return this.currentState;
  }

  get isHeld(): boolean {
    return this.currentState === 'held';
  }

  /**
   * Identifier of the session that owns (or will own) the lock.
   */
  get sessionId(): string {
    return this.session.id;
  }

  /**
   * Acquires the lock, waiting at most `timeoutMs`.
   *
   * @throws LockError `TIMEOUT_EXCEEDED` when the lock stays busy, `OPERATION_CANCELED` when `signal` aborts,
   *   `INVALID_STATE` unless the lock is idle, `TRANSPORT_FAILURE` for any other failure.
   */
  async take(options: TakeOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const acquired = await this.acquire('take', timeoutMs, options.signal);
    if (!acquired) {
      throw LockErrors.TIMEOUT_EXCEEDED(this.key, timeoutMs);
    }
  }

  /**
   * Same as {@link take}, but a busy lock resolves `false` instead of throwing.
   * Cancellation and every other failure still reject.
   */
  async tryTake(options: TakeOptions = {}): Promise<boolean> {
    return this.acquire('tryTake', options.timeoutMs ?? this.defaultTimeoutMs, options.signal);
  }

  /**
   * Releases the lock and closes the session. Safe to call any number of times.
   *
   * A held lock is released on the service first; a failure there is logged and ignored because closing
   * the session frees the lock anyway. An attempt still in flight is canceled first.
   */
  release(): Promise<void> {
    if (!this.releasing) {
      this.releasing = this.doRelease();
    }

    return this.releasing;
  }

  /**
   * Alias of {@link release} for scoped-resource call sites.
   */
  dispose(): Promise<void> {
    return this.release();
  }

  private async acquire(operation: 'take' | 'tryTake', timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.currentState !== 'idle' || this.releasing) {
      throw LockErrors.INVALID_STATE(this.key, this.currentState, operation);
    }

    if (!Number.isInteger(timeoutMs) || timeoutMs < 0) {
      throw LockErrors.INVALID_ARGUMENT('timeoutMs', `expected a non-negative integer, got ${timeoutMs}`);
    }
    const maxTimeoutMs = constants.MAX_TIMER_DELAY_MS - this.acquireGraceMs;
    if (timeoutMs > maxTimeoutMs) {
      throw LockErrors.INVALID_ARGUMENT('timeoutMs', `expected at most ${maxTimeoutMs}, got ${timeoutMs}`);
    }

    if (signal?.aborted) {
      this.metrics?.recordAcquisition(this.backend, 'cancelled');
      throw LockErrors.OPERATION_CANCELED(this.key, signal.reason);
    }

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    let markSettled: () => void = () => undefined;
    const settled = new Promise<void>((resolve) => {
      markSettled = () => resolve();
    });
    this.inFlight = { controller, settled };
    this.currentState = 'acquiring';
    this.metrics?.incrementWaitingAttempts(this.backend);
    const startTime = Date.now();

    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`Lock acquisition started: key=${this.key}, session=${this.session.id}, timeout=${timeoutMs}ms`);
    }

    try {
      await this.raceRemoteCall(this.session.open(controller.signal), controller.signal);
      const outcome = await this.raceRemoteCall(
        this.session.acquire(this.key, timeoutMs, controller.signal),
        controller.signal,
        timeoutMs + this.acquireGraceMs,
      );

      return await this.handleOutcome(outcome, startTime);
    } catch (error) {
      throw await this.failAttempt(error, controller, startTime);
    } finally {
      signal?.removeEventListener('abort', onCallerAbort);
      this.metrics?.decrementWaitingAttempts(this.backend);
      this.inFlight = null;
      markSettled();
    }
  }

  private async handleOutcome(outcome: AcquireOutcome, startTime: number): Promise<boolean> {
    const duration = Date.now() - startTime;

    switch (outcome.status) {
      case 'granted':
        this.currentState = 'held';
        this.acquiredAt = Date.now();
        this.recordAttempt('granted', duration);
        this.metrics?.incrementActiveCount(this.backend);
        if (this.logger.isLevelEnabled('debug')) {
          this.logger.debug(`Lock acquired: key=${this.key}, session=${this.session.id}, duration=${duration}ms`);
        }
        return true;

      case 'timedOut':
        this.recordAttempt('timeout', duration);
        await this.closeSession();
        this.currentState = 'idle';
        if (this.logger.isLevelEnabled('debug')) {
          this.logger.debug(`Lock acquisition timed out: key=${this.key}, duration=${duration}ms`);
        }
        return false;

      case 'error':
        throw new Error(outcome.detail);
    }
  }

  /**
   * Tears the attempt down and maps `error` to the error the caller gets.
   * The attempt is aborted before the session closes, so a request the service still runs is canceled first.
   */
  private async failAttempt(error: unknown, controller: AbortController, startTime: number): Promise<LockError> {
    const { signal } = controller;
    const canceled = signal.aborted || (error instanceof LockError && error.isOperationCanceled());
    const failure = canceled
      ? LockErrors.OPERATION_CANCELED(this.key, signal.reason)
      : error instanceof LockError && error.isTransportFailure()
        ? error
        : LockErrors.TRANSPORT_FAILURE(this.key, error);

    this.recordAttempt(canceled ? 'cancelled' : 'error', Date.now() - startTime);
    if (!signal.aborted) {
      controller.abort(failure);
    }
    await this.closeSession();
    this.currentState = 'idle';

    if (canceled) {
      if (this.logger.isLevelEnabled('debug')) {
        this.logger.debug(`Lock acquisition canceled: key=${this.key}, session=${this.session.id}`);
      }
    } else {
      this.logger.error(error, `Failed to acquire lock: key=${this.key}, session=${this.session.id}`);
    }

    return failure;
  }

  /**
   * Settles with `call`, unless `signal` aborts or `deadlineMs` passes first.
   * The remote side may keep working on an abandoned call; its late answer is only logged,
   * and the caller closes the session so that a late grant cannot outlive the attempt.
   */
  private raceRemoteCall<T>(call: Promise<T>, signal: AbortSignal, deadlineMs?: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let deadline: NodeJS.Timeout | undefined;

      const finish = (): boolean => {
        if (settled) {
          return false;
        }
        settled = true;
        clearTimeout(deadline);
        signal.removeEventListener('abort', onAbort);
        return true;
      };

      const onAbort = () => {
        if (finish()) {
          reject(LockErrors.OPERATION_CANCELED(this.key, signal.reason));
        }
      };

      if (deadlineMs !== undefined) {
        deadline = setTimeout(() => {
          if (finish()) {
            reject(
              LockErrors.TRANSPORT_FAILURE(this.key, new Error(`no answer from the lock service within ${deadlineMs}ms`)),
            );
          }
        }, deadlineMs);
      }

      signal.addEventListener('abort', onAbort, { once: true });
      if (signal.aborted) {
        onAbort();
      }

      call.then(
        (value) => {
          if (finish()) {
            resolve(value);
          } else if (this.logger.isLevelEnabled('debug')) {
            this.logger.debug({ lateResult: value }, `Ignoring late lock service answer: key=${this.key}`);
          }
        },
        (error: unknown) => {
          if (finish()) {
            reject(error);
          } else if (this.logger.isLevelEnabled('debug')) {
            this.logger.debug(error, `Ignoring late lock service failure: key=${this.key}`);
          }
        },
      );
    });
  }

  private async doRelease(): Promise<void> {
    const inFlight = this.inFlight;
    if (inFlight) {
      inFlight.controller.abort(new Error('lock released while acquiring'));
      await inFlight.settled;
    }

    const wasHeld = this.currentState === 'held';
    this.currentState = 'released';

    if (wasHeld) {
      await this.sendRelease();

      const holdTime = this.acquiredAt === null ? 0 : Date.now() - this.acquiredAt;
      this.metrics?.recordHoldDuration(this.backend, holdTime / 1000);
      this.metrics?.decrementActiveCount(this.backend);
      if (this.logger.isLevelEnabled('debug')) {
        this.logger.debug(`Lock released: key=${this.key}, session=${this.session.id}, held for ${holdTime}ms`);
      }
    }

    await this.closeSession();
  }

  private async sendRelease(): Promise<void> {
    try {
      const outcome = await this.session.release(this.key);
      if (outcome.status === 'error') {
        this.metrics?.recordReleaseFailure(this.backend);
        this.logger.warn(
          `Lock release rejected, closing the session frees it: key=${this.key}, session=${this.session.id}, detail=${outcome.detail}`,
        );
      }
    } catch (error) {
      this.metrics?.recordReleaseFailure(this.backend);
      this.logger.warn(error, `Failed to release lock, closing the session frees it: key=${this.key}, session=${this.session.id}`);
    }
  }

  private async closeSession(): Promise<void> {
    try {
      await this.session.close();
    } catch (error) {
      this.logger.warn(error, `Failed to close lock session: key=${this.key}, session=${this.session.id}`);
    }
  }

  private recordAttempt(status: LockAcquisitionStatus, durationMs: number): void {
    this.metrics?.recordAcquisition(this.backend, status);
    this.metrics?.recordWaitTime(this.backend, durationMs / 1000);
  }
}
