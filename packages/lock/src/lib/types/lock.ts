// SPDX-License-Identifier: Apache-2.0

import { LockBackend } from '@applock/config-service';

/**
 * Label of the backing lock service, used in logs and metrics.
 */
export type LockBackendLabel = LockBackend;

/**
 * Result of a bounded-wait acquire request sent to the lock service.
 */
export type AcquireOutcome = { status: 'granted' } | { status: 'timedOut' } | { status: 'error'; detail: string };

/**
 * Result of a release request sent to the lock service.
 */
export type ReleaseOutcome = { status: 'ok' } | { status: 'error'; detail: string };

/**
 * One connection to the backing lock service.
 * Every lock it is granted is owned by the session and ends with it.
 */
export interface LockSession {
  /**
   * Identifier of the session, unique per process.
   */
  readonly id: string;

  /**
   * Whether the connection is currently open.
   */
  readonly isOpen: boolean;

  /**
   * Opens the connection. Opening an open session is a no-op.
   * A closed session may be opened again, which yields a new connection.
   *
   * @param signal - aborts the connection attempt
   */
  open(signal?: AbortSignal): Promise<void>;

  /**
   * Requests the exclusive, session-owned lock on `resource`, waiting at most `timeoutMs`.
   * Driver and connection failures reject; service-level failures resolve with an `error` outcome.
   *
   * @param resource - the lock key
   * @param timeoutMs - maximum wait on the service side, 0 for a single try
   * @param signal - asks the session to cancel the in-flight request
   */
  acquire(resource: string, timeoutMs: number, signal?: AbortSignal): Promise<AcquireOutcome>;

  /**
   * Releases the session-owned lock on `resource`.
   */
  release(resource: string): Promise<ReleaseOutcome>;

  /**
   * Closes the connection, which releases every lock the session holds.
   * Closing a closed session is a no-op.
   */
  close(): Promise<void>;
}

/**
 * A backing lock service that hands out sessions.
 */
export interface LockStrategy {
  readonly backend: LockBackendLabel;

  /**
   * Creates a new, not yet opened session. Performs no I/O.
   */
  createSession(): LockSession;

  /**
   * Whether any session currently holds `resource`.
   */
  isGranted(resource: string): Promise<boolean>;

  /**
   * Whether the backing service is reachable. Never rejects.
   */
  testConnection(): Promise<boolean>;

  /**
   * Releases resources owned by the strategy itself (not its sessions).
   */
  close(): Promise<void>;
}

/**
 * Lifecycle of a {@link DistributedLock}.
 * `acquiring` is the in-flight part of `idle`; `released` is terminal.
 */
export type LockState = 'idle' | 'acquiring' | 'held' | 'released';

export interface TakeOptions {
  /**
   * Maximum time to wait for the lock. Defaults to `LOCK_DEFAULT_TIMEOUT_MS`.
   */
  timeoutMs?: number;

  /**
   * Aborts the attempt while it is in flight.
   */
  signal?: AbortSignal;
}
