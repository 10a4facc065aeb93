// SPDX-License-Identifier: Apache-2.0

import { Counter, Gauge, Histogram, Registry } from 'prom-client';

import { LockBackendLabel } from '../../types';

/**
 * Status label values for lock acquisition metrics.
 */
export type LockAcquisitionStatus = 'granted' | 'timeout' | 'cancelled' | 'error';

const DURATION_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60];

/**
 * Service responsible for managing all lock-related metrics.
 * Provides a centralized place for metric definitions and recording methods.
 */
export class LockMetricsService {
  /**
   * Histogram tracking time spent waiting for the service to answer an acquire request.
   * High values indicate contention.
   */
  private readonly waitTimeHistogram: Histogram;

  /**
   * Histogram tracking time a lock is held from acquisition to release.
   */
  private readonly holdDurationHistogram: Histogram;

  /**
   * Gauge tracking acquire requests currently in flight.
   */
  private readonly waitingAttemptsGauge: Gauge;

  /**
   * Counter tracking lock acquisition attempts by outcome.
   */
  private readonly acquisitionsCounter: Counter;

  /**
   * Counter tracking release requests the service rejected or never answered.
   * The session teardown still frees those locks.
   */
  private readonly releaseFailuresCounter: Counter;

  /**
   * Gauge tracking currently held locks.
   */
  private readonly activeCountGauge: Gauge;

  constructor(register: Registry) {
    // Remove existing metrics if they exist (for hot reloading scenarios)
    const metricNames = [
      'applock_lock_wait_time_seconds',
      'applock_lock_hold_duration_seconds',
      'applock_lock_waiting_attempts',
      'applock_lock_acquisitions_total',
      'applock_lock_release_failures_total',
      'applock_lock_active_count',
    ];
    metricNames.forEach((name) => register.removeSingleMetric(name));

    this.waitTimeHistogram = new Histogram({
      name: 'applock_lock_wait_time_seconds',
      help: 'Time waiting for the lock service to answer an acquire request. High values indicate contention.',
      labelNames: ['backend'],
      buckets: DURATION_BUCKETS,
      registers: [register],
    });

    this.holdDurationHistogram = new Histogram({
      name: 'applock_lock_hold_duration_seconds',
      help: 'Time a lock is held from acquisition to release.',
      labelNames: ['backend'],
      buckets: DURATION_BUCKETS,
      registers: [register],
    });

    this.waitingAttemptsGauge = new Gauge({
      name: 'applock_lock_waiting_attempts',
      help: 'Acquire requests currently waiting on the lock service.',
      labelNames: ['backend'],
      registers: [register],
    });

    this.acquisitionsCounter = new Counter({
      name: 'applock_lock_acquisitions_total',
      help: 'Lock acquisition attempts. Status: granted, timeout, cancelled, error.',
      labelNames: ['backend', 'status'],
      registers: [register],
    });

    this.releaseFailuresCounter = new Counter({
      name: 'applock_lock_release_failures_total',
      help: 'Release requests that failed. The lock is still freed when its session closes.',
      labelNames: ['backend'],
      registers: [register],
    });

    this.activeCountGauge = new Gauge({
      name: 'applock_lock_active_count',
      help: 'Currently held locks.',
      labelNames: ['backend'],
      registers: [register],
    });
  }

  /**
   * Records the time spent waiting for an acquire request to be answered.
   *
   * @param backend - The lock backend.
   * @param seconds - The wait time in seconds.
   */
  recordWaitTime(backend: LockBackendLabel, seconds: number): void {
    this.waitTimeHistogram.labels(backend).observe(seconds);
  }

  /**
   * Records the duration a lock was held.
   *
   * @param backend - The lock backend.
   * @param seconds - The hold duration in seconds.
   */
  recordHoldDuration(backend: LockBackendLabel, seconds: number): void {
    this.holdDurationHistogram.labels(backend).observe(seconds);
  }

  incrementWaitingAttempts(backend: LockBackendLabel): void {
    this.waitingAttemptsGauge.labels(backend).inc();
  }

  decrementWaitingAttempts(backend: LockBackendLabel): void {
    this.waitingAttemptsGauge.labels(backend).dec();
  }

  /**
   * Records the outcome of a lock acquisition attempt.
   *
   * @param backend - The lock backend.
   * @param status - The acquisition outcome.
   */
  recordAcquisition(backend: LockBackendLabel, status: LockAcquisitionStatus): void {
    this.acquisitionsCounter.labels(backend, status).inc();
  }

  recordReleaseFailure(backend: LockBackendLabel): void {
    this.releaseFailuresCounter.labels(backend).inc();
  }

  incrementActiveCount(backend: LockBackendLabel): void {
    this.activeCountGauge.labels(backend).inc();
  }

  decrementActiveCount(backend: LockBackendLabel): void {
    this.activeCountGauge.labels(backend).dec();
  }
}
