// SPDX-License-Identifier: Apache-2.0

export * from './DistributedLock';
export * from './DistributedLockFactory';
export * from './LocalLockStrategy';
export * from './LockMetricsService';
export * from './LockStrategyFactory';
export * from './SqlServerLockStrategy';
