// SPDX-License-Identifier: Apache-2.0

import { CancellationHonouredScenario } from './CancellationHonouredScenario';
import { InterProcessScenario } from './InterProcessScenario';
import { LockScenario } from './LockScenario';
import { MutualExclusionScenario } from './MutualExclusionScenario';
import { SingleThreadHappyPathScenario } from './SingleThreadHappyPathScenario';
import { TimeoutRespectedScenario } from './TimeoutRespectedScenario';

export * from './CancellationHonouredScenario';
export * from './InterProcessScenario';
export * from './LockScenario';
export * from './MutualExclusionScenario';
export * from './SingleThreadHappyPathScenario';
export * from './TimeoutRespectedScenario';

export const SCENARIO_NAMES = [
  'single-thread-happy-path',
  'mutual-exclusion-threads',
  'timeout-respected',
  'cancellation-honoured',
  'inter-process-mutual-exclusion',
] as const;

/**
 * The scenario suite with default timings, in run order.
 */
export const createDefaultScenarios = (): LockScenario[] => [
  new SingleThreadHappyPathScenario(),
  new MutualExclusionScenario(),
  new TimeoutRespectedScenario(),
  new CancellationHonouredScenario(),
  new InterProcessScenario(),
];
