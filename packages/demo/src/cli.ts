// SPDX-License-Identifier: Apache-2.0

import { GlobalConfig, LockBackend } from '@applock/config-service';
import {
  DistributedLockFactory,
  LockMetricsService,
  LockStrategy,
  LockStrategyFactory,
  RegistryFactory,
} from '@applock/lock';
import { Command, InvalidArgumentError, Option } from 'commander';
import { Logger } from 'pino';
import { z } from 'zod';

import { checkConnection, takeAndHold } from './commands';
import { DemoRunner } from './DemoRunner';
import { createDefaultScenarios, LockScenario, SCENARIO_NAMES } from './scenarios';

/**
 * What the commands need from the hosting process.
 */
export interface CliRuntime {
  logger: Logger;
  setExitCode(code: number): void;
  /**
   * Writes command output that is not a log line.
   */
  write(text: string): void;
  /**
   * Aborts a running `take` when it fires.
   */
  signal?: AbortSignal;
  /**
   * Scenario suite of the `scenarios` command. Defaults to every scenario with default timings.
   */
  scenarios?: () => LockScenario[];
}

interface GlobalOptions {
  backend?: LockBackend;
}

interface TakeCommandOptions {
  hold: number;
  timeout?: number;
}

interface ScenariosCommandOptions {
  only?: string[];
  metrics?: boolean;
}

const backendSchema = z.enum(GlobalConfig.LOCK_BACKENDS);
const millisecondsSchema = z.coerce.number().int().nonnegative();

const parseBackend = (value: string): LockBackend => {
  const parsed = backendSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${GlobalConfig.LOCK_BACKENDS.join(', ')}.`);
  }
  return parsed.data;
};

const parseMilliseconds = (value: string): number => {
  const parsed = millisecondsSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError('Expected a non-negative integer number of milliseconds.');
  }
  return parsed.data;
};

export const createProgram = (runtime: CliRuntime): Command => {
  const { logger } = runtime;
  const program = new Command();

  program
    .name('applock-demo')
    .description('Takes SQL Server application locks and runs the lock scenarios')
    .option('-b, --backend <backend>', 'lock service to use, overrides LOCK_BACKEND', parseBackend);

  const withLocks = async <T>(
    run: (strategy: LockStrategy, factory: DistributedLockFactory) => Promise<T>,
  ): Promise<T> => {
    const { backend } = program.opts<GlobalOptions>();
    const strategy = LockStrategyFactory.create(logger, backend);
    const factory = new DistributedLockFactory(strategy, logger.child({ name: 'distributed-lock' }), {
      metrics: new LockMetricsService(RegistryFactory.getInstance()),
    });

    try {
      return await run(strategy, factory);
    } finally {
      await strategy.close();
    }
  };

  program
    .command('take')
    .description('takes the lock on <key>, holds it and releases it')
    .argument('<key>', 'lock key')
    .option('--hold <ms>', 'how long to hold the lock', parseMilliseconds, 5000)
    .option('--timeout <ms>', 'how long to wait for the lock, defaults to LOCK_DEFAULT_TIMEOUT_MS', parseMilliseconds)
    .action(async (key: string, options: TakeCommandOptions) => {
      const succeeded = await withLocks((_, factory) =>
        takeAndHold(factory, logger, { key, holdMs: options.hold, timeoutMs: options.timeout, signal: runtime.signal }),
      );
      runtime.setExitCode(succeeded ? 0 : 1);
    });

  program
    .command('scenarios')
    .description('runs the lock scenarios against the selected backend')
    .addOption(new Option('--only <names...>', 'scenarios to run').choices(SCENARIO_NAMES))
    .option('--metrics', 'print the lock metrics once the scenarios are done')
    .action(async (options: ScenariosCommandOptions) => {
      const results = await withLocks((strategy, factory) => {
        const runner = new DemoRunner((runtime.scenarios ?? createDefaultScenarios)(), logger);
        return runner.run({ factory, backend: strategy.backend }, { only: options.only });
      });

      if (options.metrics) {
        runtime.write(await RegistryFactory.getInstance().metrics());
      }
      runtime.setExitCode(DemoRunner.hasFailures(results) ? 1 : 0);
    });

  program
    .command('check')
    .description('checks that the lock service is reachable')
    .action(async () => {
      const reachable = await withLocks((strategy) => checkConnection(strategy, logger));
      runtime.setExitCode(reachable ? 0 : 1);
    });

  return program;
};
