// SPDX-License-Identifier: Apache-2.0

import { ChildProcess, spawn } from 'child_process';
import { createInterface, Interface } from 'readline';
import { z } from 'zod';

import { TakeAndHoldEvent } from '../commands';
import { stopwatch } from '../utils';
import { LockScenario, ScenarioContext, ScenarioStatus } from './LockScenario';

export interface InterProcessOptions {
  /**
   * How long the child process holds the lock.
   */
  holdMs: number;
  /**
   * Largest accepted shortfall of the observed wait against `holdMs`.
   */
  toleranceMs: number;
  /**
   * How long the child gets to report its grant.
   */
  startupTimeoutMs: number;
  /**
   * Script the child process runs. Defaults to the entry script of this process.
   */
  entryScript?: string;
}

/**
 * Log line of a `take` child process, as far as this scenario reads it.
 */
const childEventSchema = z.object({
  event: z.string(),
  elapsedMs: z.number().optional(),
});

const parseLine = (line: string): unknown => {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
};

/**
 * A child process running `take` holds a key; this process must wait for the child to let go of it.
 */
export class InterProcessScenario extends LockScenario {
  readonly name = 'inter-process-mutual-exclusion';
  readonly description = 'a key held by another process stays unavailable here until that process releases it';

  private readonly options: InterProcessOptions;

  constructor(options: Partial<InterProcessOptions> = {}) {
    super();
    this.options = { holdMs: 5000, toleranceMs: 500, startupTimeoutMs: 15_000, ...options };
  }

  protected async execute({ factory, backend, logger }: ScenarioContext, details: string[]): Promise<ScenarioStatus> {
    if (backend === 'local') {
      details.push('the local backend cannot coordinate separate processes');
      return 'skipped';
    }

    const { holdMs, toleranceMs, startupTimeoutMs } = this.options;
    const entryScript = this.options.entryScript ?? process.argv[1];
    const key = this.uniqueKey('interprocess');

    logger.info(`Spawning a child process holding '${key}' for ${holdMs}ms`);
    const child = spawn(
      process.execPath,
      [...process.execArgv, entryScript, '--backend', backend, 'take', key, '--hold', String(holdMs)],
      {
        stdio: ['ignore', 'pipe', 'inherit'],
        env: { ...process.env, PRETTY_LOGS_ENABLED: 'false' },
      },
    );
    const childExited = new Promise<number | null>((resolve) => {
      child.once('exit', (code) => resolve(code));
    });
    const lines = createInterface({ input: child.stdout });

    try {
      await this.waitForChildEvent(child, lines, 'acquired', startupTimeoutMs);
      logger.info('Child process reported the grant, taking the same key here');

      const lock = factory.newLock(key);
      const elapsed = stopwatch();
      let waitedMs = 0;
      try {
        await lock.take({ timeoutMs: holdMs + startupTimeoutMs });
        waitedMs = elapsed();
      } finally {
        await lock.release();
      }
      logger.info(`Acquired the lock here after waiting ${waitedMs}ms`);

      const exitCode = await childExited;

      const checks = [
        this.check(
          details,
          waitedMs >= holdMs - toleranceMs,
          `waited ${waitedMs}ms for the child's ${holdMs}ms hold`,
          `acquired after ${waitedMs}ms while the child held the lock for ${holdMs}ms`,
        ),
        this.check(details, exitCode === 0, 'child process completed', `child process exited with code ${exitCode}`),
      ];

      return checks.every(Boolean) ? 'passed' : 'failed';
    } finally {
      lines.close();
      if (child.exitCode === null) {
        child.kill();
      }
    }
  }

  /**
   * Resolves once the child logs `event`; rejects if it exits, fails to start or stays silent for `timeoutMs`.
   */
  private waitForChildEvent(
    child: ChildProcess,
    lines: Interface,
    event: TakeAndHoldEvent,
    timeoutMs: number,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onLine = (line: string) => {
        const parsed = childEventSchema.safeParse(parseLine(line));
        if (parsed.success && parsed.data.event === event) {
          finish();
        }
      };
      const onExit = (code: number | null) => {
        finish(new Error(`child exited with code ${code} before reporting '${event}'`));
      };
      const onError = (error: Error) => {
        finish(new Error(`child process failed to start: ${error.message}`));
      };
      const timer = setTimeout(() => {
        finish(new Error(`child did not report '${event}' within ${timeoutMs}ms`));
      }, timeoutMs);

      const finish = (error?: Error) => {
        clearTimeout(timer);
        lines.off('line', onLine);
        child.off('exit', onExit);
        child.off('error', onError);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      lines.on('line', onLine);
      child.once('exit', onExit);
      child.once('error', onError);
    });
  }
}
