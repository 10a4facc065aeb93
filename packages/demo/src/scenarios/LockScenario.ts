// SPDX-License-Identifier: Apache-2.0

import { LockBackend } from '@applock/config-service';
import { DistributedLockFactory } from '@applock/lock';
import { randomUUID } from 'crypto';
import { Logger } from 'pino';

import { stopwatch } from '../utils';

export type ScenarioStatus = 'passed' | 'failed' | 'skipped';

export interface ScenarioResult {
  name: string;
  status: ScenarioStatus;
  /**
   * Observations backing the status, in the order they were made.
   */
  details: string[];
  elapsedMs: number;
}

export interface ScenarioContext {
  factory: DistributedLockFactory;
  backend: LockBackend;
  logger: Logger;
}

/**
 * A demonstration of one property of the lock, run against a live backend.
 */
export abstract class LockScenario {
  abstract readonly name: string;
  abstract readonly description: string;

  /**
   * Runs the scenario. Unexpected errors fail it instead of propagating.
   */
  async run(context: ScenarioContext): Promise<ScenarioResult> {
    const logger = context.logger.child({ scenario: this.name });
    const details: string[] = [];
    const elapsed = stopwatch();

    logger.info(`Starting scenario ${this.name}: ${this.description}`);

    let status: ScenarioStatus;
    try {
      status = await this.execute({ ...context, logger }, details);
    } catch (error) {
      logger.error(error, `Scenario ${this.name} failed with an unexpected error`);
      details.push(`unexpected error: ${error instanceof Error ? error.message : String(error)}`);
      status = 'failed';
    }

    const elapsedMs = elapsed();
    for (const detail of details) {
      logger.info(`  ${detail}`);
    }
    if (status === 'failed') {
      logger.error(`Scenario ${this.name} failed after ${elapsedMs}ms`);
    } else {
      logger.info(`Scenario ${this.name} ${status} after ${elapsedMs}ms`);
    }

    return { name: this.name, status, details, elapsedMs };
  }

  protected abstract execute(context: ScenarioContext, details: string[]): Promise<ScenarioStatus>;

  /**
   * A key no earlier run has used.
   */
  protected uniqueKey(prefix: string): string {
    return `${prefix}_${randomUUID().replace(/-/g, '')}`.substring(0, 32);
  }

  /**
   * Records the outcome of one check and returns it.
   */
  protected check(details: string[], condition: boolean, passed: string, failed: string): boolean {
    details.push(condition ? passed : failed);
    return condition;
  }
}
