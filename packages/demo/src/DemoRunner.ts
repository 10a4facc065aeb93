// SPDX-License-Identifier: Apache-2.0

import { Logger } from 'pino';

import { LockScenario, ScenarioContext, ScenarioResult } from './scenarios';

export interface DemoRunOptions {
  /**
   * Names of the scenarios to run. Runs all of them when empty or absent.
   */
  only?: readonly string[];
}

/**
 * Runs lock scenarios one after the other and reports how they went.
 */
export class DemoRunner {
  private readonly scenarios: readonly LockScenario[];
  private readonly logger: Logger;

  constructor(scenarios: readonly LockScenario[], logger: Logger) {
    this.scenarios = scenarios;
    this.logger = logger;
  }

  async run(context: Omit<ScenarioContext, 'logger'>, options: DemoRunOptions = {}): Promise<ScenarioResult[]> {
    const only = options.only ?? [];
    const selected = only.length > 0 ? this.scenarios.filter((s) => only.includes(s.name)) : this.scenarios;

    this.logger.info(`Running ${selected.length} scenario(s) against the ${context.backend} backend`);

    const results: ScenarioResult[] = [];
    for (const scenario of selected) {
      results.push(await scenario.run({ ...context, logger: this.logger }));
    }

    this.logSummary(results);
    return results;
  }

  static hasFailures(results: readonly ScenarioResult[]): boolean {
    return results.some((result) => result.status === 'failed');
  }

  private logSummary(results: readonly ScenarioResult[]): void {
    const count = (status: ScenarioResult['status']) => results.filter((r) => r.status === status).length;

    for (const { name, status, elapsedMs } of results) {
      this.logger.info(`  ${status.toUpperCase().padEnd(7)} ${name} (${elapsedMs}ms)`);
    }

    const summary = `${count('passed')} passed, ${count('failed')} failed, ${count('skipped')} skipped`;
    if (DemoRunner.hasFailures(results)) {
      this.logger.error(`Scenario summary: ${summary}`);
    } else {
      this.logger.info(`Scenario summary: ${summary}`);
    }
  }
}
