// SPDX-License-Identifier: Apache-2.0

import { ConfigKey, GlobalConfig } from '@applock/config-service';
import { Registry } from 'prom-client';

import { ConfigServiceTestHelper } from '../../config-service/tests/configServiceTestHelper';

type EnvOverrides = Partial<Record<ConfigKey, string | number | boolean | undefined>>;

const applyOverrides = (envs: EnvOverrides): Partial<Record<ConfigKey, string>> => {
  const previous: Partial<Record<ConfigKey, string>> = {};
  for (const key of GlobalConfig.KEYS) {
    if (key in envs) {
      previous[key] = process.env[key];
      ConfigServiceTestHelper.dynamicOverride(key, envs[key]);
    }
  }
  return previous;
};

const restoreOverrides = (previous: Partial<Record<ConfigKey, string>>): void => {
  for (const key of GlobalConfig.KEYS) {
    if (key in previous) {
      ConfigServiceTestHelper.dynamicOverride(key, previous[key]);
    }
  }
};

/**
 * Overrides environment values for every test of the enclosing `describe`.
 */
export const overrideEnvsInMochaDescribe = (envs: EnvOverrides): void => {
  let previous: Partial<Record<ConfigKey, string>> = {};

  before(() => {
    previous = applyOverrides(envs);
  });

  after(() => {
    restoreOverrides(previous);
  });
};

/**
 * Declares the tests of `tests` in a block that runs with the given environment values.
 */
export const withOverriddenEnvsInMochaTest = (envs: EnvOverrides, tests: () => void): void => {
  const description = Object.entries(envs)
    .map(([name, value]) => `${name}=${String(value)}`)
    .join(', ');

  describe(`with ${description}`, function () {
    overrideEnvsInMochaDescribe(envs);
    tests();
  });
};

export const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Value of a counter or gauge sample matching `labels`, 0 when absent.
 */
export const getMetricValue = async (
  registry: Registry,
  metricName: string,
  labels: Record<string, string> = {},
): Promise<number> => {
  const metric = (await registry.getMetricsAsJSON()).find((m) => m.name === metricName);
  const sample = metric?.values.find((v) => Object.entries(labels).every(([key, val]) => v.labels[key] === val));

  return sample?.value ?? 0;
};

/**
 * Number of observations of a histogram matching `labels`, 0 when absent.
 */
export const getHistogramCount = async (
  registry: Registry,
  metricName: string,
  labels: Record<string, string> = {},
): Promise<number> => {
  const metric = (await registry.getMetricsAsJSON()).find((m) => m.name === metricName);
  const sample = metric?.values.find(
    (v) =>
      'metricName' in v &&
      v.metricName === `${metricName}_count` &&
      Object.entries(labels).every(([key, val]) => v.labels[key] === val),
  );

  return sample?.value ?? 0;
};

/**
 * Sum of the observations of a histogram matching `labels`, 0 when absent.
 */
export const getHistogramSum = async (
  registry: Registry,
  metricName: string,
  labels: Record<string, string> = {},
): Promise<number> => {
  const metric = (await registry.getMetricsAsJSON()).find((m) => m.name === metricName);
  const sample = metric?.values.find(
    (v) =>
      'metricName' in v &&
      v.metricName === `${metricName}_sum` &&
      Object.entries(labels).every(([key, val]) => v.labels[key] === val),
  );

  return sample?.value ?? 0;
};
