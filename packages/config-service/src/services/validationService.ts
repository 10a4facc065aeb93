// SPDX-License-Identifier: Apache-2.0

import { ZodError } from 'zod';

import { ConfigValues, GlobalConfig } from './globalConfig';

export class ValidationService {
  /**
   * Parses the raw environment into typed configuration values.
   * Throws an error listing every invalid key when parsing fails.
   *
   * @param envs - raw environment, usually `process.env`
   */
  static parse(envs: NodeJS.ProcessEnv): ConfigValues {
    const parsed = GlobalConfig.SCHEMA.safeParse(envs);
    if (!parsed.success) {
      throw new Error(`Invalid configuration: ${ValidationService.describeIssues(parsed.error)}`);
    }

    return parsed.data;
  }

  static describeIssues(error: ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }
}
