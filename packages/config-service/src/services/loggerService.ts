// SPDX-License-Identifier: Apache-2.0

import { ConfigKey } from './globalConfig';

export class LoggerService {
  public static readonly SENSITIVE_FIELDS: ConfigKey[] = ['SQL_PASSWORD'];

  public static readonly PASSWORD_PATTERN: RegExp = /(password|pwd)\s*=/i;

  /**
   * Hide sensitive information
   *
   * @param envName
   * @param envValue
   */
  static maskUpEnv(envName: string, envValue: unknown): string {
    const isSensitiveField: boolean = this.SENSITIVE_FIELDS.some((field) => field === envName);
    const isKnownSecret: boolean = typeof envValue === 'string' && this.PASSWORD_PATTERN.test(envValue);

    if ((isSensitiveField && envValue !== undefined) || isKnownSecret) {
      return `${envName} = **********`;
    }

    return `${envName} = ${envValue}`;
  }
}
