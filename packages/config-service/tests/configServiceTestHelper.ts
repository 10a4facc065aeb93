// SPDX-License-Identifier: Apache-2.0

import { ConfigKey, ConfigService } from '../src/services';

export class ConfigServiceTestHelper {
  /**
   * Overrides a single environment value and makes ConfigService pick it up.
   * `undefined` removes the variable so the default applies.
   */
  static dynamicOverride(name: ConfigKey, value: string | number | boolean | undefined): void {
    const previous = process.env[name];
    this.setEnv(name, value);

    try {
      ConfigService['getInstance']()['reload']();
    } catch (error) {
      // an invalid value must not outlive the failed override
      this.setEnv(name, previous);
      throw error;
    }
  }

  static remove(name: ConfigKey): void {
    this.dynamicOverride(name, undefined);
  }

  private static setEnv(name: ConfigKey, value: string | number | boolean | undefined): void {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = String(value);
    }
  }
}
