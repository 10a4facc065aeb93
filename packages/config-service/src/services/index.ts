// SPDX-License-Identifier: Apache-2.0

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import pino, { Logger } from 'pino';

import { ConfigKey, ConfigValues, GlobalConfig } from './globalConfig';
import { LoggerService } from './loggerService';
import { ValidationService } from './validationService';

export class ConfigService {
  /**
   * Name of the dotenv file looked up from the working directory upwards.
   */
  private static readonly envFileName: string = '.env';

  private static instance: ConfigService | undefined;

  private readonly logger: Logger;

  /**
   * Parsed and typed configuration values.
   */
  private envs: ConfigValues;

  private constructor() {
    const envFile = ConfigService.findEnvFile(process.cwd());
    if (envFile) {
      dotenv.config({ path: envFile });
    }

    this.envs = ValidationService.parse(process.env);
    this.logger = pino({ name: 'config-service', level: this.envs.LOG_LEVEL });

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`Loaded configuration${envFile ? ` (env file: ${envFile})` : ''}`);
      for (const key of GlobalConfig.KEYS) {
        this.logger.debug(LoggerService.maskUpEnv(key, this.envs[key]));
      }
    }
  }

  /**
   * Walks up from `dir` until a dotenv file is found.
   */
  private static findEnvFile(dir: string): string | undefined {
    const candidate = path.join(dir, this.envFileName);
    if (fs.existsSync(candidate)) {
      return candidate;
    }

    const parent = path.dirname(dir);
    return parent === dir ? undefined : this.findEnvFile(parent);
  }

  private static getInstance(): ConfigService {
    if (!this.instance) {
      this.instance = new ConfigService();
    }

    return this.instance;
  }

  /**
   * Re-reads `process.env`. Used after environment overrides.
   */
  private reload(): void {
    this.envs = ValidationService.parse(process.env);
  }

  /**
   * Get a typed configuration value.
   *
   * @param name - the configuration key
   */
  public static get<K extends ConfigKey>(name: K): ConfigValues[K] {
    return this.getInstance().envs[name];
  }
}

export * from './globalConfig';
export { LoggerService } from './loggerService';
export { ValidationService } from './validationService';
