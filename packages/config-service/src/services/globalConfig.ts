// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod';

/**
 * Integer env value with a default. Empty strings count as unset.
 */
const integerEnv = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(z.number().int().nonnegative().default(defaultValue));

/**
 * Boolean env value with a default. Only `true` and `false` are accepted.
 */
const booleanEnv = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => (v === undefined ? defaultValue : v === 'true'));

const optionalStringEnv = () =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === '' ? undefined : v));

export class GlobalConfig {
  public static readonly LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

  public static readonly LOCK_BACKENDS = ['local', 'mssql'] as const;

  /**
   * Every configuration key the project reads, with its parsing rule and default.
   */
  public static readonly SCHEMA = z.object({
    LOG_LEVEL: z.enum(GlobalConfig.LOG_LEVELS).default('info'),
    PRETTY_LOGS_ENABLED: booleanEnv(true),

    LOCK_BACKEND: z.enum(GlobalConfig.LOCK_BACKENDS).default('mssql'),
    LOCK_DEFAULT_TIMEOUT_MS: integerEnv(30_000),
    LOCK_ACQUIRE_GRACE_MS: integerEnv(1_000),

    SQL_SERVER_HOST: z.string().min(1).default('localhost'),
    SQL_SERVER_PORT: integerEnv(1433),
    SQL_DATABASE: z.string().min(1).default('master'),
    SQL_USER: optionalStringEnv(),
    SQL_PASSWORD: optionalStringEnv(),
    SQL_ENCRYPT: booleanEnv(true),
    SQL_TRUST_SERVER_CERTIFICATE: booleanEnv(false),
    SQL_CONNECT_TIMEOUT_MS: integerEnv(15_000),
    SQL_REQUEST_TIMEOUT_MS: integerEnv(15_000),
  });

  public static readonly KEYS = GlobalConfig.SCHEMA.keyof().options;
}

export type ConfigValues = z.output<typeof GlobalConfig.SCHEMA>;

export type ConfigKey = keyof ConfigValues;

export type LogLevel = (typeof GlobalConfig.LOG_LEVELS)[number];

export type LockBackend = (typeof GlobalConfig.LOCK_BACKENDS)[number];
