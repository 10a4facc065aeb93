// SPDX-License-Identifier: Apache-2.0

import { DistributedLockFactory, LocalLockStrategy } from '@applock/lock';
import { pino, Logger } from 'pino';
import { z } from 'zod';

const logEntrySchema = z
  .object({
    level: z.number(),
    msg: z.string().optional(),
    event: z.string().optional(),
    key: z.string().optional(),
  })
  .passthrough();

export type LogEntry = z.infer<typeof logEntrySchema>;

/**
 * A pino logger writing parsed entries into `entries`.
 */
export const createCapturingLogger = (): { logger: Logger; entries: LogEntry[] } => {
  const entries: LogEntry[] = [];
  const logger = pino(
    { level: 'info' },
    {
      write(line: string) {
        entries.push(logEntrySchema.parse(JSON.parse(line)));
      },
    },
  );

  return { logger, entries };
};

export const silentLogger = pino({ level: 'silent' });

/**
 * A lock factory over a fresh in-process lock table.
 */
export const createLocalFactory = (defaultTimeoutMs = 1000): DistributedLockFactory =>
  new DistributedLockFactory(new LocalLockStrategy(silentLogger), silentLogger, { defaultTimeoutMs, acquireGraceMs: 100 });
