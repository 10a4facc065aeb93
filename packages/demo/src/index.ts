// SPDX-License-Identifier: Apache-2.0

import { createProgram } from './cli';
import { createLogger } from './logger';

export * from './cli';
export * from './commands';
export * from './DemoRunner';
export * from './scenarios';

async function main() {
  const logger = createLogger();
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('interrupted')));
  process.once('SIGTERM', () => controller.abort(new Error('terminated')));

  try {
    await createProgram({
      logger,
      signal: controller.signal,
      setExitCode: (code) => {
        process.exitCode = code;
      },
      write: (text) => process.stdout.write(text),
    }).parseAsync(process.argv);
  } catch (error) {
    logger.fatal(error);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
