// SPDX-License-Identifier: Apache-2.0

export { setTimeout as delay } from 'timers/promises';

/**
 * A promise resolved from the outside, once.
 */
export interface Signal {
  promise: Promise<void>;
  resolve: () => void;
}

export const createSignal = (): Signal => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = () => done();
  });

  return { promise, resolve };
};

/**
 * Milliseconds elapsed since the call, as a function.
 */
export const stopwatch = (): (() => number) => {
  const start = Date.now();
  return () => Date.now() - start;
};
