// SPDX-License-Identifier: Apache-2.0

export type LockErrorCode =
  | 'TIMEOUT_EXCEEDED'
  | 'OPERATION_CANCELED'
  | 'INVALID_STATE'
  | 'TRANSPORT_FAILURE'
  | 'INVALID_KEY'
  | 'INVALID_ARGUMENT';

export interface LockErrorArgs {
  code: LockErrorCode;
  message: string;
  key?: string;
  cause?: unknown;
}

export class LockError extends Error {
  public readonly code: LockErrorCode;
  public readonly key: string | undefined;

  constructor(args: LockErrorArgs) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = 'LockError';
    this.code = args.code;
    this.key = args.key;
    Object.setPrototypeOf(this, LockError.prototype);
  }

  public isTimeoutExceeded(): boolean {
    return this.code === 'TIMEOUT_EXCEEDED';
  }

  public isOperationCanceled(): boolean {
    return this.code === 'OPERATION_CANCELED';
  }

  public isInvalidState(): boolean {
    return this.code === 'INVALID_STATE';
  }

  public isTransportFailure(): boolean {
    return this.code === 'TRANSPORT_FAILURE';
  }
}

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause));

export const LockErrors = {
  TIMEOUT_EXCEEDED: (key: string, timeoutMs: number) =>
    new LockError({
      code: 'TIMEOUT_EXCEEDED',
      message: `Failed to acquire lock '${key}' within ${timeoutMs}ms.`,
      key,
    }),
  OPERATION_CANCELED: (key: string, reason?: unknown) =>
    new LockError({
      code: 'OPERATION_CANCELED',
      message: `Acquisition of lock '${key}' was canceled.`,
      key,
      cause: reason,
    }),
  INVALID_STATE: (key: string, state: string, operation: string) =>
    new LockError({
      code: 'INVALID_STATE',
      message: `Cannot ${operation} lock '${key}' in state '${state}'.`,
      key,
    }),
  TRANSPORT_FAILURE: (key: string, cause: unknown) =>
    new LockError({
      code: 'TRANSPORT_FAILURE',
      message: `Lock service failure for '${key}': ${describeCause(cause)}`,
      key,
      cause,
    }),
  INVALID_KEY: (key: string, reason: string) =>
    new LockError({
      code: 'INVALID_KEY',
      message: `Invalid lock key '${key}': ${reason}.`,
      key,
    }),
  INVALID_ARGUMENT: (name: string, reason: string) =>
    new LockError({
      code: 'INVALID_ARGUMENT',
      message: `Invalid argument '${name}': ${reason}.`,
    }),
};
