// SPDX-License-Identifier: Apache-2.0

export default {
  /**
   * Longest resource name sp_getapplock accepts.
   */
  LOCK_KEY_MAX_LENGTH: 255,

  LOCK_KEY_SEPARATOR: ':',

  /**
   * Longest delay a Node.js timer honours; `@LockTimeout` is an INT of the same range.
   */
  MAX_TIMER_DELAY_MS: 2_147_483_647,

  /**
   * Driver-level request timeout of a lock session connection.
   * Lock waits are bounded by @LockTimeout and the client grace timer instead.
   */
  SQL_SESSION_REQUEST_TIMEOUT_MS: 2_147_483_647,

  SQL_APPLOCK: {
    GET_PROCEDURE: 'sp_getapplock',
    RELEASE_PROCEDURE: 'sp_releaseapplock',
    LOCK_MODE: 'Exclusive',
    LOCK_OWNER: 'Session',
    DB_PRINCIPAL: 'public',
  },

  // sp_getapplock return codes
  SQL_APPLOCK_RESULT: {
    GRANTED: 0,
    TIMEOUT: -1,
    CANCELED: -2,
    DEADLOCK_VICTIM: -3,
    CALL_ERROR: -999,
  },

  // sp_releaseapplock return codes
  SQL_RELEASE_RESULT: {
    RELEASED: 0,
  },
};
