// SPDX-License-Identifier: Apache-2.0

export { SqlServerClientManager } from './lib/clients/sqlServerClientManager';
export { default as constants } from './lib/constants';
export * from './lib/errors/LockError';
export { RegistryFactory } from './lib/factories/registryFactory';
export * from './lib/services/lockService';
export * from './lib/types';
