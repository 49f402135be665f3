/**
 * Shared Database Package
 * Pool construction, transactions and pg error helpers.
 */

export * from './pool';
export * from './transactions';
export * from './errors';
export * from './jsonb';
