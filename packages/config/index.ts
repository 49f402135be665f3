/**
 * Configuration Package
 *
 * All environment-derived settings. Modules read values at import time;
 * secrets are read through functions so they are never captured in frozen objects.
 */

export * from './env';
export * from './schema';
export * from './jobs';
export * from './database';
export * from './api';
