// ===========================================
// SNAPSHOT STORE - MODULE INDEX
// ===========================================

import { createPool } from '../../utils/database.js';
import { logger } from '../../utils/logger.js';
import { MemoryTokenStore } from './memory-store.js';
import { PgTokenStore } from './pg-store.js';
import type { TokenStore } from './types.js';

export type { TokenStore } from './types.js';
export { MemoryTokenStore } from './memory-store.js';
export { PgTokenStore, buildTokenQuery } from './pg-store.js';
export { MonitoredTokenStore, type StoreHealth } from './monitored-store.js';
export { applyQuery, ageHours, matchesFilters } from './query.js';

export function createTokenStore(databaseUrl: string | null): TokenStore {
  if (!databaseUrl) {
    logger.warn('DATABASE_URL not set, using in-memory token store');
    return new MemoryTokenStore();
  }
  return new PgTokenStore(createPool(databaseUrl));
}
