/**
 * Response Cache Module
 *
 * @module
 */

export * from "./interfaces/ICacheStore.js";
export { normalizeCode } from "./normalizer.js";
export { generateCacheKey, canonicalJson, KEY_PART_SEPARATOR } from "./cache-key.js";
export { SqliteCacheStore, type SqliteCacheStoreConfig } from "./sqlite-cache-store.js";
export { MigrationRunner, type Migration, type MigrationResult } from "./migration-runner.js";
export { migrations } from "./migrations/index.js";
