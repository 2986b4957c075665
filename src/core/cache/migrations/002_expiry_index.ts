/**
 * Expiry Index
 *
 * Lookups filter on `expires_at` and sweeps delete by it.
 *
 * @module
 */

import type { Migration } from "../migration-runner.js";

export const migration: Migration = {
  version: 2,
  name: "expiry_index",
  description: "Indexes ai_cache.expires_at for sweeps and live-entry stats",

  up(db) {
    db.exec("CREATE INDEX IF NOT EXISTS idx_ai_cache_expires_at ON ai_cache (expires_at)");
  },

  down(db) {
    db.exec("DROP INDEX IF EXISTS idx_ai_cache_expires_at");
  },
};
