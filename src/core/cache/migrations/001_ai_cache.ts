/**
 * Response Cache Table
 *
 * One row per `(call_type, content_hash)`; timestamps are epoch milliseconds.
 *
 * @module
 */

import type { Migration } from "../migration-runner.js";

export const migration: Migration = {
  version: 1,
  name: "ai_cache",
  description: "Adds the model response cache table",

  up(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS ai_cache (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        call_type TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        response TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL,
        hit_count INTEGER NOT NULL DEFAULT 0,
        UNIQUE (call_type, content_hash)
      )
    `);
  },

  down(db) {
    db.exec("DROP TABLE IF EXISTS ai_cache");
  },
};
