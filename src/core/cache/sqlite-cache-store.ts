/**
 * SQLite Response Cache Store
 *
 * Persists validated model results in a single `ai_cache` table so repeated
 * requests for the same content skip the inference call. Each operation opens
 * its own connection and closes it on every exit path; concurrent writers
 * (including other processes sharing the file) are serialized by SQLite's
 * locking through `BEGIN IMMEDIATE` and the busy timeout.
 *
 * @module
 */

import Database from "better-sqlite3";
import * as path from "node:path";
import { ErrorCode, StorageFault } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { ensureDir } from "../../utils/index.js";
import { MigrationRunner } from "./migration-runner.js";
import { migrations } from "./migrations/index.js";
import type {
  CacheEntry,
  CacheStats,
  CachedRecord,
  CallTypeStats,
  ICacheStore,
} from "./interfaces/ICacheStore.js";

const logger = createLogger("cache-store");

// =============================================================================
// Types
// =============================================================================

export interface SqliteCacheStoreConfig {
  /** Path of the SQLite database file */
  dbPath: string;
  /** Entry lifetime in milliseconds */
  ttlMs: number;
  /** How long a connection waits on a locked database (default: 5000) */
  busyTimeoutMs?: number;
  /** Current time in epoch milliseconds (default: Date.now) */
  clock?: () => number;
}

interface EntryRow {
  id: number;
  call_type: string;
  content_hash: string;
  response: string;
  created_at: number;
  expires_at: number;
  hit_count: number;
}

interface CountsRow {
  total: number;
  active: number;
}

interface HitsRow {
  hits: number;
}

interface CallTypeRow {
  call_type: string;
  entries: number;
  hits: number;
}

type KeyParams = [callType: string, contentHash: string];

// =============================================================================
// Helpers
// =============================================================================

function isCachedRecord(value: unknown): value is CachedRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function shortHash(contentHash: string): string {
  return `${contentHash.slice(0, 12)}...`;
}

function parseStoredResponse(row: Pick<EntryRow, "response" | "call_type">): CachedRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(row.response);
  } catch (error) {
    throw new StorageFault("Stored response is not valid JSON", ErrorCode.STORAGE_READ_FAILED, {
      operation: "decode",
      callType: row.call_type,
      cause: String(error),
    });
  }
  if (!isCachedRecord(parsed)) {
    throw new StorageFault("Stored response is not a JSON object", ErrorCode.STORAGE_READ_FAILED, {
      operation: "decode",
      callType: row.call_type,
    });
  }
  return parsed;
}

// =============================================================================
// Store Implementation
// =============================================================================

/**
 * Cache store backed by a SQLite file.
 *
 * @example
 * ```typescript
 * const store = new SqliteCacheStore({ dbPath: ".cfg-lens/data/cache.sqlite", ttlMs: 24 * 3600_000 });
 * await store.initialize();
 *
 * await store.set("analyze_problem", hash, { requirements: [] });
 * const record = await store.get("analyze_problem", hash);
 * ```
 */
export class SqliteCacheStore implements ICacheStore {
  private readonly config: Required<SqliteCacheStoreConfig>;
  private initialized = false;

  constructor(config: SqliteCacheStoreConfig) {
    this.config = {
      dbPath: config.dbPath,
      ttlMs: config.ttlMs,
      busyTimeoutMs: config.busyTimeoutMs ?? 5000,
      clock: config.clock ?? Date.now,
    };
  }

  get ttlMs(): number {
    return this.config.ttlMs;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Creates the database directory and applies pending migrations.
   * Failures are logged; the store then misses on every lookup until a later
   * call succeeds.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      ensureDir(path.dirname(this.config.dbPath));
      const result = this.withConnection("initialize", (db) => {
        db.pragma("journal_mode = WAL");
        const runner = new MigrationRunner(db);
        runner.registerMigrations(migrations);
        return runner.migrate();
      });

      if (!result.success) {
        throw new StorageFault("Cache schema migration failed", ErrorCode.STORAGE_MIGRATION_FAILED, {
          operation: "initialize",
          fromVersion: result.fromVersion,
          toVersion: result.toVersion,
          cause: result.error?.message,
        });
      }

      this.initialized = true;
      logger.info(
        { dbPath: this.config.dbPath, ttlMs: this.config.ttlMs, applied: result.appliedMigrations },
        "Cache store initialized"
      );
    } catch (error) {
      logger.error({ err: error, dbPath: this.config.dbPath }, "Cache store initialization failed");
    }
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  async get(callType: string, contentHash: string): Promise<CachedRecord | null> {
    await this.initialize();

    try {
      const now = this.config.clock();
      const row = this.withConnection("get", (db) => {
        const select = db.prepare<[string, string, number], Pick<EntryRow, "id" | "response" | "call_type">>(
          `SELECT id, call_type, response FROM ai_cache
           WHERE call_type = ? AND content_hash = ? AND expires_at > ?`
        );
        const bump = db.prepare<[number]>("UPDATE ai_cache SET hit_count = hit_count + 1 WHERE id = ?");

        const lookup = db.transaction(() => {
          const found = select.get(callType, contentHash, now);
          if (found) bump.run(found.id);
          return found;
        });
        return lookup.immediate();
      });

      if (!row) {
        logger.debug({ callType, hash: shortHash(contentHash) }, "Cache miss");
        return null;
      }

      logger.debug({ callType, hash: shortHash(contentHash) }, "Cache hit");
      return parseStoredResponse(row);
    } catch (error) {
      logger.error({ err: error, callType, hash: shortHash(contentHash) }, "Cache lookup failed");
      return null;
    }
  }

  async set(callType: string, contentHash: string, record: CachedRecord): Promise<void> {
    await this.initialize();

    try {
      const serialized = JSON.stringify(record);
      const createdAt = this.config.clock();
      const expiresAt = createdAt + this.config.ttlMs;

      this.withConnection("set", (db) => {
        db.prepare<[string, string, string, number, number]>(
          `INSERT OR REPLACE INTO ai_cache
             (call_type, content_hash, response, created_at, expires_at, hit_count)
           VALUES (?, ?, ?, ?, ?, 0)`
        ).run(callType, contentHash, serialized, createdAt, expiresAt);
      });

      logger.debug(
        { callType, hash: shortHash(contentHash), ttlMs: this.config.ttlMs },
        "Cache store"
      );
    } catch (error) {
      logger.error({ err: error, callType, hash: shortHash(contentHash) }, "Cache write failed");
    }
  }

  async peek(callType: string, contentHash: string): Promise<CacheEntry | null> {
    await this.initialize();

    try {
      const row = this.withConnection("peek", (db) =>
        db
          .prepare<KeyParams, EntryRow>(
            `SELECT id, call_type, content_hash, response, created_at, expires_at, hit_count
             FROM ai_cache WHERE call_type = ? AND content_hash = ?`
          )
          .get(callType, contentHash)
      );
      if (!row) return null;

      return {
        callType: row.call_type,
        contentHash: row.content_hash,
        response: parseStoredResponse(row),
        createdAt: row.created_at,
        expiresAt: row.expires_at,
        hitCount: row.hit_count,
      };
    } catch (error) {
      logger.error({ err: error, callType, hash: shortHash(contentHash) }, "Cache peek failed");
      return null;
    }
  }

  async stats(): Promise<CacheStats> {
    await this.initialize();

    try {
      const now = this.config.clock();
      return this.withConnection("stats", (db) => {
        const counts = db.prepare<[number], CountsRow>(
          `SELECT COUNT(*) AS total,
                  COALESCE(SUM(CASE WHEN expires_at > ? THEN 1 ELSE 0 END), 0) AS active
           FROM ai_cache`
        );
        const hits = db.prepare<[number], HitsRow>(
          "SELECT COALESCE(SUM(hit_count), 0) AS hits FROM ai_cache WHERE expires_at > ?"
        );
        const byType = db.prepare<[number], CallTypeRow>(
          `SELECT call_type, COUNT(*) AS entries, COALESCE(SUM(hit_count), 0) AS hits
           FROM ai_cache WHERE expires_at > ?
           GROUP BY call_type ORDER BY hits DESC, call_type ASC`
        );

        // every figure from one snapshot
        const snapshot = db.transaction(() => ({
          counts: counts.get(now),
          hits: hits.get(now),
          byType: byType.all(now),
        }));
        const result = snapshot();

        const totalEntries = result.counts?.total ?? 0;
        const activeEntries = result.counts?.active ?? 0;
        const byCallType: CallTypeStats[] = result.byType.map((row) => ({
          callType: row.call_type,
          entries: row.entries,
          hits: row.hits,
        }));

        return {
          totalEntries,
          activeEntries,
          expiredEntries: totalEntries - activeEntries,
          totalHits: result.hits?.hits ?? 0,
          ttlMs: this.config.ttlMs,
          byCallType,
        };
      });
    } catch (error) {
      logger.error({ err: error }, "Cache stats failed");
      return {
        totalEntries: 0,
        activeEntries: 0,
        expiredEntries: 0,
        totalHits: 0,
        ttlMs: this.config.ttlMs,
        byCallType: [],
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  async sweep(): Promise<number> {
    await this.initialize();

    try {
      const now = this.config.clock();
      const removed = this.withConnection("sweep", (db) =>
        db.prepare<[number]>("DELETE FROM ai_cache WHERE expires_at <= ?").run(now).changes
      );
      if (removed > 0) {
        logger.info({ removed }, "Removed expired cache entries");
      }
      return removed;
    } catch (error) {
      logger.error({ err: error }, "Cache sweep failed");
      return 0;
    }
  }

  // ===========================================================================
  // Connection Scope
  // ===========================================================================

  /**
   * Runs `fn` against a fresh connection, closing it afterwards whether `fn`
   * returns or throws. Open failures surface as StorageFault.
   */
  private withConnection<T>(operation: string, fn: (db: Database.Database) => T): T {
    let db: Database.Database;
    try {
      db = new Database(this.config.dbPath, { timeout: this.config.busyTimeoutMs });
    } catch (error) {
      throw new StorageFault(`Cannot open cache database: ${String(error)}`, ErrorCode.STORAGE_UNAVAILABLE, {
        operation,
        dbPath: this.config.dbPath,
      });
    }

    try {
      return fn(db);
    } finally {
      db.close();
    }
  }
}
