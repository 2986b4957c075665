/**
 * Response Cache Store Interface
 *
 * Durable, TTL-bounded mapping from `(callType, contentHash)` to a
 * previously computed record. Every operation absorbs storage faults:
 * an unavailable cache behaves as a cache that always misses.
 */

/**
 * A JSON-serializable record as stored in the cache
 */
export type CachedRecord = Record<string, unknown>;

/**
 * One row of the cache table
 */
export interface CacheEntry {
  callType: string;
  /** 64-character lowercase hex digest */
  contentHash: string;
  response: CachedRecord;
  /** Epoch milliseconds */
  createdAt: number;
  /** Epoch milliseconds; the entry is live while `now < expiresAt` */
  expiresAt: number;
  hitCount: number;
}

export interface CallTypeStats {
  callType: string;
  entries: number;
  hits: number;
}

/**
 * Aggregate view of the cache for administrative inspection
 */
export interface CacheStats {
  totalEntries: number;
  activeEntries: number;
  expiredEntries: number;
  /** Hits accumulated by live entries */
  totalHits: number;
  ttlMs: number;
  /** Live entries only, ordered by hits (descending) */
  byCallType: CallTypeStats[];
  /** Present when the store could not be read */
  error?: string;
}

export interface ICacheStore {
  /**
   * Prepare the backing storage (schema migrations). Safe to call twice.
   */
  initialize(): Promise<void>;

  /**
   * Return the stored record for a live entry and count the hit, or null
   * when the entry is absent, expired or unreadable.
   */
  get(callType: string, contentHash: string): Promise<CachedRecord | null>;

  /**
   * Store or replace an entry with a fresh TTL and a zero hit count.
   */
  set(callType: string, contentHash: string, record: CachedRecord): Promise<void>;

  /**
   * Read a raw entry, live or expired, without counting a hit
   */
  peek(callType: string, contentHash: string): Promise<CacheEntry | null>;

  stats(): Promise<CacheStats>;

  /**
   * Delete every expired entry and return how many were removed
   */
  sweep(): Promise<number>;
}
