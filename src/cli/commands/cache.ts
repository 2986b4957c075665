/**
 * cache commands - Inspect and prune the response cache
 */

import chalk from "chalk";
import { loadConfig } from "../../core/config/index.js";
import { SqliteCacheStore, type CacheStats } from "../../core/cache/index.js";

export interface CacheStatsOptions {
  json?: boolean;
}

function formatDuration(ms: number): string {
  const hours = ms / 3_600_000;
  return Number.isInteger(hours) ? `${hours}h` : `${(ms / 60_000).toFixed(1)}m`;
}

function printStats(dbPath: string, stats: CacheStats): void {
  console.log(chalk.bold("\nResponse cache\n"));
  console.log(`  ${chalk.dim("Database:")}  ${dbPath}`);
  console.log(`  ${chalk.dim("TTL:")}       ${formatDuration(stats.ttlMs)}`);
  console.log(`  ${chalk.dim("Entries:")}   ${stats.totalEntries} (${stats.activeEntries} live, ${stats.expiredEntries} expired)`);
  console.log(`  ${chalk.dim("Hits:")}      ${stats.totalHits}`);

  if (stats.byCallType.length > 0) {
    console.log(chalk.bold("\n  By call type"));
    for (const row of stats.byCallType) {
      console.log(`    ${row.callType.padEnd(20)} ${String(row.entries).padStart(6)} entries ${String(row.hits).padStart(6)} hits`);
    }
  }

  if (stats.error) {
    console.log(chalk.yellow(`\n  Cache unavailable: ${stats.error}`));
  }
  console.log();
}

export async function cacheStatsCommand(options: CacheStatsOptions): Promise<void> {
  const { cache } = loadConfig();
  const store = new SqliteCacheStore(cache);
  const stats = await store.stats();

  if (options.json) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }
  printStats(cache.dbPath, stats);
}

export async function cacheSweepCommand(): Promise<void> {
  const { cache } = loadConfig();
  const store = new SqliteCacheStore(cache);
  const removed = await store.sweep();

  console.log(
    removed > 0
      ? chalk.green(`Removed ${removed} expired cache ${removed === 1 ? "entry" : "entries"}.`)
      : chalk.dim("No expired cache entries.")
  );
}
