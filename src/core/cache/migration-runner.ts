/**
 * Schema Migration Runner
 *
 * Applies versioned schema migrations to the cache database. The current
 * version lives in SQLite's `user_version` pragma; every migration step runs
 * in its own transaction together with the version bump, so a failed step
 * leaves the previous version intact.
 *
 * @module
 */

import type Database from "better-sqlite3";

// =============================================================================
// Types
// =============================================================================

/**
 * Migration definition interface.
 * Each migration has an up (apply) and down (revert) function.
 */
export interface Migration {
  /** Migration version number (must be sequential) */
  version: number;
  /** Human-readable migration name */
  name: string;
  description?: string;
  up: (db: Database.Database) => void;
  down: (db: Database.Database) => void;
}

export interface MigrationResult {
  success: boolean;
  fromVersion: number;
  toVersion: number;
  /** Migrations that were applied, as `<version>_<name>` */
  appliedMigrations: string[];
  error?: Error;
}

// =============================================================================
// Migration Runner
// =============================================================================

/**
 * Manages cache schema migrations.
 *
 * @example
 * ```typescript
 * const runner = new MigrationRunner(db);
 * runner.registerMigrations(migrations);
 * const result = runner.migrate();
 * if (!result.success) throw result.error;
 * ```
 */
export class MigrationRunner {
  private migrations: Migration[] = [];

  constructor(private db: Database.Database) {}

  /**
   * Registers migrations to be managed by this runner.
   *
   * @throws Error if versions are not 1..n without gaps
   */
  registerMigrations(migrations: Migration[]): void {
    const sorted = [...migrations].sort((a, b) => a.version - b.version);

    sorted.forEach((migration, index) => {
      if (migration.version !== index + 1) {
        throw new Error(
          `Migration versions must be sequential. Expected version ${index + 1}, got ${migration.version}`
        );
      }
    });

    this.migrations = sorted;
  }

  get latestVersion(): number {
    return this.migrations.at(-1)?.version ?? 0;
  }

  getCurrentVersion(): number {
    const version = this.db.pragma("user_version", { simple: true });
    return typeof version === "number" ? version : 0;
  }

  /**
   * Migrates the database to the target version (defaults to latest).
   */
  migrate(targetVersion: number = this.latestVersion): MigrationResult {
    const currentVersion = this.getCurrentVersion();
    const appliedMigrations: string[] = [];

    if (currentVersion === targetVersion) {
      return { success: true, fromVersion: currentVersion, toVersion: targetVersion, appliedMigrations };
    }

    try {
      if (currentVersion < targetVersion) {
        const migrationsToApply = this.migrations.filter(
          (m) => m.version > currentVersion && m.version <= targetVersion
        );
        for (const migration of migrationsToApply) {
          this.runMigration(migration, "up");
          appliedMigrations.push(`${migration.version}_${migration.name}`);
        }
      } else {
        const migrationsToRevert = this.migrations
          .filter((m) => m.version <= currentVersion && m.version > targetVersion)
          .reverse();
        for (const migration of migrationsToRevert) {
          this.runMigration(migration, "down");
          appliedMigrations.push(`${migration.version}_${migration.name} (reverted)`);
        }
      }

      return { success: true, fromVersion: currentVersion, toVersion: targetVersion, appliedMigrations };
    } catch (error) {
      return {
        success: false,
        fromVersion: currentVersion,
        toVersion: this.getCurrentVersion(),
        appliedMigrations,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }

  /**
   * Rolls back the last applied migration.
   */
  rollback(): MigrationResult {
    const currentVersion = this.getCurrentVersion();
    if (currentVersion === 0) {
      return { success: true, fromVersion: 0, toVersion: 0, appliedMigrations: [] };
    }
    return this.migrate(currentVersion - 1);
  }

  private runMigration(migration: Migration, direction: "up" | "down"): void {
    const newVersion = direction === "up" ? migration.version : migration.version - 1;
    const step = this.db.transaction(() => {
      migration[direction](this.db);
      // pragma values cannot be bound as parameters
      this.db.pragma(`user_version = ${Math.trunc(newVersion)}`);
    });
    step.immediate();
  }
}
