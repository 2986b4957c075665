/**
 * Migration Registry
 *
 * Exports all cache migrations in order. Add new migrations here.
 *
 * @module
 */

import type { Migration } from "../migration-runner.js";
import { migration as migration001 } from "./001_ai_cache.js";
import { migration as migration002 } from "./002_expiry_index.js";

/**
 * All registered migrations in version order.
 */
export const migrations: Migration[] = [migration001, migration002];
