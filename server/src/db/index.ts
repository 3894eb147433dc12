/**
 * Database access
 *
 * One pool per process, created on first use from DATABASE_URL.
 *
 * Usage:
 *   import { getKysely, closeKysely } from './db/index.js';
 */

import { createKysely, type KyselyDB } from './kysely.js';

let instance: KyselyDB | null = null;

export function getKysely(connectionString: string): KyselyDB {
    if (!instance) {
        instance = createKysely(connectionString);
    }
    return instance;
}

export async function closeKysely(): Promise<void> {
    if (instance) {
        const db = instance;
        instance = null;
        await db.destroy();
    }
}

export { createKysely, createOfflineKysely, type KyselyDB } from './kysely.js';
export type { DB } from './types.js';
export { migrateToLatest, MIGRATIONS, type MigrationRunResult } from './migrations.js';
