/**
 * Kysely Query Builder Configuration
 *
 * Usage:
 *   const db = createKysely(env.DATABASE_URL);
 *
 *   const pending = await db
 *     .selectFrom('production_inbox')
 *     .selectAll()
 *     .where('processed_at', 'is', null)
 *     .execute();
 */

import {
    DummyDriver,
    Kysely,
    PostgresAdapter,
    PostgresDialect,
    PostgresIntrospector,
    PostgresQueryCompiler,
} from 'kysely';
import pg from 'pg';
import type { DB } from './types.js';

/**
 * Type helper for Kysely instance
 * Use this when typing function parameters that accept a Kysely instance
 */
export type KyselyDB = Kysely<DB>;

export function createKysely(connectionString: string, maxConnections = 10): KyselyDB {
    return new Kysely<DB>({
        dialect: new PostgresDialect({
            pool: new pg.Pool({
                connectionString,
                max: maxConnections,
            }),
        }),
    });
}

/**
 * Postgres-flavoured instance that never connects; queries compile but
 * execute against an empty driver. Used to inspect generated SQL.
 */
export function createOfflineKysely(): KyselyDB {
    return new Kysely<DB>({
        dialect: {
            createAdapter: () => new PostgresAdapter(),
            createDriver: () => new DummyDriver(),
            createIntrospector: (db) => new PostgresIntrospector(db),
            createQueryCompiler: () => new PostgresQueryCompiler(),
        },
    });
}

export type { DB } from './types.js';
