/**
 * Schema migrations
 *
 * Applied with `lotrec migrate`. `production_inbox` is normally owned by the
 * capture side; it is created here only if missing so local setups work.
 */

import {
    Migrator,
    sql,
    type Kysely,
    type Migration,
    type MigrationProvider,
    type MigrationResult,
} from 'kysely';

export const MIGRATIONS: Record<string, Migration> = {
    '2026_01_01_001_production_inbox': {
        async up(db: Kysely<unknown>): Promise<void> {
            await db.schema
                .createTable('production_inbox')
                .ifNotExists()
                .addColumn('id', 'serial', (col) => col.primaryKey())
                .addColumn('lot_code', 'varchar(64)', (col) => col.notNull())
                .addColumn('quantity', 'numeric')
                .addColumn('unit_of_measure', 'varchar(32)')
                .addColumn('inserted_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
                .addColumn('processed_at', 'timestamptz')
                .addColumn('failure_reason', 'varchar(255)')
                .execute();

            await db.schema
                .createIndex('production_inbox_pending_idx')
                .ifNotExists()
                .on('production_inbox')
                .columns(['processed_at', 'inserted_at'])
                .execute();
        },
        async down(db: Kysely<unknown>): Promise<void> {
            await db.schema.dropTable('production_inbox').ifExists().execute();
        },
    },

    '2026_01_01_002_reconciliation_attempts': {
        async up(db: Kysely<unknown>): Promise<void> {
            await db.schema
                .createTable('reconciliation_attempts')
                .ifNotExists()
                .addColumn('id', 'uuid', (col) => col.primaryKey())
                .addColumn('lot_code', 'varchar(64)', (col) => col.notNull())
                .addColumn('order_number', 'varchar(64)')
                .addColumn('order_id', 'integer')
                .addColumn('requested_quantity', 'double precision', (col) => col.notNull())
                .addColumn('unit_of_measure', 'varchar(32)')
                .addColumn('status_before', 'varchar(20)')
                .addColumn('status_after', 'varchar(20)')
                .addColumn('succeeded', 'boolean', (col) => col.notNull())
                .addColumn('error_kind', 'varchar(20)')
                .addColumn('error_message', 'text')
                .addColumn('lookup_attempts', 'integer', (col) => col.notNull().defaultTo(0))
                .addColumn('update_attempts', 'integer', (col) => col.notNull().defaultTo(0))
                .addColumn('noop', 'boolean', (col) => col.notNull().defaultTo(false))
                .addColumn('source', 'varchar(10)', (col) => col.notNull())
                .addColumn('created_at', 'timestamptz', (col) => col.notNull())
                .execute();

            await db.schema
                .createIndex('reconciliation_attempts_lot_idx')
                .ifNotExists()
                .on('reconciliation_attempts')
                .columns(['lot_code', 'created_at'])
                .execute();
        },
        async down(db: Kysely<unknown>): Promise<void> {
            await db.schema.dropTable('reconciliation_attempts').ifExists().execute();
        },
    },
};

class InlineMigrationProvider implements MigrationProvider {
    async getMigrations(): Promise<Record<string, Migration>> {
        return MIGRATIONS;
    }
}

export interface MigrationRunResult {
    results: MigrationResult[];
    error: unknown;
}

export async function migrateToLatest<T>(db: Kysely<T>): Promise<MigrationRunResult> {
    const migrator = new Migrator({
        db,
        provider: new InlineMigrationProvider(),
    });
    const { error, results } = await migrator.migrateToLatest();
    return { results: results ?? [], error };
}
