/**
 * Kysely table types
 *
 * Column names are the SQL names (snake_case). Keep in sync with migrations.ts.
 */

import type { ColumnType, Generated, Insertable, Selectable } from 'kysely';

export interface ProductionInboxTable {
    id: Generated<number>;
    lot_code: string;
    /** numeric: pg returns strings */
    quantity: ColumnType<string | null, string | number | null, string | number | null>;
    unit_of_measure: string | null;
    inserted_at: ColumnType<Date, Date | string | undefined, never>;
    processed_at: ColumnType<Date | null, Date | string | null | undefined, Date | string | null>;
    failure_reason: string | null;
}

export interface ReconciliationAttemptsTable {
    id: string;
    lot_code: string;
    order_number: string | null;
    order_id: number | null;
    requested_quantity: number;
    unit_of_measure: string | null;
    status_before: string | null;
    status_after: string | null;
    succeeded: boolean;
    error_kind: string | null;
    error_message: string | null;
    lookup_attempts: number;
    update_attempts: number;
    noop: boolean;
    source: string;
    created_at: ColumnType<Date, Date | string, never>;
}

export interface DB {
    production_inbox: ProductionInboxTable;
    reconciliation_attempts: ReconciliationAttemptsTable;
}

export type ProductionInboxRow = Selectable<ProductionInboxTable>;
export type ReconciliationAttemptRow = Selectable<ReconciliationAttemptsTable>;
export type NewReconciliationAttemptRow = Insertable<ReconciliationAttemptsTable>;
