/**
 * Kysely Inbox Queries
 *
 * Pending rows are read oldest first; acknowledgement is conditional on
 * `processed_at IS NULL` so a row is acknowledged at most once.
 */

import type { KyselyDB } from '../kysely.js';
import type { InboxRow, InboxStore } from '../../services/inbox/inboxStore.js';

export function selectPendingInboxQuery(db: KyselyDB, limit: number) {
    return db
        .selectFrom('production_inbox')
        .select(['id', 'lot_code', 'quantity', 'unit_of_measure', 'inserted_at'])
        .where('processed_at', 'is', null)
        .orderBy('inserted_at', 'asc')
        .orderBy('id', 'asc')
        .limit(limit);
}

export function markInboxProcessedQuery(db: KyselyDB, id: number, failureReason: string | null, processedAt: Date) {
    return db
        .updateTable('production_inbox')
        .set({ processed_at: processedAt, failure_reason: failureReason })
        .where('id', '=', id)
        .where('processed_at', 'is', null);
}

export class KyselyInboxStore implements InboxStore {
    private readonly db: KyselyDB;
    private readonly now: () => Date;

    constructor(db: KyselyDB, now: () => Date = () => new Date()) {
        this.db = db;
        this.now = now;
    }

    async fetchPending(limit: number): Promise<InboxRow[]> {
        const rows = await selectPendingInboxQuery(this.db, limit).execute();
        return rows.map((row) => ({
            id: row.id,
            lotCode: row.lot_code,
            quantity: row.quantity,
            unitOfMeasure: row.unit_of_measure,
            insertedAt: row.inserted_at,
        }));
    }

    async markProcessed(id: number, failureReason: string | null): Promise<boolean> {
        const result = await markInboxProcessedQuery(this.db, id, failureReason, this.now()).executeTakeFirst();
        return Number(result.numUpdatedRows) > 0;
    }
}
