/**
 * Kysely Reconciliation Attempt Queries
 *
 * Append-only audit table. No update or delete statements exist for it.
 */

import { randomUUID } from 'node:crypto';
import {
    isMoStatus,
    normalizeLotCode,
    type AttemptSource,
    type NewReconciliationAttempt,
    type ReconciliationAttempt,
} from '@lotrec/shared';
import type { KyselyDB } from '../kysely.js';
import type { NewReconciliationAttemptRow, ReconciliationAttemptRow } from '../types.js';
import type { AuditQuery, AuditStore } from '../../services/reconciliation/auditLog.js';

const ATTEMPT_SOURCES: readonly AttemptSource[] = ['cli', 'poller', 'api'];

function toSource(value: string): AttemptSource {
    return ATTEMPT_SOURCES.find((source) => source === value) ?? 'cli';
}

export function toAttemptRow(id: string, attempt: NewReconciliationAttempt): NewReconciliationAttemptRow {
    return {
        id,
        lot_code: attempt.lotCode,
        order_number: attempt.orderNumber,
        order_id: attempt.orderId,
        requested_quantity: attempt.requestedQuantity,
        unit_of_measure: attempt.unitOfMeasure,
        status_before: attempt.statusBefore,
        status_after: attempt.statusAfter,
        succeeded: attempt.succeeded,
        error_kind: attempt.errorKind,
        error_message: attempt.errorMessage,
        lookup_attempts: attempt.lookupAttempts,
        update_attempts: attempt.updateAttempts,
        noop: attempt.noop,
        source: attempt.source,
        created_at: attempt.timestamp,
    };
}

export function fromAttemptRow(row: ReconciliationAttemptRow): ReconciliationAttempt {
    return {
        id: row.id,
        lotCode: row.lot_code,
        orderNumber: row.order_number,
        orderId: row.order_id,
        requestedQuantity: Number(row.requested_quantity),
        unitOfMeasure: row.unit_of_measure,
        statusBefore: isMoStatus(row.status_before) ? row.status_before : null,
        statusAfter: isMoStatus(row.status_after) ? row.status_after : null,
        succeeded: row.succeeded,
        errorKind: row.error_kind,
        errorMessage: row.error_message,
        lookupAttempts: row.lookup_attempts,
        updateAttempts: row.update_attempts,
        noop: row.noop,
        source: toSource(row.source),
        timestamp: row.created_at,
    };
}

export function insertAttemptQuery(db: KyselyDB, row: NewReconciliationAttemptRow) {
    return db.insertInto('reconciliation_attempts').values(row).returningAll();
}

export function listAttemptsQuery(db: KyselyDB, query: AuditQuery) {
    let builder = db.selectFrom('reconciliation_attempts').selectAll();
    if (query.lotCode) {
        const lotCode = normalizeLotCode(query.lotCode);
        builder = builder.where((eb) => eb(eb.fn<string>('upper', ['lot_code']), '=', lotCode));
    }
    return builder
        .orderBy('created_at', 'desc')
        .limit(query.limit);
}

export class KyselyAuditStore implements AuditStore {
    private readonly db: KyselyDB;

    constructor(db: KyselyDB) {
        this.db = db;
    }

    async append(attempt: NewReconciliationAttempt): Promise<ReconciliationAttempt> {
        const row = await insertAttemptQuery(this.db, toAttemptRow(randomUUID(), attempt)).executeTakeFirstOrThrow();
        return fromAttemptRow(row);
    }

    async list(query: AuditQuery): Promise<ReconciliationAttempt[]> {
        const rows = await listAttemptsQuery(this.db, query).execute();
        return rows.map(fromAttemptRow);
    }
}
