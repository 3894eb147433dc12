/**
 * Audit Log
 *
 * One append-only record per processing attempt. A failed write is logged
 * and reported to the caller; it never undoes the remote update.
 */

import type { NewReconciliationAttempt, ReconciliationAttempt } from '@lotrec/shared';
import { auditLogger } from '../../utils/logger.js';

export interface AuditQuery {
    lotCode?: string;
    limit: number;
}

export interface AuditStore {
    append(attempt: NewReconciliationAttempt): Promise<ReconciliationAttempt>;
    /** Newest first */
    list(query: AuditQuery): Promise<ReconciliationAttempt[]>;
}

export class AuditLog {
    private readonly store: AuditStore;

    constructor(store: AuditStore) {
        this.store = store;
    }

    /**
     * @returns the stored record, or null when the store rejected it
     */
    async record(attempt: NewReconciliationAttempt): Promise<ReconciliationAttempt | null> {
        try {
            const saved = await this.store.append(attempt);
            auditLogger.info(
                {
                    attemptId: saved.id,
                    lotCode: saved.lotCode,
                    orderNumber: saved.orderNumber,
                    succeeded: saved.succeeded,
                    errorKind: saved.errorKind,
                },
                'Reconciliation attempt recorded'
            );
            return saved;
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Unknown error';
            auditLogger.error({ error: message, attempt }, 'Failed to record reconciliation attempt');
            return null;
        }
    }

    list(query: AuditQuery): Promise<ReconciliationAttempt[]> {
        return this.store.list(query);
    }
}
