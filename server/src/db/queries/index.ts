/**
 * Kysely Query Exports
 */

// Inbox
export {
    KyselyInboxStore,
    selectPendingInboxQuery,
    markInboxProcessedQuery,
} from './inboxKysely.js';

// Audit trail
export {
    KyselyAuditStore,
    insertAttemptQuery,
    listAttemptsQuery,
    toAttemptRow,
    fromAttemptRow,
} from './reconciliationAttemptsKysely.js';
