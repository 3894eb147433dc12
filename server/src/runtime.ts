/**
 * Process runtime
 *
 * Assembles the services from the environment once, for the HTTP server
 * and for the CLI. With DATABASE_URL the audit trail and inbox live in
 * Postgres; without it audit records go to AUDIT_LOG_PATH and there is
 * no inbox.
 */

import type { Env } from './config/env.js';
import { closeKysely, getKysely, type KyselyDB } from './db/index.js';
import { KyselyAuditStore, KyselyInboxStore } from './db/queries/index.js';
import { InboxPoller } from './services/inbox/inboxPoller.js';
import {
    createReconciliationServices,
    FileAuditStore,
    type ReconciliationServices,
} from './services/reconciliation/index.js';
import logger from './utils/logger.js';

export type { WorkflowOutcome } from './services/reconciliation/workflow.js';

export interface Runtime {
    env: Env;
    services: ReconciliationServices;
    db: KyselyDB | null;
    poller: InboxPoller | null;
    close(): Promise<void>;
}

export interface RuntimeOverrides {
    /** Poll batch size (defaults to POLL_BATCH_SIZE) */
    batchSize?: number;
    /** Poll interval (defaults to POLL_INTERVAL_MS) */
    intervalMs?: number;
}

export function createRuntime(env: Env, overrides: RuntimeOverrides = {}): Runtime {
    const db = env.DATABASE_URL ? getKysely(env.DATABASE_URL) : null;
    const auditStore = db ? new KyselyAuditStore(db) : new FileAuditStore(env.AUDIT_LOG_PATH);

    const services = createReconciliationServices({ config: env, auditStore });

    const poller = db
        ? new InboxPoller({
            store: new KyselyInboxStore(db),
            workflow: services.workflow,
            lotLock: services.lotLock,
            batchSize: overrides.batchSize ?? env.POLL_BATCH_SIZE,
            intervalMs: overrides.intervalMs ?? env.POLL_INTERVAL_MS,
            concurrency: env.POLL_CONCURRENCY,
        })
        : null;

    logger.debug({ database: db !== null, auditPath: db ? null : env.AUDIT_LOG_PATH }, 'Runtime created');

    return {
        env,
        services,
        db,
        poller,
        async close() {
            if (poller) {
                await poller.stop();
            }
            await closeKysely();
        },
    };
}
