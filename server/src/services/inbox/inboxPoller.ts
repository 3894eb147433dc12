/**
 * Inbox Poller
 *
 * Background worker that feeds pending production events to the
 * reconciliation workflow and acknowledges each row exactly once.
 *
 * Protocol per row: process -> acknowledge. Runs never overlap, so a row is
 * fetched again only after the run that fetched it has finished with it.
 * Rows for the same lot code are serialized through the lot lock.
 */

import {
    createProductionEvent,
    producedQuantitySchema,
    type ProductionEvent,
} from '@lotrec/shared';
import { inboxLogger } from '../../utils/logger.js';
import { INBOX_FAILURE_REASON_MAX_LENGTH } from '../../config/index.js';
import type { LotLock } from '../../utils/lotLock.js';
import type { ReconciliationWorkflow } from '../reconciliation/workflow.js';
import type { InboxRow, InboxStore } from './inboxStore.js';

// ============================================
// TYPES
// ============================================

export interface InboxPollerOptions {
    store: InboxStore;
    workflow: ReconciliationWorkflow;
    lotLock: LotLock;
    batchSize: number;
    intervalMs: number;
    concurrency: number;
}

export interface PollRunResult {
    fetched: number;
    succeeded: number;
    failed: number;
    /** Left pending because processing was cancelled */
    deferred: number;
    /** Rows acknowledged by someone else first */
    alreadyAcknowledged: number;
    errors: number;
    skipped: boolean;
}

export interface InboxPollerStatus {
    running: boolean;
    polling: boolean;
    intervalMs: number;
    batchSize: number;
    concurrency: number;
    inFlight: number;
    lastRunAt: string | null;
    lastResult: PollRunResult | null;
}

function emptyResult(skipped = false): PollRunResult {
    return { fetched: 0, succeeded: 0, failed: 0, deferred: 0, alreadyAcknowledged: 0, errors: 0, skipped };
}

export function truncateFailureReason(reason: string): string {
    return reason.length > INBOX_FAILURE_REASON_MAX_LENGTH
        ? reason.slice(0, INBOX_FAILURE_REASON_MAX_LENGTH)
        : reason;
}

/**
 * Unparseable quantities become NaN so the workflow rejects the event
 * (and audits it) without touching the ERP.
 */
export function inboxRowToEvent(row: InboxRow): ProductionEvent {
    const quantity = producedQuantitySchema.safeParse(row.quantity);
    return createProductionEvent(
        row.lotCode,
        quantity.success ? quantity.data : Number.NaN,
        row.unitOfMeasure,
        row.insertedAt
    );
}

// ============================================
// POLLER
// ============================================

export class InboxPoller {
    private readonly options: InboxPollerOptions;
    private timer: NodeJS.Timeout | null = null;
    private isRunning = false;
    private currentRun: Promise<PollRunResult> | null = null;
    private abortController = new AbortController();
    /** Rows of the current run still being processed; reported by getStatus */
    private readonly inFlight = new Set<number>();
    private lastRunAt: Date | null = null;
    private lastResult: PollRunResult | null = null;

    constructor(options: InboxPollerOptions) {
        this.options = options;
    }

    /**
     * One poll run. Overlapping runs are skipped.
     */
    async pollOnce(limit: number = this.options.batchSize): Promise<PollRunResult> {
        if (this.isRunning) {
            inboxLogger.info('Already running, skipping');
            return emptyResult(true);
        }

        this.isRunning = true;
        const run = this.runBatch(limit);
        this.currentRun = run;
        try {
            const result = await run;
            this.lastRunAt = new Date();
            this.lastResult = result;
            return result;
        } finally {
            this.isRunning = false;
            this.currentRun = null;
        }
    }

    start(): void {
        if (this.timer) {
            inboxLogger.info('Already started');
            return;
        }
        if (this.abortController.signal.aborted) {
            this.abortController = new AbortController();
        }

        inboxLogger.info({ intervalSeconds: this.options.intervalMs / 1000 }, 'Starting inbox poller');

        // Run immediately on start
        this.pollOnce().catch((err: unknown) => {
            inboxLogger.error({ err }, 'Initial poll error');
        });

        this.timer = setInterval(() => {
            this.pollOnce().catch((err: unknown) => {
                inboxLogger.error({ err }, 'Interval poll error');
            });
        }, this.options.intervalMs);
    }

    /**
     * Stop polling, cancel pending retry delays and wait for in-flight rows.
     */
    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        this.abortController.abort();

        if (this.currentRun) {
            try {
                await this.currentRun;
            } catch (err) {
                inboxLogger.error({ err }, 'Poll run failed during shutdown');
            }
        }
        inboxLogger.info('Stopped');
    }

    getStatus(): InboxPollerStatus {
        return {
            running: this.timer !== null,
            polling: this.isRunning,
            intervalMs: this.options.intervalMs,
            batchSize: this.options.batchSize,
            concurrency: this.options.concurrency,
            inFlight: this.inFlight.size,
            lastRunAt: this.lastRunAt ? this.lastRunAt.toISOString() : null,
            lastResult: this.lastResult,
        };
    }

    // ============================================
    // INTERNALS
    // ============================================

    private async runBatch(limit: number): Promise<PollRunResult> {
        const result = emptyResult();
        const rows = await this.options.store.fetchPending(limit);
        result.fetched = rows.length;
        if (rows.length === 0) {
            return result;
        }

        for (const row of rows) {
            this.inFlight.add(row.id);
        }
        inboxLogger.info({ count: rows.length }, 'Found pending production events');

        // Process in chunks to control concurrency
        const { concurrency } = this.options;
        for (let i = 0; i < rows.length; i += concurrency) {
            const chunk = rows.slice(i, i + concurrency);
            await Promise.allSettled(chunk.map((row) => this.processRow(row, result)));
        }

        inboxLogger.info(
            { fetched: result.fetched, succeeded: result.succeeded, failed: result.failed, deferred: result.deferred },
            'Poll batch completed'
        );
        return result;
    }

    private async processRow(row: InboxRow, result: PollRunResult): Promise<void> {
        const log = inboxLogger.child({ inboxId: row.id, lotCode: row.lotCode });
        try {
            const event = inboxRowToEvent(row);
            const signal = this.abortController.signal;
            const outcome = await this.options.lotLock.runExclusive(row.lotCode, 'poller', () =>
                this.options.workflow.run(event, { source: 'poller', signal })
            );

            if (outcome.failure?.kind === 'cancelled') {
                // Picked up again on the next run; the update step is idempotent
                result.deferred++;
                log.info('Processing cancelled, row left pending');
                return;
            }

            const failureReason = outcome.state === 'logged' ? null : truncateFailureReason(outcome.message);
            const acknowledged = await this.options.store.markProcessed(row.id, failureReason);
            if (!acknowledged) {
                result.alreadyAcknowledged++;
                log.warn('Row was already acknowledged');
            }

            if (outcome.state === 'logged') {
                result.succeeded++;
            } else {
                result.failed++;
            }
        } catch (error) {
            result.errors++;
            const message = error instanceof Error ? error.message : 'Unknown error';
            log.error({ error: message }, 'Failed to process inbox row');
        } finally {
            this.inFlight.delete(row.id);
        }
    }
}
