/**
 * Reconciliation Workflow
 *
 * Takes one production event to one terminal outcome:
 *
 *   captured -> resolving -> resolved -> updating -> updated -> logged
 *                    \            \           \          \
 *                     `------------`-----------`----------`--> failed
 *
 * Lookup and update each run under the retry policy. Every terminal outcome
 * is written to the audit log before `run` returns.
 */

import type { Logger } from 'pino';
import {
    WorkflowStateTracker,
    describeReconciliationFailure,
    reconciliationFailure,
    validateProductionEvent,
    type AttemptSource,
    type MoStatus,
    type ProductionEvent,
    type ReconciliationFailure,
    type RemoteOrder,
    type RetryPolicyConfig,
    type WorkflowState,
} from '@lotrec/shared';
import { reconciliationLogger } from '../../utils/logger.js';
import type { Sleep } from '../../utils/sleep.js';
import type { AuditLog } from './auditLog.js';
import type { OrderLookup } from './orderLookup.js';
import type { OrderUpdate } from './orderUpdate.js';
import { runWithRetry } from './retry.js';

// ============================================
// TYPES
// ============================================

export interface WorkflowOutcome {
    state: Extract<WorkflowState, 'logged' | 'failed'>;
    history: WorkflowState[];
    event: ProductionEvent;
    order: RemoteOrder | null;
    statusBefore: MoStatus | null;
    failure: ReconciliationFailure | null;
    lookupAttempts: number;
    updateAttempts: number;
    noop: boolean;
    auditRecorded: boolean;
    attemptId: string | null;
    /** One line for operators */
    message: string;
}

export interface WorkflowRunOptions {
    source: AttemptSource;
    signal?: AbortSignal;
}

export interface ReconciliationWorkflowDeps {
    lookup: OrderLookup;
    update: OrderUpdate;
    audit: AuditLog;
    retryPolicy: RetryPolicyConfig;
    sleep?: Sleep;
    now?: () => Date;
}

interface StepProgress {
    order: RemoteOrder | null;
    statusBefore: MoStatus | null;
    failure: ReconciliationFailure | null;
    failedStep: 'validation' | 'lookup' | 'update' | null;
    lookupAttempts: number;
    updateAttempts: number;
    noop: boolean;
}

// ============================================
// WORKFLOW
// ============================================

export class ReconciliationWorkflow {
    private readonly deps: ReconciliationWorkflowDeps;
    private readonly now: () => Date;

    constructor(deps: ReconciliationWorkflowDeps) {
        this.deps = deps;
        this.now = deps.now ?? (() => new Date());
    }

    async run(event: ProductionEvent, options: WorkflowRunOptions): Promise<WorkflowOutcome> {
        const tracker = new WorkflowStateTracker();
        const log = reconciliationLogger.child({ lotCode: event.lotCode, source: options.source });
        log.info({ quantity: event.producedQuantity, unitOfMeasure: event.unitOfMeasure }, 'Processing production event');

        const progress = await this.execute(event, options, tracker, log);

        const saved = await this.deps.audit.record({
            lotCode: event.lotCode,
            orderNumber: progress.order?.orderNumber ?? null,
            orderId: progress.order?.orderId ?? null,
            requestedQuantity: event.producedQuantity,
            unitOfMeasure: event.unitOfMeasure,
            statusBefore: progress.statusBefore,
            statusAfter: progress.failure ? null : progress.order?.status ?? null,
            succeeded: progress.failure === null,
            errorKind: progress.failure?.kind ?? null,
            errorMessage: progress.failure?.message ?? null,
            lookupAttempts: progress.lookupAttempts,
            updateAttempts: progress.updateAttempts,
            noop: progress.noop,
            source: options.source,
            timestamp: this.now(),
        });

        // The remote update stands even when the audit write failed
        if (tracker.state === 'updated') {
            tracker.transition('logged');
        }

        const state = tracker.state === 'logged' ? 'logged' : 'failed';
        const message = this.describe(progress);

        if (progress.failure) {
            log.warn(
                { kind: progress.failure.kind, code: progress.failure.code, step: progress.failedStep },
                message
            );
        } else {
            log.info({ orderNumber: progress.order?.orderNumber, noop: progress.noop }, message);
        }

        return {
            state,
            history: [...tracker.history],
            event,
            order: progress.order,
            statusBefore: progress.statusBefore,
            failure: progress.failure,
            lookupAttempts: progress.lookupAttempts,
            updateAttempts: progress.updateAttempts,
            noop: progress.noop,
            auditRecorded: saved !== null,
            attemptId: saved?.id ?? null,
            message,
        };
    }

    private async execute(
        event: ProductionEvent,
        options: WorkflowRunOptions,
        tracker: WorkflowStateTracker,
        log: Logger
    ): Promise<StepProgress> {
        const progress: StepProgress = {
            order: null,
            statusBefore: null,
            failure: null,
            failedStep: null,
            lookupAttempts: 0,
            updateAttempts: 0,
            noop: false,
        };

        const problems = validateProductionEvent(event);
        if (problems.length > 0) {
            tracker.transition('failed');
            progress.failure = reconciliationFailure('VALIDATION', problems.join('; ')).error;
            progress.failedStep = 'validation';
            return progress;
        }

        const retryOptions = {
            policy: this.deps.retryPolicy,
            signal: options.signal,
            sleep: this.deps.sleep,
            logger: log,
        };

        // Lookup
        tracker.transition('resolving');
        const lookup = await runWithRetry(
            () => this.deps.lookup.find(event.lotCode),
            { ...retryOptions, label: 'lookup' }
        );
        progress.lookupAttempts = lookup.attempts;
        if (!lookup.result.success) {
            tracker.transition('failed');
            progress.failure = lookup.result.error;
            progress.failedStep = 'lookup';
            return progress;
        }

        const order = lookup.result.data;
        progress.order = order;
        progress.statusBefore = order.status;
        tracker.transition('resolved');

        // Update
        tracker.transition('updating');
        const update = await runWithRetry(
            () => this.deps.update.apply(order.orderId, event.producedQuantity, event.lotCode),
            { ...retryOptions, label: 'update' }
        );
        progress.updateAttempts = update.attempts;
        if (!update.result.success) {
            tracker.transition('failed');
            progress.failure = update.result.error;
            progress.failedStep = 'update';
            return progress;
        }

        progress.order = update.result.data.order;
        progress.statusBefore = update.result.data.statusBefore;
        progress.noop = update.result.data.noop;
        tracker.transition('updated');
        return progress;
    }

    private describe(progress: StepProgress): string {
        if (progress.failure) {
            const attempts = progress.failedStep === 'update' ? progress.updateAttempts : progress.lookupAttempts;
            return describeReconciliationFailure(progress.failure, attempts);
        }

        const order = progress.order;
        if (!order) {
            return 'Processed';
        }
        const quantity = `${order.actualQuantity ?? '?'}${order.unit ? ` ${order.unit}` : ''}`;
        return progress.noop
            ? `${order.orderNumber} already ${order.status} with actual quantity ${quantity}`
            : `${order.orderNumber} updated: actual quantity ${quantity}, status ${order.status}`;
    }
}
