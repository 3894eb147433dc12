/**
 * Reconciliation Routes (Express)
 *
 * Admin endpoints: status, audit trail, single-event processing and
 * on-demand inbox polls. Mounted under /api/reconciliation behind the
 * bearer token middleware.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import {
    attemptsQuerySchema,
    createProductionEvent,
    productionEventInputSchema,
    type ReconciliationFailure,
    type RetryPolicyConfig,
} from '@lotrec/shared';
import { asyncHandler, formatZodIssues, typedRoute } from '../middleware/asyncHandler.js';
import { ValidationError } from '../utils/errors.js';
import type { LotLock } from '../utils/lotLock.js';
import type { AuditLog } from '../services/reconciliation/auditLog.js';
import type { ReconciliationWorkflow, WorkflowOutcome } from '../services/reconciliation/workflow.js';
import type { InboxPoller } from '../services/inbox/inboxPoller.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

export interface ReconciliationRouterDeps {
    workflow: ReconciliationWorkflow;
    audit: AuditLog;
    lotLock: LotLock;
    retryPolicy: RetryPolicyConfig;
    /** null when no inbox database is configured */
    poller: InboxPoller | null;
    /** Aborted at shutdown; runs waiting out a retry delay end as cancelled */
    signal?: AbortSignal;
}

const pollBodySchema = z.object({
    limit: z.coerce.number().int().positive().max(500).optional(),
});

// ============================================
// HELPERS
// ============================================

/**
 * HTTP status for a failed outcome
 */
export function statusForFailure(failure: ReconciliationFailure): number {
    switch (failure.kind) {
        case 'not_found':
            return 404;
        case 'ambiguous':
        case 'conflict':
            return 409;
        case 'fatal':
            return failure.code === 'VALIDATION' ? 400 : 502;
        case 'transient':
            return 502;
        case 'cancelled':
            return 503;
    }
}

export function serializeOutcome(outcome: WorkflowOutcome) {
    return {
        state: outcome.state,
        history: outcome.history,
        lotCode: outcome.event.lotCode,
        quantity: outcome.event.producedQuantity,
        unitOfMeasure: outcome.event.unitOfMeasure,
        order: outcome.order,
        statusBefore: outcome.statusBefore,
        noop: outcome.noop,
        lookupAttempts: outcome.lookupAttempts,
        updateAttempts: outcome.updateAttempts,
        auditRecorded: outcome.auditRecorded,
        attemptId: outcome.attemptId,
        message: outcome.message,
    };
}

// ============================================
// ROUTER
// ============================================

export function createReconciliationRouter(deps: ReconciliationRouterDeps): Router {
    const router: Router = Router();

    /**
     * GET /status
     * Poller state, held lot locks and the active retry policy
     */
    router.get('/status', (_req: Request, res: Response) => {
        res.json({
            poller: deps.poller ? deps.poller.getStatus() : null,
            locks: deps.lotLock.getStatus(),
            retryPolicy: deps.retryPolicy,
        });
    });

    /**
     * GET /attempts?lotCode=&limit=
     * Audit trail, newest first
     */
    router.get('/attempts', asyncHandler(async (req: Request, res: Response) => {
        const parsed = attemptsQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            throw new ValidationError('Invalid query', formatZodIssues(parsed.error));
        }
        const attempts = await deps.audit.list(parsed.data);
        res.json({ attempts });
    }));

    /**
     * POST /process
     * Run one production event through the workflow under the lot lock
     */
    router.post('/process', ...typedRoute(productionEventInputSchema, async (body, _req, res) => {
        const event = createProductionEvent(body.lotCode, body.quantity, body.unitOfMeasure, body.capturedAt);
        const outcome = await deps.lotLock.runExclusive(event.lotCode, 'api', () =>
            deps.workflow.run(event, { source: 'api', signal: deps.signal })
        );

        if (!outcome.failure) {
            res.json({ success: true, outcome: serializeOutcome(outcome) });
            return;
        }

        res.status(statusForFailure(outcome.failure)).json({
            success: false,
            error: {
                kind: outcome.failure.kind,
                code: outcome.failure.code,
                message: outcome.message,
            },
            outcome: serializeOutcome(outcome),
        });
    }));

    /**
     * POST /poll
     * One inbox poll run
     */
    router.post('/poll', ...typedRoute(pollBodySchema, async (body, _req, res) => {
        if (!deps.poller) {
            res.status(503).json({ error: 'Inbox poller is not configured (DATABASE_URL is not set)' });
            return;
        }
        const result = await deps.poller.pollOnce(body.limit);
        res.json({ success: true, result });
    }));

    return router;
}
