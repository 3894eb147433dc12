/**
 * Admin API tests (supertest against the Express app, in-memory ERP)
 */

import request from 'supertest';
import type { RemoteOrder } from '@lotrec/shared';
import { createApp } from '../../app.js';
import { parseEnv } from '../../config/env.js';
import { InboxPoller } from '../../services/inbox/inboxPoller.js';
import { createReconciliationServices } from '../../services/reconciliation/index.js';
import { FakeErp, MemoryAuditStore, makeOrder, recordingSleep } from '../../services/reconciliation/__tests__/fakeErp.js';
import type { Sleep } from '../../utils/sleep.js';
import { statusForFailure } from '../reconciliation.js';

const TOKEN = 'test-secret';

interface SetupOptions {
    orders?: RemoteOrder[];
    withPoller?: boolean;
    adminToken?: string;
    signal?: AbortSignal;
    sleep?: Sleep;
}

function setup(options: SetupOptions = {}) {
    const erp = new FakeErp(options.orders ?? [makeOrder()]);
    const auditStore = new MemoryAuditStore();
    const services = createReconciliationServices({
        config: parseEnv({}),
        auditStore,
        gateway: erp,
        sleep: options.sleep ?? recordingSleep().sleep,
    });
    const poller = options.withPoller
        ? new InboxPoller({
            store: { fetchPending: async () => [], markProcessed: async () => true },
            workflow: services.workflow,
            lotLock: services.lotLock,
            batchSize: 10,
            intervalMs: 60_000,
            concurrency: 2,
        })
        : null;
    const app = createApp({
        adminToken: 'adminToken' in options ? options.adminToken : TOKEN,
        workflow: services.workflow,
        audit: services.audit,
        lotLock: services.lotLock,
        retryPolicy: services.retryPolicy,
        poller,
        signal: options.signal,
    });
    return { app, erp, auditStore };
}

describe('admin API', () => {
    describe('health and routing', () => {
        it('answers health checks without a token', async () => {
            const { app } = setup();

            const res = await request(app).get('/api/health');

            expect(res.status).toBe(200);
            expect(res.body.status).toBe('ok');
        });

        it('returns 404 for unknown routes', async () => {
            const { app } = setup();

            const res = await request(app).get('/api/nope');

            expect(res.status).toBe(404);
            expect(res.body).toEqual({
                error: 'Route not found: GET /api/nope',
                type: 'NotFoundError',
                resourceType: 'route',
                resourceId: '/api/nope',
            });
        });
    });

    describe('authentication', () => {
        it('requires a bearer token', async () => {
            const { app } = setup();

            const res = await request(app).get('/api/reconciliation/status');

            expect(res.status).toBe(401);
            expect(res.body).toEqual({ error: 'Access token required', type: 'UnauthorizedError' });
        });

        it('rejects a wrong token', async () => {
            const { app } = setup();

            const res = await request(app).get('/api/reconciliation/status').set('Authorization', 'Bearer wrong');

            expect(res.status).toBe(401);
            expect(res.body.error).toBe('Invalid access token');
        });

        it('refuses everything when no token is configured', async () => {
            const { app } = setup({ adminToken: undefined });

            const res = await request(app).get('/api/reconciliation/status').set('Authorization', `Bearer ${TOKEN}`);

            expect(res.status).toBe(401);
            expect(res.body.error).toBe('Admin API token is not configured');
        });
    });

    describe('GET /status', () => {
        it('reports the retry policy, locks and poller', async () => {
            const { app } = setup();

            const res = await request(app).get('/api/reconciliation/status').set('Authorization', `Bearer ${TOKEN}`);

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                poller: null,
                locks: [],
                retryPolicy: { maxAttempts: 3, initialDelayMs: 1000, backoffFactor: 2, maxDelayMs: 60_000 },
            });
        });
    });

    describe('POST /process', () => {
        it('reconciles a lot', async () => {
            const { app, erp } = setup();

            const res = await request(app)
                .post('/api/reconciliation/process')
                .set('Authorization', `Bearer ${TOKEN}`)
                .send({ lotCode: 'L28553', quantity: 2.5, unitOfMeasure: 'kg' });

            expect(res.status).toBe(200);
            expect(res.body.success).toBe(true);
            expect(res.body.outcome).toMatchObject({
                state: 'logged',
                lotCode: 'L28553',
                quantity: 2.5,
                statusBefore: 'in_progress',
                noop: false,
                updateAttempts: 1,
                message: 'MO-00101 updated: actual quantity 2.5 kg, status done',
            });
            expect(res.body.outcome.order.status).toBe('done');
            expect(erp.updates).toHaveLength(1);
        });

        it('returns 404 when no order lists the lot', async () => {
            const { app, erp } = setup();

            const res = await request(app)
                .post('/api/reconciliation/process')
                .set('Authorization', `Bearer ${TOKEN}`)
                .send({ lotCode: 'UNKNOWN', quantity: 1 });

            expect(res.status).toBe(404);
            expect(res.body.success).toBe(false);
            expect(res.body.error).toEqual({
                kind: 'not_found',
                code: 'ORDER_NOT_FOUND',
                message: 'No order found: No manufacturing order lists lot UNKNOWN',
            });
            expect(erp.calls.update).toBe(0);
        });

        it('returns 409 for an ambiguous lot', async () => {
            const { app } = setup({ orders: [makeOrder(), makeOrder({ orderId: 102, orderNumber: 'MO-00102' })] });

            const res = await request(app)
                .post('/api/reconciliation/process')
                .set('Authorization', `Bearer ${TOKEN}`)
                .send({ lotCode: 'L28553', quantity: 1 });

            expect(res.status).toBe(409);
            expect(res.body.error.kind).toBe('ambiguous');
        });

        it('returns 502 when the ERP stays unavailable', async () => {
            const { app, erp } = setup();
            erp.failNext('list', 'NETWORK', 'NETWORK', 'NETWORK');

            const res = await request(app)
                .post('/api/reconciliation/process')
                .set('Authorization', `Bearer ${TOKEN}`)
                .send({ lotCode: 'L28553', quantity: 1 });

            expect(res.status).toBe(502);
            expect(res.body.error.message).toBe('Remote system unavailable after 3 attempts: Could not reach the ERP');
        });

        it('ends a run waiting on a retry as cancelled when the server shuts down, and audits it', async () => {
            const shutdown = new AbortController();
            const { app, erp, auditStore } = setup({
                signal: shutdown.signal,
                sleep: async (_ms, signal) => {
                    shutdown.abort();
                    if (signal?.aborted) throw new Error('aborted');
                },
            });
            erp.failNext('list', 'NETWORK');

            const res = await request(app)
                .post('/api/reconciliation/process')
                .set('Authorization', `Bearer ${TOKEN}`)
                .send({ lotCode: 'L28553', quantity: 1 });

            expect(res.status).toBe(503);
            expect(res.body.error.code).toBe('CANCELLED');
            expect(res.body.outcome.auditRecorded).toBe(true);
            expect(auditStore.records).toHaveLength(1);
            expect(auditStore.records[0]).toMatchObject({ lotCode: 'L28553', succeeded: false, errorKind: 'cancelled', source: 'api' });
            expect(erp.calls.update).toBe(0);
        });

        it('validates the body', async () => {
            const { app } = setup();

            const res = await request(app)
                .post('/api/reconciliation/process')
                .set('Authorization', `Bearer ${TOKEN}`)
                .send({ lotCode: 'L28553', quantity: -1 });

            expect(res.status).toBe(400);
            expect(res.body).toEqual({
                error: 'Quantity must be greater than zero',
                details: [{ path: 'quantity', message: 'Quantity must be greater than zero' }],
            });
        });

        it('rejects malformed JSON', async () => {
            const { app } = setup();

            const res = await request(app)
                .post('/api/reconciliation/process')
                .set('Authorization', `Bearer ${TOKEN}`)
                .set('Content-Type', 'application/json')
                .send('{"lotCode":');

            expect(res.status).toBe(400);
            expect(res.body).toEqual({ error: 'Malformed JSON body', type: 'ValidationError' });
        });
    });

    describe('GET /attempts', () => {
        it('lists recorded attempts for a lot', async () => {
            const { app } = setup();
            await request(app)
                .post('/api/reconciliation/process')
                .set('Authorization', `Bearer ${TOKEN}`)
                .send({ lotCode: 'L28553', quantity: 2.5 });

            const res = await request(app)
                .get('/api/reconciliation/attempts?lotCode=l28553')
                .set('Authorization', `Bearer ${TOKEN}`);

            expect(res.status).toBe(200);
            expect(res.body.attempts).toHaveLength(1);
            expect(res.body.attempts[0]).toMatchObject({ lotCode: 'L28553', succeeded: true, source: 'api' });
        });

        it('rejects an oversized limit', async () => {
            const { app } = setup();

            const res = await request(app)
                .get('/api/reconciliation/attempts?limit=900')
                .set('Authorization', `Bearer ${TOKEN}`);

            expect(res.status).toBe(400);
            expect(res.body.error).toBe('Invalid query');
            expect(res.body.type).toBe('ValidationError');
        });
    });

    describe('POST /poll', () => {
        it('is unavailable without an inbox', async () => {
            const { app } = setup();

            const res = await request(app).post('/api/reconciliation/poll').set('Authorization', `Bearer ${TOKEN}`);

            expect(res.status).toBe(503);
        });

        it('runs one poll', async () => {
            const { app } = setup({ withPoller: true });

            const res = await request(app)
                .post('/api/reconciliation/poll')
                .set('Authorization', `Bearer ${TOKEN}`)
                .send({ limit: 5 });

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                success: true,
                result: {
                    fetched: 0,
                    succeeded: 0,
                    failed: 0,
                    deferred: 0,
                    alreadyAcknowledged: 0,
                    errors: 0,
                    skipped: false,
                },
            });
        });
    });
});

describe('statusForFailure', () => {
    it('maps failure kinds to HTTP statuses', () => {
        expect(statusForFailure({ kind: 'not_found', code: 'ORDER_NOT_FOUND', message: '' })).toBe(404);
        expect(statusForFailure({ kind: 'conflict', code: 'ALREADY_TRANSITIONED', message: '' })).toBe(409);
        expect(statusForFailure({ kind: 'fatal', code: 'VALIDATION', message: '' })).toBe(400);
        expect(statusForFailure({ kind: 'fatal', code: 'UNAUTHORIZED', message: '' })).toBe(502);
        expect(statusForFailure({ kind: 'cancelled', code: 'CANCELLED', message: '' })).toBe(503);
    });
});
