/**
 * End-to-end tests for the reconciliation workflow against an in-memory ERP
 */

import { createProductionEvent, type RemoteOrder } from '@lotrec/shared';
import { parseEnv } from '../../../config/env.js';
import type { Sleep } from '../../../utils/sleep.js';
import { createReconciliationServices } from '../index.js';
import { FakeErp, MemoryAuditStore, makeOrder, recordingSleep } from './fakeErp.js';

function setup(orders: RemoteOrder[] = [makeOrder()], sleepOverride?: Sleep) {
    const erp = new FakeErp(orders);
    const store = new MemoryAuditStore();
    const recorder = recordingSleep();
    const services = createReconciliationServices({
        config: parseEnv({}),
        auditStore: store,
        gateway: erp,
        sleep: sleepOverride ?? recorder.sleep,
        now: () => new Date('2026-03-02T08:00:00.000Z'),
    });
    return { erp, store, delays: recorder.delays, workflow: services.workflow };
}

describe('ReconciliationWorkflow', () => {
    describe('successful reconciliation', () => {
        it('writes the produced quantity and closes the order', async () => {
            const { erp, store, workflow } = setup();

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5, 'kg'), { source: 'cli' });

            expect(outcome.state).toBe('logged');
            expect(outcome.history).toEqual(['captured', 'resolving', 'resolved', 'updating', 'updated', 'logged']);
            expect(outcome.order?.status).toBe('done');
            expect(outcome.order?.actualQuantity).toBe(2.5);
            expect(outcome.order?.expectedQuantity).toBe(3);
            expect(outcome.statusBefore).toBe('in_progress');
            expect(outcome.noop).toBe(false);
            expect(outcome.message).toBe('MO-00101 updated: actual quantity 2.5 kg, status done');
            expect(erp.updates).toEqual([{ orderId: 101, update: { actualQuantity: 2.5, status: 'done' } }]);

            expect(store.records).toHaveLength(1);
            expect(store.records[0]).toMatchObject({
                lotCode: 'L28553',
                orderNumber: 'MO-00101',
                orderId: 101,
                requestedQuantity: 2.5,
                unitOfMeasure: 'kg',
                statusBefore: 'in_progress',
                statusAfter: 'done',
                succeeded: true,
                errorKind: null,
                lookupAttempts: 1,
                updateAttempts: 1,
                noop: false,
                source: 'cli',
            });
            expect(outcome.auditRecorded).toBe(true);
            expect(outcome.attemptId).toBe('attempt-1');
        });

        it('matches a lot code typed without its prefix', async () => {
            const { erp, workflow } = setup();

            const outcome = await workflow.run(createProductionEvent('28553', 2.5), { source: 'api' });

            expect(outcome.state).toBe('logged');
            expect(outcome.order?.orderNumber).toBe('MO-00101');
            expect(erp.calls.update).toBe(1);
        });

        it('refreshes a cached listing once before reporting a miss', async () => {
            const { erp, workflow } = setup();
            await workflow.run(createProductionEvent('L28553', 2.5), { source: 'cli' });

            erp.orders.set(102, makeOrder({ orderId: 102, orderNumber: 'MO-00102', targetLots: ['L30000'] }));
            const outcome = await workflow.run(createProductionEvent('L30000', 1), { source: 'cli' });

            expect(outcome.state).toBe('logged');
            expect(outcome.order?.orderNumber).toBe('MO-00102');
            expect(erp.calls.list).toBe(2);
        });
    });

    describe('idempotence', () => {
        it('reports a repeated event as a no-op without writing again', async () => {
            const { erp, store, workflow } = setup();
            const event = createProductionEvent('L28553', 2.5, 'kg');

            await workflow.run(event, { source: 'poller' });
            const second = await workflow.run(event, { source: 'poller' });

            expect(second.state).toBe('logged');
            expect(second.noop).toBe(true);
            expect(second.statusBefore).toBe('done');
            expect(second.message).toBe('MO-00101 already done with actual quantity 2.5 kg');
            expect(erp.calls.update).toBe(1);
            expect(store.records).toHaveLength(2);
            expect(store.records[1]?.noop).toBe(true);
        });
    });

    describe('lookup failures', () => {
        it('fails with not_found and never updates', async () => {
            const { erp, store, workflow } = setup();

            const outcome = await workflow.run(createProductionEvent('UNKNOWN', 2.5), { source: 'cli' });

            expect(outcome.state).toBe('failed');
            expect(outcome.history).toEqual(['captured', 'resolving', 'failed']);
            expect(outcome.failure?.kind).toBe('not_found');
            expect(outcome.message).toBe('No order found: No manufacturing order lists lot UNKNOWN');
            expect(erp.calls.update).toBe(0);
            expect(store.records).toHaveLength(1);
            expect(store.records[0]).toMatchObject({
                lotCode: 'UNKNOWN',
                orderNumber: null,
                succeeded: false,
                errorKind: 'not_found',
                statusAfter: null,
                lookupAttempts: 1,
                updateAttempts: 0,
            });
        });

        it('fails with ambiguous when two orders list the lot', async () => {
            const { erp, workflow } = setup([
                makeOrder(),
                makeOrder({ orderId: 102, orderNumber: 'MO-00102' }),
            ]);

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5), { source: 'cli' });

            expect(outcome.state).toBe('failed');
            expect(outcome.failure?.kind).toBe('ambiguous');
            expect(outcome.failure?.message).toBe('Lot L28553 matches 2 orders: MO-00101, MO-00102');
            expect(erp.calls.get).toBe(0);
            expect(erp.calls.update).toBe(0);
        });

        it('retries a listing timeout', async () => {
            const { erp, delays, workflow } = setup();
            erp.failNext('list', 'TIMEOUT');

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5), { source: 'cli' });

            expect(outcome.state).toBe('logged');
            expect(outcome.lookupAttempts).toBe(2);
            expect(delays).toEqual([1000]);
        });
    });

    describe('update retries', () => {
        it('succeeds on the third attempt after two timeouts', async () => {
            const { erp, delays, store, workflow } = setup();
            erp.failNext('update', 'TIMEOUT', 'TIMEOUT');

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5), { source: 'cli' });

            expect(outcome.state).toBe('logged');
            expect(outcome.updateAttempts).toBe(3);
            expect(erp.calls.update).toBe(3);
            expect(erp.updates).toHaveLength(1);
            expect(delays).toEqual([1000, 2000]);
            expect(store.records[0]?.updateAttempts).toBe(3);
        });

        it('gives up after the retry budget and records the transient failure', async () => {
            const { erp, delays, store, workflow } = setup();
            erp.failNext('update', 'SERVER_ERROR', 'SERVER_ERROR', 'SERVER_ERROR');

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5), { source: 'cli' });

            expect(outcome.state).toBe('failed');
            expect(outcome.history).toEqual(['captured', 'resolving', 'resolved', 'updating', 'failed']);
            expect(outcome.updateAttempts).toBe(3);
            expect(outcome.message).toBe('Remote system unavailable after 3 attempts: The ERP returned a server error');
            expect(delays).toEqual([1000, 2000]);
            expect(store.records[0]).toMatchObject({
                succeeded: false,
                errorKind: 'transient',
                statusBefore: 'in_progress',
                statusAfter: null,
                orderNumber: 'MO-00101',
            });
        });

        it('does not retry a fatal error', async () => {
            const { erp, delays, workflow } = setup();
            erp.failNext('update', 'FORBIDDEN');

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5), { source: 'cli' });

            expect(outcome.failure?.code).toBe('FORBIDDEN');
            expect(outcome.updateAttempts).toBe(1);
            expect(delays).toEqual([]);
        });

        it('treats a write that does not read back as transient', async () => {
            const { erp, workflow } = setup();
            erp.applyWrites = false;

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5), { source: 'cli' });

            expect(outcome.failure?.code).toBe('UNCONFIRMED');
            expect(outcome.updateAttempts).toBe(3);
        });
    });

    describe('conflicts', () => {
        it('refuses to overwrite an order closed with another quantity', async () => {
            const { erp, workflow } = setup([makeOrder({ status: 'done', actualQuantity: 4 })]);

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5), { source: 'cli' });

            expect(outcome.failure?.kind).toBe('conflict');
            expect(outcome.message).toBe(
                'Order already transitioned, escalate to a supervisor: MO-00101 is already done with actual quantity 4'
            );
            expect(erp.calls.update).toBe(0);
        });
    });

    describe('validation', () => {
        it('rejects a zero quantity before calling the ERP', async () => {
            const { erp, store, workflow } = setup();

            const outcome = await workflow.run(createProductionEvent('L28553', 0), { source: 'cli' });

            expect(outcome.state).toBe('failed');
            expect(outcome.history).toEqual(['captured', 'failed']);
            expect(outcome.failure?.code).toBe('VALIDATION');
            expect(outcome.message).toBe('Cannot process event: Produced quantity must be greater than zero (got 0)');
            expect(erp.calls.list).toBe(0);
            expect(store.records).toHaveLength(1);
        });
    });

    describe('audit', () => {
        it('keeps the remote update when the audit write fails', async () => {
            const { erp, store, workflow } = setup();
            store.failWrites = true;

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5), { source: 'cli' });

            expect(outcome.state).toBe('logged');
            expect(outcome.auditRecorded).toBe(false);
            expect(outcome.attemptId).toBeNull();
            expect(erp.calls.update).toBe(1);
        });
    });

    describe('cancellation', () => {
        it('does not start a lookup once cancelled', async () => {
            const { erp, workflow } = setup();
            const controller = new AbortController();
            controller.abort();

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5), {
                source: 'poller',
                signal: controller.signal,
            });

            expect(outcome.failure?.kind).toBe('cancelled');
            expect(outcome.message).toBe('Processing cancelled: lookup cancelled after 0 attempt(s)');
            expect(erp.calls.list).toBe(0);
        });

        it('stops waiting between update attempts when cancelled', async () => {
            const controller = new AbortController();
            const { erp, workflow } = setup([makeOrder()], async () => {
                controller.abort();
                throw new Error('aborted');
            });
            erp.failNext('update', 'TIMEOUT');

            const outcome = await workflow.run(createProductionEvent('L28553', 2.5), {
                source: 'poller',
                signal: controller.signal,
            });

            expect(outcome.failure?.code).toBe('CANCELLED');
            expect(outcome.failure?.message).toBe('update cancelled after 1 attempt(s)');
            expect(outcome.updateAttempts).toBe(1);
            expect(erp.calls.update).toBe(1);
        });
    });
});
