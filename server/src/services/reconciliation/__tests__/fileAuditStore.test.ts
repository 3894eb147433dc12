import { appendFile, mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { NewReconciliationAttempt } from '@lotrec/shared';
import { AuditLog } from '../auditLog.js';
import { FileAuditStore } from '../fileAuditStore.js';

function attempt(overrides: Partial<NewReconciliationAttempt> = {}): NewReconciliationAttempt {
    return {
        lotCode: 'L28553',
        orderNumber: 'MO-00101',
        orderId: 101,
        requestedQuantity: 2.5,
        unitOfMeasure: 'kg',
        statusBefore: 'in_progress',
        statusAfter: 'done',
        succeeded: true,
        errorKind: null,
        errorMessage: null,
        lookupAttempts: 1,
        updateAttempts: 1,
        noop: false,
        source: 'cli',
        timestamp: new Date('2026-03-02T08:00:00.000Z'),
        ...overrides,
    };
}

describe('FileAuditStore', () => {
    let dir: string;
    let path: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'lotrec-audit-'));
        path = join(dir, 'nested', 'attempts.jsonl');
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('returns nothing before the first write', async () => {
        expect(await new FileAuditStore(path).list({ limit: 10 })).toEqual([]);
    });

    it('appends one JSON line per attempt', async () => {
        const store = new FileAuditStore(path);

        const saved = await store.append(attempt());
        await store.append(attempt({ lotCode: 'L30000' }));

        const lines = (await readFile(path, 'utf8')).trim().split('\n');
        expect(lines).toHaveLength(2);
        expect(JSON.parse(lines[0] ?? '')).toMatchObject({ id: saved.id, lotCode: 'L28553', timestamp: '2026-03-02T08:00:00.000Z' });
    });

    it('lists newest first, filtered by lot and limited', async () => {
        const store = new FileAuditStore(path);
        await store.append(attempt({ requestedQuantity: 1 }));
        await store.append(attempt({ lotCode: 'L30000', requestedQuantity: 2 }));
        await store.append(attempt({ requestedQuantity: 3 }));
        await store.append(attempt({ requestedQuantity: 4 }));

        const all = await store.list({ limit: 10 });
        const forLot = await store.list({ lotCode: 'l28553', limit: 2 });

        expect(all.map((a) => a.requestedQuantity)).toEqual([4, 3, 2, 1]);
        expect(forLot.map((a) => a.requestedQuantity)).toEqual([4, 3]);
        expect(forLot[0]?.timestamp).toEqual(new Date('2026-03-02T08:00:00.000Z'));
    });

    it('skips lines it cannot read', async () => {
        const store = new FileAuditStore(path);
        await store.append(attempt({ requestedQuantity: 1 }));
        await appendFile(path, 'not json\n{"lotCode":"L1"}\n', 'utf8');
        await store.append(attempt({ requestedQuantity: 2 }));

        const listed = await store.list({ limit: 10 });

        expect(listed.map((a) => a.requestedQuantity)).toEqual([2, 1]);
    });
});

describe('AuditLog', () => {
    it('returns null instead of throwing when the store fails', async () => {
        const log = new AuditLog({
            append: async () => {
                throw new Error('disk full');
            },
            list: async () => [],
        });

        expect(await log.record(attempt())).toBeNull();
    });
});
