/**
 * JSON-lines audit store
 *
 * Used by the CLI when no database is configured. One JSON object per line,
 * appended; the file is never rewritten.
 */

import { randomUUID } from 'node:crypto';
import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import {
    moStatusSchema,
    normalizeLotCode,
    type NewReconciliationAttempt,
    type ReconciliationAttempt,
} from '@lotrec/shared';
import { auditLogger } from '../../utils/logger.js';
import type { AuditQuery, AuditStore } from './auditLog.js';

const storedAttemptSchema = z.object({
    id: z.string(),
    lotCode: z.string(),
    orderNumber: z.string().nullable(),
    orderId: z.number().nullable(),
    requestedQuantity: z.number(),
    unitOfMeasure: z.string().nullable(),
    statusBefore: moStatusSchema.nullable(),
    statusAfter: moStatusSchema.nullable(),
    succeeded: z.boolean(),
    errorKind: z.string().nullable(),
    errorMessage: z.string().nullable(),
    lookupAttempts: z.number().int(),
    updateAttempts: z.number().int(),
    noop: z.boolean(),
    source: z.enum(['cli', 'poller', 'api']),
    timestamp: z.coerce.date(),
});

export class FileAuditStore implements AuditStore {
    private readonly path: string;

    constructor(path: string) {
        this.path = path;
    }

    async append(attempt: NewReconciliationAttempt): Promise<ReconciliationAttempt> {
        const record: ReconciliationAttempt = { id: randomUUID(), ...attempt };
        await mkdir(dirname(this.path), { recursive: true });
        await appendFile(this.path, JSON.stringify(record) + '\n', 'utf8');
        return record;
    }

    async list(query: AuditQuery): Promise<ReconciliationAttempt[]> {
        let content: string;
        try {
            content = await readFile(this.path, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return [];
            }
            throw error;
        }

        const lotCode = query.lotCode ? normalizeLotCode(query.lotCode) : null;
        const records: ReconciliationAttempt[] = [];
        const lines = content.split('\n');

        for (let index = 0; index < lines.length; index++) {
            const line = lines[index]?.trim();
            if (!line) continue;

            let parsed: unknown;
            try {
                parsed = JSON.parse(line);
            } catch {
                auditLogger.warn({ path: this.path, line: index + 1 }, 'Skipping unreadable audit line');
                continue;
            }

            const result = storedAttemptSchema.safeParse(parsed);
            if (!result.success) {
                auditLogger.warn({ path: this.path, line: index + 1 }, 'Skipping malformed audit record');
                continue;
            }
            if (lotCode && normalizeLotCode(result.data.lotCode) !== lotCode) continue;
            records.push(result.data);
        }

        return records.reverse().slice(0, query.limit);
    }
}
