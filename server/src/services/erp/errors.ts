/**
 * ERP error classification
 *
 * Maps anything axios throws into the reconciliation taxonomy.
 */

import axios from 'axios';
import { ReconciliationError } from '@lotrec/shared';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Parse an HTTP Retry-After header (delta-seconds or HTTP-date) into ms.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
    if (typeof value !== 'string' && typeof value !== 'number') return undefined;
    const text = String(value).trim();
    if (!text) return undefined;

    if (/^\d+(\.\d+)?$/.test(text)) {
        return Math.round(Number(text) * 1000);
    }

    const date = Date.parse(text);
    if (Number.isNaN(date)) return undefined;
    return Math.max(0, date - now);
}

export function classifyErpError(error: unknown, operation: string): ReconciliationError {
    if (error instanceof ReconciliationError) {
        return error;
    }

    if (!axios.isAxiosError(error)) {
        const message = error instanceof Error ? error.message : String(error);
        return new ReconciliationError('UNEXPECTED', {
            message: `${operation}: ${message}`,
            context: { operation },
        });
    }

    const status = error.response?.status;
    const context = { operation, status, code: error.code };

    if (status === undefined) {
        if (error.code && TIMEOUT_CODES.has(error.code)) {
            return new ReconciliationError('TIMEOUT', { message: `${operation}: request timed out`, context });
        }
        return new ReconciliationError('NETWORK', {
            message: `${operation}: ${error.message || 'connection failed'}`,
            context,
        });
    }

    if (status === 401) {
        return new ReconciliationError('UNAUTHORIZED', { context });
    }
    if (status === 403) {
        return new ReconciliationError('FORBIDDEN', { context });
    }
    if (status === 404) {
        return new ReconciliationError('ORDER_MISSING', { message: `${operation}: not found`, context });
    }
    if (status === 409) {
        return new ReconciliationError('ALREADY_TRANSITIONED', {
            message: `${operation}: the ERP reported a conflicting state`,
            context,
        });
    }
    if (status === 429) {
        const retryAfterMs = parseRetryAfter(error.response?.headers?.['retry-after']);
        return new ReconciliationError('RATE_LIMITED', {
            message: `${operation}: rate limited`,
            ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
            context,
        });
    }
    if (status >= 500) {
        return new ReconciliationError('SERVER_ERROR', { message: `${operation}: HTTP ${status}`, context });
    }
    return new ReconciliationError('BAD_REQUEST', { message: `${operation}: HTTP ${status}`, context });
}
