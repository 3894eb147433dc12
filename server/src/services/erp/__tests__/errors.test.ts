import { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios';
import { ReconciliationError } from '@lotrec/shared';
import { classifyErpError, parseRetryAfter } from '../errors.js';

function httpError(status: number, headers: Record<string, string> = {}): AxiosError {
    const config = { headers: new AxiosHeaders() };
    const response: AxiosResponse = { status, statusText: '', headers, data: null, config };
    return new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
}

describe('parseRetryAfter', () => {
    const now = Date.parse('Mon, 02 Mar 2026 08:00:00 GMT');

    it('reads delta-seconds', () => {
        expect(parseRetryAfter('5', now)).toBe(5000);
        expect(parseRetryAfter('1.5', now)).toBe(1500);
        expect(parseRetryAfter(3, now)).toBe(3000);
    });

    it('reads an HTTP date relative to now', () => {
        expect(parseRetryAfter('Mon, 02 Mar 2026 08:00:30 GMT', now)).toBe(30_000);
        expect(parseRetryAfter('Mon, 02 Mar 2026 07:59:00 GMT', now)).toBe(0);
    });

    it('ignores missing or unreadable values', () => {
        expect(parseRetryAfter(undefined, now)).toBeUndefined();
        expect(parseRetryAfter('', now)).toBeUndefined();
        expect(parseRetryAfter('soon', now)).toBeUndefined();
    });
});

describe('classifyErpError', () => {
    it('passes reconciliation errors through', () => {
        const original = new ReconciliationError('UNKNOWN_STATUS');
        expect(classifyErpError(original, 'op')).toBe(original);
    });

    it('treats non-HTTP errors as unexpected', () => {
        const error = classifyErpError(new Error('bad state'), 'getManufacturingOrder:1');
        expect(error.code).toBe('UNEXPECTED');
        expect(error.kind).toBe('fatal');
        expect(error.message).toBe('getManufacturingOrder:1: bad state');
    });

    it('separates timeouts from other network failures', () => {
        const timeout = new AxiosError('timeout', 'ETIMEDOUT');
        const refused = new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED');

        expect(classifyErpError(timeout, 'op').code).toBe('TIMEOUT');
        expect(classifyErpError(refused, 'op').code).toBe('NETWORK');
        expect(classifyErpError(refused, 'op').message).toBe('op: connect ECONNREFUSED 127.0.0.1:443');
    });

    it.each([
        [401, 'UNAUTHORIZED', 'fatal'],
        [403, 'FORBIDDEN', 'fatal'],
        [404, 'ORDER_MISSING', 'fatal'],
        [409, 'ALREADY_TRANSITIONED', 'conflict'],
        [422, 'BAD_REQUEST', 'fatal'],
        [500, 'SERVER_ERROR', 'transient'],
        [503, 'SERVER_ERROR', 'transient'],
    ])('maps HTTP %i to %s', (status, code, kind) => {
        const error = classifyErpError(httpError(status), 'op');
        expect(error.code).toBe(code);
        expect(error.kind).toBe(kind);
    });

    it('carries the Retry-After hint of a 429', () => {
        const error = classifyErpError(httpError(429, { 'retry-after': '7' }), 'op');
        expect(error.code).toBe('RATE_LIMITED');
        expect(error.kind).toBe('transient');
        expect(error.retryAfterMs).toBe(7000);
    });
});
