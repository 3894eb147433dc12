import { ZodError } from 'zod';
import { formatEnvIssues, parseEnv } from '../env.js';

describe('parseEnv', () => {
    it('applies defaults', () => {
        const env = parseEnv({});

        expect(env.PORT).toBe(3001);
        expect(env.ERP_API_URL).toBe('https://api.mrpeasy.com/rest/v1');
        expect(env.ERP_REQUEST_TIMEOUT_MS).toBe(30_000);
        expect(env.RETRY_MAX_ATTEMPTS).toBe(3);
        expect(env.RETRY_INITIAL_DELAY_MS).toBe(1000);
        expect(env.RETRY_BACKOFF_FACTOR).toBe(2);
        expect(env.RETRY_MAX_DELAY_MS).toBe(60_000);
        expect(env.POLL_BATCH_SIZE).toBe(50);
        expect(env.DISABLE_BACKGROUND_WORKERS).toBe('false');
        expect(env.DATABASE_URL).toBeUndefined();
    });

    it('coerces numeric strings', () => {
        const env = parseEnv({ RETRY_MAX_ATTEMPTS: '5', RETRY_BACKOFF_FACTOR: '1.5', POLL_CONCURRENCY: '8' });

        expect(env.RETRY_MAX_ATTEMPTS).toBe(5);
        expect(env.RETRY_BACKOFF_FACTOR).toBe(1.5);
        expect(env.POLL_CONCURRENCY).toBe(8);
    });

    it('rejects a retry budget of zero attempts', () => {
        expect(() => parseEnv({ RETRY_MAX_ATTEMPTS: '0' })).toThrow(ZodError);
    });

    it('rejects a max delay below the initial delay', () => {
        try {
            parseEnv({ RETRY_INITIAL_DELAY_MS: '5000', RETRY_MAX_DELAY_MS: '1000' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ZodError);
            if (error instanceof ZodError) {
                expect(formatEnvIssues(error)).toBe('  - RETRY_MAX_DELAY_MS: RETRY_MAX_DELAY_MS must be >= RETRY_INITIAL_DELAY_MS');
            }
        }
    });

    it('rejects a malformed ERP URL', () => {
        expect(() => parseEnv({ ERP_API_URL: 'not a url' })).toThrow(ZodError);
    });
});
