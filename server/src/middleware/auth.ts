import { timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError } from '../utils/errors.js';

function tokensMatch(expected: string, received: string): boolean {
    const a = Buffer.from(expected);
    const b = Buffer.from(received);
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Middleware to authenticate the admin API bearer token.
 * Every request is refused when no token is configured.
 */
export function requireApiToken(expectedToken: string | undefined): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction): void => {
        if (!expectedToken) {
            next(new UnauthorizedError('Admin API token is not configured'));
            return;
        }

        const authHeader = req.headers['authorization'];
        const token = authHeader?.startsWith('Bearer ') ? authHeader.slice('Bearer '.length).trim() : '';

        if (!token) {
            next(new UnauthorizedError('Access token required'));
            return;
        }
        if (!tokensMatch(expectedToken, token)) {
            next(new UnauthorizedError('Invalid access token'));
            return;
        }

        next();
    };
}
