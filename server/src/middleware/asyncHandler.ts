/**
 * Async Handler & Typed Route Middleware
 *
 * asyncHandler: wraps async route handlers to catch errors automatically
 * typedRoute: combines Zod body validation + asyncHandler for type-safe routes
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { z } from 'zod';

// ============================================
// Core types
// ============================================

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<void | Response>;

type TypedHandler<TBody> = (
    body: TBody,
    req: Request,
    res: Response,
) => Promise<void | Response>;

export interface ValidationIssue {
    path: string;
    message: string;
}

export function formatZodIssues(error: z.ZodError): ValidationIssue[] {
    return error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
    }));
}

// ============================================
// asyncHandler: for unvalidated routes
// ============================================

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

// ============================================
// typedRoute: Zod body validation + asyncHandler
// ============================================

/**
 * Validates the body with Zod and hands the parsed value to the handler.
 * Returns a RequestHandler[] to spread into router methods.
 *
 * @example
 * router.post('/process', ...typedRoute(productionEventInputSchema, async (body, req, res) => {
 *     const { lotCode } = body; // ← fully typed
 *     res.json({ success: true });
 * }));
 */
export function typedRoute<T extends z.ZodTypeAny>(
    schema: T,
    handler: TypedHandler<z.output<T>>,
): RequestHandler[] {
    return [
        asyncHandler(async (req: Request, res: Response) => {
            const result = schema.safeParse(req.body ?? {});
            if (!result.success) {
                res.status(400).json({
                    error: result.error.issues[0]?.message || 'Validation failed',
                    details: formatZodIssues(result.error),
                });
                return;
            }
            await handler(result.data, req, res);
        }),
    ];
}

export default asyncHandler;
