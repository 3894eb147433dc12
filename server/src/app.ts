/**
 * Express application
 *
 * Built from injected services so tests can mount it with supertest
 * without a database or ERP.
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import { requestLogger } from './utils/logger.js';
import { NotFoundError } from './utils/errors.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requireApiToken } from './middleware/auth.js';
import { createReconciliationRouter, type ReconciliationRouterDeps } from './routes/reconciliation.js';

export interface AppOptions extends ReconciliationRouterDeps {
    adminToken: string | undefined;
}

export function createApp(options: AppOptions): Express {
    const { adminToken, ...routerDeps } = options;
    const app = express();

    app.disable('x-powered-by');
    app.use(express.json({ limit: '100kb' }));
    app.use(requestLogger);

    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    app.use('/api/reconciliation', requireApiToken(adminToken), createReconciliationRouter(routerDeps));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`Route not found: ${req.method} ${req.path}`, 'route', req.path));
    });

    app.use(errorHandler);

    return app;
}
