/**
 * Admin API server + inbox poller
 *
 * Start: `npm start` (tsx server/src/index.ts)
 */

import type { Server } from 'node:http';
import { getEnv } from './config/env.js';
import { INBOX_STARTUP_DELAY_MS } from './config/index.js';
import { createApp } from './app.js';
import { createRuntime } from './runtime.js';
import logger from './utils/logger.js';
import { shutdownCoordinator } from './utils/shutdownCoordinator.js';

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}

async function main(): Promise<void> {
    const env = getEnv();
    const runtime = createRuntime(env);
    const { services, poller } = runtime;
    const apiShutdown = new AbortController();

    const app = createApp({
        adminToken: env.ADMIN_API_TOKEN,
        workflow: services.workflow,
        audit: services.audit,
        lotLock: services.lotLock,
        retryPolicy: services.retryPolicy,
        poller,
        signal: apiShutdown.signal,
    });

    if (!env.ADMIN_API_TOKEN) {
        logger.warn('ADMIN_API_TOKEN is not set; /api/reconciliation will refuse every request');
    }

    const server = app.listen(env.PORT, () => {
        logger.info({ port: env.PORT }, 'Admin API listening');
    });

    let startupTimer: NodeJS.Timeout | null = null;
    if (poller && env.DISABLE_BACKGROUND_WORKERS !== 'true') {
        startupTimer = setTimeout(() => {
            startupTimer = null;
            poller.start();
        }, INBOX_STARTUP_DELAY_MS);
    } else {
        logger.info({ database: runtime.db !== null }, 'Inbox poller disabled');
    }

    // API runs write their audit rows through the pool, so the server drains first.
    // One update attempt can make three ERP requests before it sees the abort.
    shutdownCoordinator.register('http-server', () => {
        apiShutdown.abort();
        return closeServer(server);
    }, 3 * env.ERP_REQUEST_TIMEOUT_MS + 5000);
    shutdownCoordinator.register('runtime', async () => {
        if (startupTimer) clearTimeout(startupTimer);
        await runtime.close();
    }, 30000);

    const onSignal = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, 'Shutdown signal received');
        shutdownCoordinator.shutdown()
            .then((results) => {
                process.exit(results.every((result) => result.success) ? 0 : 1);
            })
            .catch((err: unknown) => {
                logger.error({ err }, 'Shutdown failed');
                process.exit(1);
            });
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
}

main().catch((err: unknown) => {
    logger.fatal({ err }, 'Server failed to start');
    process.exit(1);
});
