/**
 * Shutdown Coordinator
 *
 * Runs the shutdown steps one after another in registration order:
 * close the HTTP server, then stop the poller and release the pool.
 * Each step is bounded by its own timeout, and a failed or timed-out
 * step does not stop the ones after it.
 */

import logger from './logger.js';

const log = logger.child({ module: 'shutdown' });

interface ShutdownStep {
    name: string;
    handler: () => Promise<void> | void;
    timeout: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

export class ShutdownCoordinator {
    private readonly steps: ShutdownStep[] = [];
    private started = false;

    /**
     * Append a step. Steps run in the order they were registered.
     * @param timeout - max wait for this step (ms), default 10s
     */
    register(name: string, handler: () => Promise<void> | void, timeout = 10000): void {
        if (this.steps.some((step) => step.name === name)) {
            throw new Error(`Shutdown step already registered: ${name}`);
        }
        this.steps.push({ name, handler, timeout });
        log.debug({ name, timeout, position: this.steps.length }, 'Shutdown step registered');
    }

    async shutdown(): Promise<ShutdownResult[]> {
        if (this.started) {
            log.warn('Shutdown already in progress');
            return [];
        }
        this.started = true;
        log.info({ steps: this.steps.map((step) => step.name) }, 'Starting graceful shutdown');

        const results: ShutdownResult[] = [];
        for (const step of this.steps) {
            results.push(await this.runStep(step));
        }

        const failed = results.filter((r) => !r.success).length;
        log.info({ successful: results.length - failed, failed }, 'Shutdown complete');
        return results;
    }

    private async runStep({ name, handler, timeout }: ShutdownStep): Promise<ShutdownResult> {
        const start = Date.now();
        let timer: NodeJS.Timeout | undefined;

        try {
            const timedOut = await Promise.race([
                Promise.resolve(handler()).then(() => false),
                new Promise<boolean>((resolve) => {
                    timer = setTimeout(() => resolve(true), timeout);
                }),
            ]);

            const duration = Date.now() - start;
            if (timedOut) {
                log.warn({ name, timeout, duration }, 'Shutdown step timed out');
                return { name, success: false, error: 'Timeout', duration };
            }
            log.debug({ name, duration }, 'Shutdown step completed');
            return { name, success: true, duration };
        } catch (error: unknown) {
            const duration = Date.now() - start;
            const errorMsg = error instanceof Error ? error.message : 'Unknown error';
            log.error({ name, error: errorMsg, duration }, 'Shutdown step failed');
            return { name, success: false, error: errorMsg, duration };
        } finally {
            clearTimeout(timer);
        }
    }
}

export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;
