/**
 * Retry runner
 *
 * Wraps one remote step with the retry policy. Each call of `operation` is
 * one attempt; cancellation is checked before every attempt and during the
 * backoff delay, never in the middle of a remote call.
 */

import type { Logger } from 'pino';
import {
    decideRetry,
    reconciliationFailure,
    toReconciliationFailure,
    type ReconciliationResult,
    type RetryPolicyConfig,
} from '@lotrec/shared';
import { reconciliationLogger } from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../../utils/sleep.js';

export interface RetryRunOptions {
    policy: RetryPolicyConfig;
    /** Step name used in logs and cancellation messages */
    label: string;
    signal?: AbortSignal;
    sleep?: Sleep;
    logger?: Logger;
}

export interface RetryRunResult<T> {
    result: ReconciliationResult<T>;
    attempts: number;
}

export async function runWithRetry<T>(
    operation: (attempt: number) => Promise<ReconciliationResult<T>>,
    options: RetryRunOptions
): Promise<RetryRunResult<T>> {
    const { policy, label, signal } = options;
    const sleep = options.sleep ?? defaultSleep;
    const log = options.logger ?? reconciliationLogger;

    let attempts = 0;
    for (;;) {
        if (signal?.aborted) {
            return { result: reconciliationFailure('CANCELLED', `${label} cancelled after ${attempts} attempt(s)`), attempts };
        }

        attempts++;
        let result: ReconciliationResult<T>;
        try {
            result = await operation(attempts);
        } catch (error) {
            result = { success: false, error: toReconciliationFailure(error) };
        }

        if (result.success) {
            return { result, attempts };
        }

        const { kind, code, message, retryAfterMs } = result.error;
        const decision = decideRetry(kind, attempts, policy, retryAfterMs);
        if (decision.action === 'stop') {
            if (kind === 'transient') {
                log.error({ step: label, attempts, code, error: message }, 'Retries exhausted');
            }
            return { result, attempts };
        }

        log.warn({ step: label, attempt: attempts, code, error: message, retryDelayMs: decision.delayMs }, 'Attempt failed, retrying');
        try {
            await sleep(decision.delayMs, signal);
        } catch (error) {
            if (signal?.aborted) {
                return { result: reconciliationFailure('CANCELLED', `${label} cancelled after ${attempts} attempt(s)`), attempts };
            }
            throw error;
        }
    }
}
