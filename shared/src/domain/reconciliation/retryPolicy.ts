/**
 * Retry Policy - Pure Domain Logic
 *
 * Decides whether a failed remote call is attempted again and after how long.
 * NO I/O - the caller owns the clock and the sleeping.
 *
 * delay(n) = min(maxDelay, initialDelay * backoffFactor^(n - 1))
 * where n is the 1-based number of the attempt that just failed.
 */

import type { ReconciliationErrorKind } from '../../errors/reconciliation.js';
import { isRetryableKind } from '../../errors/reconciliation.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

export interface RetryPolicyConfig {
    /** Total calls allowed, first one included */
    maxAttempts: number;
    initialDelayMs: number;
    backoffFactor: number;
    maxDelayMs: number;
}

export type RetryDecision =
    | { action: 'stop' }
    | { action: 'retry'; delayMs: number };

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicyConfig> = {
    maxAttempts: 3,
    initialDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 60_000,
};

// ============================================
// DECISIONS
// ============================================

export function computeBackoffDelay(attemptNumber: number, config: RetryPolicyConfig): number {
    const exponent = Math.max(0, attemptNumber - 1);
    const raw = config.initialDelayMs * Math.pow(config.backoffFactor, exponent);
    return Math.min(config.maxDelayMs, raw);
}

/**
 * @param attemptNumber - 1-based number of the attempt that just failed
 * @param retryAfterMs - server hint; raises the delay, never above maxDelayMs
 */
export function decideRetry(
    kind: ReconciliationErrorKind,
    attemptNumber: number,
    config: RetryPolicyConfig = DEFAULT_RETRY_POLICY,
    retryAfterMs?: number
): RetryDecision {
    if (!isRetryableKind(kind)) {
        return { action: 'stop' };
    }
    if (attemptNumber >= config.maxAttempts) {
        return { action: 'stop' };
    }

    let delayMs = computeBackoffDelay(attemptNumber, config);
    if (retryAfterMs !== undefined && retryAfterMs > delayMs) {
        delayMs = Math.min(config.maxDelayMs, retryAfterMs);
    }
    return { action: 'retry', delayMs };
}

/**
 * Reject configurations that would never call the remote system or never stop.
 */
export function validateRetryPolicy(config: RetryPolicyConfig): string[] {
    const problems: string[] = [];
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
        problems.push('maxAttempts must be an integer >= 1');
    }
    if (!(config.initialDelayMs >= 0)) {
        problems.push('initialDelayMs must be >= 0');
    }
    if (!(config.backoffFactor >= 1)) {
        problems.push('backoffFactor must be >= 1');
    }
    if (!(config.maxDelayMs >= config.initialDelayMs)) {
        problems.push('maxDelayMs must be >= initialDelayMs');
    }
    return problems;
}
