import { setTimeout as delay } from 'node:timers/promises';

/**
 * Resolves after `ms`; rejects with an AbortError when `signal` fires first.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
    await delay(ms, undefined, signal ? { signal } : undefined);
};
