/**
 * Lot Processing Lock
 *
 * Serializes work on the same lot code so two events for one lot are never
 * in flight together, whether they come from the inbox poller or the admin API.
 *
 * In-memory only (single-instance). Callers for a busy lot wait their turn
 * in arrival order instead of being rejected.
 */

import { normalizeLotCode } from '@lotrec/shared';
import { lockLogger } from './logger.js';

interface LockHolder {
    source: string;
    acquiredAt: number;
}

export interface LotLockStatus {
    lotCode: string;
    source: string;
    /** Seconds the current holder has held the lock */
    age: number;
    waiting: number;
}

export class LotLock {
    private readonly tails = new Map<string, Promise<void>>();
    private readonly holders = new Map<string, LockHolder>();
    private readonly waiting = new Map<string, number>();
    private readonly now: () => number;

    constructor(now: () => number = Date.now) {
        this.now = now;
    }

    /**
     * Run `fn` once every earlier holder of the same lot has finished.
     * The lock is released even when `fn` throws.
     */
    async runExclusive<T>(lotCode: string, source: string, fn: () => Promise<T>): Promise<T> {
        const key = normalizeLotCode(lotCode);
        const prior = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = prior.then(() => gate);
        this.tails.set(key, tail);

        const holder = this.holders.get(key);
        if (holder) {
            lockLogger.debug({ lotCode: key, source, heldBy: holder.source }, 'Lot busy, waiting');
        }

        this.waiting.set(key, (this.waiting.get(key) ?? 0) + 1);
        await prior;
        this.decrementWaiting(key);

        this.holders.set(key, { source, acquiredAt: this.now() });
        try {
            return await fn();
        } finally {
            this.holders.delete(key);
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    isLocked(lotCode: string): boolean {
        return this.holders.has(normalizeLotCode(lotCode));
    }

    /**
     * Get current lock status for debugging
     */
    getStatus(): LotLockStatus[] {
        const now = this.now();
        return Array.from(this.holders.entries()).map(([lotCode, holder]) => ({
            lotCode,
            source: holder.source,
            age: Math.round((now - holder.acquiredAt) / 1000),
            waiting: this.waiting.get(lotCode) ?? 0,
        }));
    }

    private decrementWaiting(key: string): void {
        const count = (this.waiting.get(key) ?? 1) - 1;
        if (count > 0) {
            this.waiting.set(key, count);
        } else {
            this.waiting.delete(key);
        }
    }
}
