/**
 * Order Lookup
 *
 * Resolves a lot code to exactly one manufacturing order. The ERP listing
 * has no lot filter, so the listing is fetched (or taken from the cache)
 * and matched locally against each lot code candidate in turn.
 */

import {
    lotCodeCandidates,
    lotCodesMatch,
    normalizeLotCode,
    reconciliationFailure,
    reconciliationSuccess,
    toReconciliationFailure,
    MAX_LOT_CODE_CANDIDATES,
    type ReconciliationResult,
    type RemoteOrder,
} from '@lotrec/shared';
import { reconciliationLogger } from '../../utils/logger.js';
import type { TtlCache } from '../../utils/ttlCache.js';
import type { ErpGateway } from '../erp/gateway.js';

export const ORDER_LISTING_CACHE_KEY = 'manufacturing-orders';

export interface OrderLookupOptions {
    gateway: ErpGateway;
    cache: TtlCache<string, RemoteOrder[]>;
    maxCandidates?: number;
}

interface CandidateMatch {
    candidate: string | null;
    matches: RemoteOrder[];
    tried: string[];
}

export class OrderLookup {
    private readonly gateway: ErpGateway;
    private readonly cache: TtlCache<string, RemoteOrder[]>;
    private readonly maxCandidates: number;

    constructor(options: OrderLookupOptions) {
        this.gateway = options.gateway;
        this.cache = options.cache;
        this.maxCandidates = options.maxCandidates ?? MAX_LOT_CODE_CANDIDATES;
    }

    async find(lotCode: string): Promise<ReconciliationResult<RemoteOrder>> {
        const normalized = normalizeLotCode(lotCode);
        if (!normalized) {
            return reconciliationFailure('VALIDATION', 'Lot code is required');
        }

        try {
            const listing = await this.loadListing(false);
            let match = this.matchCandidates(lotCode, listing.orders);

            // A cached snapshot may predate the order; look once more before reporting a miss
            if (match.matches.length === 0 && listing.fromCache) {
                const fresh = await this.loadListing(true);
                match = this.matchCandidates(lotCode, fresh.orders);
            }

            if (match.matches.length === 0) {
                return reconciliationFailure(
                    'ORDER_NOT_FOUND',
                    `No manufacturing order lists lot ${normalized}`,
                    { lotCode: normalized, tried: match.tried }
                );
            }

            if (match.matches.length > 1) {
                const orderNumbers = match.matches.map((order) => order.orderNumber);
                return reconciliationFailure(
                    'AMBIGUOUS_LOT',
                    `Lot ${match.candidate ?? normalized} matches ${orderNumbers.length} orders: ${orderNumbers.join(', ')}`,
                    { lotCode: normalized, orderNumbers }
                );
            }

            const [listed] = match.matches;
            if (!listed) {
                return reconciliationFailure('ORDER_NOT_FOUND', `No manufacturing order lists lot ${normalized}`);
            }
            if (match.candidate !== normalized) {
                reconciliationLogger.info(
                    { lotCode: normalized, matchedAs: match.candidate, orderNumber: listed.orderNumber },
                    'Lot matched through a fallback spelling'
                );
            }

            // Always return the detail view, never the listing snapshot
            const order = await this.gateway.getManufacturingOrder(listed.orderId);
            if (!order) {
                this.cache.delete(ORDER_LISTING_CACHE_KEY);
                return reconciliationFailure(
                    'ORDER_MISSING',
                    `Manufacturing order ${listed.orderNumber} disappeared after it was listed`,
                    { orderId: listed.orderId }
                );
            }

            return reconciliationSuccess(order);
        } catch (error) {
            return { success: false, error: toReconciliationFailure(error) };
        }
    }

    private async loadListing(forceRefresh: boolean): Promise<{ orders: RemoteOrder[]; fromCache: boolean }> {
        if (!forceRefresh) {
            const cached = this.cache.get(ORDER_LISTING_CACHE_KEY);
            if (cached) {
                return { orders: cached, fromCache: true };
            }
        }

        const orders = await this.gateway.listManufacturingOrders();
        this.cache.set(ORDER_LISTING_CACHE_KEY, orders);
        reconciliationLogger.debug({ count: orders.length, forceRefresh }, 'Loaded manufacturing order listing');
        return { orders, fromCache: false };
    }

    /** First candidate with any match decides */
    private matchCandidates(lotCode: string, orders: readonly RemoteOrder[]): CandidateMatch {
        const tried: string[] = [];
        for (const candidate of lotCodeCandidates(lotCode, this.maxCandidates)) {
            tried.push(candidate);
            const matches = orders.filter((order) =>
                order.targetLots.some((lot) => lotCodesMatch(lot, candidate))
            );
            if (matches.length > 0) {
                return { candidate, matches, tried };
            }
        }
        return { candidate: null, matches: [], tried };
    }
}
