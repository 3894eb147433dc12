/**
 * ERP REST Client
 *
 * Reads and updates manufacturing orders over HTTP basic auth.
 * No retries here: callers wrap calls with the retry policy so that
 * every attempt is counted and audited.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { z } from 'zod';
import { ReconciliationError, type RemoteOrder } from '@lotrec/shared';
import { erpLogger } from '../../utils/logger.js';
import {
    ERP_MANUFACTURING_ORDERS_PATH,
    ERP_MAX_PAGES,
    ERP_PAGE_SIZE,
} from '../../config/index.js';
import { classifyErpError } from './errors.js';
import { statusToErp, toRemoteOrder } from './mapping.js';
import {
    erpManufacturingOrderListSchema,
    erpManufacturingOrderSchema,
    type ErpManufacturingOrderUpdate,
} from './schemas.js';
import type { ErpGateway, ManufacturingOrderFilters, ManufacturingOrderUpdate } from './gateway.js';

// ============================================
// TYPES
// ============================================

export interface ErpClientConfig {
    baseUrl: string;
    apiKey?: string | null;
    apiSecret?: string | null;
    timeoutMs: number;
    pageSize?: number;
    maxPages?: number;
    /** Replaces the HTTP transport (tests) */
    adapter?: AxiosAdapter;
}

// ============================================
// CLIENT CLASS
// ============================================

export class ErpClient implements ErpGateway {
    private readonly pageSize: number;
    private readonly maxPages: number;
    private readonly client: AxiosInstance | null;

    constructor(config: ErpClientConfig) {
        this.pageSize = config.pageSize ?? ERP_PAGE_SIZE;
        this.maxPages = config.maxPages ?? ERP_MAX_PAGES;

        this.client = config.apiKey && config.apiSecret
            ? axios.create({
                baseURL: config.baseUrl,
                auth: { username: config.apiKey, password: config.apiSecret },
                headers: {
                    'Content-Type': 'application/json',
                    Accept: 'application/json',
                },
                timeout: config.timeoutMs,
                ...(config.adapter ? { adapter: config.adapter } : {}),
            })
            : null;
    }

    /**
     * Fetch the whole listing page by page using the Range header.
     * 200 and 206 both carry a page; a short page is the last one.
     */
    async listManufacturingOrders(filters: ManufacturingOrderFilters = {}): Promise<RemoteOrder[]> {
        const params: Record<string, string | number> = {};
        if (filters.itemCode) params.item_code = filters.itemCode;
        if (filters.status) params.status = statusToErp(filters.status);

        const orders: RemoteOrder[] = [];
        for (let page = 0; page < this.maxPages; page++) {
            const start = page * this.pageSize;
            const end = start + this.pageSize - 1;
            const operation = `listManufacturingOrders:${start}-${end}`;

            const wire = await this.request(operation, async (client) => {
                const response = await client.get<unknown>(ERP_MANUFACTURING_ORDERS_PATH, {
                    params,
                    headers: { Range: `items=${start}-${end}` },
                });
                return this.parseBody(erpManufacturingOrderListSchema, response.data, operation);
            });

            for (const item of wire) {
                orders.push(toRemoteOrder(item));
            }
            if (wire.length < this.pageSize) {
                return orders;
            }
        }

        erpLogger.warn({ maxPages: this.maxPages, fetched: orders.length }, 'Listing truncated at page limit');
        return orders;
    }

    async getManufacturingOrder(orderId: number): Promise<RemoteOrder | null> {
        const operation = `getManufacturingOrder:${orderId}`;
        try {
            const wire = await this.request(operation, async (client) => {
                const response = await client.get<unknown>(`${ERP_MANUFACTURING_ORDERS_PATH}/${orderId}`);
                return this.parseBody(erpManufacturingOrderSchema, response.data, operation);
            });
            return toRemoteOrder(wire);
        } catch (error) {
            if (error instanceof ReconciliationError && error.code === 'ORDER_MISSING') {
                return null;
            }
            throw error;
        }
    }

    async updateManufacturingOrder(orderId: number, update: ManufacturingOrderUpdate): Promise<void> {
        const operation = `updateManufacturingOrder:${orderId}`;
        const body: ErpManufacturingOrderUpdate = {
            actual_quantity: update.actualQuantity,
            status: statusToErp(update.status),
        };

        await this.request(operation, async (client) => {
            await client.put(`${ERP_MANUFACTURING_ORDERS_PATH}/${orderId}`, body);
        });

        erpLogger.info({ orderId, actualQuantity: update.actualQuantity, status: update.status }, 'Updated manufacturing order');
    }

    // ============================================
    // INTERNALS
    // ============================================

    private async request<T>(operation: string, fn: (client: AxiosInstance) => Promise<T>): Promise<T> {
        if (!this.client) {
            throw new ReconciliationError('NOT_CONFIGURED', {
                message: 'ERP_API_KEY and ERP_API_SECRET must be set',
            });
        }

        const start = Date.now();
        try {
            const result = await fn(this.client);
            erpLogger.debug({ operation, durationMs: Date.now() - start }, 'ERP request completed');
            return result;
        } catch (error) {
            const classified = classifyErpError(error, operation);
            erpLogger.warn(
                { operation, code: classified.code, kind: classified.kind, durationMs: Date.now() - start },
                'ERP request failed'
            );
            throw classified;
        }
    }

    private parseBody<S extends z.ZodTypeAny>(schema: S, data: unknown, operation: string): z.output<S> {
        const result = schema.safeParse(data);
        if (!result.success) {
            const issue = result.error.issues[0];
            throw new ReconciliationError('BAD_RESPONSE', {
                message: `${operation}: unexpected response body (${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'})`,
                context: { operation },
            });
        }
        return result.data;
    }
}
