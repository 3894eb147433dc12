/**
 * Reconciliation service wiring
 *
 * Builds the ERP client, listing cache, lookup, update, audit log and
 * workflow from validated configuration. Tests pass their own gateway,
 * store and sleep.
 */

import {
    validateRetryPolicy,
    type RemoteOrder,
    type RetryPolicyConfig,
} from '@lotrec/shared';
import type { Env } from '../../config/env.js';
import { LotLock } from '../../utils/lotLock.js';
import type { Sleep } from '../../utils/sleep.js';
import { TtlCache } from '../../utils/ttlCache.js';
import { ErpClient } from '../erp/client.js';
import type { ErpGateway } from '../erp/gateway.js';
import { AuditLog, type AuditStore } from './auditLog.js';
import { OrderLookup } from './orderLookup.js';
import { OrderUpdate } from './orderUpdate.js';
import { ReconciliationWorkflow } from './workflow.js';

export type ReconciliationConfig = Pick<
    Env,
    | 'ERP_API_URL'
    | 'ERP_API_KEY'
    | 'ERP_API_SECRET'
    | 'ERP_REQUEST_TIMEOUT_MS'
    | 'RETRY_MAX_ATTEMPTS'
    | 'RETRY_INITIAL_DELAY_MS'
    | 'RETRY_BACKOFF_FACTOR'
    | 'RETRY_MAX_DELAY_MS'
    | 'ORDER_CACHE_TTL_MS'
    | 'ORDER_CACHE_MAX_ENTRIES'
>;

export interface ReconciliationServicesOptions {
    config: ReconciliationConfig;
    auditStore: AuditStore;
    gateway?: ErpGateway;
    lotLock?: LotLock;
    sleep?: Sleep;
    now?: () => Date;
}

export interface ReconciliationServices {
    gateway: ErpGateway;
    lookup: OrderLookup;
    update: OrderUpdate;
    audit: AuditLog;
    workflow: ReconciliationWorkflow;
    lotLock: LotLock;
    retryPolicy: RetryPolicyConfig;
}

export function retryPolicyFromConfig(config: ReconciliationConfig): RetryPolicyConfig {
    const policy: RetryPolicyConfig = {
        maxAttempts: config.RETRY_MAX_ATTEMPTS,
        initialDelayMs: config.RETRY_INITIAL_DELAY_MS,
        backoffFactor: config.RETRY_BACKOFF_FACTOR,
        maxDelayMs: config.RETRY_MAX_DELAY_MS,
    };
    const problems = validateRetryPolicy(policy);
    if (problems.length > 0) {
        throw new Error(`Invalid retry policy: ${problems.join('; ')}`);
    }
    return policy;
}

export function createReconciliationServices(options: ReconciliationServicesOptions): ReconciliationServices {
    const { config } = options;

    const gateway = options.gateway ?? new ErpClient({
        baseUrl: config.ERP_API_URL,
        apiKey: config.ERP_API_KEY,
        apiSecret: config.ERP_API_SECRET,
        timeoutMs: config.ERP_REQUEST_TIMEOUT_MS,
    });

    const cache = new TtlCache<string, RemoteOrder[]>({
        maxEntries: config.ORDER_CACHE_MAX_ENTRIES,
        ttlMs: config.ORDER_CACHE_TTL_MS,
    });

    const retryPolicy = retryPolicyFromConfig(config);
    const lookup = new OrderLookup({ gateway, cache });
    const update = new OrderUpdate(gateway);
    const audit = new AuditLog(options.auditStore);
    const workflow = new ReconciliationWorkflow({
        lookup,
        update,
        audit,
        retryPolicy,
        sleep: options.sleep,
        now: options.now,
    });

    return {
        gateway,
        lookup,
        update,
        audit,
        workflow,
        lotLock: options.lotLock ?? new LotLock(),
        retryPolicy,
    };
}

export { AuditLog, type AuditStore, type AuditQuery } from './auditLog.js';
export { FileAuditStore } from './fileAuditStore.js';
export { OrderLookup, ORDER_LISTING_CACHE_KEY } from './orderLookup.js';
export { OrderUpdate, type UpdateOutcome } from './orderUpdate.js';
export { runWithRetry, type RetryRunResult } from './retry.js';
export { ReconciliationWorkflow, type WorkflowOutcome, type WorkflowRunOptions } from './workflow.js';
