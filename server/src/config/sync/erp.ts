/**
 * ERP Sync Configuration
 *
 * Settings for talking to the manufacturing ERP: endpoints, paging and
 * the integer status codes used on the wire.
 *
 * TO CHANGE ERP SETTINGS:
 * Update the values below. Timeouts and retry budgets can also be
 * overridden per deployment through the environment (see config/env.ts).
 */

import type { WritableMoStatus } from '@lotrec/shared';

// ============================================
// API SETTINGS
// ============================================

export const ERP_DEFAULT_BASE_URL = 'https://api.mrpeasy.com/rest/v1';

export const ERP_MANUFACTURING_ORDERS_PATH = '/manufacturing-orders';

/**
 * Page size for the manufacturing order listing
 *
 * The listing is paged with a `Range: items=<start>-<end>` header.
 * A page shorter than this is the last one.
 */
export const ERP_PAGE_SIZE = 100;

/**
 * Hard stop for the listing loop
 */
export const ERP_MAX_PAGES = 200;

/**
 * API request timeout (ms)
 */
export const ERP_API_TIMEOUT_MS = 30000;

// ============================================
// STATUS CODES
// ============================================

/**
 * ERP integer status -> domain status
 *
 * Codes outside this table map to `other`. Such orders can still be listed,
 * but OrderUpdate refuses to write to them.
 */
export const ERP_STATUS_CODES: Readonly<Record<number, WritableMoStatus>> = {
    5: 'planned',
    10: 'in_progress',
    20: 'done',
    30: 'cancelled',
};

export const ERP_STATUS_VALUES: Readonly<Record<WritableMoStatus, number>> = {
    planned: 5,
    in_progress: 10,
    done: 20,
    cancelled: 30,
};

// ============================================
// INBOX POLLING
// ============================================

/** Batch size for a one-shot poll (CLI `poll` without --watch) */
export const INBOX_ONCE_BATCH_SIZE = 10;

/** Maximum length of the failure_reason column */
export const INBOX_FAILURE_REASON_MAX_LENGTH = 255;

/** Delay before the first poll after server start (ms) */
export const INBOX_STARTUP_DELAY_MS = 5000;
