/**
 * Production Reconciliation - Domain Types
 *
 * Pure types shared by the server, the CLI and the tests.
 * The ERP's integer status codes never appear here; they are translated
 * at the ERP client boundary.
 */

// ============================================
// MANUFACTURING ORDER STATUS
// ============================================

/** `other` stands for any ERP code without a name here; the raw code travels on the order */
export const MO_STATUSES = ['planned', 'in_progress', 'done', 'cancelled', 'other'] as const;

export type MoStatus = (typeof MO_STATUSES)[number];

/** Statuses this system may send to the ERP */
export type WritableMoStatus = Exclude<MoStatus, 'other'>;

/** Statuses after which the ERP order no longer accepts production updates */
export const TERMINAL_MO_STATUSES: readonly MoStatus[] = ['done', 'cancelled'];

export function isMoStatus(value: unknown): value is MoStatus {
    return typeof value === 'string' && MO_STATUSES.some((status) => status === value);
}

export function isTerminalMoStatus(status: MoStatus): boolean {
    return TERMINAL_MO_STATUSES.includes(status);
}

// ============================================
// EVENTS & ORDERS
// ============================================

/**
 * A single scan + quantity fact captured on the production floor.
 */
export interface ProductionEvent {
    readonly lotCode: string;
    readonly producedQuantity: number;
    readonly unitOfMeasure: string | null;
    readonly capturedAt: Date;
}

/**
 * ERP-side manufacturing order, as seen by this system.
 * `expectedQuantity` is the planning estimate and is never written back.
 */
export interface RemoteOrder {
    orderId: number;
    orderNumber: string;
    itemCode: string;
    itemTitle: string;
    status: MoStatus;
    /** ERP code behind an `other` status, null otherwise */
    statusCode: number | null;
    expectedQuantity: number;
    actualQuantity: number | null;
    unit: string | null;
    targetLots: readonly string[];
}

// ============================================
// AUDIT
// ============================================

export type AttemptSource = 'cli' | 'poller' | 'api';

/**
 * One audit row per processing attempt. Append-only.
 */
export interface ReconciliationAttempt {
    id: string;
    lotCode: string;
    orderNumber: string | null;
    orderId: number | null;
    requestedQuantity: number;
    unitOfMeasure: string | null;
    statusBefore: MoStatus | null;
    statusAfter: MoStatus | null;
    succeeded: boolean;
    errorKind: string | null;
    errorMessage: string | null;
    lookupAttempts: number;
    updateAttempts: number;
    noop: boolean;
    source: AttemptSource;
    timestamp: Date;
}

export type NewReconciliationAttempt = Omit<ReconciliationAttempt, 'id'>;

// ============================================
// QUANTITIES
// ============================================

/** Tolerance used when comparing produced quantities read back from the ERP */
export const QUANTITY_EPSILON = 1e-6;

export function quantitiesEqual(a: number | null, b: number | null): boolean {
    if (a === null || b === null) return a === b;
    return Math.abs(a - b) < QUANTITY_EPSILON;
}
