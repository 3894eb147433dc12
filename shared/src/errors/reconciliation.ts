/**
 * Reconciliation Error Utilities
 *
 * Error kinds, codes, user-facing descriptions and the ReconciliationError class
 * for the lot reconciliation domain. Follows the result-based pattern: remote
 * steps return `ReconciliationResult<T>` instead of throwing across the workflow.
 */

// ============================================
// ERROR KINDS
// ============================================

/**
 * Coarse error taxonomy. Only `transient` is eligible for retry.
 */
export const RECONCILIATION_ERROR_KINDS = [
  'not_found',
  'ambiguous',
  'fatal',
  'conflict',
  'transient',
  'cancelled',
] as const;

export type ReconciliationErrorKind = (typeof RECONCILIATION_ERROR_KINDS)[number];

export function isRetryableKind(kind: ReconciliationErrorKind): boolean {
  return kind === 'transient';
}

// ============================================
// ERROR CODES
// ============================================

export const RECONCILIATION_ERROR_CODES = {
  // Lookup
  ORDER_NOT_FOUND: 'ORDER_NOT_FOUND',
  AMBIGUOUS_LOT: 'AMBIGUOUS_LOT',

  // Fatal
  VALIDATION: 'VALIDATION',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  BAD_REQUEST: 'BAD_REQUEST',
  ORDER_MISSING: 'ORDER_MISSING',
  UNKNOWN_STATUS: 'UNKNOWN_STATUS',
  NOT_CONFIGURED: 'NOT_CONFIGURED',
  UNEXPECTED: 'UNEXPECTED',

  // Conflict
  ALREADY_TRANSITIONED: 'ALREADY_TRANSITIONED',

  // Transient
  TIMEOUT: 'TIMEOUT',
  NETWORK: 'NETWORK',
  SERVER_ERROR: 'SERVER_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
  BAD_RESPONSE: 'BAD_RESPONSE',
  UNCONFIRMED: 'UNCONFIRMED',

  // Shutdown
  CANCELLED: 'CANCELLED',
} as const;

export type ReconciliationErrorCode =
  (typeof RECONCILIATION_ERROR_CODES)[keyof typeof RECONCILIATION_ERROR_CODES];

/**
 * Kind of every code. A code never changes kind.
 */
export const RECONCILIATION_ERROR_CODE_KINDS: Record<ReconciliationErrorCode, ReconciliationErrorKind> = {
  ORDER_NOT_FOUND: 'not_found',
  AMBIGUOUS_LOT: 'ambiguous',
  VALIDATION: 'fatal',
  UNAUTHORIZED: 'fatal',
  FORBIDDEN: 'fatal',
  BAD_REQUEST: 'fatal',
  ORDER_MISSING: 'fatal',
  UNKNOWN_STATUS: 'fatal',
  NOT_CONFIGURED: 'fatal',
  UNEXPECTED: 'fatal',
  ALREADY_TRANSITIONED: 'conflict',
  TIMEOUT: 'transient',
  NETWORK: 'transient',
  SERVER_ERROR: 'transient',
  RATE_LIMITED: 'transient',
  BAD_RESPONSE: 'transient',
  UNCONFIRMED: 'transient',
  CANCELLED: 'cancelled',
};

// ============================================
// MESSAGES
// ============================================

export const RECONCILIATION_ERROR_MESSAGES: Record<ReconciliationErrorCode, string> = {
  ORDER_NOT_FOUND: 'No manufacturing order matches this lot code',
  AMBIGUOUS_LOT: 'More than one manufacturing order matches this lot code',
  VALIDATION: 'The production event is invalid',
  UNAUTHORIZED: 'The ERP rejected the API credentials',
  FORBIDDEN: 'The ERP credentials lack permission for this operation',
  BAD_REQUEST: 'The ERP rejected the request',
  ORDER_MISSING: 'The manufacturing order no longer exists',
  UNKNOWN_STATUS: 'The ERP returned an unknown order status',
  NOT_CONFIGURED: 'The ERP client is not configured',
  UNEXPECTED: 'An unexpected error occurred',
  ALREADY_TRANSITIONED: 'The manufacturing order was already closed with different values',
  TIMEOUT: 'The ERP request timed out',
  NETWORK: 'Could not reach the ERP',
  SERVER_ERROR: 'The ERP returned a server error',
  RATE_LIMITED: 'The ERP is rate limiting requests',
  BAD_RESPONSE: 'The ERP returned an unreadable response',
  UNCONFIRMED: 'The ERP did not confirm the update',
  CANCELLED: 'Processing was cancelled',
};

// ============================================
// FAILURE SHAPE
// ============================================

export interface ReconciliationFailure {
  kind: ReconciliationErrorKind;
  code: ReconciliationErrorCode;
  message: string;
  /** Server-supplied wait hint (HTTP Retry-After) */
  retryAfterMs?: number;
  context?: Record<string, unknown>;
}

// ============================================
// ERROR CLASS
// ============================================

/**
 * Thrown at the ERP boundary; converted to a failure result by the
 * lookup and update steps.
 */
export class ReconciliationError extends Error {
  readonly kind: ReconciliationErrorKind;
  readonly code: ReconciliationErrorCode;
  readonly retryAfterMs?: number;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ReconciliationErrorCode,
    options?: {
      message?: string;
      retryAfterMs?: number;
      context?: Record<string, unknown>;
    }
  ) {
    super(options?.message || RECONCILIATION_ERROR_MESSAGES[code]);
    this.name = 'ReconciliationError';
    this.kind = RECONCILIATION_ERROR_CODE_KINDS[code];
    this.code = code;
    this.retryAfterMs = options?.retryAfterMs;
    this.context = options?.context;
    Object.setPrototypeOf(this, ReconciliationError.prototype);
  }

  toFailure(): ReconciliationFailure {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      ...(this.retryAfterMs !== undefined ? { retryAfterMs: this.retryAfterMs } : {}),
      ...(this.context ? { context: this.context } : {}),
    };
  }
}

export function isReconciliationError(error: unknown): error is ReconciliationError {
  return error instanceof ReconciliationError;
}

/**
 * Normalize anything thrown by a remote step. Errors that did not come
 * through the ERP boundary are programming errors and are not retried.
 */
export function toReconciliationFailure(error: unknown): ReconciliationFailure {
  if (isReconciliationError(error)) {
    return error.toFailure();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'fatal', code: RECONCILIATION_ERROR_CODES.UNEXPECTED, message };
}

// ============================================
// RESULT TYPES
// ============================================

export interface ReconciliationSuccessResult<T> {
  success: true;
  data: T;
}

export interface ReconciliationErrorResult {
  success: false;
  error: ReconciliationFailure;
}

export type ReconciliationResult<T> = ReconciliationSuccessResult<T> | ReconciliationErrorResult;

export function reconciliationSuccess<T>(data: T): ReconciliationSuccessResult<T> {
  return { success: true, data };
}

export function reconciliationFailure(
  code: ReconciliationErrorCode,
  message?: string,
  context?: Record<string, unknown>
): ReconciliationErrorResult {
  return {
    success: false,
    error: {
      kind: RECONCILIATION_ERROR_CODE_KINDS[code],
      code,
      message: message || RECONCILIATION_ERROR_MESSAGES[code],
      ...(context ? { context } : {}),
    },
  };
}

// ============================================
// USER-FACING DESCRIPTION
// ============================================

/**
 * Human-readable one-liner for the CLI, the poller's failure_reason and the API.
 *
 * @param attempts - calls made for the step that failed
 */
export function describeReconciliationFailure(failure: ReconciliationFailure, attempts: number): string {
  switch (failure.kind) {
    case 'not_found':
      return `No order found: ${failure.message}`;
    case 'ambiguous':
      return `Multiple orders found, escalate to a supervisor: ${failure.message}`;
    case 'transient':
      return `Remote system unavailable after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${failure.message}`;
    case 'conflict':
      return `Order already transitioned, escalate to a supervisor: ${failure.message}`;
    case 'cancelled':
      return `Processing cancelled: ${failure.message}`;
    case 'fatal':
      return `Cannot process event: ${failure.message}`;
  }
}
