/**
 * Shared Error Utilities
 *
 * Export barrel for domain-specific error utilities.
 */

export {
  // Kinds & codes
  RECONCILIATION_ERROR_KINDS,
  RECONCILIATION_ERROR_CODES,
  RECONCILIATION_ERROR_CODE_KINDS,
  type ReconciliationErrorKind,
  type ReconciliationErrorCode,
  // Messages
  RECONCILIATION_ERROR_MESSAGES,
  describeReconciliationFailure,
  // Error class
  ReconciliationError,
  isReconciliationError,
  toReconciliationFailure,
  isRetryableKind,
  // Result types
  type ReconciliationFailure,
  type ReconciliationSuccessResult,
  type ReconciliationErrorResult,
  type ReconciliationResult,
  // Result helpers
  reconciliationSuccess,
  reconciliationFailure,
} from './reconciliation.js';
