/**
 * Reconciliation Domain Module
 *
 * Pure business logic for matching production events to ERP manufacturing orders.
 * No database or network dependencies.
 */

export * from './types.js';
export * from './events.js';
export * from './lotCodes.js';
export * from './retryPolicy.js';
export * from './workflowStateMachine.js';
