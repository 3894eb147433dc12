/**
 * @lotrec/shared - Shared types and schemas for the lot reconciler
 *
 * This package contains the reconciliation domain (types, retry policy,
 * workflow state machine, lot code matching), Zod input schemas and the
 * reconciliation error utilities shared by the server and the CLI.
 *
 * Nothing here performs I/O.
 */

export * from './domain/reconciliation/index.js';
export * from './schemas/reconciliation.js';
export * from './errors/index.js';
