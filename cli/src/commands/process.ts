/**
 * Process command: reconcile one production event against the ERP
 *
 * Runs in-process with the server's configuration. Exit code 0 means the
 * order was updated (or already matched), 1 means it was not.
 */

import type { Command } from 'commander';
import { createProductionEvent } from '@lotrec/shared';
import type { WorkflowOutcome } from '@lotrec/server';
import { heading, field, success, error, json, statusColor } from '../format.js';

/**
 * Print an outcome and return the exit code for it.
 * Failures go to stderr, except under --json where the outcome carries them.
 */
export function reportOutcome(outcome: WorkflowOutcome, opts: { json?: boolean } = {}): number {
  const exitCode = outcome.state === 'logged' ? 0 : 1;

  if (opts.json) {
    json(outcome);
    return exitCode;
  }

  if (outcome.state !== 'logged') {
    error(outcome.message);
    return exitCode;
  }

  success(outcome.message);
  if (outcome.order) {
    heading(`Order ${outcome.order.orderNumber}`);
    field('Lot', outcome.event.lotCode);
    field('Item', outcome.order.itemCode);
    field('Status', statusColor(outcome.order.status));
    field('Status before', outcome.statusBefore);
    field('Expected qty', outcome.order.expectedQuantity);
    field('Actual qty', outcome.order.actualQuantity);
    field('Unit', outcome.order.unit);
    field('Attempts', `lookup ${outcome.lookupAttempts}, update ${outcome.updateAttempts}`);
    if (!outcome.auditRecorded) {
      field('Audit', 'not recorded');
    }
  }
  return exitCode;
}

export function registerProcessCommand(program: Command): void {
  program
    .command('process')
    .description('Reconcile one lot against its manufacturing order')
    .argument('<lotCode>', 'Lot code printed on the label, e.g. L28553')
    .argument('<quantity>', 'Produced quantity, e.g. 2.5')
    .argument('[unitOfMeasure]', 'Unit of measure, e.g. kg')
    .option('--json', 'Output the full outcome as JSON')
    .action(async (lotCode: string, quantity: string, unitOfMeasure: string | undefined, opts: { json?: boolean }) => {
      const { getEnv } = await import('@lotrec/server/config');
      const { createRuntime } = await import('@lotrec/server');

      const runtime = createRuntime(getEnv());
      const { workflow, lotLock } = runtime.services;

      // Number('') is 0 and 'abc' is NaN: both fail event validation and are audited
      const event = createProductionEvent(lotCode, Number(quantity), unitOfMeasure ?? null);

      try {
        const outcome = await lotLock.runExclusive(event.lotCode, 'cli', () =>
          workflow.run(event, { source: 'cli' })
        );

        process.exitCode = reportOutcome(outcome, opts);
      } finally {
        await runtime.close();
      }
    });
}
