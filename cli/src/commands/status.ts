import type { Command } from 'commander';
import { z } from 'zod';
import { api } from '../api.js';
import { heading, field, error, json, table } from '../format.js';

const pollResultSchema = z.object({
  fetched: z.number(),
  succeeded: z.number(),
  failed: z.number(),
  deferred: z.number(),
  alreadyAcknowledged: z.number(),
  errors: z.number(),
  skipped: z.boolean(),
});

const statusResponseSchema = z.object({
  poller: z
    .object({
      running: z.boolean(),
      polling: z.boolean(),
      intervalMs: z.number(),
      batchSize: z.number(),
      concurrency: z.number(),
      inFlight: z.number(),
      lastRunAt: z.string().nullable(),
      lastResult: pollResultSchema.nullable(),
    })
    .nullable(),
  locks: z.array(
    z.object({
      lotCode: z.string(),
      source: z.string(),
      age: z.number(),
      waiting: z.number(),
    })
  ),
  retryPolicy: z.object({
    maxAttempts: z.number(),
    initialDelayMs: z.number(),
    backoffFactor: z.number(),
    maxDelayMs: z.number(),
  }),
});

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show poller, lock and retry status (via admin API)')
    .option('--json', 'Output raw JSON')
    .action(async (opts: { json?: boolean }) => {
      const res = await api('/api/reconciliation/status', statusResponseSchema);
      if (!res.ok || !res.data) {
        error(`Failed to fetch status: ${res.error}`);
        process.exitCode = 1;
        return;
      }

      if (opts.json) {
        json(res.data);
        return;
      }

      const { poller, locks, retryPolicy } = res.data;

      heading('Inbox poller');
      if (!poller) {
        field('State', 'not configured');
      } else {
        field('State', poller.running ? (poller.polling ? 'polling' : 'idle') : 'stopped');
        field('Interval', `${poller.intervalMs}ms`);
        field('Batch / parallel', `${poller.batchSize} / ${poller.concurrency}`);
        field('In flight', poller.inFlight);
        field('Last run', poller.lastRunAt);
        if (poller.lastResult) {
          const r = poller.lastResult;
          field('Last result', `${r.succeeded} ok, ${r.failed} failed, ${r.deferred} deferred, ${r.errors} errors`);
        }
      }

      heading('Retry policy');
      field('Max attempts', retryPolicy.maxAttempts);
      field('Initial delay', `${retryPolicy.initialDelayMs}ms`);
      field('Multiplier', retryPolicy.backoffFactor);
      field('Max delay', `${retryPolicy.maxDelayMs}ms`);

      heading(`Lot locks (${locks.length})`);
      table(locks.map((l) => ({ lot: l.lotCode, source: l.source, age: `${l.age}s`, waiting: l.waiting })));
    });
}
