/**
 * Poll command: drain pending rows from production_inbox
 *
 * Once by default; --watch keeps polling until SIGINT/SIGTERM.
 */

import type { Command } from 'commander';
import { field, heading, error, success, warn } from '../format.js';

interface PollOptions {
  watch?: boolean;
  limit?: string;
  interval?: string;
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer (got ${value})`);
  }
  return parsed;
}

export function registerPollCommand(program: Command): void {
  program
    .command('poll')
    .description('Process pending production events from the inbox table')
    .option('-w, --watch', 'Keep polling until interrupted')
    .option('-l, --limit <n>', 'Rows per poll (default 10 once, POLL_BATCH_SIZE when watching)')
    .option('-i, --interval <ms>', 'Poll interval in ms when watching (default POLL_INTERVAL_MS)')
    .action(async (opts: PollOptions) => {
      const { getEnv, INBOX_ONCE_BATCH_SIZE } = await import('@lotrec/server/config');
      const { createRuntime } = await import('@lotrec/server');

      const env = getEnv();
      const limit = parsePositiveInt(opts.limit, '--limit');
      const intervalMs = parsePositiveInt(opts.interval, '--interval');

      const runtime = createRuntime(env, {
        batchSize: limit ?? (opts.watch ? env.POLL_BATCH_SIZE : INBOX_ONCE_BATCH_SIZE),
        intervalMs,
      });
      const { poller } = runtime;

      if (!poller) {
        error('DATABASE_URL is not set: there is no inbox to poll');
        await runtime.close();
        process.exitCode = 1;
        return;
      }

      if (opts.watch) {
        const status = poller.getStatus();
        success(`Watching inbox every ${status.intervalMs}ms (batch ${status.batchSize}). Ctrl+C to stop.`);
        await new Promise<void>((resolve) => {
          const onSignal = () => {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
            resolve();
          };
          process.on('SIGINT', onSignal);
          process.on('SIGTERM', onSignal);
          poller.start();
        });
        warn('Stopping, waiting for in-flight rows');
        await runtime.close();
        return;
      }

      try {
        const result = await poller.pollOnce();
        heading('Poll result');
        field('Fetched', result.fetched);
        field('Succeeded', result.succeeded);
        field('Failed', result.failed);
        field('Deferred', result.deferred);
        field('Already acked', result.alreadyAcknowledged);
        field('Errors', result.errors);
        process.exitCode = result.errors > 0 ? 1 : 0;
      } finally {
        await runtime.close();
      }
    });
}
