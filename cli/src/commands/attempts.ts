import type { Command } from 'commander';
import { z } from 'zod';
import { api } from '../api.js';
import { error, json, table } from '../format.js';

const attemptsResponseSchema = z.object({
  attempts: z.array(
    z.object({
      id: z.string(),
      lotCode: z.string(),
      orderNumber: z.string().nullable(),
      requestedQuantity: z.number(),
      unitOfMeasure: z.string().nullable(),
      statusBefore: z.string().nullable(),
      statusAfter: z.string().nullable(),
      succeeded: z.boolean(),
      errorKind: z.string().nullable(),
      errorMessage: z.string().nullable(),
      updateAttempts: z.number(),
      noop: z.boolean(),
      source: z.string(),
      timestamp: z.string(),
    })
  ),
});

export function registerAttemptsCommand(program: Command): void {
  program
    .command('attempts')
    .description('Show the reconciliation audit trail (via admin API)')
    .argument('[lotCode]', 'Only attempts for this lot')
    .option('-l, --limit <n>', 'Max rows', '20')
    .option('--json', 'Output raw JSON')
    .action(async (lotCode: string | undefined, opts: { limit: string; json?: boolean }) => {
      const params = new URLSearchParams({ limit: opts.limit });
      if (lotCode) params.set('lotCode', lotCode);

      const res = await api(`/api/reconciliation/attempts?${params.toString()}`, attemptsResponseSchema);
      if (!res.ok || !res.data) {
        error(`Failed to fetch attempts: ${res.error}`);
        process.exitCode = 1;
        return;
      }

      if (opts.json) {
        json(res.data.attempts);
        return;
      }

      table(
        res.data.attempts.map((a) => ({
          time: a.timestamp.replace('T', ' ').slice(0, 19),
          lot: a.lotCode,
          order: a.orderNumber ?? '',
          qty: a.unitOfMeasure ? `${a.requestedQuantity} ${a.unitOfMeasure}` : String(a.requestedQuantity),
          result: a.succeeded ? (a.noop ? 'ok (noop)' : 'ok') : a.errorKind ?? 'failed',
          status: a.statusAfter ?? a.statusBefore ?? '',
          tries: a.updateAttempts,
          source: a.source,
          error: a.errorMessage ?? '',
        })),
        ['time', 'lot', 'order', 'qty', 'result', 'status', 'tries', 'source', 'error']
      );
    });
}
