import type { Command } from 'commander';
import { error, success, warn } from '../format.js';

export function registerMigrateCommand(program: Command): void {
  program
    .command('migrate')
    .description('Create or update the inbox and audit tables')
    .action(async () => {
      const { getEnv } = await import('@lotrec/server/config');
      const { getKysely, closeKysely, migrateToLatest } = await import('@lotrec/server/db');

      const env = getEnv();
      if (!env.DATABASE_URL) {
        error('DATABASE_URL is not set');
        process.exitCode = 1;
        return;
      }

      try {
        const { results, error: migrationError } = await migrateToLatest(getKysely(env.DATABASE_URL));

        if (results.length === 0 && !migrationError) {
          success('Already up to date');
        }
        for (const result of results) {
          if (result.status === 'Success') {
            success(`Applied ${result.migrationName}`);
          } else if (result.status === 'Error') {
            error(`Failed ${result.migrationName}`);
          } else {
            warn(`Skipped ${result.migrationName}`);
          }
        }

        if (migrationError) {
          error(migrationError instanceof Error ? migrationError.message : String(migrationError));
          process.exitCode = 1;
        }
      } finally {
        await closeKysely();
      }
    });
}
