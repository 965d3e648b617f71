/**
 * Backfill Drain CLI
 * Layer: Entry Point (CLI)
 *
 *   npm run drain [-- --batch-size 50] [--budget 50] [--publish-overrides] [--purge-overrides]
 *
 * Optionally syncs the override tiers into the cache first, then drains one
 * slice of the backfill queue and prints the outcome plus the queue's status
 * counts. Meant for a scheduler (cron, CI job), one slice per invocation.
 */
import { container } from '@core/container';
import { config } from '@core/config';
import { TOKENS } from '@core/types';
import { BackfillDrainService } from '@application/services/BackfillDrainService';
import { MappingStore } from '@application/services/MappingStore';
import type { IBackfillQueue } from '@domain/interfaces/IBackfillQueue';
import { destroyDbConnection } from '@infrastructure/database/connection';

// CLI argument parsing

const args = process.argv.slice(2);

function getNumberArg(flag: string, fallback: number): number {
  const idx = args.indexOf(flag);
  if (idx === -1 || !args[idx + 1]) return fallback;
  const value = Number.parseInt(args[idx + 1], 10);
  return Number.isInteger(value) && value >= 0 ? value : fallback;
}

const hasFlag = (flag: string): boolean => args.includes(flag);

const batchSize = getNumberArg('--batch-size', config.backfill.drainBatchSize);
const budget = getNumberArg('--budget', batchSize);

// Main

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  log('');
  log('  Backfill drain');
  log(`  Batch size: ${batchSize}`);
  log(`  Budget:     ${budget}`);
  log('');

  try {
    const store = container.resolve<MappingStore>(TOKENS.MappingStore);

    if (hasFlag('--publish-overrides')) {
      const published = await store.publishOverrides();
      log(`  Overrides published: ${published.written} written, ${published.skipped} skipped`);
    }
    if (hasFlag('--purge-overrides')) {
      const purged = await store.purgeOrphanedOverrides();
      log(`  Orphaned overrides purged: ${purged}`);
    }

    const drainer = container.resolve<BackfillDrainService>(TOKENS.BackfillDrainService);
    const result = await drainer.drain({ batchSize, budget, staleAfterMs: config.backfill.staleAfterMs });

    log(`  Released stale: ${result.released}`);
    log(`  Claimed:        ${result.claimed}`);
    log(`  Resolved:       ${result.resolved}`);
    log(`  Failed:         ${result.failed}`);

    const counts = await container.resolve<IBackfillQueue>(TOKENS.BackfillQueue).countByStatus();
    log('');
    log(
      `  Queue: ${counts.pending} pending, ${counts.processing} processing, ${counts.done} done, ${counts.failed} failed`,
    );
    log('');
  } finally {
    await destroyDbConnection();
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Drain failed:', err);
  process.exit(1);
});
