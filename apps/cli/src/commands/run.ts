import { Command } from 'commander';
import { createDb, ensureSchema } from '@stakewatch/db';
import { IngestRunner, loadEnvFile, loadIngestConfig } from '@stakewatch/ingest';
import { createLogger } from '@stakewatch/logging';

export const runCommand = new Command('run')
  .description('Run one ingestion in this process, bypassing the queue')
  .action(async () => {
    loadEnvFile();
    const config = loadIngestConfig();
    const { db, shutdown } = createDb(config.databaseUrl);

    try {
      await ensureSchema(db);
      const runner = new IngestRunner(db, config.sources, createLogger('ingest'));
      const result = await runner.run('manual');

      if (result.status === 'completed') {
        for (const summary of [result.holdings, result.bulkDeals, result.blockDeals]) {
          console.log(`${summary.table}: ${summary.upserted} upserted, ${summary.removed} removed`);
        }
        if (result.failedInvestors.length > 0) {
          console.log(`Failed investors: ${result.failedInvestors.join(', ')}`);
        }
      }
    } finally {
      await shutdown();
    }
  });
