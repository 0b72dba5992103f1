import type { DbClient } from '@stakewatch/db';
import { createLogger, type Logger } from '@stakewatch/logging';
import type { InvestorSource } from '@stakewatch/sources';
import { reconcileDeals, reconcileHoldings, type ReconcileSummary } from '@stakewatch/sync';
import { gatherRecords } from './gather.js';

export type RunTrigger = 'schedule' | 'manual';

export type IngestRunResult =
  | {
      status: 'completed';
      trigger: RunTrigger;
      holdings: ReconcileSummary;
      bulkDeals: ReconcileSummary;
      blockDeals: ReconcileSummary;
      failedInvestors: string[];
    }
  | { status: 'skipped'; trigger: RunTrigger };

/**
 * One ingestion run: gather from every source, then mirror holdings, bulk
 * deals and block deals, each in its own transaction.
 *
 * Runs do not overlap within a process. A call made while another is in
 * flight returns immediately with status 'skipped'.
 */
export class IngestRunner {
  private running = false;

  constructor(
    private readonly db: DbClient,
    private readonly sources: readonly InvestorSource[],
    private readonly log: Logger = createLogger('ingest'),
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  async run(trigger: RunTrigger = 'manual'): Promise<IngestRunResult> {
    if (this.running) {
      this.log.warn('Ingestion already running, skipping', { trigger });
      return { status: 'skipped', trigger };
    }

    this.running = true;
    try {
      this.log.info('Ingestion started', { trigger, investors: this.sources.length });
      const gathered = await gatherRecords(this.sources, this.log);

      if (gathered.failedInvestors.length > 0) {
        // Their persisted rows fall outside this batch and will be removed.
        this.log.warn('Investors missing from this run lose their stored rows', {
          investors: gathered.failedInvestors.join(', '),
        });
      }

      const holdings = await reconcileHoldings(this.db, gathered.holdings, this.log);
      const bulkDeals = await reconcileDeals(this.db, gathered.deals, 'bulk', this.log);
      const blockDeals = await reconcileDeals(this.db, gathered.deals, 'block', this.log);

      this.log.info('Ingestion finished', { trigger, failed: gathered.failedInvestors.length });
      return {
        status: 'completed',
        trigger,
        holdings,
        bulkDeals,
        blockDeals,
        failedInvestors: gathered.failedInvestors,
      };
    } finally {
      this.running = false;
    }
  }
}
