import type { Logger } from '@stakewatch/logging';

/**
 * Graceful shutdown on SIGTERM/SIGINT, in order:
 * 1. BullMQ worker (stop taking jobs, let the in-flight run finish)
 * 2. Queue connection
 * 3. Postgres pool
 *
 * A 10-second force-kill timer makes sure the process exits even if a step hangs.
 */
export interface Closable {
  close(): Promise<void>;
}

export interface ShutdownPool {
  end(): Promise<void>;
}

export interface ShutdownResources {
  pool: ShutdownPool;
  worker?: Closable;
  queue?: Closable;
}

export function registerShutdownHandlers(resources: ShutdownResources, log: Logger): void {
  const { pool, worker, queue } = resources;

  async function gracefulShutdown(signal: string): Promise<void> {
    log.info(`Received ${signal}. Shutting down...`);

    const forceKillTimer = setTimeout(() => {
      log.error('Graceful shutdown timed out after 10s. Forcing exit.');
      process.exit(1);
    }, 10_000);
    forceKillTimer.unref();

    try {
      if (worker !== undefined) {
        await worker.close();
        log.info('Ingestion worker closed.');
      }

      if (queue !== undefined) {
        await queue.close();
        log.info('Ingestion queue closed.');
      }

      await pool.end();
      log.info('Postgres pool closed.');

      clearTimeout(forceKillTimer);
      log.info('Graceful shutdown complete.');
      process.exit(0);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Error during graceful shutdown: ${message}`);
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
}
