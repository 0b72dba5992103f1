import { integer, pgTable, timestamp, varchar } from 'drizzle-orm/pg-core';

/** Primary key of the only row the table ever holds. */
export const SCHEDULE_ROW_ID = 1;

/**
 * Singleton time-of-day configuration for the daily ingestion trigger.
 * The queue-side trigger is derived from this row at startup and on every
 * update; the row is the source of truth.
 */
export const ingestSchedule = pgTable('ingest_schedule', {
  id: integer('id').primaryKey().default(SCHEDULE_ROW_ID),
  hour: integer('hour').notNull(),
  minute: integer('minute').notNull(),
  /** IANA timezone identifier, e.g. 'UTC' or 'Asia/Kolkata' */
  timezone: varchar('timezone', { length: 64 }).notNull().default('UTC'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export type IngestSchedule = typeof ingestSchedule.$inferSelect;
export type NewIngestSchedule = typeof ingestSchedule.$inferInsert;
