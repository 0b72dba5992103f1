import { z } from 'zod';

export const INGEST_QUEUE = 'portfolio-ingest';

/** Fixed scheduler id: re-registering replaces the trigger instead of adding one. */
export const INGEST_SCHEDULER_ID = 'daily-ingestion';

export interface ScheduleConfig {
  hour: number;
  minute: number;
  /** IANA timezone identifier */
  timezone: string;
}

export const DEFAULT_SCHEDULE: Readonly<ScheduleConfig> = { hour: 2, minute: 0, timezone: 'UTC' };

export class ScheduleValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScheduleValidationError';
  }
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export const scheduleInputSchema = z.object({
  hour: z.number().int().min(0, 'hour must be between 0 and 23').max(23, 'hour must be between 0 and 23'),
  minute: z
    .number()
    .int()
    .min(0, 'minute must be between 0 and 59')
    .max(59, 'minute must be between 0 and 59'),
  timezone: z
    .string()
    .min(1)
    .refine(isValidTimezone, (tz) => ({ message: `unknown timezone: ${tz}` }))
    .optional(),
});

export type ScheduleInput = z.infer<typeof scheduleInputSchema>;

/**
 * Validate a schedule update, throwing ScheduleValidationError with every
 * issue joined into one message.
 */
export function validateScheduleInput(input: unknown): ScheduleInput {
  const parsed = scheduleInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ScheduleValidationError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

/** Parses "HH:MM" (24-hour clock, one- or two-digit hour). */
export function parseTime(value: string): { hour: number; minute: number } {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new ScheduleValidationError(`expected HH:MM, got "${value}"`);
  }
  const { hour, minute } = validateScheduleInput({ hour: Number(match[1]), minute: Number(match[2]) });
  return { hour, minute };
}

/** Daily cron pattern firing at hour:minute. */
export function toCronPattern(schedule: Pick<ScheduleConfig, 'hour' | 'minute'>): string {
  return `${schedule.minute} ${schedule.hour} * * *`;
}

export function formatTime(schedule: Pick<ScheduleConfig, 'hour' | 'minute'>): string {
  return `${String(schedule.hour).padStart(2, '0')}:${String(schedule.minute).padStart(2, '0')}`;
}
