import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { formatTime, type ScheduleController } from '@stakewatch/scheduler';

/**
 * GET  /  current run time plus what the queue has registered
 * PUT  /  replace the run time; range and timezone checks happen in the
 *         controller, whose ScheduleValidationError maps to 400
 */
const scheduleBodySchema = z.object({
  hour: z.number().int(),
  minute: z.number().int(),
  timezone: z.string().optional(),
});

export function createScheduleRoute(controller: ScheduleController): Hono {
  const app = new Hono();

  app.get('/', async (c) => {
    const schedule = await controller.getOrCreateSchedule();
    const trigger = await controller.getTrigger();
    return c.json({ ...schedule, time: formatTime(schedule), trigger });
  });

  app.put('/', zValidator('json', scheduleBodySchema), async (c) => {
    const { hour, minute, timezone } = c.req.valid('json');
    const schedule = await controller.updateSchedule(hour, minute, timezone);
    return c.json({ ...schedule, time: formatTime(schedule) });
  });

  return app;
}
