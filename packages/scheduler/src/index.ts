export * from './schedule.js';
export * from './queue.js';
export { ScheduleController, type TriggerStatus } from './controller.js';
