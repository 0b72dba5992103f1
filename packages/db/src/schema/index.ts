export * from './entities.js';
export * from './holdings.js';
export * from './deals.js';
export * from './ingest-schedule.js';
