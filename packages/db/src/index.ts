export * from './client.js';
export * from './ensure-schema.js';
export * from './queries.js';
export * from './schema/index.js';
// Re-export commonly used drizzle-orm utilities so downstream packages
// don't need to import drizzle-orm directly
export { sql, eq, and, or, desc, asc, inArray, getTableName } from 'drizzle-orm';
