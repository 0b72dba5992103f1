export {
  buildDatabaseUrl,
  ConfigError,
  DEFAULT_REDIS_URL,
  loadEnvFile,
  loadIngestConfig,
  parseInvestors,
  readInvestorsFile,
  type Env,
  type IngestConfig,
  type InvestorDefinition,
  type LoadConfigOptions,
} from './config.js';
export { gatherRecords, type GatheredRecords } from './gather.js';
export { IngestRunner, type IngestRunResult, type RunTrigger } from './runner.js';
