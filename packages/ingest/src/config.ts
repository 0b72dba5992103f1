import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import {
  createPageFetcher,
  createSource,
  DEFAULT_FETCH_TIMEOUT_MS,
  type InvestorSource,
  type PageFetcher,
} from '@stakewatch/sources';

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface InvestorDefinition {
  name: string;
  url: string;
}

export interface IngestConfig {
  databaseUrl: string;
  redisUrl: string;
  fetchTimeoutMs: number;
  investors: InvestorDefinition[];
  /** One adapter per investor, already resolved through the source factory */
  sources: InvestorSource[];
}

export interface LoadConfigOptions {
  /** Overrides the got-based fetcher the adapters would otherwise share. */
  fetchPage?: PageFetcher;
}

export const DEFAULT_REDIS_URL = 'redis://localhost:6379';

const DEFAULT_INVESTORS_FILE = new URL('../investors.default.json', import.meta.url);

const investorFileSchema = z.union([
  z.record(z.string().url()),
  z.array(z.object({ name: z.string().min(1), url: z.string().url() })),
]);

const envSchema = z.object({
  REDIS_URL: z.string().min(1).default(DEFAULT_REDIS_URL),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
});

/**
 * Load INGEST_ENV_FILE into `env`, when set. Variables already present win
 * over the file. Entry points still import 'dotenv/config' for the plain .env.
 */
export function loadEnvFile(env: Env = process.env): void {
  const path = env.INGEST_ENV_FILE;
  if (!path) return;
  const loaded: Record<string, string> = {};
  const result = dotenv.config({ path, processEnv: loaded });
  if (result.error) {
    throw new ConfigError(`Cannot read INGEST_ENV_FILE ${path}: ${result.error.message}`);
  }
  for (const [key, value] of Object.entries(loaded)) {
    if (env[key] === undefined) env[key] = value;
  }
}

/**
 * Postgres URL from DATABASE_URL, or assembled from DB_HOST and friends.
 * Returns null when neither form is configured.
 */
export function buildDatabaseUrl(env: Env): string | null {
  if (env.DATABASE_URL) return env.DATABASE_URL;

  const host = env.DB_HOST;
  if (!host) return null;

  const username = env.DB_USERNAME;
  if (!username) {
    throw new ConfigError('DB_USERNAME must be set when DB_HOST is used');
  }
  const password = env.DB_PASSWORD;
  if (password === undefined) {
    throw new ConfigError('DB_PASSWORD must be set when DB_HOST is used');
  }
  const port = env.DB_PORT || '5432';
  const database = env.DB_NAME || 'portfolio';

  const auth = `${encodeURIComponent(username)}:${encodeURIComponent(password)}`;
  return `postgresql://${auth}@${host}:${port}/${database}`;
}

/** Parses newline-separated `Name|URL` lines; blank lines are ignored. */
export function parseInvestors(raw: string): InvestorDefinition[] {
  const investors: InvestorDefinition[] = [];
  for (const line of raw.split('\n')) {
    if (!line.trim()) continue;
    const separator = line.indexOf('|');
    if (separator === -1) {
      throw new ConfigError(`Investor entries must look like "Name|URL", got "${line.trim()}"`);
    }
    const name = line.slice(0, separator).trim();
    const url = line.slice(separator + 1).trim();
    if (!name || !url) {
      throw new ConfigError(`Investor entry has an empty name or URL: "${line.trim()}"`);
    }
    investors.push({ name, url });
  }
  return investors;
}

/** Reads a JSON investor list: either `{ name: url }` or `[{ name, url }]`. */
export function readInvestorsFile(path: string | URL): InvestorDefinition[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read investor list ${String(path)}: ${message}`);
  }

  const result = investorFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid investor list ${String(path)}: ${result.error.issues[0]?.message ?? 'unknown shape'}`);
  }
  const data = result.data;
  return Array.isArray(data)
    ? data.map(({ name, url }) => ({ name, url }))
    : Object.entries(data).map(([name, url]) => ({ name, url }));
}

function resolveInvestors(env: Env): InvestorDefinition[] {
  if (env.INVESTORS) return parseInvestors(env.INVESTORS);
  if (env.INVESTORS_FILE) return readInvestorsFile(env.INVESTORS_FILE);
  return readInvestorsFile(DEFAULT_INVESTORS_FILE);
}

/**
 * Read and validate the ingestion configuration. Every investor URL goes
 * through the source factory here, so an unsupported location stops startup
 * instead of the first run.
 *
 * @throws ConfigError, or UnsupportedSourceError from the factory
 */
export function loadIngestConfig(env: Env = process.env, options: LoadConfigOptions = {}): IngestConfig {
  const databaseUrl = buildDatabaseUrl(env);
  if (!databaseUrl) {
    throw new ConfigError('DATABASE_URL must be set, or DB_HOST with DB_USERNAME and DB_PASSWORD');
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid ${issue?.path.join('.') ?? 'environment'}: ${issue?.message ?? 'unknown error'}`);
  }

  const investors = resolveInvestors(env);
  if (investors.length === 0) {
    throw new ConfigError('No investors configured');
  }

  const fetchPage = options.fetchPage ?? createPageFetcher({ timeoutMs: parsed.data.FETCH_TIMEOUT_MS });
  const sources = investors.map(({ name, url }) => createSource(name, url, fetchPage));

  return {
    databaseUrl,
    redisUrl: parsed.data.REDIS_URL,
    fetchTimeoutMs: parsed.data.FETCH_TIMEOUT_MS,
    investors,
    sources,
  };
}
