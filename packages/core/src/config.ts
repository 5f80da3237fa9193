export type Env = Record<string, string | undefined>;

export interface DatabaseConfig {
  url: string | null;
  poolMax: number;
  statementTimeoutMs: number;
}

export interface HttpConfig {
  baseUrl: string;
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface PollerConfig {
  intervalSeconds: number;
  pageSize: number;
  maxPages: number;
  /** Minimum delay between two page requests */
  requestDelayMs: number;
  order: string;
  ascending: boolean;
  includeClosed: boolean;
  closedMaxPages: number;
  closedLookbackHours: number;
  maxConsecutiveFailures: number;
}

export interface BackfillConfig {
  batchSize: number;
  pauseMs: number;
}

/**
 * Process-wide configuration, built once at start and handed to each component
 */
export interface AppConfig {
  database: DatabaseConfig;
  http: HttpConfig;
  poller: PollerConfig;
  backfill: BackfillConfig;
  /** 0 disables the health server */
  healthPort: number;
}

export const DEFAULT_GAMMA_API_URL = 'https://gamma-api.polymarket.com';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse int from env with fallback
 */
function parseInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

function positive(value: number, fallback: number): number {
  return value > 0 ? value : fallback;
}

/**
 * Load full app config from env
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    database: {
      url: env.DATABASE_URL || null,
      poolMax: positive(parseInt(env.DB_POOL_MAX, 10), 10),
      statementTimeoutMs: positive(parseInt(env.DB_STATEMENT_TIMEOUT_MS, 30000), 30000),
    },
    http: {
      baseUrl: env.GAMMA_API_URL || DEFAULT_GAMMA_API_URL,
      timeoutMs: positive(parseInt(env.HTTP_TIMEOUT_MS, 30000), 30000),
      maxAttempts: positive(parseInt(env.HTTP_MAX_ATTEMPTS, 4), 4),
      baseDelayMs: parseInt(env.HTTP_BASE_DELAY_MS, 1000),
      maxDelayMs: parseInt(env.HTTP_MAX_DELAY_MS, 30000),
    },
    poller: {
      intervalSeconds: positive(parseInt(env.POLL_INTERVAL_SECONDS, 60), 60),
      pageSize: positive(parseInt(env.POLL_PAGE_SIZE, 200), 200),
      maxPages: positive(parseInt(env.POLL_MAX_PAGES, 500), 500),
      requestDelayMs: parseInt(env.POLL_REQUEST_DELAY_MS, 100),
      order: env.POLL_ORDER || 'volumeNum',
      ascending: parseBool(env.POLL_ASCENDING, false),
      includeClosed: parseBool(env.POLL_INCLUDE_CLOSED, false),
      closedMaxPages: positive(parseInt(env.POLL_CLOSED_MAX_PAGES, 50), 50),
      closedLookbackHours: positive(parseInt(env.POLL_CLOSED_LOOKBACK_HOURS, 24), 24),
      maxConsecutiveFailures: positive(parseInt(env.POLL_MAX_CONSECUTIVE_FAILURES, 5), 5),
    },
    backfill: {
      batchSize: positive(parseInt(env.BACKFILL_BATCH_SIZE, 10000), 10000),
      pauseMs: parseInt(env.BACKFILL_PAUSE_MS, 500),
    },
    healthPort: parseInt(env.HEALTH_PORT, 0),
  };
}

export function requireDatabaseUrl(config: AppConfig): string {
  if (!config.database.url) {
    throw new ConfigError('DATABASE_URL is not set');
  }
  return config.database.url;
}

/**
 * Hide the password part of a connection string
 */
export function redactUrl(url: string | null): string {
  if (!url) return '(unset)';
  return url.replace(/\/\/([^:/@]+):[^@]*@/, '//$1:***@');
}

/**
 * Format config for logging
 */
export function formatAppConfig(config: AppConfig): string {
  const { database, http, poller, backfill } = config;
  return [
    '[config]',
    `  database.url: ${redactUrl(database.url)}`,
    `  database.poolMax: ${database.poolMax}`,
    `  database.statementTimeoutMs: ${database.statementTimeoutMs}ms`,
    `  http.baseUrl: ${http.baseUrl}`,
    `  http.timeoutMs: ${http.timeoutMs}ms (attempts=${http.maxAttempts})`,
    `  poller.intervalSeconds: ${poller.intervalSeconds}s`,
    `  poller.pageSize: ${poller.pageSize} (maxPages=${poller.maxPages}, delay=${poller.requestDelayMs}ms)`,
    `  poller.order: ${poller.order} ${poller.ascending ? 'asc' : 'desc'}`,
    `  poller.includeClosed: ${poller.includeClosed} (lookback=${poller.closedLookbackHours}h)`,
    `  backfill.batchSize: ${backfill.batchSize} (pause=${backfill.pauseMs}ms)`,
  ].join('\n');
}
