import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

export interface PlayFabConfig {
  baseUrl: string;
  sessionToken: string;
  requestTimeoutMs: number;
}

export interface FetcherConfig {
  pageSize: number;
  requestDelayMs: number;
  maxPages: number;
}

export interface DatabaseConfig {
  url?: string;
  ssl: boolean;
  logQueries: boolean;
}

export interface LogConfig {
  level: string;
  file: string | null;
}

export interface Config {
  playfab: PlayFabConfig;
  fetcher: FetcherConfig;
  database: DatabaseConfig;
  log: LogConfig;
  port: number;
}

export type Environment = Record<string, string | undefined>;

export const DEFAULT_PLAYFAB_BASE_URL = 'https://d155a.playfabapi.com';

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return ['1', 'true', 'yes', 'on'].includes(normalized);
}

function resolvePath(raw: string | undefined, cwd: string): string | null {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return null;
  }
  return path.isAbsolute(trimmed) ? trimmed : path.resolve(cwd, trimmed);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Builds the process-wide configuration from an environment map. Numeric
 * values outside their allowed range are clamped.
 */
export function buildConfig(env: Environment, cwd: string = process.cwd()): Readonly<Config> {
  const config: Config = {
    playfab: {
      baseUrl: (env.PLAYFAB_BASE_URL?.trim() || DEFAULT_PLAYFAB_BASE_URL).replace(/\/+$/, ''),
      sessionToken: env.PLAYFAB_SESSION_TOKEN?.trim() ?? '',
      requestTimeoutMs: Math.max(1000, parseInteger(env.PLAYFAB_TIMEOUT_MS, 30000)),
    },
    fetcher: {
      pageSize: Math.min(100, Math.max(1, parseInteger(env.API_MAX_RESULTS_PER_PAGE, 50))),
      requestDelayMs: Math.max(0, parseInteger(env.API_REQUEST_DELAY_MS, 100)),
      maxPages: Math.max(1, parseInteger(env.API_MAX_PAGES, 1000)),
    },
    database: {
      url: env.DATABASE_URL || undefined,
      ssl:
        env.DATABASE_SSL === 'true' ||
        (env.NODE_ENV === 'production' && env.DATABASE_SSL !== 'false'),
      logQueries: parseBoolean(env.DATABASE_LOG_QUERIES),
    },
    log: {
      level: env.LOG_LEVEL || 'info',
      file: resolvePath(env.LOG_PATH, cwd),
    },
    port: parseInteger(env.PORT, 3000),
  };

  return deepFreeze(config);
}

export interface ConfigRequirements {
  requireSessionToken?: boolean;
  /** Defaults to true. */
  requireDatabase?: boolean;
}

/**
 * Returns every configuration problem that must stop a run before any work
 * starts. An empty list means the configuration is usable.
 */
export function validateConfig(config: Readonly<Config>, requirements: ConfigRequirements = {}): string[] {
  const errors: string[] = [];

  if (requirements.requireSessionToken && !config.playfab.sessionToken) {
    errors.push('PLAYFAB_SESSION_TOKEN is not set');
  }

  if (requirements.requireDatabase !== false && !config.database.url) {
    errors.push('DATABASE_URL is not set');
  }

  if (config.log.file) {
    const directory = path.dirname(config.log.file);
    try {
      fs.mkdirSync(directory, { recursive: true });
      fs.accessSync(directory, fs.constants.W_OK);
    } catch {
      errors.push(`Log directory is not writable: ${directory}`);
    }
  }

  return errors;
}

/** Reads `.env` once and returns the frozen configuration for this process. */
export function loadConfig(): Readonly<Config> {
  dotenv.config();
  return buildConfig(process.env);
}
