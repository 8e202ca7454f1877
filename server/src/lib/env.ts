// server/src/lib/env.ts
import path from 'node:path';

export type Env = {
  MOCK: 0 | 1;
  NWS_BASE_URL: string;
  NWS_USER_AGENT: string;
  NWS_RETRY_ATTEMPTS: number;
  NWS_RETRY_DELAY_MS: number;
  REQUEST_TIMEOUT_MS: number;
  REQUEST_DEADLINE_MS: number;
  STATION_CATALOG_PATH: string;
  ARCHIVE_DIR: string;
  CACHE_TTL_SEC: number;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX: number;
};

function pick(...candidates: Array<string | undefined | null>): string {
  for (const c of candidates) if (c && c.trim().length > 0) return c.trim();
  return '';
}

function pickNumber(value: string | undefined | null, fallback: number): number {
  if (value == null) return fallback;
  const trimmed = value.trim();
  if (!trimmed) return fallback;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : fallback;
}

// data files are resolved against the working directory, like the ETL that writes them
function pickPath(value: string | undefined | null, fallback: string): string {
  return path.resolve(process.cwd(), pick(value, fallback));
}

export const ENV: Env = {
  MOCK: process.env['MOCK'] === '0' ? 0 : 1,
  NWS_BASE_URL: pick(process.env['NWS_BASE_URL'], 'https://api.weather.gov'),
  NWS_USER_AGENT: pick(process.env['NWS_USER_AGENT'], 'station-weather-api (contact@example.com)'),
  NWS_RETRY_ATTEMPTS: pickNumber(process.env['NWS_RETRY_ATTEMPTS'], 3),
  NWS_RETRY_DELAY_MS: pickNumber(process.env['NWS_RETRY_DELAY_MS'], 4000),
  REQUEST_TIMEOUT_MS: pickNumber(process.env['REQUEST_TIMEOUT_MS'], 7000),
  REQUEST_DEADLINE_MS: pickNumber(process.env['REQUEST_DEADLINE_MS'], 30000),
  STATION_CATALOG_PATH: pickPath(process.env['STATION_CATALOG_PATH'], 'server/data/stations.json'),
  ARCHIVE_DIR: pickPath(process.env['ARCHIVE_DIR'], 'server/data/archive'),
  CACHE_TTL_SEC: pickNumber(process.env['CACHE_TTL_SEC'], 300),
  RATE_LIMIT_WINDOW_MS: pickNumber(process.env['RATE_LIMIT_WINDOW_MS'], 60_000),
  RATE_LIMIT_MAX: pickNumber(process.env['RATE_LIMIT_MAX'], 120),
};
