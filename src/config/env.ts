import dotenv from 'dotenv';
import { ConfigError } from '../lib/errors';

dotenv.config();

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Auth gate
  BASIC_AUTH_USER: process.env.BASIC_AUTH_USER,
  BASIC_AUTH_PASS: process.env.BASIC_AUTH_PASS,
  API_KEY: process.env.API_KEY,

  // Providers
  WORLDTIDES_KEY: process.env.WORLDTIDES_KEY,
  OPENWEATHER_KEY: process.env.OPENWEATHER_KEY,

  // Gate site
  GATE_OPEN_HEIGHT: parseFloat(process.env.GATE_OPEN_HEIGHT || '4'), // metres above chart datum
  SITE_LATITUDE: parseFloat(process.env.SITE_LATITUDE || '53.28'),
  SITE_LONGITUDE: parseFloat(process.env.SITE_LONGITUDE || '-3.83'),
  SITE_TIMEZONE: process.env.SITE_TIMEZONE || 'Europe/London',

  // Dataset freshness
  TIDE_EXTREMES_TTL: parseFloat(process.env.TIDE_EXTREMES_TTL_HOURS || '12') * HOUR_MS,
  WEATHER_TTL: parseFloat(process.env.WEATHER_TTL_HOURS || '12') * HOUR_MS,
  GATE_TIMES_TTL: parseFloat(process.env.GATE_TIMES_TTL_HOURS || '12') * HOUR_MS,
  TIDE_HEIGHTS_TTL: parseFloat(process.env.TIDE_HEIGHTS_TTL_DAYS || '7') * DAY_MS,
  SUN_MOON_TTL: parseFloat(process.env.SUN_MOON_TTL_DAYS || '7') * DAY_MS,
  MARINE_TTL: parseFloat(process.env.MARINE_TTL_HOURS || '12') * HOUR_MS,
  KEYED_DATASET_LIMIT: parseInt(process.env.KEYED_DATASET_LIMIT || '200', 10),

  // Forecast horizons
  TIDE_EXTREMES_DAYS: parseInt(process.env.TIDE_EXTREMES_DAYS || '365', 10),
  TIDE_HEIGHTS_DAYS: parseInt(process.env.TIDE_HEIGHTS_DAYS || '180', 10),

  // Timeouts
  UPSTREAM_TIMEOUT: parseInt(process.env.UPSTREAM_TIMEOUT || '10000', 10), // per HTTP call
  DATASET_FETCH_TIMEOUT: parseInt(process.env.DATASET_FETCH_TIMEOUT || '120000', 10), // whole refresh
  SCHEDULER_TICK_MS: parseInt(process.env.SCHEDULER_TICK_MS || '60000', 10),

  // Circuit Breaker
  CIRCUIT_BREAKER_TIMEOUT: parseInt(process.env.CIRCUIT_BREAKER_TIMEOUT || '15000', 10),
  CIRCUIT_BREAKER_ERROR_THRESHOLD: parseInt(process.env.CIRCUIT_BREAKER_ERROR_THRESHOLD || '50', 10), // 50%
  CIRCUIT_BREAKER_RESET_TIMEOUT: parseInt(process.env.CIRCUIT_BREAKER_RESET_TIMEOUT || '30000', 10),
  CIRCUIT_BREAKER_MIN_REQUESTS: parseInt(process.env.CIRCUIT_BREAKER_MIN_REQUESTS || '5', 10),
} as const;

export type EnvConfig = typeof env;

const POSITIVE_KEYS = [
  'PORT',
  'TIDE_EXTREMES_TTL',
  'WEATHER_TTL',
  'GATE_TIMES_TTL',
  'TIDE_HEIGHTS_TTL',
  'SUN_MOON_TTL',
  'MARINE_TTL',
  'KEYED_DATASET_LIMIT',
  'TIDE_EXTREMES_DAYS',
  'TIDE_HEIGHTS_DAYS',
  'UPSTREAM_TIMEOUT',
  'DATASET_FETCH_TIMEOUT',
  'SCHEDULER_TICK_MS',
  'CIRCUIT_BREAKER_TIMEOUT',
  'CIRCUIT_BREAKER_RESET_TIMEOUT',
] as const satisfies ReadonlyArray<keyof EnvConfig>;

/**
 * Check every setting the service cannot run without.
 * Throws a single ConfigError naming all offending keys.
 */
export function validateEnv(config: EnvConfig = env): void {
  const problems: string[] = [];

  if (!Number.isFinite(config.GATE_OPEN_HEIGHT)) {
    problems.push('GATE_OPEN_HEIGHT must be a number');
  }
  if (!Number.isFinite(config.SITE_LATITUDE) || Math.abs(config.SITE_LATITUDE) > 90) {
    problems.push('SITE_LATITUDE must be between -90 and 90');
  }
  if (!Number.isFinite(config.SITE_LONGITUDE) || Math.abs(config.SITE_LONGITUDE) > 180) {
    problems.push('SITE_LONGITUDE must be between -180 and 180');
  }

  try {
    new Intl.DateTimeFormat('en-GB', { timeZone: config.SITE_TIMEZONE });
  } catch {
    problems.push(`SITE_TIMEZONE "${config.SITE_TIMEZONE}" is not a known time zone`);
  }

  for (const key of POSITIVE_KEYS) {
    const value = config[key];
    if (!Number.isFinite(value) || value <= 0) {
      problems.push(`${key} must be a positive number`);
    }
  }

  const threshold = config.CIRCUIT_BREAKER_ERROR_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold <= 0 || threshold > 100) {
    problems.push('CIRCUIT_BREAKER_ERROR_THRESHOLD must be between 1 and 100');
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
}

export default env;
