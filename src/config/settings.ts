/**
 * Application settings
 *
 * Loaded once from the environment at process start and frozen.
 * Every violation is collected before failing so an operator sees the
 * whole list in one pass.
 *
 * Usage:
 * ```typescript
 * import { loadSettings } from '@/config/settings.js';
 * const settings = loadSettings(process.env);
 * ```
 */

export type Environment = 'development' | 'staging' | 'production' | 'test';
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';

export interface HealthSettings {
  /** Per-probe deadline in milliseconds */
  probeTimeoutMs: number;
  /** Latency above which a reachable dependency is reported as degraded */
  degradedThresholdMs: number;
  /** Requests per minute per client IP on the detailed endpoint */
  detailedRateLimitPerMinute: number;
}

export interface Settings {
  appName: string;
  appVersion: string;
  environment: Environment;
  host: string;
  port: number;
  databaseUrl: string;
  databasePoolSize: number;
  redisUrl: string;
  allowedOrigins: readonly string[];
  logLevel: LogLevelName;
  logFormat: LogFormat;
  health: HealthSettings;
}

/**
 * Configuration validation result
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Thrown when the environment cannot produce a usable configuration
 */
export class ConfigurationError extends Error {
  constructor(public readonly errors: readonly string[]) {
    super(`Invalid configuration:\n  - ${errors.join('\n  - ')}`);
    this.name = 'ConfigurationError';
  }
}

type Env = Record<string, string | undefined>;

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production', 'test'];
const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'text'];

export const DEFAULTS = {
  APP_NAME: 'Paper Monitor API',
  APP_VERSION: '2.0.0',
  NODE_ENV: 'development',
  HOST: '0.0.0.0',
  PORT: '8000',
  DATABASE_URL: 'postgresql://localhost:5432/papermonitor',
  DATABASE_POOL_SIZE: '10',
  REDIS_URL: 'redis://localhost:6379/0',
  ALLOWED_ORIGINS: 'http://localhost:3000,http://127.0.0.1:3000',
  LOG_LEVEL: 'info',
  LOG_FORMAT: 'json',
  HEALTH_PROBE_TIMEOUT_MS: '1000',
  HEALTH_DEGRADED_THRESHOLD_MS: '200',
  HEALTH_DETAILED_RATE_LIMIT: '60'
} as const;

function read(env: Env, name: keyof typeof DEFAULTS): string {
  const value = env[name]?.trim();
  return value ? value : DEFAULTS[name];
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return (values as readonly string[]).includes(value);
}

/**
 * Largest delay setTimeout honours; longer delays fire after 1ms
 */
export const MAX_TIMER_DELAY_MS = 2147483647;

/**
 * Parse a strictly positive integer, recording an error on failure
 */
function parsePositiveInt(name: string, raw: string, errors: string[], max?: number): number {
  if (!/^\d+$/.test(raw)) {
    errors.push(`${name} must be a positive integer (got "${raw}")`);
    return 0;
  }

  const value = parseInt(raw, 10);
  if (value <= 0) {
    errors.push(`${name} must be greater than 0`);
  } else if (max !== undefined && value > max) {
    errors.push(`${name} must not exceed ${max}`);
  }
  return value;
}

function validateUrl(name: string, raw: string, protocols: readonly string[], errors: string[]): void {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    errors.push(`${name} is not a valid URL`);
    return;
  }

  if (!protocols.includes(url.protocol)) {
    errors.push(`${name} must use one of: ${protocols.map(p => `${p}//`).join(', ')}`);
  }
}

/**
 * Validate the environment without throwing
 */
export function validateSettings(env: Env): ConfigValidationResult & { settings: Settings } {
  const errors: string[] = [];
  const warnings: string[] = [];

  const environment = read(env, 'NODE_ENV').toLowerCase();
  if (!isOneOf(ENVIRONMENTS, environment)) {
    errors.push(`NODE_ENV must be one of: ${ENVIRONMENTS.join(', ')}`);
  }

  const port = parsePositiveInt('PORT', read(env, 'PORT'), errors);
  if (port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  const databaseUrl = read(env, 'DATABASE_URL');
  validateUrl('DATABASE_URL', databaseUrl, ['postgres:', 'postgresql:'], errors);
  if (environment === 'production' && /@?localhost[:/]/.test(databaseUrl)) {
    warnings.push('DATABASE_URL points to localhost in production environment');
  }

  const redisUrl = read(env, 'REDIS_URL');
  validateUrl('REDIS_URL', redisUrl, ['redis:', 'rediss:'], errors);

  const logLevel = read(env, 'LOG_LEVEL').toLowerCase();
  if (!isOneOf(LOG_LEVELS, logLevel)) {
    errors.push(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  const logFormat = read(env, 'LOG_FORMAT').toLowerCase();
  if (!isOneOf(LOG_FORMATS, logFormat)) {
    errors.push(`LOG_FORMAT must be one of: ${LOG_FORMATS.join(', ')}`);
  }

  const probeTimeoutMs = parsePositiveInt(
    'HEALTH_PROBE_TIMEOUT_MS',
    read(env, 'HEALTH_PROBE_TIMEOUT_MS'),
    errors,
    MAX_TIMER_DELAY_MS
  );
  const degradedThresholdMs = parsePositiveInt(
    'HEALTH_DEGRADED_THRESHOLD_MS',
    read(env, 'HEALTH_DEGRADED_THRESHOLD_MS'),
    errors,
    MAX_TIMER_DELAY_MS
  );
  if (probeTimeoutMs > 0 && degradedThresholdMs >= probeTimeoutMs) {
    errors.push('HEALTH_DEGRADED_THRESHOLD_MS must be lower than HEALTH_PROBE_TIMEOUT_MS');
  }

  const allowedOrigins = read(env, 'ALLOWED_ORIGINS')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
  if (allowedOrigins.includes('*') && environment === 'production') {
    warnings.push('ALLOWED_ORIGINS contains "*" in production environment');
  }

  const settings: Settings = {
    appName: read(env, 'APP_NAME'),
    appVersion: read(env, 'APP_VERSION'),
    environment: isOneOf(ENVIRONMENTS, environment) ? environment : 'development',
    host: read(env, 'HOST'),
    port,
    databaseUrl,
    databasePoolSize: parsePositiveInt('DATABASE_POOL_SIZE', read(env, 'DATABASE_POOL_SIZE'), errors),
    redisUrl,
    allowedOrigins: Object.freeze(allowedOrigins),
    logLevel: isOneOf(LOG_LEVELS, logLevel) ? logLevel : 'info',
    logFormat: isOneOf(LOG_FORMATS, logFormat) ? logFormat : 'json',
    health: Object.freeze({
      probeTimeoutMs,
      degradedThresholdMs,
      detailedRateLimitPerMinute: parsePositiveInt(
        'HEALTH_DETAILED_RATE_LIMIT',
        read(env, 'HEALTH_DETAILED_RATE_LIMIT'),
        errors
      )
    })
  };

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    settings
  };
}

/**
 * Load settings and throw if the environment is invalid
 * @throws ConfigurationError listing every violation
 */
export function loadSettings(env: Env = process.env): { settings: Readonly<Settings>; warnings: string[] } {
  const result = validateSettings(env);

  if (!result.valid) {
    throw new ConfigurationError(result.errors);
  }

  return {
    settings: Object.freeze(result.settings),
    warnings: result.warnings
  };
}

export function isProduction(settings: Settings): boolean {
  return settings.environment === 'production';
}
