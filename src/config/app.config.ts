/**
 * Centralized environment configuration.
 *
 * Values are read once at startup (after `dotenv/config` has populated
 * `process.env`) and injected under the `APP_CONFIG` token.
 */

export const APP_CONFIG = 'APP_CONFIG';

export interface AppConfig {
  port: number;
  /** Freshness window of a cached quote. */
  quoteTtlSeconds: number;
  /** Freshness window of a computed equity curve. */
  equityCurveTtlSeconds: number;
  /** Upper bound on any single market-data call. */
  marketDataTimeoutMs: number;
  defaultInitialCash: number;
}

export const DEFAULT_APP_CONFIG: Readonly<AppConfig> = Object.freeze({
  port: 3000,
  quoteTtlSeconds: 300,
  equityCurveTtlSeconds: 900,
  marketDataTimeoutMs: 10_000,
  defaultInitialCash: 10_000,
});

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value !== undefined && value !== '' ? value : defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const parsed = Number(getEnv(env, key, String(defaultValue)));
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : defaultValue;
}

export function loadAppConfig(env: Env = process.env): Readonly<AppConfig> {
  return Object.freeze({
    port: getEnvNumber(env, 'PORT', DEFAULT_APP_CONFIG.port),
    quoteTtlSeconds: getEnvNumber(env, 'QUOTE_TTL_SECONDS', DEFAULT_APP_CONFIG.quoteTtlSeconds),
    equityCurveTtlSeconds: getEnvNumber(
      env,
      'EQUITY_CURVE_TTL_SECONDS',
      DEFAULT_APP_CONFIG.equityCurveTtlSeconds,
    ),
    marketDataTimeoutMs: getEnvNumber(
      env,
      'MARKET_DATA_TIMEOUT_MS',
      DEFAULT_APP_CONFIG.marketDataTimeoutMs,
    ),
    defaultInitialCash: getEnvNumber(
      env,
      'DEFAULT_INITIAL_CASH',
      DEFAULT_APP_CONFIG.defaultInitialCash,
    ),
  });
}
