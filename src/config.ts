import dotenv from 'dotenv';
import { parsePair } from './exchanges/pairs';
import { isLogLevel, logger, LogLevel } from './utils/logger';

dotenv.config();

export type TradingMode = 'dry_run' | 'live';

export interface TradingConfig {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly tradingMode: TradingMode;
  readonly tradingPair: string;
  readonly maxOrderUsd: number;
  readonly isDryRun: boolean;
  readonly logDir: string;
  readonly logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULTS = {
  TRADING_MODE: 'dry_run',
  MAX_ORDER_USD: 50,
  TRADING_PAIR: 'BTC-USD',
  LOG_DIR: 'logs',
  LOG_LEVEL: 'info',
  RECOMMENDED_MAX_ORDER_USD: 100,
} as const;

const PLACEHOLDERS: Record<string, string> = {
  COINBASE_API_KEY: 'your_api_key_here',
  COINBASE_API_SECRET: 'your_api_secret_here',
};

type Env = Record<string, string | undefined>;

function requireCredential(env: Env, name: string): string {
  const value = (env[name] ?? '').trim();
  if (!value || value === PLACEHOLDERS[name]) {
    throw new ConfigError(
      `${name} not set or still has placeholder value. Copy .env.example to .env and add your API credentials`
    );
  }
  return value;
}

function resolveTradingMode(raw: string | undefined): TradingMode {
  const value = (raw ?? DEFAULTS.TRADING_MODE).trim().toLowerCase();
  if (value === 'live') return 'live';
  if (value !== 'dry_run') {
    logger.warn('unknown_trading_mode', { event: 'unknown_trading_mode', value, fallback: 'dry_run' });
  }
  return 'dry_run';
}

function resolveMaxOrder(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULTS.MAX_ORDER_USD;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`MAX_ORDER_USD must be a positive number, got "${raw}"`);
  }
  if (value > DEFAULTS.RECOMMENDED_MAX_ORDER_USD) {
    logger.warn('max_order_above_recommended', {
      event: 'max_order_above_recommended',
      maxOrderUsd: value,
      recommended: DEFAULTS.RECOMMENDED_MAX_ORDER_USD,
    });
  }
  return value;
}

function resolveTradingPair(raw: string | undefined): string {
  const value = (raw ?? '').trim() || DEFAULTS.TRADING_PAIR;
  const parts = parsePair(value);
  if (!parts) {
    throw new ConfigError(`TRADING_PAIR must look like BASE-QUOTE (e.g. BTC-USD), got "${value}"`);
  }
  return `${parts.base}-${parts.quote}`;
}

function resolveLogLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? DEFAULTS.LOG_LEVEL).trim().toLowerCase();
  if (!isLogLevel(value)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${raw}"`);
  }
  return value;
}

function freeze(config: Omit<TradingConfig, 'isDryRun'>): TradingConfig {
  return Object.freeze({ ...config, isDryRun: config.tradingMode !== 'live' });
}

/**
 * Builds the process-wide configuration snapshot. Values from a `.env` file are
 * already merged into `process.env` when this module loads.
 */
export function loadConfig(env: Env = process.env): TradingConfig {
  const apiKey = requireCredential(env, 'COINBASE_API_KEY');
  const apiSecret = requireCredential(env, 'COINBASE_API_SECRET');

  return freeze({
    apiKey,
    apiSecret,
    tradingMode: resolveTradingMode(env.TRADING_MODE),
    tradingPair: resolveTradingPair(env.TRADING_PAIR),
    maxOrderUsd: resolveMaxOrder(env.MAX_ORDER_USD),
    logDir: (env.LOG_DIR ?? '').trim() || DEFAULTS.LOG_DIR,
    logLevel: resolveLogLevel(env.LOG_LEVEL),
  });
}

export function withTradingMode(config: TradingConfig, tradingMode: TradingMode): TradingConfig {
  if (config.tradingMode === tradingMode) return config;
  return freeze({ ...config, tradingMode });
}

export function maskApiKey(apiKey: string): string {
  if (apiKey.length <= 8) return '****';
  return `${apiKey.slice(0, 4)}...${apiKey.slice(-4)}`;
}
