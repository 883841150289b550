// ABOUTME: Builds the typed run configuration from environment variables
// ABOUTME: Applies defaults for paths, chart and retry settings and validates values

import { ConfigError } from './errors.js';
import type { AppConfig, BackoffStrategy, RetryPolicy } from './types.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 10,
  delayMs: 60_000,
  strategy: 'fixed',
  maxDelayMs: 15 * 60_000,
  jitter: false,
};

const DEFAULTS = {
  apiBaseUrl: 'https://api.github.com',
  requestTimeoutMs: 30_000,
  rDatasetsListPath: 'data/r_datasets_list.json',
  sklearnOutputPath: 'sklearn_datasets_counts.csv',
  rOutputPath: 'r_datasets_counts.csv',
  chartOutputPath: 'dataset_usage_top10.png',
  chartTopN: 10,
};

export type Env = Record<string, string | undefined>;

// Node timers fire after 1 ms for anything longer than this
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Read configuration from the given environment (normally process.env after dotenv has run)
 */
export function loadConfig(env: Env): AppConfig {
  const githubToken = env.GITHUB_TOKEN?.trim();
  if (!githubToken) {
    throw new ConfigError('GITHUB_TOKEN environment variable is not set.');
  }

  const retry: RetryPolicy = {
    maxAttempts: readInteger(env, 'RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_POLICY.maxAttempts, 1),
    delayMs: readInteger(env, 'RETRY_DELAY_MS', DEFAULT_RETRY_POLICY.delayMs, 0, MAX_TIMER_MS),
    strategy: readStrategy(env),
    maxDelayMs: readInteger(env, 'RETRY_MAX_DELAY_MS', DEFAULT_RETRY_POLICY.maxDelayMs, 0, MAX_TIMER_MS),
    jitter: readBoolean(env, 'RETRY_JITTER', DEFAULT_RETRY_POLICY.jitter),
  };

  return {
    githubToken,
    apiBaseUrl: readString(env, 'GITHUB_API_URL', DEFAULTS.apiBaseUrl),
    requestTimeoutMs: readInteger(env, 'REQUEST_TIMEOUT_MS', DEFAULTS.requestTimeoutMs, 1, MAX_TIMER_MS),
    rDatasetsListPath: readString(env, 'R_DATASETS_LIST_PATH', DEFAULTS.rDatasetsListPath),
    sklearnOutputPath: readString(env, 'SKLEARN_OUTPUT_PATH', DEFAULTS.sklearnOutputPath),
    rOutputPath: readString(env, 'R_OUTPUT_PATH', DEFAULTS.rOutputPath),
    chart: {
      enabled: readBoolean(env, 'CHART_ENABLED', true),
      outputPath: readString(env, 'CHART_OUTPUT_PATH', DEFAULTS.chartOutputPath),
      topN: readInteger(env, 'CHART_TOP_N', DEFAULTS.chartTopN, 1),
    },
    retry,
  };
}

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readInteger(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a whole number, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(`${name} must be at least ${min}, got ${value}`);
  }
  if (value > max) {
    throw new ConfigError(`${name} must be at most ${max}, got ${value}`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;

  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${name} must be true or false, got "${raw}"`);
}

function readStrategy(env: Env): BackoffStrategy {
  const raw = env.RETRY_STRATEGY?.trim().toLowerCase();
  if (!raw) return DEFAULT_RETRY_POLICY.strategy;

  if (raw === 'fixed' || raw === 'exponential') return raw;
  throw new ConfigError(`RETRY_STRATEGY must be "fixed" or "exponential", got "${raw}"`);
}
