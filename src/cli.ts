// ABOUTME: One report run driven by an environment map, with the search client built on demand
// ABOUTME: Validates configuration before any client exists, then prints the run summary

import { loadConfig, type Env } from './config.js';
import { runReport, type ReportResult } from './report.js';
import type { Sleep } from './retry-policy.js';
import type { CodeSearchClient } from './search-runner.js';
import type { AppConfig } from './types.js';

export type ClientFactory = (config: AppConfig) => CodeSearchClient;

export interface CliOptions {
  sleep?: Sleep;
}

/**
 * Load configuration, build the client and run the report; throws ConfigError before building anything
 */
export async function runCli(env: Env, createClient: ClientFactory, options: CliOptions = {}): Promise<ReportResult> {
  const config = loadConfig(env);
  console.log('GitHub token retrieved!');

  const client = createClient(config);
  const result = await runReport(config, { client, sleep: options.sleep });

  const failed = result.sklearn.summary.failures.length + result.r.summary.failures.length;
  console.error(
    `Report complete: ${result.sklearn.table.rows.length} scikit-learn rows, ` +
      `${result.r.table.rows.length} R rows, ${failed} failed queries`
  );
  return result;
}
