#!/usr/bin/env node
// ABOUTME: Command line entry point for the dataset usage report
// ABOUTME: Loads .env settings, runs the report once with a GitHub client and exits

import * as dotenv from 'dotenv';
import { runCli } from './cli.js';
import { ConfigError } from './errors.js';
import { GitHubSearchClient } from './github-search-client.js';

// Load environment variables
dotenv.config();

async function main() {
  try {
    await runCli(process.env, (config) =>
      new GitHubSearchClient(config.githubToken, {
        baseURL: config.apiBaseUrl,
        timeoutMs: config.requestTimeoutMs,
      })
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
