// ABOUTME: Runs dataset queries against the code search client one at a time
// ABOUTME: Retries rate-limited requests per policy and collects per-dataset outcomes

import { buildQueries } from './ecosystems.js';
import { backoffDelay, sleep as defaultSleep, type Sleep } from './retry-policy.js';
import type {
  DatasetQuery,
  EcosystemDefinition,
  FailureReason,
  QueryFailure,
  QueryOutcome,
  QueryResult,
  ResultTable,
  RetryPolicy,
  RunSummary,
  SearchResponse,
} from './types.js';

export interface CodeSearchClient {
  countCodeResults(query: string): Promise<SearchResponse>;
}

export interface SearchRunnerOptions {
  sleep?: Sleep;
  random?: () => number;
}

export interface EcosystemRun {
  table: ResultTable;
  summary: RunSummary;
}

export class SearchRunner {
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(private readonly client: CodeSearchClient, options: SearchRunnerOptions = {}) {
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Query every searchable dataset of an ecosystem in list order
   */
  async runEcosystem(definition: EcosystemDefinition, datasets: readonly string[]): Promise<EcosystemRun> {
    const { queries, skipped } = buildQueries(definition, datasets);
    if (skipped.length > 0) {
      console.error(`[SearchRunner] Skipping ${skipped.length} ${definition.label} dataset names ${definition.skipReason}`);
    }

    const outcomes: QueryOutcome[] = [];
    for (const query of queries) {
      outcomes.push(await this.runQuery(query, definition.retry));
    }

    const rows: QueryResult[] = [];
    const failures: QueryFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        rows.push(outcome.result);
      } else {
        failures.push(outcome.failure);
      }
    }

    const summary: RunSummary = {
      ecosystem: definition.ecosystem,
      attempted: queries.length,
      skipped: skipped.length,
      succeeded: rows.length,
      failures,
    };
    console.error(
      `[SearchRunner] ${definition.label}: ${summary.succeeded}/${summary.attempted} queries succeeded`
    );

    return { table: { ecosystem: definition.ecosystem, rows }, summary };
  }

  /**
   * Run one query, retrying only while the API reports rate limiting
   */
  async runQuery(query: DatasetQuery, policy: RetryPolicy): Promise<QueryOutcome> {
    const maxAttempts = Math.max(1, policy.maxAttempts);
    let attempt = 0;

    while (true) {
      attempt++;
      const response = await this.client.countCodeResults(query.query);

      switch (response.kind) {
        case 'ok':
          console.log(`${query.dataset}: ${response.totalCount}`);
          return { ok: true, result: { dataset: query.dataset, totalCount: response.totalCount } };

        case 'http-error':
          console.error(`Request failed for ${query.dataset}: ${response.status}`);
          return this.failure(query, 'http-status', attempt, `HTTP ${response.status} ${response.statusText}`.trim(), response.status);

        case 'transport-error':
          console.error(`Error querying ${query.dataset}: ${response.message}`);
          return this.failure(query, 'transport', attempt, response.message);

        case 'rate-limited': {
          if (maxAttempts === 1) {
            console.error(`Request failed for ${query.dataset}: ${response.status}`);
            return this.failure(query, 'rate-limited', attempt, `Rate limited (HTTP ${response.status})`, response.status);
          }

          // Every rate-limited response waits, including the last one
          const waitMs = backoffDelay(policy, attempt, this.random);
          console.warn(
            `Rate limit exceeded for ${query.dataset}. Waiting ${Math.round(waitMs / 1000)} seconds before retrying...`
          );
          await this.sleep(waitMs);

          if (attempt >= maxAttempts) {
            console.error(`Failed to retrieve data for ${query.dataset} after ${maxAttempts} attempts.`);
            return this.failure(query, 'rate-limited', attempt, `Rate limited (HTTP ${response.status})`, response.status);
          }
          break;
        }
      }
    }
  }

  private failure(
    query: DatasetQuery,
    reason: FailureReason,
    attempts: number,
    message: string,
    status?: number
  ): QueryOutcome {
    return {
      ok: false,
      failure: {
        dataset: query.dataset,
        reason,
        attempts,
        message,
        ...(status !== undefined ? { status } : {}),
      },
    };
  }
}
