// ABOUTME: TypeScript type definitions for the dataset usage report
// ABOUTME: Includes query, outcome, result table, retry policy and configuration shapes

export type Ecosystem = 'sklearn' | 'r';

export interface DatasetQuery {
  readonly dataset: string;
  readonly query: string;
}

export interface QueryResult {
  dataset: string;
  totalCount: number;
}

export type FailureReason = 'http-status' | 'rate-limited' | 'transport';

export interface QueryFailure {
  dataset: string;
  reason: FailureReason;
  attempts: number;
  status?: number;
  message: string;
}

export type QueryOutcome =
  | { ok: true; result: QueryResult }
  | { ok: false; failure: QueryFailure };

export interface ResultTable {
  ecosystem: Ecosystem;
  rows: QueryResult[];
}

export type SearchResponse =
  | { kind: 'ok'; totalCount: number }
  | { kind: 'rate-limited'; status: number }
  | { kind: 'http-error'; status: number; statusText: string }
  | { kind: 'transport-error'; message: string };

export type BackoffStrategy = 'fixed' | 'exponential';

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
  strategy: BackoffStrategy;
  maxDelayMs: number;
  jitter: boolean;
}

export interface EcosystemDefinition {
  ecosystem: Ecosystem;
  label: string;
  buildQuery(dataset: string): string;
  isSearchable(dataset: string): boolean;
  /** Completes the log line for filtered names, e.g. "containing spaces or periods" */
  skipReason: string;
  retry: RetryPolicy;
}

export interface RunSummary {
  ecosystem: Ecosystem;
  attempted: number;
  skipped: number;
  succeeded: number;
  failures: QueryFailure[];
}

export interface ChartOptions {
  outputPath: string;
  topN: number;
}

export interface AppConfig {
  githubToken: string;
  apiBaseUrl: string;
  requestTimeoutMs: number;
  rDatasetsListPath: string;
  sklearnOutputPath: string;
  rOutputPath: string;
  chart: ChartOptions & { enabled: boolean };
  retry: RetryPolicy;
}
