// ABOUTME: GitHub code search API client used to count dataset references
// ABOUTME: Handles authentication headers and maps HTTP outcomes to typed search responses

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { ResponseParseError } from './errors.js';
import type { SearchResponse } from './types.js';

export interface GitHubSearchClientOptions {
  baseURL?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

// GitHub signals primary rate limits with 403 and secondary ones with 429
const RATE_LIMIT_STATUSES = new Set([403, 429]);

export class GitHubSearchClient {
  private client: AxiosInstance;
  private readonly API_VERSION = '2022-11-28';

  constructor(token: string, options: GitHubSearchClientOptions = {}) {
    this.client = axios.create({
      baseURL: options.baseURL ?? 'https://api.github.com',
      timeout: options.timeoutMs ?? 30_000,
      headers: {
        'Authorization': `Bearer ${token}`,
        'Accept': 'application/vnd.github+json',
        'X-GitHub-Api-Version': this.API_VERSION,
        'User-Agent': 'dataset-usage-report/1.0',
      },
      // Statuses are outcomes here, not exceptions
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  /**
   * Count code search hits for a raw query string
   */
  async countCodeResults(query: string): Promise<SearchResponse> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(buildSearchPath(query));
    } catch (error) {
      if (axios.isAxiosError(error)) {
        return { kind: 'transport-error', message: error.message };
      }
      throw error;
    }

    if (response.status >= 200 && response.status < 300) {
      return { kind: 'ok', totalCount: parseTotalCount(response.data, query) };
    }

    if (RATE_LIMIT_STATUSES.has(response.status)) {
      return { kind: 'rate-limited', status: response.status };
    }

    return { kind: 'http-error', status: response.status, statusText: response.statusText };
  }
}

/**
 * Build the request path with the query URL-encoded into the q parameter
 */
export function buildSearchPath(query: string): string {
  return `/search/code?q=${encodeURIComponent(query)}`;
}

/**
 * Read total_count from a search response body, defaulting to 0 when the field is absent
 */
export function parseTotalCount(data: unknown, query: string): number {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ResponseParseError(`Search response for "${query}" is not a JSON object`, query);
  }

  if (!('total_count' in data)) return 0;

  const totalCount = data.total_count;
  if (totalCount === null || totalCount === undefined) return 0;
  if (typeof totalCount !== 'number' || !Number.isInteger(totalCount) || totalCount < 0) {
    throw new ResponseParseError(
      `Search response for "${query}" has an invalid total_count: ${JSON.stringify(totalCount)}`,
      query
    );
  }

  return totalCount;
}
