import axios, { AxiosInstance } from 'axios';
import { FetchError } from '../errors.js';
import { IdentitySampler } from '../identity/user-agent-pool.js';
import { SearchQuery } from '../types/image.js';
import { logger } from '../utils/logger.js';
import { PageFetcher, PageOutcome } from './page-fetcher.js';

export interface SearchClientOptions {
  baseUrl: string;
  perPage: number;
  timeoutMs: number;
  identity: IdentitySampler;
  http?: Pick<AxiosInstance, 'get'>;
}

export type SearchParams = Record<string, string | number>;

export function buildSearchParams(query: SearchQuery, page: number, perPage: number): SearchParams {
  const params: SearchParams = {
    query: query.term,
    per_page: perPage,
    page,
  };
  if (query.orientation !== 'any') params.orientation = query.orientation;
  if (query.color !== 'any') params.color = query.color;
  return params;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SearchClient implements PageFetcher {
  private readonly http: Pick<AxiosInstance, 'get'>;

  constructor(private readonly options: SearchClientOptions) {
    this.http = options.http ?? axios;
  }

  async fetchPage(query: SearchQuery, page: number, signal?: AbortSignal): Promise<PageOutcome> {
    const params = buildSearchParams(query, page, this.options.perPage);
    logger.debug(`Fetching page ${page} for "${query.term}"`, params);

    let data: unknown;
    try {
      const response = await this.http.get<unknown>(this.options.baseUrl, {
        params,
        headers: {
          'User-Agent': this.options.identity.sample(),
          Accept: 'application/json',
        },
        timeout: this.options.timeoutMs,
        signal,
      });
      data = response.data;
    } catch (error) {
      return { ok: false, error: this.classify(error, page) };
    }

    // axios hands back the raw string when the body is not valid JSON
    if (!isRecord(data)) {
      return { ok: false, error: new FetchError('decode', 'Response body is not a JSON object', page) };
    }
    // no results at all reads as the end of the listing, not a failure
    const results = data['results'] ?? [];
    if (!Array.isArray(results)) {
      return { ok: false, error: new FetchError('decode', 'Response "results" is not an array', page) };
    }

    return { ok: true, page: { page, results } };
  }

  private classify(error: unknown, page: number): FetchError {
    if (axios.isCancel(error)) {
      return new FetchError('cancelled', 'Request was cancelled', page);
    }
    if (axios.isAxiosError(error)) {
      if (error.response) {
        const { status, statusText } = error.response;
        return new FetchError('http_status', `HTTP ${status}${statusText ? `: ${statusText}` : ''}`, page, status);
      }
      return new FetchError('transport', error.code ? `${error.code}: ${error.message}` : error.message, page);
    }
    return new FetchError('transport', error instanceof Error ? error.message : String(error), page);
  }
}
