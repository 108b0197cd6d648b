import { FetchError } from '../errors.js';
import { SearchQuery } from '../types/image.js';

export interface PageResult {
  page: number;
  /** Raw candidates in the order the service returned them. */
  results: unknown[];
}

export type PageOutcome =
  | { ok: true; page: PageResult }
  | { ok: false; error: FetchError };

export interface PageFetcher {
  /**
   * Fetches one page of search results.
   * @param page 1-indexed page number.
   * @param signal Aborts the in-flight request.
   */
  fetchPage(query: SearchQuery, page: number, signal?: AbortSignal): Promise<PageOutcome>;
}
