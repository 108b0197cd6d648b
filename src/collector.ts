import { config } from './config.js';
import { FetchError } from './errors.js';
import { UserAgentPool } from './identity/user-agent-pool.js';
import { candidateId, decodeCandidate } from './providers/candidate.js';
import { PageFetcher, PageOutcome } from './providers/page-fetcher.js';
import { SearchClient } from './providers/search-client.js';
import {
  CollectionProgress,
  CollectionStatus,
  ImageRecord,
  SearchQuery,
  TerminalStatus,
} from './types/image.js';
import { logger } from './utils/logger.js';
import { sleep } from './utils/sleep.js';
import { toUserFriendlyError } from './utils/userErrors.js';

export interface CollectorOptions {
  fetcher: PageFetcher;
  /** Pause between successive page fetches. */
  politenessDelayMs: number;
}

export interface CollectOptions {
  signal?: AbortSignal;
  onProgress?: (progress: CollectionProgress) => void;
}

export interface CollectionResult {
  images: ImageRecord[];
  status: TerminalStatus;
  pagesFetched: number;
  warnings: string[];
  error?: FetchError;
}

interface CollectionState {
  page: number;
  pagesFetched: number;
  images: ImageRecord[];
  seenIds: Set<string>;
  status: CollectionStatus;
  warnings: string[];
  error?: FetchError;
}

/**
 * Drives the page-by-page search loop for one query at a time.
 *
 * Holds only configuration; every `collect` call owns its own state, so one
 * instance can serve concurrent callers.
 */
export class Collector {
  constructor(private readonly options: CollectorOptions) {}

  async collect(query: SearchQuery, options: CollectOptions = {}): Promise<CollectionResult> {
    const { signal, onProgress } = options;
    const state: CollectionState = {
      page: 1,
      pagesFetched: 0,
      images: [],
      seenIds: new Set(),
      status: 'running',
      warnings: [],
    };

    logger.info(`Collecting up to ${query.maxResults} images for "${query.term}"`, {
      orientation: query.orientation,
      color: query.color,
      minWidth: query.minWidth,
      minHeight: query.minHeight,
    });

    while (state.status === 'running' && state.images.length < query.maxResults) {
      if (signal?.aborted) {
        this.fail(state, new FetchError('cancelled', 'Collection was cancelled', state.page));
        break;
      }

      const outcome = await this.fetch(query, state.page, signal);
      if (!outcome.ok) {
        this.fail(state, outcome.error);
        break;
      }
      state.pagesFetched++;

      const { results } = outcome.page;
      if (results.length === 0) {
        logger.info(`Page ${state.page} returned no results.`);
        state.status = 'stopped_by_empty_page';
        break;
      }

      const added = this.processPage(state, query, results);
      logger.debug(`Page ${state.page}: ${added} new of ${results.length} candidates (total ${state.images.length})`);
      onProgress?.({
        page: state.page,
        collected: state.images.length,
        maxResults: query.maxResults,
        fraction: Math.min(state.images.length / query.maxResults, 1),
      });

      if (state.images.length >= query.maxResults) {
        state.status = 'stopped_by_cap';
        break;
      }

      if (added === 0) {
        logger.info(`Page ${state.page} contained no unseen images. Stopping.`);
        state.status = 'stopped_by_exhaustion';
        break;
      }

      state.page++;
      await sleep(this.options.politenessDelayMs, signal);
    }

    const images = state.images.slice(0, query.maxResults);
    const status: TerminalStatus = state.status === 'running' ? 'stopped_by_cap' : state.status;
    logger.info(`Collected ${images.length} images from ${state.pagesFetched} page(s) (${status})`);

    return {
      images,
      status,
      pagesFetched: state.pagesFetched,
      warnings: state.warnings,
      ...(state.error ? { error: state.error } : {}),
    };
  }

  private async fetch(query: SearchQuery, page: number, signal?: AbortSignal): Promise<PageOutcome> {
    try {
      return await this.options.fetcher.fetchPage(query, page, signal);
    } catch (error) {
      // PageFetcher implementations should resolve with an error outcome instead
      const detail = error instanceof Error ? error.message : String(error);
      return { ok: false, error: new FetchError('transport', detail, page) };
    }
  }

  /** Returns the number of records accepted from this page. */
  private processPage(state: CollectionState, query: SearchQuery, results: unknown[]): number {
    let added = 0;

    for (const [index, raw] of results.entries()) {
      const id = candidateId(raw);
      if (id === null) {
        this.warn(state, `Skipped result ${index + 1} on page ${state.page}: missing id`);
        continue;
      }
      if (state.seenIds.has(id)) continue;
      state.seenIds.add(id);

      const decoded = decodeCandidate(raw);
      if (!decoded.ok) {
        this.warn(state, `Skipped image ${id} on page ${state.page}: ${decoded.reason}`);
        continue;
      }

      const { record } = decoded;
      if (record.width < query.minWidth || record.height < query.minHeight) continue;

      state.images.push(record);
      added++;

      // nothing after the cap-reaching candidate is evaluated
      if (state.images.length >= query.maxResults) break;
    }

    return added;
  }

  private fail(state: CollectionState, error: FetchError): void {
    state.status = 'stopped_by_error';
    state.error = error;
    const message = toUserFriendlyError(error, 'collect');
    logger.error(`Collection stopped on page ${error.page}: ${error.message}`);
    state.warnings.push(
      state.images.length > 0
        ? `Stopped early with ${state.images.length} image(s): ${message}`
        : message
    );
  }

  private warn(state: CollectionState, message: string): void {
    logger.warn(message);
    state.warnings.push(message);
  }
}

export interface CreateCollectorOptions {
  baseUrl?: string;
  perPage?: number;
  timeoutMs?: number;
  politenessDelayMs?: number;
  userAgentsFile?: string;
}

/**
 * Wires a Collector to the HTTP search client using `config` defaults.
 */
export function createCollector(overrides: CreateCollectorOptions = {}): Collector {
  const fetcher = new SearchClient({
    baseUrl: overrides.baseUrl ?? config.searchBaseUrl,
    perPage: overrides.perPage ?? config.perPage,
    timeoutMs: overrides.timeoutMs ?? config.requestTimeoutMs,
    identity: UserAgentPool.fromFile(overrides.userAgentsFile),
  });
  return new Collector({
    fetcher,
    politenessDelayMs: overrides.politenessDelayMs ?? config.politenessDelayMs,
  });
}
