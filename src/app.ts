import express, { Express } from 'express';
import { Collector } from './collector.js';
import { QueryValidationError } from './errors.js';
import { parseSearchQuery } from './query.js';
import { SearchQuery } from './types/image.js';
import { logger } from './utils/logger.js';
import { toUserFriendlyError } from './utils/userErrors.js';

export const DEFAULT_MAX_RESULTS = 20;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps a `POST /api/collect` body onto a SearchQuery.
 * Throws QueryValidationError for anything unusable.
 */
export function parseCollectRequest(body: unknown): SearchQuery {
  if (!isRecord(body)) {
    throw new QueryValidationError(['Request body must be a JSON object']);
  }
  return parseSearchQuery({
    term: body.query,
    orientation: body.orientation,
    color: body.color,
    minWidth: body.minWidth,
    minHeight: body.minHeight,
    maxResults: body.maxResults ?? DEFAULT_MAX_RESULTS,
  });
}

export function createApp(collector: Collector): Express {
  const app = express();
  app.use(express.json());

  app.post('/api/collect', async (req, res) => {
    let query: SearchQuery;
    try {
      query = parseCollectRequest(req.body);
    } catch (error) {
      return res.status(400).json({ success: false, error: toUserFriendlyError(error, 'api') });
    }

    // stop paging once the client has gone away
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const result = await collector.collect(query, { signal: controller.signal });
      return res.json({
        success: result.status !== 'stopped_by_error',
        status: result.status,
        count: result.images.length,
        images: result.images,
        warnings: result.warnings,
        ...(result.error ? { error: toUserFriendlyError(result.error, 'api') } : {}),
      });
    } catch (error) {
      logger.error('Error in /api/collect:', error instanceof Error ? error.message : String(error));
      return res.status(500).json({ success: false, error: toUserFriendlyError(error, 'api') });
    }
  });

  return app;
}
