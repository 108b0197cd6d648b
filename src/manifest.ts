import fs from 'fs-extra';
import * as path from 'path';
import { CollectionResult } from './collector.js';
import { ImageRecord, SearchQuery, TerminalStatus } from './types/image.js';
import { logger } from './utils/logger.js';

export interface ManifestEntry extends ImageRecord {
  filename?: string;
}

export interface ManifestData {
  query: SearchQuery;
  status: TerminalStatus;
  pagesFetched: number;
  count: number;
  warnings: string[];
  images: ManifestEntry[];
  collectedAt: string;
}

export function buildManifest(
  query: SearchQuery,
  result: CollectionResult,
  filenames: ReadonlyMap<string, string> = new Map()
): ManifestData {
  return {
    query,
    status: result.status,
    pagesFetched: result.pagesFetched,
    count: result.images.length,
    warnings: result.warnings,
    images: result.images.map((image) => {
      const filename = filenames.get(image.id);
      return filename ? { ...image, filename } : { ...image };
    }),
    collectedAt: new Date().toISOString(),
  };
}

/** Writes `manifest.json` into `outputFolder` and returns its path. */
export async function writeManifest(
  query: SearchQuery,
  result: CollectionResult,
  outputFolder: string,
  filenames?: ReadonlyMap<string, string>
): Promise<string> {
  const manifestPath = path.join(outputFolder, 'manifest.json');
  await fs.ensureDir(outputFolder);
  await fs.writeJson(manifestPath, buildManifest(query, result, filenames), { spaces: 2 });
  logger.info(`Manifest written to ${manifestPath}`);
  return manifestPath;
}
