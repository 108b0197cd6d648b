import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { CollectionResult } from './collector.js';
import { downloadVariant, variantFilename } from './downloader.js';
import { buildManifest, writeManifest } from './manifest.js';
import { ImageRecord, SearchQuery } from './types/image.js';

const record: ImageRecord = {
  id: 'abc123',
  regularURL: 'https://images.example.test/abc123?w=1080',
  fullURL: 'https://images.example.test/abc123?q=85',
  rawURL: 'https://images.example.test/abc123',
  width: 4000,
  height: 3000,
  altText: 'a quiet lake',
  color: '#8ca6c0',
  likes: 12,
};

const query: SearchQuery = {
  term: 'lake',
  orientation: 'landscape',
  color: 'any',
  minWidth: 1200,
  minHeight: 800,
  maxResults: 1,
};

const result: CollectionResult = {
  images: [record],
  status: 'stopped_by_cap',
  pagesFetched: 1,
  warnings: [],
};

describe('Downloads and manifests', () => {
  let outputFolder: string;

  beforeEach(async () => {
    outputFolder = await fs.mkdtemp(path.join(os.tmpdir(), 'photo-collector-'));
  });

  afterEach(async () => {
    await fs.remove(outputFolder);
  });

  describe('downloadVariant', () => {
    it('streams the requested variant to <id>_<variant>.jpg', async () => {
      const get = vi.fn().mockResolvedValueOnce({ data: Readable.from([Buffer.from('jpeg-bytes')]) });

      const filename = await downloadVariant(record, 'full', outputFolder, { get });

      expect(filename).toBe('abc123_full.jpg');
      expect(get).toHaveBeenCalledWith('https://images.example.test/abc123?q=85', { responseType: 'stream' });
      expect(await fs.readFile(path.join(outputFolder, filename), 'utf-8')).toBe('jpeg-bytes');
    });

    it('names files by id and variant', () => {
      expect(variantFilename(record, 'raw')).toBe('abc123_raw.jpg');
    });
  });

  describe('writeManifest', () => {
    it('records the query, outcome and downloaded filenames', async () => {
      const manifestPath = await writeManifest(query, result, outputFolder, new Map([['abc123', 'abc123_regular.jpg']]));

      expect(manifestPath).toBe(path.join(outputFolder, 'manifest.json'));
      const manifest = await fs.readJson(manifestPath);
      expect(manifest.query).toEqual(query);
      expect(manifest.status).toBe('stopped_by_cap');
      expect(manifest.count).toBe(1);
      expect(manifest.images).toEqual([{ ...record, filename: 'abc123_regular.jpg' }]);
    });

    it('leaves filename off records that were not downloaded', () => {
      const manifest = buildManifest(query, result);
      expect(manifest.images).toEqual([record]);
      expect(manifest.pagesFetched).toBe(1);
    });
  });
});
