import axios, { AxiosInstance } from 'axios';
import fs from 'fs-extra';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { ImageRecord, ImageVariant, variantUrl } from './types/image.js';
import { logger } from './utils/logger.js';

export function variantFilename(record: ImageRecord, variant: ImageVariant): string {
  return `${record.id}_${variant}.jpg`;
}

/**
 * Streams one resolution variant of a record into `outputFolder`.
 * Resolves with the written filename.
 */
export async function downloadVariant(
  record: ImageRecord,
  variant: ImageVariant,
  outputFolder: string,
  http: Pick<AxiosInstance, 'get'> = axios
): Promise<string> {
  await fs.ensureDir(outputFolder);

  const filename = variantFilename(record, variant);
  const filePath = path.join(outputFolder, filename);

  const response = await http.get<Readable>(variantUrl(record, variant), {
    responseType: 'stream',
  });
  await pipeline(response.data, fs.createWriteStream(filePath));

  logger.debug(`Saved ${variant} variant of ${record.id} to ${filePath}`);
  return filename;
}
