#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import * as path from 'path';
import { CollectionResult, createCollector } from './collector.js';
import { downloadVariant } from './downloader.js';
import { QueryValidationError } from './errors.js';
import { writeManifest } from './manifest.js';
import { parseSearchQuery } from './query.js';
import { ImageRecord, ImageVariant, SearchQuery } from './types/image.js';
import { logger } from './utils/logger.js';
import { toUserFriendlyError } from './utils/userErrors.js';

interface CliOptions {
  query: string;
  orientation: string;
  color: string;
  minWidth: number;
  minHeight: number;
  max: number;
  download?: string;
  variant: ImageVariant;
  json?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function describe(image: ImageRecord, index: number): string {
  const alt = image.altText ? ` "${image.altText}"` : '';
  return `${index + 1}. ${image.id} ${image.width}x${image.height} ${image.color} ♥${image.likes}${alt}\n   ${image.regularURL}`;
}

async function downloadAll(
  images: ImageRecord[],
  variant: ImageVariant,
  outputFolder: string
): Promise<Map<string, string>> {
  const filenames = new Map<string, string>();
  for (const image of images) {
    try {
      filenames.set(image.id, await downloadVariant(image, variant, outputFolder));
    } catch (error) {
      logger.warn(`Could not download ${image.id}: ${toUserFriendlyError(error, 'download')}`);
    }
  }
  logger.info(`Downloaded ${filenames.size}/${images.length} images to ${outputFolder}`);
  return filenames;
}

function report(query: SearchQuery, result: CollectionResult, asJson: boolean): void {
  if (asJson) {
    console.log(JSON.stringify({ query, ...result, error: result.error?.message }, null, 2));
    return;
  }
  for (const warning of result.warnings) {
    logger.warn(warning);
  }
  if (result.images.length === 0) {
    console.log('No images found matching your criteria');
    return;
  }
  console.log(`Found ${result.images.length} images:`);
  result.images.forEach((image, index) => console.log(describe(image, index)));
}

const program = new Command();

program
  .name('photo-collector')
  .description('Collect filtered, deduplicated photo records from a paginated search endpoint')
  .version('1.0.0');

program
  .requiredOption('-q, --query <term>', 'search term')
  .option('-o, --orientation <value>', 'landscape, portrait, squarish or any', 'any')
  .option('-c, --color <value>', 'colour filter, e.g. black_and_white or "Black and White"', 'any')
  .option('--min-width <px>', 'minimum width in pixels', parseInteger, 0)
  .option('--min-height <px>', 'minimum height in pixels', parseInteger, 0)
  .option('-m, --max <count>', 'maximum number of images', parseInteger, 20)
  .option('-d, --download <dir>', 'download every collected image into this folder')
  .addOption(
    new Option('--variant <variant>', 'resolution to download').choices(['regular', 'full', 'raw']).default('regular')
  )
  .option('--json', 'print the result as JSON')
  .action(async (options: CliOptions) => {
    let query: SearchQuery;
    try {
      query = parseSearchQuery({
        term: options.query,
        orientation: options.orientation,
        color: options.color,
        minWidth: options.minWidth,
        minHeight: options.minHeight,
        maxResults: options.max,
      });
    } catch (error) {
      if (error instanceof QueryValidationError) {
        console.error(`Error: ${error.issues.join('; ')}`);
        process.exit(1);
      }
      throw error;
    }

    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('Interrupted, returning the images collected so far...');
      controller.abort();
    });

    try {
      const collector = createCollector();
      const result = await collector.collect(query, {
        signal: controller.signal,
        onProgress: (p) => logger.info(`Page ${p.page}: ${p.collected}/${p.maxResults} (${Math.round(p.fraction * 100)}%)`),
      });

      report(query, result, options.json === true);

      if (options.download && result.images.length > 0) {
        const outputFolder = path.resolve(options.download);
        const filenames = await downloadAll(result.images, options.variant, outputFolder);
        await writeManifest(query, result, outputFolder, filenames);
      }

      process.exit(result.images.length > 0 ? 0 : 1);
    } catch (error) {
      console.error('An unexpected error occurred:', toUserFriendlyError(error, 'cli'));
      process.exit(1);
    }
  });

await program.parseAsync();
