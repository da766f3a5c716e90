/**
 * Pipeline Module
 *
 * The three runs of the collector, each reading and writing through a
 * StorageAdapter and reporting a ModuleResult:
 *
 * 1. runCrawl         - category listing → URL list file
 * 2. runImageDownload - URL list file → one PNG per page
 * 3. runReconcile     - URL list file + record table → record table with urls
 *
 * Per-item failures are logged and counted, never abort a run. A missing
 * input file fails the run with MISSING_INPUT and names the step to run first.
 */

import type { AxiosInstance } from 'axios';
import { DEFAULT_CONFIG, type CollectorConfig } from '../config/index.js';
import { CrawlError, crawlCategory } from '../crawler/index.js';
import { ImageDownloadError, resolveImage } from '../downloader/index.js';
import {
  createWikiClient,
  describeError,
  isAbortError,
  sleep,
  throwIfAborted,
} from '../http/index.js';
import { defaultLogger, type Logger } from '../logging/index.js';
import {
  countMatched,
  ensureUrlColumn,
  parseRecordsCsv,
  reconcile,
  serializeRecordsCsv,
} from '../reconciler/index.js';
import type { ImageTier } from '../resolver/index.js';
import type {
  ModuleErrorCode,
  ModuleResult,
  PageReference,
  StorageAdapter,
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineOptions {
  storage: StorageAdapter;
  config?: CollectorConfig;
  client?: AxiosInstance;
  logger?: Logger;
  signal?: AbortSignal;
  /** Image resolver chain override */
  tiers?: readonly ImageTier[];
}

export interface CrawlSummary {
  urlsFound: number;
  pagesVisited: number;
  urls: PageReference[];
  errors: string[];
}

export interface ImageRunSummary {
  processed: number;
  saved: number;
  failed: number;
  /** Storage keys written */
  files: string[];
  errors: string[];
}

export interface ReconcileSummary {
  matched: number;
  total: number;
}

const CRAWL_FIRST = 'Run the crawl step first.';

// ============================================================================
// Helpers
// ============================================================================

function succeed<T>(module: string, startTime: number, data: T): ModuleResult<T> {
  return {
    success: true,
    data,
    metadata: {
      module,
      timestamp: new Date().toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

function fail<T>(
  module: string,
  startTime: number,
  code: ModuleErrorCode,
  message: string,
  details?: unknown
): ModuleResult<T> {
  return {
    success: false,
    error: { code, message, details },
    metadata: {
      module,
      timestamp: new Date().toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

function failFromError<T>(module: string, startTime: number, error: unknown): ModuleResult<T> {
  if (isAbortError(error)) {
    return fail<T>(module, startTime, 'ABORTED', 'Run aborted');
  }
  return fail<T>(module, startTime, 'UNEXPECTED_ERROR', describeError(error));
}

/**
 * Serialize a URL list: one URL per line, trailing newline
 */
export function formatUrlList(urls: readonly PageReference[]): string {
  return urls.map((url) => `${url}\n`).join('');
}

/**
 * Read a URL list, skipping blank lines
 */
export async function readUrlList(storage: StorageAdapter, key: string): Promise<PageReference[]> {
  const { content } = await storage.load(key);
  return content
    .toString('utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

async function missingInput<T>(
  storage: StorageAdapter,
  required: Array<{ key: string; hint: string }>,
  module: string,
  startTime: number,
  logger: Logger
): Promise<ModuleResult<T> | null> {
  for (const { key, hint } of required) {
    if (!(await storage.exists(key))) {
      const message = `Missing ${key}. ${hint}`;
      logger.error(message, { file: key });
      return fail<T>(module, startTime, 'MISSING_INPUT', message, { file: key });
    }
  }
  return null;
}

// ============================================================================
// Runs
// ============================================================================

/**
 * Crawl the category listing and rewrite the URL list file
 */
export async function runCrawl(options: PipelineOptions): Promise<ModuleResult<CrawlSummary>> {
  const startTime = Date.now();
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? defaultLogger;

  try {
    const result = await crawlCategory(config.categoryUrl, {
      config,
      client: options.client ?? createWikiClient(config),
      logger,
      signal: options.signal,
    });

    await options.storage.save(config.urlsFile, formatUrlList(result.urls), {
      contentType: 'text/plain',
    });

    for (const url of result.urls) {
      logger.info('Collected URL', { url });
    }
    logger.info(`Collected ${result.urls.length} URLs`, { file: config.urlsFile });

    return succeed('crawl', startTime, {
      urlsFound: result.urls.length,
      pagesVisited: result.pages.length,
      urls: result.urls,
      errors: result.errors,
    });
  } catch (error) {
    if (error instanceof CrawlError) {
      logger.error('Category crawl failed', { url: error.url, error: error.message });
      return fail<CrawlSummary>('crawl', startTime, 'CRAWL_FAILED', error.message, { url: error.url });
    }
    return failFromError<CrawlSummary>('crawl', startTime, error);
  }
}

/**
 * Resolve and save one image per URL in the list file
 */
export async function runImageDownload(options: PipelineOptions): Promise<ModuleResult<ImageRunSummary>> {
  const startTime = Date.now();
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? defaultLogger;
  const { storage, signal } = options;

  const missing = await missingInput<ImageRunSummary>(
    storage,
    [{ key: config.urlsFile, hint: CRAWL_FIRST }],
    'images',
    startTime,
    logger
  );
  if (missing) {
    return missing;
  }

  const client = options.client ?? createWikiClient(config);
  const summary: ImageRunSummary = { processed: 0, saved: 0, failed: 0, files: [], errors: [] };

  try {
    const urls = await readUrlList(storage, config.urlsFile);
    logger.info('Starting image download', { urls: urls.length, outputDir: config.outputDir });

    for (const [index, pageUrl] of urls.entries()) {
      throwIfAborted(signal);
      summary.processed++;

      try {
        const image = await resolveImage(pageUrl, { config, client, logger, tiers: options.tiers });

        if (!image) {
          summary.failed++;
          summary.errors.push(`No image found for ${pageUrl}`);
        } else {
          const key = `${config.outputDir}/${image.filename}`;
          await storage.save(key, image.content, { contentType: 'image/png' });
          summary.saved++;
          summary.files.push(key);
          logger.info(`Saved ${key}`, { page: pageUrl, image: image.url, source: image.source, encoding: image.encoding });
        }
      } catch (error) {
        summary.failed++;
        const message =
          error instanceof ImageDownloadError
            ? `Failed ${pageUrl} -> ${error.imageUrl}: ${error.message}`
            : `Failed ${pageUrl}: ${describeError(error)}`;
        summary.errors.push(message);
        logger.error('Image download failed', { page: pageUrl, error: message });
      }

      if (index < urls.length - 1 && config.imageDelayMs > 0) {
        await sleep(config.imageDelayMs);
      }
    }
  } catch (error) {
    return failFromError<ImageRunSummary>('images', startTime, error);
  }

  logger.info(`Done. Saved ${summary.saved} images to ${config.outputDir}`, {
    processed: summary.processed,
    failed: summary.failed,
  });

  return succeed('images', startTime, summary);
}

/**
 * Fill the url column of the record table from the URL list file
 */
export async function runReconcile(options: PipelineOptions): Promise<ModuleResult<ReconcileSummary>> {
  const startTime = Date.now();
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? defaultLogger;
  const { storage } = options;

  const missing = await missingInput<ReconcileSummary>(
    storage,
    [
      { key: config.urlsFile, hint: CRAWL_FIRST },
      { key: config.recordsFile, hint: 'Provide the record table with a "name" column.' },
    ],
    'reconcile',
    startTime,
    logger
  );
  if (missing) {
    return missing;
  }

  try {
    throwIfAborted(options.signal);

    const urls = await readUrlList(storage, config.urlsFile);
    const { content } = await storage.load(config.recordsFile);
    const table = parseRecordsCsv(content.toString('utf-8'));

    const columns = ensureUrlColumn(table.columns);
    const records = reconcile(table.records, urls, config);

    await storage.save(config.recordsFile, serializeRecordsCsv(records, columns), {
      contentType: 'text/csv',
    });

    const matched = countMatched(records);
    logger.info(`Updated URLs for ${matched}/${records.length} rows`, { file: config.recordsFile });

    return succeed('reconcile', startTime, { matched, total: records.length });
  } catch (error) {
    return failFromError<ReconcileSummary>('reconcile', startTime, error);
  }
}
