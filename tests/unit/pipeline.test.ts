/**
 * Unit tests for the Pipeline Module
 * Runs against MemoryStorageAdapter and an in-process fake origin
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { resolveConfig } from '../../src/config/index.js';
import {
  formatUrlList,
  readUrlList,
  runCrawl,
  runImageDownload,
  runReconcile,
} from '../../src/pipeline/index.js';
import { silentLogger } from '../../src/logging/index.js';
import { FileSystemStorageAdapter, MemoryStorageAdapter } from '../../src/storage/index.js';
import { FakeOrigin } from '../helpers/fake-origin.js';
import { createMockLogger, type MockLogger } from '../helpers/mock-logger.js';

// ============================================================================
// Test Utilities
// ============================================================================

const WIKI = 'https://dontstarve.fandom.com/wiki';
const CATEGORY = `${WIKI}/Category:Boss_Monsters`;
const CDN = 'https://static.wikia.nocookie.net/dontstarve_gamepedia/images';
const IMAGE = `${CDN}/4/4e/Deerclops.png/revision/latest`;
const URLS_FILE = 'scraping/boss_urls.txt';

const config = resolveConfig({
  pageDelayMs: 0,
  imageDelayMs: 0,
  expectedCount: null,
  fallbackThreshold: 1,
});

const LISTING_HTML = `
<div id="mw-content-text">
  <a class="category-page__member-link" href="/wiki/Klaus">Klaus</a>
  <a class="category-page__member-link" href="/wiki/Deerclops">Deerclops</a>
</div>`;

async function text(storage: MemoryStorageAdapter, key: string): Promise<string> {
  const { content } = await storage.load(key);
  return content.toString('utf-8');
}

// ============================================================================
// Tests
// ============================================================================

describe('Pipeline Module', () => {
  let origin: FakeOrigin;
  let logger: MockLogger;
  let storage: MemoryStorageAdapter;

  beforeEach(() => {
    origin = new FakeOrigin();
    logger = createMockLogger();
    storage = new MemoryStorageAdapter();
  });

  describe('URL list files', () => {
    test('should write one URL per line with a trailing newline', () => {
      expect(formatUrlList([`${WIKI}/Deerclops`, `${WIKI}/Klaus`])).toBe(`${WIKI}/Deerclops\n${WIKI}/Klaus\n`);
      expect(formatUrlList([])).toBe('');
    });

    test('should read lines and skip blanks', async () => {
      await storage.save(URLS_FILE, `${WIKI}/Deerclops\r\n\n  ${WIKI}/Klaus  \n`);

      expect(await readUrlList(storage, URLS_FILE)).toEqual([`${WIKI}/Deerclops`, `${WIKI}/Klaus`]);
    });
  });

  describe('runCrawl()', () => {
    test('should write the sorted URL list', async () => {
      origin.onPage(CATEGORY, LISTING_HTML);

      const result = await runCrawl({ storage, config, client: origin.client(), logger });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        urlsFound: 2,
        pagesVisited: 1,
        urls: [`${WIKI}/Deerclops`, `${WIKI}/Klaus`],
        errors: [],
      });
      expect(await text(storage, URLS_FILE)).toBe(`${WIKI}/Deerclops\n${WIKI}/Klaus\n`);
      expect(logger.messages('info')).toContain('Collected 2 URLs');
      expect(result.metadata.module).toBe('crawl');
    });

    test('should fail with CRAWL_FAILED when the listing is unreachable', async () => {
      origin.onUrl(CATEGORY, { status: 503 });

      const result = await runCrawl({ storage, config, client: origin.client(), logger });

      expect(result.success).toBe(false);
      expect(result.error).toEqual({
        code: 'CRAWL_FAILED',
        message: `Failed to fetch category page ${CATEGORY}: HTTP 503 for ${CATEGORY}`,
        details: { url: CATEGORY },
      });
      expect(await storage.exists(URLS_FILE)).toBe(false);
    });

    test('should report an aborted run', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await runCrawl({ storage, config, client: origin.client(), logger, signal: controller.signal });

      expect(result.error?.code).toBe('ABORTED');
      expect(origin.requests).toEqual([]);
    });
  });

  describe('runImageDownload()', () => {
    test('should fail with MISSING_INPUT without a URL list', async () => {
      const result = await runImageDownload({ storage, config, client: origin.client(), logger });

      expect(result.success).toBe(false);
      expect(result.error).toEqual({
        code: 'MISSING_INPUT',
        message: 'Missing scraping/boss_urls.txt. Run the crawl step first.',
        details: { file: URLS_FILE },
      });
      expect(logger.calls.error).toEqual([
        ['Missing scraping/boss_urls.txt. Run the crawl step first.', { file: URLS_FILE }],
      ]);
    });

    test('should save found images and count misses', async () => {
      const bytes = Buffer.from('png-bytes');
      await storage.save(URLS_FILE, formatUrlList([`${WIKI}/Deerclops`, `${WIKI}/Klaus`]));
      origin
        .onApi({ prop: 'pageimages', titles: 'Deerclops' }, {
          data: { query: { pages: { '7': { original: { source: IMAGE } } } } },
        })
        .onApi({}, { status: 500 })
        .onUrl(IMAGE, { data: bytes, headers: { 'content-type': 'image/png' } });

      const result = await runImageDownload({ storage, config, client: origin.client(), logger });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        processed: 2,
        saved: 1,
        failed: 1,
        files: ['bosses/Deerclops.png'],
        errors: [`No image found for ${WIKI}/Klaus`],
      });
      const saved = await storage.load('bosses/Deerclops.png');
      expect(saved.content.equals(bytes)).toBe(true);
      expect(saved.metadata.contentType).toBe('image/png');
      expect(logger.messages('info')).toContain('Done. Saved 1 images to bosses');
    });

    test('should record a failed image download and continue', async () => {
      await storage.save(URLS_FILE, formatUrlList([`${WIKI}/Deerclops`]));
      origin
        .onApi({ prop: 'pageimages' }, {
          data: { query: { pages: { '7': { original: { source: IMAGE } } } } },
        })
        .onUrl(IMAGE, { status: 404 });

      const result = await runImageDownload({ storage, config, client: origin.client(), logger });

      expect(result.success).toBe(true);
      expect(result.data?.failed).toBe(1);
      expect(result.data?.errors).toEqual([`Failed ${WIKI}/Deerclops -> ${IMAGE}: HTTP 404 for ${IMAGE}`]);
      expect(logger.messages('error')).toEqual(['Image download failed']);
    });

    test('should stop before the next item once aborted', async () => {
      await storage.save(URLS_FILE, formatUrlList([`${WIKI}/Deerclops`]));
      const controller = new AbortController();
      controller.abort();

      const result = await runImageDownload({
        storage,
        config,
        client: origin.client(),
        logger,
        signal: controller.signal,
      });

      expect(result.error).toEqual({ code: 'ABORTED', message: 'Run aborted', details: undefined });
      expect(origin.requests).toEqual([]);
    });
  });

  describe('runReconcile()', () => {
    test('should require the URL list first', async () => {
      await storage.save('bosses.csv', 'name\nDeerclops\n');

      const result = await runReconcile({ storage, config, logger });

      expect(result.error?.code).toBe('MISSING_INPUT');
      expect(result.error?.message).toBe('Missing scraping/boss_urls.txt. Run the crawl step first.');
    });

    test('should require the record table', async () => {
      await storage.save(URLS_FILE, formatUrlList([`${WIKI}/Deerclops`]));

      const result = await runReconcile({ storage, config, logger: silentLogger });

      expect(result.error?.code).toBe('MISSING_INPUT');
      expect(result.error?.message).toBe('Missing bosses.csv. Provide the record table with a "name" column.');
    });

    test('should report missing files in an empty data directory', async () => {
      const rootDir = await mkdtemp(path.join(os.tmpdir(), 'boss-wiki-pipeline-'));
      try {
        const result = await runReconcile({
          storage: new FileSystemStorageAdapter(rootDir),
          config,
          logger: silentLogger,
        });

        expect(result.error).toEqual({
          code: 'MISSING_INPUT',
          message: 'Missing scraping/boss_urls.txt. Run the crawl step first.',
          details: { file: URLS_FILE },
        });
      } finally {
        await rm(rootDir, { recursive: true, force: true });
      }
    });

    test('should fill the url column and rewrite the table', async () => {
      await storage.save(URLS_FILE, formatUrlList([`${WIKI}/Deerclops`, `${WIKI}/Reanimated_Skeleton`]));
      await storage.save(
        'bosses.csv',
        'name,health\nDeerclops,4000\nKlaus,10000\nReanimated Skeleton (Ruins),2500\n'
      );

      const result = await runReconcile({ storage, config, logger });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({ matched: 2, total: 3 });
      expect(await text(storage, 'bosses.csv')).toBe(
        'name,url,health\n' +
          `Deerclops,${WIKI}/Deerclops,4000\n` +
          'Klaus,,10000\n' +
          `Reanimated Skeleton (Ruins),${WIKI}/Reanimated_Skeleton,2500\n`
      );
      expect(logger.messages('info')).toEqual(['Updated URLs for 2/3 rows']);
    });
  });
});
