/**
 * Crawler Module
 *
 * Walks a paginated wiki category listing and collects the canonical URLs of
 * its member pages.
 *
 * Features:
 * - Primary selector scoped to category-membership markup
 * - Broader rescan when the primary selector finds fewer than
 *   `fallbackThreshold` links (markup drift)
 * - "Next page" pagination with a visited-set cycle guard
 * - Fixed politeness delay between listing pages
 * - Cross-page deduplication, lexicographically sorted output
 *
 * Usage:
 * ```typescript
 * const result = await crawlCategory(config.categoryUrl, { config });
 * console.log(result.urls.length);
 * ```
 */

import * as cheerio from 'cheerio';
import type { AxiosInstance } from 'axios';
import { canonicalize } from '../canonicalizer/index.js';
import { DEFAULT_CONFIG, type CollectorConfig } from '../config/index.js';
import {
  createWikiClient,
  describeError,
  fetchText,
  sleep,
  throwIfAborted,
} from '../http/index.js';
import { defaultLogger, type Logger } from '../logging/index.js';
import type { CrawlResult, PageReference } from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

/** Fandom category items use this class */
const MEMBER_LINK_SELECTOR = 'a.category-page__member-link';

/** Every link in the content container, then every link on the page */
const FALLBACK_LINK_SELECTOR = '#mw-content-text a, a';

const NEXT_PAGE_SELECTOR = 'a[rel="next"], a.category-page__pagination-next';

// ============================================================================
// Types
// ============================================================================

export interface CrawlOptions {
  config?: CollectorConfig;
  /** Preconfigured HTTP client (defaults to one built from config) */
  client?: AxiosInstance;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Raised when the first listing page cannot be fetched
 */
export class CrawlError extends Error {
  constructor(
    message: string,
    readonly url: string
  ) {
    super(message);
    this.name = 'CrawlError';
  }
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Extract canonical member links from one listing page
 */
export function extractMemberLinks(
  html: string,
  pageUrl: string,
  config: CollectorConfig = DEFAULT_CONFIG
): Set<PageReference> {
  const $ = cheerio.load(html);
  const urls = new Set<PageReference>();

  const collect = (selector: string): void => {
    $(selector).each((_index, element) => {
      const url = canonicalize(pageUrl, $(element).attr('href'), config);
      if (url) {
        urls.add(url);
      }
    });
  };

  collect(MEMBER_LINK_SELECTOR);

  if (urls.size < config.fallbackThreshold) {
    collect(FALLBACK_LINK_SELECTOR);
  }

  return urls;
}

/**
 * Absolute URL of the listing's "next page" link, fragment removed
 */
export function findNextPageUrl(html: string, pageUrl: string): string | null {
  const $ = cheerio.load(html);
  const href = $(NEXT_PAGE_SELECTOR).first().attr('href')?.trim();
  if (!href) {
    return null;
  }

  try {
    const next = new URL(href, pageUrl);
    next.hash = '';
    return next.toString();
  } catch {
    return null;
  }
}

// ============================================================================
// Main Crawl Function
// ============================================================================

/**
 * Crawl a category listing and every page reachable through its "next" links
 *
 * @throws CrawlError when the first page cannot be fetched
 * @throws AbortError when `signal` is aborted between pages
 */
export async function crawlCategory(
  startUrl: string,
  options: CrawlOptions = {}
): Promise<CrawlResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const client = options.client ?? createWikiClient(config);
  const logger = options.logger ?? defaultLogger;
  const { signal } = options;

  const visited = new Set<string>();
  const pages: string[] = [];
  const urls = new Set<PageReference>();
  const errors: string[] = [];

  throwIfAborted(signal);
  logger.info('Starting category crawl', { url: startUrl });

  let html: string;
  try {
    html = await fetchText(client, startUrl);
  } catch (error) {
    throw new CrawlError(`Failed to fetch category page ${startUrl}: ${describeError(error)}`, startUrl);
  }

  let pageUrl = startUrl;

  for (;;) {
    visited.add(pageUrl);
    pages.push(pageUrl);

    const found = extractMemberLinks(html, pageUrl, config);
    for (const url of found) {
      urls.add(url);
    }

    logger.debug('Listing page processed', {
      url: pageUrl,
      linksFound: found.size,
      totalUnique: urls.size,
    });

    const nextUrl = findNextPageUrl(html, pageUrl);
    if (!nextUrl || visited.has(nextUrl)) {
      break;
    }

    await sleep(config.pageDelayMs);
    throwIfAborted(signal);

    try {
      html = await fetchText(client, nextUrl);
    } catch (error) {
      const message = `Failed to fetch listing page ${nextUrl}: ${describeError(error)}`;
      errors.push(message);
      logger.warn('Listing page fetch failed, stopping pagination', { url: nextUrl, error: message });
      break;
    }

    pageUrl = nextUrl;
  }

  const sorted = Array.from(urls).sort();

  if (config.expectedCount !== null && sorted.length !== config.expectedCount) {
    logger.warn('Unexpected member count; the page layout may have changed', {
      expected: config.expectedCount,
      found: sorted.length,
    });
  }

  logger.info('Category crawl completed', {
    pagesVisited: pages.length,
    urlsFound: sorted.length,
    errorCount: errors.length,
  });

  return { pages, urls: sorted, errors };
}
