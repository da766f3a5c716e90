/**
 * Resolver Module
 *
 * Finds the best image for a wiki page through an ordered chain of tiers.
 * Each tier shares one signature and returns a candidate or null; the first
 * candidate wins and later tiers never run.
 *
 * Default chain:
 * 1. api-original   - page → original image (pageimages)
 * 2. api-imageinfo  - page → image list → preferred file → direct URL
 * 3. html           - Open Graph image, then infobox image selectors
 *
 * A tier that throws (transport error, malformed JSON) counts as a miss.
 */

import * as cheerio from 'cheerio';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { isRasterImage, normalizeImageUrl, pageTitleFromUrl } from '../canonicalizer/index.js';
import { DEFAULT_CONFIG, type CollectorConfig } from '../config/index.js';
import { createWikiClient, describeError, fetchText } from '../http/index.js';
import { defaultLogger, type Logger } from '../logging/index.js';
import type { ImageCandidate } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Page a tier is asked about
 */
export interface PageTarget {
  url: string;
  /** Decoded page title, e.g. "Ancient_Guardian" */
  title: string;
}

export interface TierContext {
  client: AxiosInstance;
  config: CollectorConfig;
  logger: Logger;
}

/**
 * One strategy in the fallback chain
 */
export interface ImageTier {
  readonly name: string;
  resolve(page: PageTarget, context: TierContext): Promise<ImageCandidate | null>;
}

export interface ResolveOptions {
  config?: CollectorConfig;
  client?: AxiosInstance;
  logger?: Logger;
  /** Override the chain (defaults to DEFAULT_TIERS) */
  tiers?: readonly ImageTier[];
}

// ============================================================================
// Query API Schemas
// ============================================================================

const PageImagesResponseSchema = z.object({
  query: z.object({
    pages: z.record(
      z.object({
        original: z.object({ source: z.string().min(1) }).optional(),
      })
    ),
  }),
});

const PageImageListResponseSchema = z.object({
  query: z.object({
    pages: z.record(
      z.object({
        images: z.array(z.object({ title: z.string() })).optional(),
      })
    ),
  }),
});

const ImageInfoResponseSchema = z.object({
  query: z.object({
    pages: z.record(
      z.object({
        imageinfo: z.array(z.object({ url: z.string().optional() })).optional(),
      })
    ),
  }),
});

/**
 * GET the query API. The response body is returned unvalidated.
 */
async function queryApi(
  context: TierContext,
  params: Record<string, string>
): Promise<unknown> {
  const response = await context.client.get<unknown>(context.config.apiUrl, {
    params: { action: 'query', ...params, format: 'json' },
    timeout: context.config.apiTimeoutMs,
    responseType: 'json',
  });
  return response.data;
}

// ============================================================================
// Image Selection
// ============================================================================

/**
 * Compare titles with spaces and underscores treated alike
 */
function titleKey(value: string): string {
  return value.replace(/ /g, '_').toLowerCase();
}

/**
 * Pick the most likely main image among a page's files.
 *
 * Only raster files are considered. Preference:
 * (a) a .png whose name starts with the page's base title,
 * (b) the first .png,
 * (c) the first raster file.
 */
export function chooseImageTitle(imageTitles: readonly string[], pageTitle: string): string | null {
  const raster = imageTitles.filter((title) => isRasterImage(title));
  const base = titleKey(pageTitle.split(':').pop() ?? pageTitle);

  const preferred = raster.find((title) => {
    const name = titleKey(title.replace('File:', ''));
    return name.startsWith(base) && name.endsWith('.png');
  });

  return (
    preferred ??
    raster.find((title) => title.toLowerCase().endsWith('.png')) ??
    raster[0] ??
    null
  );
}

/**
 * File name part of an image URL: the segment before /revision/, or the last one
 */
function imageFileSegment(url: string): string {
  const path = url.split(/[?#]/)[0] ?? url;
  const revisionIndex = path.indexOf('/revision/');
  const filePath = revisionIndex === -1 ? path : path.slice(0, revisionIndex);
  return filePath.slice(filePath.lastIndexOf('/') + 1);
}

const JPEG_EXTENSION = /\.jpe?g(?=\/revision\/|\?|$)/i;

const INFOBOX_IMAGE_SELECTORS = [
  '.portable-infobox .pi-image-thumbnail',
  'figure.pi-item.pi-image img',
  'a.image img',
];

/**
 * Choose an image URL from a page's HTML.
 *
 * The Open Graph image wins when present. A .jpg/.jpeg og:image is rewritten
 * to .png on the assumption that the wiki stores a PNG under the same name;
 * nothing checks that before download.
 */
export function pickBestHtmlImage(
  html: string,
  pageUrl: string,
  config: CollectorConfig = DEFAULT_CONFIG
): ImageCandidate | null {
  const $ = cheerio.load(html);

  const ogImage = $('meta[property="og:image"]').first().attr('content')?.trim();
  if (ogImage) {
    const candidate = normalizeImageUrl(ogImage, config);
    if (imageFileSegment(candidate).toLowerCase().endsWith('.png')) {
      return { url: candidate, source: 'html-og' };
    }
    return { url: normalizeImageUrl(candidate.replace(JPEG_EXTENSION, '.png'), config), source: 'html-og' };
  }

  for (const selector of INFOBOX_IMAGE_SELECTORS) {
    const image = $(selector).first();
    if (image.length === 0) {
      continue;
    }

    // Lazy-loaded images carry a placeholder in src and the real file in data-src
    const lazySrc = image.attr('data-src')?.trim();
    const eagerSrc = image.attr('src')?.trim();
    const raw = lazySrc || (eagerSrc && !eagerSrc.startsWith('data:') ? eagerSrc : undefined);
    if (!raw) {
      continue;
    }

    try {
      return { url: normalizeImageUrl(new URL(raw, pageUrl).toString(), config), source: 'html-infobox' };
    } catch {
      continue;
    }
  }

  return null;
}

// ============================================================================
// Tiers
// ============================================================================

export const apiOriginalTier: ImageTier = {
  name: 'api-original',
  async resolve(page, context) {
    const data = PageImagesResponseSchema.parse(
      await queryApi(context, { titles: page.title, prop: 'pageimages', piprop: 'original' })
    );

    for (const entry of Object.values(data.query.pages)) {
      if (entry.original) {
        return { url: entry.original.source, source: 'api-original' };
      }
    }
    return null;
  },
};

export const apiImageListTier: ImageTier = {
  name: 'api-imageinfo',
  async resolve(page, context) {
    const list = PageImageListResponseSchema.parse(
      await queryApi(context, { titles: page.title, prop: 'images', imlimit: 'max' })
    );

    const imageTitles = Object.values(list.query.pages).flatMap(
      (entry) => entry.images?.map((image) => image.title) ?? []
    );

    const chosen = chooseImageTitle(imageTitles, page.title);
    if (!chosen) {
      return null;
    }

    context.logger.debug('Image chosen from page file list', {
      page: page.url,
      image: chosen,
      candidates: imageTitles.length,
    });

    const info = ImageInfoResponseSchema.parse(
      await queryApi(context, { titles: chosen, prop: 'imageinfo', iiprop: 'url' })
    );

    for (const entry of Object.values(info.query.pages)) {
      const url = entry.imageinfo?.[0]?.url;
      if (url) {
        return { url, source: 'api-imageinfo' };
      }
    }
    return null;
  },
};

export const htmlTier: ImageTier = {
  name: 'html',
  async resolve(page, context) {
    const html = await fetchText(context.client, page.url);
    return pickBestHtmlImage(html, page.url, context.config);
  },
};

export const DEFAULT_TIERS: readonly ImageTier[] = [apiOriginalTier, apiImageListTier, htmlTier];

// ============================================================================
// Resolution
// ============================================================================

/**
 * Run the tier chain for a page URL.
 * The winning URL is normalized; null means no tier found an image.
 */
export async function resolveImageCandidate(
  pageUrl: string,
  options: ResolveOptions = {}
): Promise<ImageCandidate | null> {
  const config = options.config ?? DEFAULT_CONFIG;
  const context: TierContext = {
    config,
    client: options.client ?? createWikiClient(config),
    logger: options.logger ?? defaultLogger,
  };
  const page: PageTarget = {
    url: pageUrl,
    title: pageTitleFromUrl(pageUrl, config) ?? pageUrl,
  };

  for (const tier of options.tiers ?? DEFAULT_TIERS) {
    try {
      const candidate = await tier.resolve(page, context);
      if (candidate) {
        context.logger.debug('Image candidate found', { page: pageUrl, tier: tier.name, url: candidate.url });
        return { ...candidate, url: normalizeImageUrl(candidate.url, config) };
      }
    } catch (error) {
      context.logger.warn('Image tier failed', { page: pageUrl, tier: tier.name, error: describeError(error) });
    }
  }

  return null;
}

// ============================================================================
// File Names
// ============================================================================

function stem(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Local file name for an image URL, always with a .png extension.
 *
 * `.../Ancient_Guardian.png/revision/latest` → `Ancient_Guardian.png`
 */
export function filenameFromImageUrl(url: string, fallback: string): string {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    path = url.split(/[?#]/)[0] ?? url;
  }

  const segments = path.split('/').filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1] ?? '';
  const name = last === 'latest' ? segments[segments.length - 3] ?? '' : last;

  const base = stem(decodeSegment(name)).replace(/[/\\]/g, '_') || stem(fallback);
  return `${base}.png`;
}
