/**
 * Downloader Module
 *
 * Turns a resolved image candidate into PNG bytes ready to be stored.
 *
 * Key behaviors:
 * - PNG responses are kept byte-for-byte
 * - Anything else is decoded and re-encoded as PNG (sharp)
 * - Bytes that cannot be decoded are kept as received rather than dropped
 */

import type { AxiosInstance } from 'axios';
import sharp from 'sharp';
import { DEFAULT_CONFIG, type CollectorConfig } from '../config/index.js';
import { createWikiClient, describeError } from '../http/index.js';
import { defaultLogger, type Logger } from '../logging/index.js';
import {
  filenameFromImageUrl,
  resolveImageCandidate,
  type ResolveOptions,
} from '../resolver/index.js';
import type { ImageCandidate, ResolvedImage } from '../types/index.js';

export interface DownloadOptions {
  config?: CollectorConfig;
  client?: AxiosInstance;
  logger?: Logger;
}

/**
 * Raised when an image candidate cannot be fetched
 */
export class ImageDownloadError extends Error {
  constructor(
    message: string,
    readonly pageUrl: string,
    readonly imageUrl: string
  ) {
    super(message);
    this.name = 'ImageDownloadError';
  }
}

/**
 * Decode any format sharp understands and re-encode it as PNG
 */
export async function encodeAsPng(data: Buffer): Promise<Buffer> {
  return sharp(data).png().toBuffer();
}

/**
 * Last path segment of the page URL, used when the image URL yields no name
 */
function pageBasename(pageUrl: string): string {
  const path = pageUrl.split(/[?#]/)[0] ?? pageUrl;
  return path.slice(path.lastIndexOf('/') + 1);
}

/**
 * Fetch a candidate's bytes and make them PNG
 *
 * @throws ImageDownloadError when the request fails
 */
export async function downloadImage(
  candidate: ImageCandidate,
  pageUrl: string,
  options: DownloadOptions = {}
): Promise<ResolvedImage> {
  const config = options.config ?? DEFAULT_CONFIG;
  const client = options.client ?? createWikiClient(config);
  const logger = options.logger ?? defaultLogger;

  let data: Buffer;
  let contentType: string;
  try {
    const response = await client.get<ArrayBuffer>(candidate.url, { responseType: 'arraybuffer' });
    data = Buffer.from(response.data);
    contentType = String(response.headers['content-type'] ?? '').toLowerCase();
  } catch (error) {
    throw new ImageDownloadError(describeError(error), pageUrl, candidate.url);
  }

  const base = {
    ...candidate,
    pageUrl,
    filename: filenameFromImageUrl(candidate.url, pageBasename(pageUrl)),
  };

  if (contentType.includes('image/png')) {
    return { ...base, content: data, encoding: 'original-png' };
  }

  try {
    return { ...base, content: await encodeAsPng(data), encoding: 'converted' };
  } catch (error) {
    logger.warn('Image could not be decoded, keeping raw bytes', {
      page: pageUrl,
      image: candidate.url,
      contentType,
      error: describeError(error),
    });
    return { ...base, content: data, encoding: 'raw-fallback' };
  }
}

/**
 * Resolve a page's image and download it.
 * Null when no tier found an image.
 *
 * @throws ImageDownloadError when the chosen image cannot be fetched
 */
export async function resolveImage(
  pageUrl: string,
  options: ResolveOptions & DownloadOptions = {}
): Promise<ResolvedImage | null> {
  const config = options.config ?? DEFAULT_CONFIG;
  const resolved = {
    ...options,
    config,
    client: options.client ?? createWikiClient(config),
    logger: options.logger ?? defaultLogger,
  };

  const candidate = await resolveImageCandidate(pageUrl, resolved);
  if (!candidate) {
    resolved.logger.warn('No image found', { page: pageUrl });
    return null;
  }

  return downloadImage(candidate, pageUrl, resolved);
}
