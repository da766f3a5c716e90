/**
 * Canonicalizer Module
 *
 * Pure URL functions shared by the crawler, the image resolver and the
 * reconciler:
 * - canonicalize(): raw href → canonical article PageReference (or null)
 * - normalizeImageUrl(): CDN image URL → full-size revision/latest form
 *
 * Both are deterministic and idempotent; set-based deduplication of crawl
 * results depends on it.
 */

import { DEFAULT_CONFIG, type CollectorConfig } from '../config/index.js';
import type { PageReference } from '../types/index.js';

type UrlRules = Pick<CollectorConfig, 'siteUrl' | 'articlePrefix'>;

const RASTER_EXTENSION = /\.(png|jpe?g)$/i;
const SCALE_SEGMENT = /\/scale-to-width-down\/\d+/g;

/**
 * Percent-decode, keeping the input when it holds a malformed escape
 */
function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Escapes that would change the URL's meaning once decoded: `%`, `?`, `#` */
const RESERVED_ESCAPE = /(%(?:25|23|3F))/i;
const RESERVED_ESCAPE_ONLY = /^%(?:25|23|3F)$/i;

/**
 * Percent-decode a path, keeping %25, %23 and %3F encoded (upper-cased)
 */
function decodePath(pathname: string): string {
  return pathname
    .split(RESERVED_ESCAPE)
    .map((part) => (RESERVED_ESCAPE_ONLY.test(part) ? part.toUpperCase() : safeDecode(part)))
    .join('');
}

function parseUrl(value: string, base?: string): URL | null {
  try {
    return new URL(value, base);
  } catch {
    return null;
  }
}

/**
 * True when `hostname` is the site host or one of its subdomains
 */
function isSiteHost(hostname: string, siteUrl: string): boolean {
  const siteHost = parseUrl(siteUrl)?.hostname;
  if (!siteHost) {
    return false;
  }
  return hostname === siteHost || hostname.endsWith(`.${siteHost}`);
}

/**
 * Whether a file name or URL path ends in a recognized raster extension
 */
export function isRasterImage(name: string): boolean {
  return RASTER_EXTENSION.test(name);
}

/**
 * Resolve `href` against `baseUrl` and reduce it to a canonical article URL.
 *
 * Returns null for non-http(s) schemes, foreign hosts, paths outside the
 * article prefix and namespaced titles (Category:, File:, Template:, ...).
 */
export function canonicalize(
  baseUrl: string,
  href: string | null | undefined,
  config: UrlRules = DEFAULT_CONFIG
): PageReference | null {
  const trimmed = href?.trim();
  if (!trimmed) {
    return null;
  }

  const parsed = parseUrl(trimmed, baseUrl);
  if (!parsed) {
    return null;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }

  if (!isSiteHost(parsed.hostname, config.siteUrl)) {
    return null;
  }

  // Fragment and query are dropped by rebuilding from the path alone
  const path = decodePath(parsed.pathname);
  if (!path.startsWith(config.articlePrefix)) {
    return null;
  }

  const title = path.slice(config.articlePrefix.length);
  if (!title || title.includes(':')) {
    return null;
  }

  return `${parsed.protocol}//${parsed.host}${path}`;
}

/**
 * Decoded page title of an article URL, slashes kept.
 * Null when the URL has no article prefix or no title after it.
 */
export function pageTitleFromUrl(
  url: string,
  config: Pick<CollectorConfig, 'articlePrefix'> = DEFAULT_CONFIG
): string | null {
  const parsed = parseUrl(url);
  const path = safeDecode(parsed ? parsed.pathname : url);
  const index = path.indexOf(config.articlePrefix);
  if (index === -1) {
    return null;
  }
  return path.slice(index + config.articlePrefix.length) || null;
}

/**
 * Rewrite an image URL to its canonical full-size form.
 *
 * On the image CDN: drop /scale-to-width-down/<n> and force /revision/latest
 * on bare raster paths. The query string (cache buster) is kept. URLs on any
 * other host only lose their fragment.
 */
export function normalizeImageUrl(
  raw: string,
  config: Pick<CollectorConfig, 'cdnHost'> = DEFAULT_CONFIG
): string {
  if (!raw) {
    return raw;
  }

  const hashIndex = raw.indexOf('#');
  const withoutFragment = hashIndex === -1 ? raw : raw.slice(0, hashIndex);

  const parsed = parseUrl(withoutFragment);
  if (!parsed || !parsed.hostname.includes(config.cdnHost)) {
    return withoutFragment;
  }

  let path = parsed.pathname.replace(SCALE_SEGMENT, '');
  if (!path.includes('/revision/') && isRasterImage(path)) {
    path = `${path}/revision/latest`;
  }
  parsed.pathname = path;

  return parsed.toString();
}
