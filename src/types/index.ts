/**
 * Core type definitions for the boss wiki collector
 *
 * This module exports all shared types used across the system.
 */

// ============================================================================
// Page References
// ============================================================================

/**
 * Canonical absolute URL of a wiki article page.
 *
 * Always http(s), on the configured site host, under the article prefix,
 * without fragment or query, percent-decoded except %25, %23 and %3F.
 * Produced by `canonicalize()`.
 */
export type PageReference = string;

/**
 * Result of walking a paginated category listing
 */
export interface CrawlResult {
  /** Listing pages visited, in fetch order */
  pages: string[];
  /** Deduplicated member pages, sorted lexicographically */
  urls: PageReference[];
  errors: string[];
}

// ============================================================================
// Images
// ============================================================================

/**
 * Which resolver tier produced an image candidate
 */
export type ImageSource = 'api-original' | 'api-imageinfo' | 'html-og' | 'html-infobox';

export interface ImageCandidate {
  url: string;
  source: ImageSource;
}

/**
 * How the saved bytes relate to what the server returned
 * - original-png: served as PNG, written verbatim
 * - converted: decoded and re-encoded as PNG
 * - raw-fallback: could not be decoded, written as received
 */
export type ImageEncoding = 'original-png' | 'converted' | 'raw-fallback';

export interface ResolvedImage extends ImageCandidate {
  pageUrl: string;
  filename: string;
  content: Buffer;
  encoding: ImageEncoding;
}

// ============================================================================
// Records
// ============================================================================

/**
 * One row of the name-keyed boss table.
 * Columns other than `name` and `url` are carried through untouched.
 */
export interface BossRecord {
  name: string;
  url: string;
  [column: string]: string;
}

// ============================================================================
// Storage
// ============================================================================

/**
 * Metadata tracked for every stored object
 */
export interface StoredObjectMetadata {
  key: string;
  contentType: string;
  createdAt: string;
  size: number;
  checksum: string;
}

/**
 * Storage adapter interface for run inputs and outputs
 */
export interface StorageAdapter {
  save(key: string, content: string | Buffer, metadata?: { contentType?: string }): Promise<StoredObjectMetadata>;
  load(key: string): Promise<{ content: Buffer; metadata: StoredObjectMetadata }>;
  exists(key: string): Promise<boolean>;
  list(prefix?: string): Promise<StoredObjectMetadata[]>;
  delete(key: string): Promise<void>;
}

// ============================================================================
// Module Results
// ============================================================================

export type ModuleErrorCode =
  | 'MISSING_INPUT'
  | 'CRAWL_FAILED'
  | 'ABORTED'
  | 'UNEXPECTED_ERROR';

/**
 * Module result wrapper returned by every pipeline run
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: ModuleErrorCode;
    message: string;
    details?: unknown;
  };
  metadata: {
    module: string;
    timestamp: string;
    duration?: number;
  };
}
