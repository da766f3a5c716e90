/**
 * Boss Wiki Collector - Main Entry Point
 *
 * This module exports all public interfaces and implementations of the
 * collector.
 *
 * Architecture:
 * - Each module is callable independently
 * - Runs exchange data through StorageAdapter files (URL list, images, CSV)
 * - Configuration is passed explicitly; only loadConfig() reads the environment
 */

// Core Types
export type * from './types/index.js';

// Config Module - Defaults, env overrides, validation
export {
  CollectorConfigSchema,
  ConfigError,
  DEFAULT_CONFIG,
  loadConfig,
  resolveConfig,
  type AliasRule,
  type CollectorConfig,
  type CollectorConfigInput,
} from './config/index.js';

// Logging Module
export {
  createConsoleLogger,
  defaultLogger,
  silentLogger,
  type Logger,
} from './logging/index.js';

// HTTP Module
export {
  createWikiClient,
  createAbortError,
  describeError,
  isAbortError,
} from './http/index.js';

// Canonicalizer Module - Page and image URL canonical forms
export {
  canonicalize,
  normalizeImageUrl,
  pageTitleFromUrl,
  isRasterImage,
} from './canonicalizer/index.js';

// Crawler Module - Category listing walk
export {
  crawlCategory,
  extractMemberLinks,
  findNextPageUrl,
  CrawlError,
  type CrawlOptions,
} from './crawler/index.js';

// Resolver Module - Image tier chain
export {
  resolveImageCandidate,
  chooseImageTitle,
  pickBestHtmlImage,
  filenameFromImageUrl,
  apiOriginalTier,
  apiImageListTier,
  htmlTier,
  DEFAULT_TIERS,
  type ImageTier,
  type PageTarget,
  type TierContext,
  type ResolveOptions,
} from './resolver/index.js';

// Downloader Module - Fetch and PNG encoding
export {
  resolveImage,
  downloadImage,
  encodeAsPng,
  ImageDownloadError,
  type DownloadOptions,
} from './downloader/index.js';

// Reconciler Module - Name → page URL join
export {
  reconcile,
  normalizeNameToTitle,
  buildTitleIndex,
  ensureUrlColumn,
  parseRecordsCsv,
  serializeRecordsCsv,
  countMatched,
  URL_COLUMN,
  type RecordTable,
} from './reconciler/index.js';

// Storage Module
export {
  FileSystemStorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
} from './storage/index.js';

// Pipeline Module - The three runs
export {
  runCrawl,
  runImageDownload,
  runReconcile,
  readUrlList,
  formatUrlList,
  type PipelineOptions,
  type CrawlSummary,
  type ImageRunSummary,
  type ReconcileSummary,
} from './pipeline/index.js';
