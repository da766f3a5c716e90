/**
 * Reconciler Module
 *
 * Fills the `url` column of the name-keyed boss table from the crawled page
 * list. Names are mapped to wiki page titles (spaces → underscores, slashes
 * kept, alias rules applied) and looked up in a title → URL index.
 * A miss leaves the column empty; it is not an error.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { pageTitleFromUrl } from '../canonicalizer/index.js';
import { DEFAULT_CONFIG, type AliasRule, type CollectorConfig } from '../config/index.js';
import type { BossRecord, PageReference } from '../types/index.js';

export const URL_COLUMN = 'url';

const CsvRowsSchema = z.array(z.array(z.string()));

/**
 * Parsed record table with its header order
 */
export interface RecordTable {
  columns: string[];
  records: BossRecord[];
}

/**
 * Map decoded page titles to their canonical URL
 */
export function buildTitleIndex(
  urls: Iterable<PageReference>,
  config: Pick<CollectorConfig, 'articlePrefix'> = DEFAULT_CONFIG
): Map<string, PageReference> {
  const index = new Map<string, PageReference>();

  for (const raw of urls) {
    const url = raw.trim();
    if (!url) continue;
    const title = pageTitleFromUrl(url, config);
    if (title) {
      index.set(title, url);
    }
  }

  return index;
}

/**
 * Convert a display name to wiki page-title form.
 *
 * Alias rules win over the generic conversion, e.g. every
 * "Reanimated Skeleton (...)" variant maps to "Reanimated_Skeleton".
 */
export function normalizeNameToTitle(
  name: string,
  aliasRules: readonly AliasRule[] = DEFAULT_CONFIG.aliasRules
): string {
  const alias = aliasRules.find((rule) => name.includes(rule.phrase));
  if (alias) {
    return alias.title;
  }
  return name.trim().replace(/ /g, '_');
}

/**
 * Trim whitespace and stray surrounding quotes from a name cell
 */
function cleanName(name: string): string {
  return name.trim().replace(/^"+|"+$/g, '');
}

/**
 * Set each record's url from the crawled pages.
 * Record order and all other fields are preserved; the input is not mutated.
 */
export function reconcile(
  records: readonly BossRecord[],
  urls: Iterable<PageReference>,
  config: Pick<CollectorConfig, 'articlePrefix' | 'aliasRules'> = DEFAULT_CONFIG
): BossRecord[] {
  const index = buildTitleIndex(urls, config);

  return records.map((record) => {
    const title = normalizeNameToTitle(cleanName(record.name ?? ''), config.aliasRules);
    return { ...record, url: index.get(title) ?? '' };
  });
}

/**
 * Header order with the url column present (inserted second when missing)
 */
export function ensureUrlColumn(columns: readonly string[]): string[] {
  if (columns.includes(URL_COLUMN)) {
    return [...columns];
  }
  const result = [...columns];
  result.splice(Math.min(1, result.length), 0, URL_COLUMN);
  return result;
}

/**
 * Parse the record table; short rows are padded with empty cells
 */
export function parseRecordsCsv(text: string): RecordTable {
  const rows = CsvRowsSchema.parse(
    parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  );

  const [header = [], ...body] = rows;

  const records = body.map((row) => {
    const record: BossRecord = { name: '', url: '' };
    header.forEach((column, i) => {
      record[column] = row[i] ?? '';
    });
    return record;
  });

  return { columns: header, records };
}

/**
 * Serialize records in the given column order, header first
 */
export function serializeRecordsCsv(records: readonly BossRecord[], columns: readonly string[]): string {
  const rows = records.map((record) => columns.map((column) => record[column] ?? ''));
  return stringify([[...columns], ...rows]);
}

/**
 * Count records that ended up with a URL
 */
export function countMatched(records: readonly BossRecord[]): number {
  return records.filter((record) => record.url !== '').length;
}
