/**
 * Config Module
 *
 * Responsibilities:
 * - Define the CollectorConfig schema (zod) and its defaults
 * - Apply environment overrides
 * - Fail early with every invalid field listed
 *
 * The config is passed explicitly into each component, so tests can point
 * the whole pipeline at a fake origin.
 */

import { z } from 'zod';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/114.0.0.0 Safari/537.36';

const AliasRuleSchema = z.object({
  /** Any name containing this phrase... */
  phrase: z.string().min(1),
  /** ...maps to this page title */
  title: z.string().min(1),
});

export type AliasRule = z.infer<typeof AliasRuleSchema>;

/**
 * Zod schema for collector configuration.
 * Numeric fields are coerced so environment strings validate as-is.
 */
export const CollectorConfigSchema = z.object({
  siteUrl: z.string().url().default('https://dontstarve.fandom.com'),
  articlePrefix: z
    .string()
    .startsWith('/', { message: 'articlePrefix must start with "/"' })
    .endsWith('/', { message: 'articlePrefix must end with "/"' })
    .default('/wiki/'),
  cdnHost: z.string().min(1).default('static.wikia.nocookie.net'),
  apiUrl: z.string().url().default('https://dontstarve.fandom.com/api.php'),
  categoryUrl: z.string().url().default('https://dontstarve.fandom.com/wiki/Category:Boss_Monsters'),
  /** Below this many primary-selector hits the crawler rescans with a broader selector */
  fallbackThreshold: z.coerce.number().int().min(0).default(30),
  pageDelayMs: z.coerce.number().int().min(0).default(400),
  imageDelayMs: z.coerce.number().int().min(0).default(250),
  timeoutMs: z.coerce.number().int().positive().default(25000),
  apiTimeoutMs: z.coerce.number().int().positive().default(20000),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  /** Member count the category page is known to list; null disables the check */
  expectedCount: z.coerce.number().int().positive().nullable().default(37),
  urlsFile: z.string().min(1).default('scraping/boss_urls.txt'),
  outputDir: z.string().min(1).default('bosses'),
  recordsFile: z.string().min(1).default('bosses.csv'),
  aliasRules: z
    .array(AliasRuleSchema)
    .default([{ phrase: 'Reanimated Skeleton', title: 'Reanimated_Skeleton' }]),
});

export type CollectorConfig = z.infer<typeof CollectorConfigSchema>;
export type CollectorConfigInput = z.input<typeof CollectorConfigSchema>;

/**
 * Thrown when configuration fails validation
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Environment variable → config field
 */
const ENV_OVERRIDES: Record<string, keyof CollectorConfig> = {
  BOSS_WIKI_SITE_URL: 'siteUrl',
  BOSS_WIKI_API_URL: 'apiUrl',
  BOSS_WIKI_CATEGORY_URL: 'categoryUrl',
  BOSS_WIKI_CDN_HOST: 'cdnHost',
  BOSS_WIKI_TIMEOUT_MS: 'timeoutMs',
  BOSS_WIKI_PAGE_DELAY_MS: 'pageDelayMs',
  BOSS_WIKI_USER_AGENT: 'userAgent',
};

/**
 * Validate a raw config object, applying defaults
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(raw: unknown = {}): CollectorConfig {
  const parseResult = CollectorConfigSchema.safeParse(raw);

  if (!parseResult.success) {
    const issues = parseResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return parseResult.data;
}

/**
 * Build the effective config: defaults, then environment, then explicit overrides
 */
export function loadConfig(
  overrides: CollectorConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): CollectorConfig {
  const fromEnv: Record<string, string> = {};

  for (const [variable, field] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable]?.trim();
    if (value) {
      fromEnv[field] = value;
    }
  }

  return resolveConfig({ ...fromEnv, ...overrides });
}

export const DEFAULT_CONFIG: CollectorConfig = resolveConfig();
