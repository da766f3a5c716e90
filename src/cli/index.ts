#!/usr/bin/env node
/**
 * Command line entry point
 *
 *   boss-wiki crawl      [--root <dir>] [--verbose]
 *   boss-wiki images     [--root <dir>] [--verbose]
 *   boss-wiki reconcile  [--root <dir>] [--verbose]
 *
 * Exit codes: 0 success, 1 usage or unexpected error, 2 missing input or
 * failed crawl, 130 interrupted.
 */

import { ConfigError, loadConfig, type CollectorConfig } from '../config/index.js';
import { createConsoleLogger } from '../logging/index.js';
import { runCrawl, runImageDownload, runReconcile, type PipelineOptions } from '../pipeline/index.js';
import { FileSystemStorageAdapter } from '../storage/index.js';
import type { ModuleResult } from '../types/index.js';

export type Command = 'crawl' | 'images' | 'reconcile';

export interface CliArgs {
  command: Command;
  rootDir: string;
  verbose: boolean;
}

export const USAGE = 'Usage: boss-wiki <crawl|images|reconcile> [--root <dir>] [--verbose]';

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  missingInput: 2,
  aborted: 130,
} as const;

const COMMANDS: Record<Command, (options: PipelineOptions) => Promise<ModuleResult>> = {
  crawl: runCrawl,
  images: runImageDownload,
  reconcile: runReconcile,
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

/**
 * Parse argv (without the node and script entries). Null on invalid usage.
 */
export function parseArgs(argv: readonly string[], cwd: string = process.cwd()): CliArgs | null {
  const [command, ...rest] = argv;
  if (!command || !isCommand(command)) {
    return null;
  }

  const args: CliArgs = { command, rootDir: cwd, verbose: false };

  for (let i = 0; i < rest.length; i++) {
    const flag = rest[i];
    if (flag === '--verbose') {
      args.verbose = true;
    } else if (flag === '--root') {
      const value = rest[i + 1];
      if (!value) return null;
      args.rootDir = value;
      i++;
    } else {
      return null;
    }
  }

  return args;
}

/**
 * Map a run result to a process exit code
 */
export function exitCodeFor(result: ModuleResult): number {
  if (result.success) {
    return EXIT_CODES.success;
  }
  switch (result.error?.code) {
    case 'MISSING_INPUT':
    case 'CRAWL_FAILED':
      return EXIT_CODES.missingInput;
    case 'ABORTED':
      return EXIT_CODES.aborted;
    default:
      return EXIT_CODES.failure;
  }
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const args = parseArgs(argv);
  if (!args) {
    console.error(USAGE);
    return EXIT_CODES.failure;
  }

  const logger = createConsoleLogger(args.command, args.verbose);

  let config: CollectorConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message, { issues: error.issues });
      return EXIT_CODES.failure;
    }
    throw error;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupt received, stopping after the current item');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const result = await COMMANDS[args.command]({
      config,
      logger,
      storage: new FileSystemStorageAdapter(args.rootDir),
      signal: controller.signal,
    });

    if (!result.success) {
      logger.error(result.error?.message ?? 'Run failed', { code: result.error?.code });
    }
    return exitCodeFor(result);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_CODES.failure;
    }
  );
}
