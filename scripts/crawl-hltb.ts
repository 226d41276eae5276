#!/usr/bin/env tsx
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  DEFAULT_CSV_PATH,
  DEFAULT_LOG_PATH,
  ConfigError,
  ensureWritable,
  isConfigError,
  loadConfigFile,
  resolveConfig,
  type CrawlConfig,
  type CrawlConfigKey
} from '../lib/config';
import { runCrawl, type CrawlResult } from '../lib/crawl/pipeline';
import { RetryingFetcher } from '../lib/hltb/fetcher';
import { createCrawlLogger } from '../lib/logger';
import { CsvRecordStore } from '../lib/store';

export interface CliOptions {
  flags: Partial<Record<CrawlConfigKey, string>>;
  configPath: string | null;
  helpRequested: boolean;
}

const VALUE_FLAGS: Record<string, CrawlConfigKey> = {
  '--start': 'start',
  '--concurrency': 'concurrency',
  '--miss-threshold': 'missThreshold',
  '--csv': 'csvPath',
  '--log': 'logPath',
  '--url-template': 'urlTemplate'
};

export function parseArgs(argv: string[]): CliOptions {
  const flags: Partial<Record<CrawlConfigKey, string>> = {};
  let configPath: string | null = null;
  let helpRequested = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const key = VALUE_FLAGS[arg];
    if (key) {
      flags[key] = requireValue(argv, ++i, arg);
      continue;
    }
    switch (arg) {
      case '--config':
        configPath = path.resolve(requireValue(argv, ++i, '--config'));
        break;
      case '--help':
      case '-h':
        helpRequested = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown argument: ${arg}`);
        }
        if (flags.count !== undefined) {
          throw new ConfigError(`Unexpected extra argument: ${arg}`);
        }
        flags.count = arg;
    }
  }

  return { flags, configPath, helpRequested };
}

function requireValue(argv: string[], index: number, flag: string) {
  const value = argv[index];
  if (!value) {
    throw new ConfigError(`${flag} flag requires a value`);
  }
  return value;
}

function printHelp() {
  console.log(`Usage: npm run crawl -- [count] [options]

Arguments:
  count                   How many ids to attempt from the start id, or "*" to run
                          until --miss-threshold consecutive ids have no data (default: 1000)

Options:
  --start <id>            First id to crawl; 0 resumes from the CSV (default: largest id in the CSV + 1)
  --concurrency <n>       Requests in flight at once (default: 8)
  --miss-threshold <n>    Consecutive misses that stop a "*" run (default: 400)
  --csv <file>            CSV dataset to append to (default: ${DEFAULT_CSV_PATH}, env HLTB_CSV_PATH)
  --log <file>            Log file to append to (default: ${DEFAULT_LOG_PATH}, env HLTB_LOG_PATH)
  --url-template <url>    Page URL with an {id} placeholder
  --config <file>         JSON or YAML file with any of the settings above
  -h, --help              Show this message
`);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<CrawlResult | null> {
  let config: CrawlConfig;
  try {
    const options = parseArgs(argv);
    if (options.helpRequested) {
      printHelp();
      return null;
    }
    const file = options.configPath ? loadConfigFile(options.configPath) : {};
    config = resolveConfig({ flags: options.flags, file });
    ensureWritable(config.csvPath);
    ensureWritable(config.logPath);
  } catch (error) {
    if (!isConfigError(error)) throw error;
    console.error(error.message);
    printHelp();
    process.exitCode = 1;
    return null;
  }

  const logger = createCrawlLogger(config.logPath);
  const store = new CsvRecordStore(config.csvPath);
  const fetcher = new RetryingFetcher({ concurrency: config.concurrency }, { logger });
  const controller = new AbortController();
  const interrupt = () => controller.abort();
  process.once('SIGINT', interrupt);
  process.once('SIGTERM', interrupt);

  try {
    return await runCrawl(
      {
        count: config.count,
        startId: config.start,
        concurrency: config.concurrency,
        missThreshold: config.missThreshold,
        urlTemplate: config.urlTemplate,
        signal: controller.signal
      },
      { fetcher, store, logger }
    );
  } finally {
    process.off('SIGINT', interrupt);
    process.off('SIGTERM', interrupt);
    await fetcher.close();
    try {
      await store.close();
    } finally {
      await logger.close();
    }
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
