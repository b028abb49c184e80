#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { getConfig, parseStorageSelection, resolveStorage } from './config.js';
import { SOURCE_CATALOG, isSourceId } from './constants/sources.js';
import { describeError } from './errors.js';
import { logger } from './logger.js';
import { runPipeline } from './services/pipeline.js';
import { formatRunReport } from './services/report.js';
import { SqliteAdapter } from './storage/index.js';
import { SOURCE_IDS, type SourceId, type StorageKind } from './types.js';

const USAGE = `Usage: news-lexicon [--source <id>] [--storage <kinds|all>] [--stats]

  --source   ${SOURCE_IDS.join(' | ')} (default: hackernews)
  --storage  comma-separated list of sqlite, csv, parquet, json, or all
             (default: STORAGE env, else all)
  --stats    print statistics of the SQLite store and exit
  --help     show this message

Examples:
  news-lexicon --source bbc
  news-lexicon --source g1 --storage sqlite
  news-lexicon --storage csv,json`;

interface CliOptions {
  source: SourceId;
  storage?: StorageKind[];
  stats: boolean;
  help: boolean;
}

function parseCli(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      source: { type: 'string', short: 's', default: 'hackernews' },
      storage: { type: 'string' },
      stats: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  const source = (values.source ?? 'hackernews').toLowerCase();
  if (!isSourceId(source)) {
    throw new Error(`Unknown source: ${source} (expected ${SOURCE_IDS.join(', ')})`);
  }

  return {
    source,
    storage: values.storage !== undefined ? parseStorageSelection(values.storage) : undefined,
    stats: values.stats ?? false,
    help: values.help ?? false,
  };
}

function printStatistics(): void {
  const cfg = getConfig();
  const store = new SqliteAdapter({ dataDir: cfg.dataDir, filename: cfg.sqlite.filename });
  const stats = store.statistics();
  const lines = [
    `SQLite store: ${store.dbPath}`,
    `Total articles: ${stats.totalArticles}`,
    `Runs: ${stats.runs}`,
    `Unique words analyzed: ${stats.uniqueWordsAnalyzed}`,
    ...Object.entries(stats.articlesBySource).map(([source, count]) => {
      const name = isSourceId(source) ? SOURCE_CATALOG[source].name : source;
      return `  ${name}: ${count}`;
    }),
  ];
  console.log(lines.join('\n'));
}

process.on('SIGINT', () => {
  logger.info('SIGINT received, stopping');
  process.exit(130);
});

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCli(process.argv.slice(2));
  } catch (err) {
    console.error(describeError(err));
    console.error(USAGE);
    return 2;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }
  if (options.stats) {
    printStatistics();
    return 0;
  }

  let storage: StorageKind[];
  try {
    storage = options.storage ?? resolveStorage();
  } catch (err) {
    console.error(describeError(err));
    console.error(USAGE);
    return 2;
  }

  const report = await runPipeline({ source: options.source, storage });
  console.log(formatRunReport(report));
  return report.status === 'failed' ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error({ err: error }, 'News Lexicon run crashed');
    process.exit(1);
  });
