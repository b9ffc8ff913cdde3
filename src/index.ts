#!/usr/bin/env node
import 'dotenv/config';
import { RunConfig, USAGE, VERSION, loadConfig } from './config.js';
import { loadCookies } from './cookies.js';
import { Crawler } from './crawler.js';
import { FatalInvariantError, UsageError, errorMessage } from './errors.js';
import { HttpClient } from './http.js';
import { Logger, createLogger, setLogLevel } from './logger.js';
import { SiteUrls } from './site.js';
import { RunSummary } from './types.js';

type Command = 'crawl' | 'help';

const EXIT_ERROR = 1;
const EXIT_FATAL = 2;

async function main() {
  const cmd = process.argv[2] ?? 'help';
  switch (cmd) {
    case 'crawl':
      await runCrawl(process.argv.slice(3));
      break;
    case 'help':
    default:
      printHelp();
  }
}

function buildClient(cfg: RunConfig, logger: Logger): HttpClient {
  const http = new HttpClient({
    logger,
    userAgent: cfg.userAgent,
    timeoutMs: cfg.timeoutMs,
    tryCount: cfg.tryCount,
    retryIntervalMs: cfg.retryIntervalMs,
    delay: {
      throttle: cfg.throttle,
      highLoadThreshold: cfg.highLoadThreshold,
      highLoadDelayMs: cfg.highLoadDelayMs,
      defaultDelayMs: cfg.defaultDelayMs
    }
  });
  if (cfg.cookieFile) {
    const count = loadCookies(cfg.cookieFile, http.cookieJar);
    logger.info('loaded cookies from file', { file: cfg.cookieFile, count });
  }
  return http;
}

async function runCrawl(argv: string[]): Promise<RunSummary> {
  const cfg = loadConfig(argv);
  setLogLevel(cfg.logLevel);
  const logger = createLogger({ app: 'gallery-archiver' });

  logger.info('starting', { version: VERSION });
  logger.debug('configuration', { ...cfg });

  const http = buildClient(cfg, logger);
  const crawler = new Crawler(http, new SiteUrls(cfg.baseUrl), logger, {
    maxWatchlistPages: cfg.maxWatchlistPages,
    maxGalleryPages: cfg.maxGalleryPages,
    minNewPerPage: cfg.minNewPerPage
  });

  const summary = await crawler.crawl({
    watcher: cfg.watcher,
    creators: cfg.creators,
    reCrawl: cfg.reCrawl,
    skipScraps: cfg.skipScraps,
    outputDir: cfg.outputDir
  });
  logger.info('done', summary);
  return summary;
}

function printHelp() {
  const commands: Record<Command, string> = {
    crawl: 'Crawl watchlists and galleries and archive new submissions',
    help: 'Show this message'
  };
  console.log('Commands:');
  for (const [name, desc] of Object.entries(commands)) {
    console.log(`  ${name.padEnd(8)} ${desc}`);
  }
  console.log('');
  console.log(USAGE);
}

if (require.main === module) {
  main().catch((err) => {
    if (err instanceof UsageError) {
      console.error(`[gallery-archiver] ${err.message}\n`);
      console.error(USAGE);
      process.exit(EXIT_ERROR);
    }
    const logger = createLogger({ app: 'gallery-archiver' });
    if (err instanceof FatalInvariantError) {
      logger.error('fatal invariant violated, aborting', { error: err.message });
      process.exit(EXIT_FATAL);
    }
    logger.error('application error', { error: errorMessage(err) });
    process.exit(EXIT_ERROR);
  });
}
