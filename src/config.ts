import path from 'node:path';
import pkg from '../package.json';
import { UsageError } from './errors.js';
import { LogLevel, isLogLevel } from './logger.js';
import { DEFAULT_BASE_URL } from './site.js';
import { splitList } from './utils.js';

export const VERSION: string = pkg.version;

// Tuned against how the site paginates today; the page ceilings only guard
// against runaway loops.
export const DEFAULTS = {
  baseUrl: DEFAULT_BASE_URL,
  outputDir: 'dl',
  userAgent: `gallery-archiver/${VERSION}`,
  timeoutMs: 90_000,
  tryCount: 3,
  retryIntervalMs: 5_000,
  highLoadThreshold: 10_000,
  highLoadDelayMs: 5 * 60_000,
  defaultDelayMs: 1_000,
  maxWatchlistPages: 100,
  maxGalleryPages: 1000,
  minNewPerPage: 2
} as const;

export type CliArgs = {
  debug: boolean;
  reCrawl: boolean;
  skipScraps: boolean;
  noThrottle: boolean;
  username?: string;
  artists: string[];
  outputDir?: string;
  cookieFile?: string;
};

export type RunConfig = {
  logLevel: LogLevel;
  watcher?: string;
  creators: string[];
  reCrawl: boolean;
  skipScraps: boolean;
  throttle: boolean;
  outputDir: string;
  cookieFile?: string;
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  tryCount: number;
  retryIntervalMs: number;
  highLoadThreshold: number;
  highLoadDelayMs: number;
  defaultDelayMs: number;
  maxWatchlistPages: number;
  maxGalleryPages: number;
  minNewPerPage: number;
};

const BOOLEAN_FLAGS: Record<string, 'debug' | 'reCrawl' | 'skipScraps' | 'noThrottle'> = {
  d: 'debug',
  debug: 'debug',
  r: 'reCrawl',
  recrawl: 'reCrawl',
  s: 'skipScraps',
  'skip-scraps': 'skipScraps',
  n: 'noThrottle',
  'no-throttle': 'noThrottle'
};

const VALUE_FLAGS: Record<string, 'username' | 'artists' | 'outputDir' | 'cookieFile'> = {
  u: 'username',
  username: 'username',
  a: 'artists',
  artists: 'artists',
  o: 'outputDir',
  output: 'outputDir',
  c: 'cookieFile',
  cookies: 'cookieFile'
};

export const USAGE = [
  'Usage: gallery-archiver crawl [-drsn] (-u <username> | -a <artist1>[,artist2,...]) [-o <output_dir>] [-c <cookies_file>]',
  '',
  '  -d, --debug          Enable debug logging',
  '  -r, --recrawl        Re-crawl galleries looking for missed submissions',
  '  -s, --skip-scraps    Don\'t download scraps',
  '  -n, --no-throttle    Disable the load-aware wait between requests',
  '  -u, --username       Download all artists in this user\'s watchlist',
  '  -a, --artists        Download all submissions from comma-separated list of artists',
  '  -o, --output         Output directory for downloads (default: dl)',
  '  -c, --cookies        Path to cookies.txt file',
  '',
  'Either --username or --artists must be specified.',
  'Env: BASE_URL OUTPUT_DIR COOKIES_FILE USER_AGENT TIMEOUT_MS RETRY_COUNT RETRY_INTERVAL_MS',
  '     MAX_WATCHLIST_PAGES MAX_GALLERY_PAGES MIN_NEW_PER_PAGE LOG_LEVEL'
].join('\n');

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { debug: false, reCrawl: false, skipScraps: false, noThrottle: false, artists: [] };

  const setValue = (key: (typeof VALUE_FLAGS)[string], value: string | undefined, flag: string) => {
    if (value === undefined || value === '') throw new UsageError(`missing value for ${flag}`);
    if (key === 'artists') args.artists.push(...splitList(value));
    else args[key] = value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      const [name, inline] = splitInline(arg.slice(2));
      if (Object.hasOwn(BOOLEAN_FLAGS, name) && inline === undefined) {
        args[BOOLEAN_FLAGS[name]] = true;
      } else if (Object.hasOwn(VALUE_FLAGS, name)) {
        setValue(VALUE_FLAGS[name], inline ?? argv[++i], arg);
      } else {
        throw new UsageError(`unknown flag: ${arg}`);
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      // short flags can be bundled: -drs, -ro dir
      const letters = arg.slice(1);
      for (let j = 0; j < letters.length; j++) {
        const ch = letters[j];
        if (Object.hasOwn(BOOLEAN_FLAGS, ch)) {
          args[BOOLEAN_FLAGS[ch]] = true;
        } else if (Object.hasOwn(VALUE_FLAGS, ch)) {
          const rest = letters.slice(j + 1);
          setValue(VALUE_FLAGS[ch], rest || argv[++i], `-${ch}`);
          break;
        } else {
          throw new UsageError(`unknown flag: -${ch}`);
        }
      }
    } else {
      throw new UsageError(`unexpected argument: ${arg}`);
    }
  }

  if (!args.username && args.artists.length === 0) {
    throw new UsageError('either --username or --artists must be specified');
  }
  return args;
}

function splitInline(flag: string): [string, string | undefined] {
  const eq = flag.indexOf('=');
  return eq < 0 ? [flag, undefined] : [flag.slice(0, eq), flag.slice(eq + 1)];
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) throw new UsageError(`${name} must be a non-negative integer, got "${raw}"`);
  const n = parseInt(raw, 10);
  if (n < min) throw new UsageError(`${name} must be at least ${min}, got "${raw}"`);
  return n;
}

/**
 * Merges flags, environment and defaults into the one RunConfig handed to
 * every component. Flags win over the environment.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): RunConfig {
  const args = parseArgs(argv);
  const envLevel = env.LOG_LEVEL?.toLowerCase();
  const logLevel: LogLevel = args.debug ? 'debug' : envLevel && isLogLevel(envLevel) ? envLevel : 'info';

  return {
    logLevel,
    watcher: args.username,
    creators: args.artists,
    reCrawl: args.reCrawl,
    skipScraps: args.skipScraps,
    throttle: !args.noThrottle,
    outputDir: path.resolve(args.outputDir ?? env.OUTPUT_DIR ?? DEFAULTS.outputDir),
    cookieFile: args.cookieFile ?? (env.COOKIES_FILE || undefined),
    baseUrl: env.BASE_URL || DEFAULTS.baseUrl,
    userAgent: env.USER_AGENT || DEFAULTS.userAgent,
    timeoutMs: intFromEnv(env, 'TIMEOUT_MS', DEFAULTS.timeoutMs, 1),
    tryCount: intFromEnv(env, 'RETRY_COUNT', DEFAULTS.tryCount, 1),
    retryIntervalMs: intFromEnv(env, 'RETRY_INTERVAL_MS', DEFAULTS.retryIntervalMs),
    highLoadThreshold: DEFAULTS.highLoadThreshold,
    highLoadDelayMs: DEFAULTS.highLoadDelayMs,
    defaultDelayMs: DEFAULTS.defaultDelayMs,
    maxWatchlistPages: intFromEnv(env, 'MAX_WATCHLIST_PAGES', DEFAULTS.maxWatchlistPages, 1),
    maxGalleryPages: intFromEnv(env, 'MAX_GALLERY_PAGES', DEFAULTS.maxGalleryPages, 1),
    minNewPerPage: intFromEnv(env, 'MIN_NEW_PER_PAGE', DEFAULTS.minNewPerPage, 1)
  };
}
