import { fatalInvariant, wrapError } from './errors.js';
import { Logger } from './logger.js';
import { SiteUrls } from './site.js';
import { Fetcher } from './types.js';

export type WatchlistOptions = {
  maxPages: number;
  minNewPerPage: number;
};

// One path segment per name; "." and ".." are dropped below.
const WATCHED_USER_RE = /\/user\/([^/]+)\//g;

export function parseWatchedUsers(html: Buffer | string): string[] {
  return Array.from(html.toString().matchAll(WATCHED_USER_RE), (m) => m[1]).filter((u) => u !== '.' && u !== '..');
}

export class WatchlistCrawler {
  private client: Fetcher;
  private urls: SiteUrls;
  private log: Logger;
  private opts: WatchlistOptions;

  constructor(client: Fetcher, urls: SiteUrls, logger: Logger, opts: WatchlistOptions) {
    this.client = client;
    this.urls = urls;
    this.log = logger;
    this.opts = opts;
  }

  /**
   * Unique usernames from a watcher's watchlist, in order of first appearance.
   *
   * The site keeps repeating a long tail of old entries on every page past
   * the end, so an empty page never shows up; the list ends at the first page
   * that adds fewer than minNewPerPage names.
   */
  async list(watcher: string): Promise<string[]> {
    this.log.debug('getting watchlist', { watcher });
    const seen = new Set<string>();
    const users: string[] = [];

    for (let page = 1; ; page++) {
      if (page > this.opts.maxPages) {
        this.log.error('maximum watchlist pages exceeded', { watcher, maxPages: this.opts.maxPages });
        fatalInvariant('maximum watchlist pages exceeded');
      }

      // watchlist pages lack the users-online footer, so no load-aware delay here
      const url = this.urls.watchlist(watcher, page);
      let body: Buffer;
      try {
        body = await this.client.get(url);
      } catch (err) {
        this.log.error('watchlist page fetch error', { url, error: err });
        throw wrapError('failed to fetch watchlist page', err);
      }

      const matches = parseWatchedUsers(body);
      let added = 0;
      for (const u of matches) {
        if (seen.has(u)) continue;
        seen.add(u);
        users.push(u);
        added++;
      }

      this.log.info('watchlist page processed', { watcher, page, count: matches.length, new: added });

      if (added < this.opts.minNewPerPage) break;
    }

    this.log.info('total watchlist entries found', { watcher, count: users.length });
    return users;
  }
}
