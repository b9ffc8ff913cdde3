import path from 'node:path';
import { GalleryCrawler } from './gallery.js';
import { Logger } from './logger.js';
import { SiteUrls } from './site.js';
import { Creator, Fetcher, RunOptions, RunSummary } from './types.js';
import { WatchlistCrawler } from './watchlist.js';

export type CrawlerLimits = {
  maxWatchlistPages: number;
  maxGalleryPages: number;
  minNewPerPage: number;
};

export class Crawler {
  private log: Logger;
  private watchlist: WatchlistCrawler;
  private gallery: GalleryCrawler;

  constructor(client: Fetcher, urls: SiteUrls, logger: Logger, limits: CrawlerLimits) {
    this.log = logger.child({ component: 'crawler' });
    this.watchlist = new WatchlistCrawler(client, urls, logger.child({ component: 'watchlist' }), {
      maxPages: limits.maxWatchlistPages,
      minNewPerPage: limits.minNewPerPage
    });
    this.gallery = new GalleryCrawler(client, urls, logger.child({ component: 'gallery' }), {
      maxPages: limits.maxGalleryPages
    });
  }

  async creators(opts: Pick<RunOptions, 'watcher' | 'creators' | 'outputDir'>): Promise<Creator[]> {
    const ids: string[] = [];
    if (opts.watcher) {
      ids.push(...(await this.watchlist.list(opts.watcher)));
    }
    ids.push(...opts.creators);
    return ids.map((id) => ({ id, directory: path.join(opts.outputDir, id) }));
  }

  /**
   * Crawls every creator and saves what is new, in order. The first error
   * ends the run; everything saved before it stays saved, and running again
   * picks up where this left off.
   */
  async crawl(opts: RunOptions): Promise<RunSummary> {
    this.log.info('crawl running with config', {
      watcher: opts.watcher,
      creators: opts.creators,
      reCrawl: opts.reCrawl,
      skipScraps: opts.skipScraps
    });

    const creators = await this.creators(opts);
    let submissions = 0;
    for (const creator of creators) {
      const found = await this.gallery.list(creator, { includeScraps: !opts.skipScraps, reCrawl: opts.reCrawl });
      for (const submission of found) {
        await submission.save();
        submissions++;
      }
    }

    return { creators: creators.length, submissions };
  }
}
