import * as cheerio from 'cheerio';
import path from 'node:path';
import { fatalInvariant, wrapError } from './errors.js';
import { Logger } from './logger.js';
import { SiteUrls } from './site.js';
import { Submission } from './submission.js';
import { CrawlPage, Creator, Fetcher, GallerySection, ListOptions } from './types.js';
import { parseUnsignedId } from './utils.js';

export type GalleryOptions = {
  maxPages: number;
};

// Gallery thumbnails are links to /view/<id>/ wrapping an <img>; navigation
// links to the same path have no image, so requiring one avoids duplicates.
const SUBMISSION_LINK = 'a[href^="/view/"]:has(img)';

export function parseSubmissionIds(html: Buffer | string): bigint[] {
  const $ = cheerio.load(html.toString());
  const ids: bigint[] = [];
  for (const a of $(SUBMISSION_LINK).toArray()) {
    const href = $(a).attr('href');
    if (href === undefined) {
      fatalInvariant('selected a submission link without an href');
    }
    const raw = href.replace(/\/$/, '').replace(/^\/view\//, '');
    const id = parseUnsignedId(raw);
    if (id === null) {
      fatalInvariant(`unable to extract id from ${href}`);
    }
    ids.push(id);
  }
  return ids;
}

export class GalleryCrawler {
  private client: Fetcher;
  private urls: SiteUrls;
  private log: Logger;
  private maxPages: number;

  constructor(client: Fetcher, urls: SiteUrls, logger: Logger, opts: GalleryOptions) {
    this.client = client;
    this.urls = urls;
    this.log = logger;
    this.maxPages = opts.maxPages;
  }

  /**
   * Submissions of one creator, oldest first: the gallery, then (optionally)
   * scraps. Without reCrawl each section stops at the first submission that is
   * already archived, since pages list newest first and everything after it
   * was saved by an earlier run.
   */
  async list(creator: Creator, opts: ListOptions): Promise<Submission[]> {
    this.log.debug('getting submissions for creator', { creator: creator.id, reCrawl: opts.reCrawl });
    const submissions = await this.crawlSection(creator, 'gallery', opts.reCrawl);
    if (opts.includeScraps) {
      this.log.debug('getting scraps for creator', { creator: creator.id, reCrawl: opts.reCrawl });
      submissions.push(...(await this.crawlSection(creator, 'scraps', opts.reCrawl)));
    }
    this.log.info('total submissions found', { creator: creator.id, count: submissions.length });
    return submissions;
  }

  private async crawlSection(creator: Creator, section: GallerySection, reCrawl: boolean): Promise<Submission[]> {
    const dir = section === 'scraps' ? path.join(creator.directory, 'scraps') : creator.directory;
    const found: Submission[] = [];

    for (let page = 1; ; page++) {
      if (page > this.maxPages) {
        this.log.error('maximum gallery pages exceeded', { creator: creator.id, maxPages: this.maxPages });
        fatalInvariant('maximum gallery pages exceeded');
      }

      const url = this.urls.gallery(section, creator.id, page);
      let body: Buffer;
      try {
        body = await this.client.getWithDelay(url);
      } catch (err) {
        this.log.error('gallery page fetch error', { url, error: err });
        throw wrapError('failed to fetch gallery page', err);
      }

      const { result, stop } = this.collect(body, url, page, dir, reCrawl, creator);
      found.push(...result.items);
      this.log.debug(`listing ${section}`, {
        creator: creator.id,
        url: result.url,
        page: result.page,
        count: result.items.length
      });

      if (result.items.length === 0 || stop) break;
    }

    return found.reverse();
  }

  private collect(
    body: Buffer,
    url: string,
    page: number,
    dir: string,
    reCrawl: boolean,
    creator: Creator
  ): { result: CrawlPage<Submission>; stop: boolean } {
    const items: Submission[] = [];
    for (const id of parseSubmissionIds(body)) {
      const submission = new Submission(this.client, this.urls, this.log, id, dir);
      if (!reCrawl && submission.isArchived()) {
        this.log.debug('submission already saved, stopping crawl', { creator: creator.id, id });
        return { result: { url, page, items }, stop: true };
      }
      items.push(submission);
    }
    return { result: { url, page, items }, stop: false };
  }
}
