import * as cheerio from 'cheerio';
import {
  DownloadLinkNotFoundError,
  InvalidFilePathError,
  UnexpectedLinkFormatError,
  isNotFound,
  wrapError
} from './errors.js';
import { Logger } from './logger.js';
import { SiteUrls, resolveAssetHref } from './site.js';
import { commitSubmission, ensureDir, isArchived } from './storage.js';
import { Fetcher } from './types.js';
import { sanitizeFilename, urlBasename } from './utils.js';

export type DownloadTarget = {
  url: string;
  filename: string;
};

/**
 * Finds the "Download" link on a submission's view page and derives the
 * local filename from the last segment of its URL.
 */
export function parseDownloadTarget(html: Buffer | string): DownloadTarget {
  const $ = cheerio.load(html.toString());
  let href: string | undefined;
  // no useful attribute to select on, so walk every link
  for (const a of $('a').toArray()) {
    if ($(a).text().trim() !== 'Download') continue;
    href = $(a).attr('href');
    if (href !== undefined) break;
  }
  if (href === undefined) throw new DownloadLinkNotFoundError();

  const url = resolveAssetHref(href);
  if (!url) throw new UnexpectedLinkFormatError(href);

  const filename = sanitizeFilename(urlBasename(url));
  if (filename === '' || filename === '.' || filename === '..') {
    throw new InvalidFilePathError(filename);
  }
  return { url, filename };
}

export class Submission {
  readonly id: bigint;
  readonly directory: string;
  private client: Fetcher;
  private urls: SiteUrls;
  private log: Logger;

  constructor(client: Fetcher, urls: SiteUrls, logger: Logger, id: bigint, directory: string) {
    this.client = client;
    this.urls = urls;
    this.log = logger;
    this.id = id;
    this.directory = directory;
  }

  isArchived(): boolean {
    return isArchived(this.id, this.directory);
  }

  /**
   * Downloads the file and its view page unless the archive marker already
   * exists. A file URL that 404s is logged and skipped: the view page exists
   * but the site lost the file, and that must not stop the crawl.
   */
  async save(): Promise<void> {
    if (this.isArchived()) {
      this.log.debug('submission already saved, skipping', { id: this.id });
      return;
    }

    try {
      ensureDir(this.directory);
    } catch (err) {
      throw wrapError('failed to create target directory', err);
    }

    let page: Buffer;
    try {
      page = await this.client.getWithDelay(this.urls.view(this.id));
    } catch (err) {
      throw wrapError('failed to get submission page', err);
    }

    const target = parseDownloadTarget(page);

    let payload: Buffer;
    try {
      payload = await this.client.get(target.url);
    } catch (err) {
      if (isNotFound(err)) {
        this.log.error('file download 404s, skipping submission', { id: this.id, url: target.url });
        return;
      }
      throw wrapError('failed to download file', err);
    }

    const filePath = await commitSubmission(this.directory, target.filename, this.id, payload, page);
    this.log.info('saved submission', { id: this.id, file: filePath });
  }
}
