// Transport boundary consumed by the crawl. Both methods reject with a
// FetchError ('notFound' | 'badStatus' | 'transportFailure') once retries are
// exhausted; getWithDelay can also reject with ActivityNotFoundError.
export interface Fetcher {
  get(url: string): Promise<Buffer>;
  getWithDelay(url: string): Promise<Buffer>;
}

export type Creator = {
  id: string;
  directory: string; // <outputDir>/<id>; scraps live in <directory>/scraps
};

export type GallerySection = 'gallery' | 'scraps';

export type CrawlPage<T> = {
  url: string;
  page: number;
  items: T[];
};

export type ListOptions = {
  includeScraps: boolean;
  reCrawl: boolean; // keep paginating past submissions that are already archived
};

export type RunOptions = {
  watcher?: string;
  creators: string[];
  reCrawl: boolean;
  skipScraps: boolean;
  outputDir: string;
};

export type RunSummary = {
  creators: number;
  submissions: number;
};
