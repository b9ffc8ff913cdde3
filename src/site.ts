import type { GallerySection } from './types.js';

export const DEFAULT_BASE_URL = 'https://www.furaffinity.net';

// URL layout of the site. Creator and watcher ids are inserted verbatim: they
// come from the user or from the watchlist pattern, which never yields a "/".
export class SiteUrls {
  private readonly origin: string;

  constructor(baseUrl: string = DEFAULT_BASE_URL) {
    this.origin = new URL(baseUrl).origin;
  }

  watchlist(watcher: string, page: number): string {
    return `${this.origin}/watchlist/by/${watcher}/${page}`;
  }

  gallery(section: GallerySection, creator: string, page: number): string {
    return `${this.origin}/${section}/${creator}/${page}`;
  }

  view(id: bigint): string {
    return `${this.origin}/view/${id}`;
  }
}

// Download links on the detail page are protocol-relative ("//host/...").
export function resolveAssetHref(href: string): string | null {
  if (!href.startsWith('//')) return null;
  return `https:${href}`;
}
