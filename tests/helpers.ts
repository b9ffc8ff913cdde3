import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FetchError } from '../src/errors';
import { Logger, LogEntry, createLogger, setLogHandler, setLogLevel } from '../src/logger';
import { Fetcher } from '../src/types';

export const BASE = 'https://www.example.com';

/**
 * In-memory stand-in for HttpClient. Unknown URLs behave like a 404; every
 * request is recorded in order so tests can assert what was (not) fetched.
 */
export class FakeFetcher implements Fetcher {
  private responses = new Map<string, Buffer | Error>();
  readonly requests: string[] = [];
  readonly delayed: string[] = [];

  set(url: string, body: string | Buffer | Error): this {
    this.responses.set(url, typeof body === 'string' ? Buffer.from(body) : body);
    return this;
  }

  async get(url: string): Promise<Buffer> {
    this.requests.push(url);
    const res = this.responses.get(url);
    if (res === undefined) throw new FetchError('notFound', url, `resource not found: ${url}`, { statusCode: 404 });
    if (res instanceof Error) throw res;
    return res;
  }

  async getWithDelay(url: string): Promise<Buffer> {
    this.delayed.push(url);
    return this.get(url);
  }

  count(url: string): number {
    return this.requests.filter((u) => u === url).length;
  }
}

// Captures log entries instead of printing them.
export function quietLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  setLogLevel('debug');
  setLogHandler((e) => entries.push(e));
  return { logger: createLogger(), entries };
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'gallery-archiver-'));
}

const FOOTER = '<div class="online-stats">42 registered, 1200 guests</div>';

export function galleryPage(ids: number[]): string {
  const figures = ids
    .map(
      (id) =>
        `<figure><a href="/view/${id}/"><img src="//t.example.com/${id}.jpg"></a>` +
        `<figcaption><a href="/view/${id}/">Piece ${id}</a></figcaption></figure>`
    )
    .join('');
  return `<html><body><nav><a href="/view/1/">Latest</a></nav><section>${figures}</section>${FOOTER}</body></html>`;
}

export function viewPage(href: string | null): string {
  const link = href === null ? '<a>Download</a>' : `<a href="${href}">Download</a>`;
  return `<html><body><div class="buttons"><a href="/fav/1/">+Fav</a>${link}</div>${FOOTER}</body></html>`;
}

export function watchlistPage(users: string[]): string {
  const rows = users.map((u) => `<div class="watch-row"><a href="/user/${u}/">${u}</a></div>`).join('');
  return `<html><body>${rows}</body></html>`;
}

export function listDir(dir: string): string[] {
  return fs.readdirSync(dir).sort();
}
