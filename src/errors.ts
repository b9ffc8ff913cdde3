import { types } from 'node:util';

export type FetchErrorKind = 'notFound' | 'badStatus' | 'transportFailure';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly statusCode?: number;

  constructor(kind: FetchErrorKind, url: string, message: string, opts: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.statusCode = opts.statusCode;
  }
}

// Thrown by getWithDelay when the page has no "registered users online" figure.
// The body was fetched successfully and is kept for callers that can use it anyway.
export class ActivityNotFoundError extends Error {
  readonly url: string;
  readonly body: Buffer;

  constructor(url: string, body: Buffer) {
    super(`could not find registered users count: ${url}`);
    this.name = 'ActivityNotFoundError';
    this.url = url;
    this.body = body;
  }
}

export class CookieFormatError extends Error {
  readonly cookieName?: string;

  constructor(message: string, cookieName?: string) {
    super(message);
    this.name = 'CookieFormatError';
    this.cookieName = cookieName;
  }
}

export class CookieExpiredError extends Error {
  readonly cookieName: string;

  constructor(cookieName: string) {
    super(`cookie is expiring, update your cookies.txt file: ${cookieName}`);
    this.name = 'CookieExpiredError';
    this.cookieName = cookieName;
  }
}

export class DownloadLinkNotFoundError extends Error {
  constructor() {
    super('failed to find download link in HTML');
    this.name = 'DownloadLinkNotFoundError';
  }
}

export class UnexpectedLinkFormatError extends Error {
  readonly href: string;

  constructor(href: string) {
    super(`unexpected download link format: ${href}`);
    this.name = 'UnexpectedLinkFormatError';
    this.href = href;
  }
}

export class InvalidFilePathError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`invalid file path: ${filePath}`);
    this.name = 'InvalidFilePathError';
    this.filePath = filePath;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * The site no longer looks the way the crawler assumes it does (non-numeric
 * submission ids, runaway pagination, a selector returning something it
 * cannot). Nothing in the crawl catches this: continuing could record
 * submissions as archived when they are not.
 */
export class FatalInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalInvariantError';
  }
}

export function fatalInvariant(message: string): never {
  throw new FatalInvariantError(message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error || types.isNativeError(err) ? err.message : String(err);
}

// Adds stage context to a failure while keeping the original reachable as `cause`.
export function wrapError(context: string, cause: unknown): Error {
  if (cause instanceof FatalInvariantError) return cause;
  return new Error(`${context}: ${errorMessage(cause)}`, { cause });
}

export function findCause<T extends Error>(err: unknown, ctor: new (...args: never[]) => T): T | undefined {
  let cur: unknown = err;
  while (cur instanceof Error) {
    if (cur instanceof ctor) return cur;
    cur = cur.cause;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return findCause(err, FetchError)?.kind === 'notFound';
}
