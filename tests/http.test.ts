import { IncomingMessage, Server, ServerResponse, createServer } from 'node:http';
import { ActivityNotFoundError, FetchError } from '../src/errors';
import { HttpClient, HttpOptions } from '../src/http';
import { quietLogger } from './helpers';

// In-process site stand-in. Each path has a fixed behaviour; hits are counted.
const hits = new Map<string, number>();
let server: Server;
let base: string;

function footer(registered: number): string {
  return `<html><body><p>page</p><div class="online-stats">${registered} registered, 800 guests</div></body></html>`;
}

function handle(req: IncomingMessage, res: ServerResponse) {
  const url = req.url ?? '/';
  const n = (hits.get(url) ?? 0) + 1;
  hits.set(url, n);

  switch (url) {
    case '/ok':
      res.end('hello');
      return;
    case '/missing':
      res.statusCode = 404;
      res.end('not here');
      return;
    case '/broken':
      res.statusCode = 500;
      res.end('oops');
      return;
    case '/flaky':
      if (n < 3) {
        res.statusCode = 503;
        res.end('busy');
      } else {
        res.end('recovered');
      }
      return;
    case '/ua':
      res.end(req.headers['user-agent'] ?? '');
      return;
    case '/cookie':
      res.end(req.headers.cookie ?? '');
      return;
    case '/busy':
      res.end(footer(12000));
      return;
    case '/quiet':
      res.end(footer(5));
      return;
    case '/nofooter':
      res.end('<p>no stats</p>');
      return;
    case '/slow':
      // never answers; the client's timeout has to fire
      return;
    default:
      res.statusCode = 404;
      res.end();
  }
}

beforeAll(async () => {
  server = createServer(handle);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const addr = server.address();
  if (addr === null || typeof addr === 'string') throw new Error('server has no TCP address');
  base = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  hits.clear();
});

function client(overrides: Partial<HttpOptions> = {}) {
  const sleep = jest.fn(async (_ms: number) => undefined);
  const http = new HttpClient({
    logger: quietLogger().logger,
    userAgent: 'gallery-archiver-test',
    tryCount: 3,
    retryIntervalMs: 5_000,
    sleep,
    ...overrides
  });
  return { http, sleep };
}

async function failure(p: Promise<unknown>): Promise<FetchError> {
  try {
    await p;
  } catch (err) {
    if (err instanceof FetchError) return err;
    throw err;
  }
  throw new Error('expected the request to fail');
}

describe('HttpClient.get', () => {
  test('returns the body of a 200 response', async () => {
    const { http, sleep } = client();
    expect((await http.get(`${base}/ok`)).toString()).toBe('hello');
    expect(sleep).not.toHaveBeenCalled();
  });

  test('a 404 is reported at once and never retried', async () => {
    const { http, sleep } = client();
    const err = await failure(http.get(`${base}/missing`));
    expect(err.kind).toBe('notFound');
    expect(hits.get('/missing')).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  test('other statuses are retried with a fixed pause, then reported', async () => {
    const { http, sleep } = client();
    const err = await failure(http.get(`${base}/broken`));
    expect(err.kind).toBe('badStatus');
    expect(err.statusCode).toBe(500);
    expect(hits.get('/broken')).toBe(3);
    expect(sleep.mock.calls).toEqual([[5_000], [5_000]]);
  });

  test('recovers when a retry succeeds', async () => {
    const { http } = client();
    expect((await http.get(`${base}/flaky`)).toString()).toBe('recovered');
    expect(hits.get('/flaky')).toBe(3);
  });

  test('a timeout is a transport failure and is retried', async () => {
    const { http } = client({ timeoutMs: 100, tryCount: 2 });
    const err = await failure(http.get(`${base}/slow`));
    expect(err.kind).toBe('transportFailure');
    expect(hits.get('/slow')).toBe(2);
  });

  test('sends the configured user agent', async () => {
    const { http } = client();
    expect((await http.get(`${base}/ua`)).toString()).toBe('gallery-archiver-test');
  });

  test('sends cookies from its jar', async () => {
    const { http } = client();
    http.cookieJar.setCookieSync('sid=test-session', `${base}/`);
    expect((await http.get(`${base}/cookie`)).toString()).toBe('sid=test-session');
  });
});

describe('HttpClient options', () => {
  test('rejects a retry count or timeout below one', () => {
    expect(() => client({ tryCount: 0 })).toThrow('tryCount must be at least 1, got 0');
    expect(() => client({ timeoutMs: 0 })).toThrow('timeoutMs must be at least 1, got 0');
  });
});

describe('HttpClient.getWithDelay', () => {
  test('pauses briefly when few users are online', async () => {
    const { http, sleep } = client();
    expect((await http.getWithDelay(`${base}/quiet`)).toString()).toBe(footer(5));
    expect(sleep.mock.calls).toEqual([[1_000]]);
  });

  test('backs off for five minutes when the site is busy', async () => {
    const { http, sleep } = client();
    await http.getWithDelay(`${base}/busy`);
    expect(sleep.mock.calls).toEqual([[300_000]]);
  });

  test('keeps the short pause when throttling is off', async () => {
    const { http, sleep } = client({ delay: { throttle: false } });
    await http.getWithDelay(`${base}/busy`);
    expect(sleep.mock.calls).toEqual([[1_000]]);
  });

  test('a page without the users figure is reported with its body', async () => {
    const { http, sleep } = client();
    let caught: unknown;
    try {
      await http.getWithDelay(`${base}/nofooter`);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ActivityNotFoundError);
    expect(caught instanceof ActivityNotFoundError && caught.body.toString()).toBe('<p>no stats</p>');
    expect(sleep).not.toHaveBeenCalled();
  });

  test('fetch failures pass through untouched', async () => {
    const { http } = client();
    const err = await failure(http.getWithDelay(`${base}/missing`));
    expect(err.kind).toBe('notFound');
  });
});
