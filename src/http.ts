import got, { Response } from 'got';
import pLimit from 'p-limit';
import { CookieJar } from 'tough-cookie';
import { DelayPolicy, delayFor, isHighLoad, parseRegisteredUsersOnline } from './activity.js';
import { ActivityNotFoundError, FetchError, errorMessage } from './errors.js';
import { Logger } from './logger.js';
import { Fetcher } from './types.js';
import { sleep as defaultSleep } from './utils.js';

export type HttpOptions = {
  logger: Logger;
  userAgent?: string;
  timeoutMs?: number;
  tryCount?: number;
  retryIntervalMs?: number;
  delay?: Partial<DelayPolicy>;
  cookieJar?: CookieJar;
  sleep?: (ms: number) => Promise<void>;
};

const DEFAULT_DELAY: DelayPolicy = {
  throttle: true,
  highLoadThreshold: 10_000,
  highLoadDelayMs: 5 * 60_000,
  defaultDelayMs: 1_000
};

export class HttpClient implements Fetcher {
  private client = got.extend({
    headers: {},
    followRedirect: true,
    retry: { limit: 0 },
    throwHttpErrors: false,
    timeout: { request: 90_000 }
  });

  readonly cookieJar: CookieJar;
  private limit: ReturnType<typeof pLimit>;
  private log: Logger;
  private tryCount: number;
  private retryIntervalMs: number;
  private delay: DelayPolicy;
  private sleep: (ms: number) => Promise<void>;

  constructor(opts: HttpOptions) {
    const { userAgent, timeoutMs, tryCount, retryIntervalMs, delay, cookieJar, sleep } = opts;
    if (tryCount !== undefined && tryCount < 1) throw new RangeError(`tryCount must be at least 1, got ${tryCount}`);
    if (timeoutMs !== undefined && timeoutMs < 1) throw new RangeError(`timeoutMs must be at least 1, got ${timeoutMs}`);
    this.cookieJar = cookieJar ?? new CookieJar();
    this.client = this.client.extend({ cookieJar: this.cookieJar });
    if (userAgent) this.client = this.client.extend({ headers: { 'user-agent': userAgent } });
    if (timeoutMs !== undefined) this.client = this.client.extend({ timeout: { request: timeoutMs } });
    // one request in flight at a time, whoever is asking
    this.limit = pLimit(1);
    this.log = opts.logger.child({ component: 'http' });
    this.tryCount = tryCount ?? 3;
    this.retryIntervalMs = Math.max(0, retryIntervalMs ?? 5_000);
    this.delay = { ...DEFAULT_DELAY, ...delay };
    this.sleep = sleep ?? defaultSleep;
  }

  /**
   * GET with retries. 404 is reported at once as a 'notFound' FetchError;
   * other statuses and network failures are retried tryCount times with a
   * fixed pause, then the last failure is thrown.
   */
  async get(url: string): Promise<Buffer> {
    this.log.debug('GET', { url });
    let lastErr: FetchError | undefined;
    for (let attempt = 1; attempt <= this.tryCount; attempt++) {
      try {
        return await this.limit(() => this.getOnce(url));
      } catch (err) {
        if (!(err instanceof FetchError) || err.kind === 'notFound') throw err;
        lastErr = err;
        this.log.info('GET failed attempt', { url, attempt, error: err.message });
        if (attempt < this.tryCount) await this.sleep(this.retryIntervalMs);
      }
    }
    this.log.error('GET all attempts failed', { url, error: lastErr?.message });
    throw lastErr ?? new FetchError('transportFailure', url, `GET failed: ${url}`);
  }

  /**
   * get(), then a politeness pause sized by the "registered users online"
   * figure on the fetched page. A page without that figure rejects with
   * ActivityNotFoundError, which still carries the body.
   */
  async getWithDelay(url: string): Promise<Buffer> {
    const body = await this.get(url);
    const registeredUsers = parseRegisteredUsersOnline(body);
    if (registeredUsers === null) {
      throw new ActivityNotFoundError(url, body);
    }
    const ms = delayFor(registeredUsers, this.delay);
    if (isHighLoad(registeredUsers, this.delay)) {
      this.log.info('high registered user count detected, delaying', { count: registeredUsers, delayMs: ms });
    } else {
      this.log.debug('registered users online', { count: registeredUsers, delayMs: ms });
    }
    await this.sleep(ms);
    return body;
  }

  private async getOnce(url: string): Promise<Buffer> {
    let res: Response<Buffer>;
    try {
      res = await this.client.get(url, { responseType: 'buffer' });
    } catch (err) {
      throw new FetchError('transportFailure', url, `GET failed: ${errorMessage(err)}`, { cause: err });
    }
    if (res.statusCode === 404) {
      throw new FetchError('notFound', url, `resource not found: ${url}`, { statusCode: 404 });
    }
    if (res.statusCode !== 200) {
      throw new FetchError('badStatus', url, `HTTP request failed with non-200 status: ${res.statusCode}`, {
        statusCode: res.statusCode
      });
    }
    return res.body;
  }
}
