import fs from 'node:fs';
import { Cookie, CookieJar } from 'tough-cookie';
import { CookieExpiredError, CookieFormatError } from './errors.js';

const FIELD_COUNT = 7;
const ONE_WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export type CookieRecord = {
  domain: string;
  path: string;
  secure: boolean;
  expires: Date;
  name: string;
  value: string;
};

/**
 * Parses one line of a Netscape/Mozilla cookies.txt file:
 * domain, include-subdomains flag (unused), path, secure, expiry (epoch
 * seconds), name, value. Returns null for comments and blank lines.
 *
 * A cookie that expires within a week is refused: running on without the
 * session would silently skip content only visible to logged-in users.
 */
export function parseCookieLine(raw: string, now: Date = new Date()): CookieRecord | null {
  const line = raw.trim();
  if (!line || line.startsWith('#')) return null;

  const parts = line.split('\t');
  if (parts.length !== FIELD_COUNT) {
    throw new CookieFormatError(`invalid cookie format: ${line}`);
  }
  const [domain, , cookiePath, secure, expiration, name, value] = parts;

  if (!/^-?\d+$/.test(expiration)) {
    throw new CookieFormatError(`invalid expiration time for cookie ${name}: ${expiration}`, name);
  }
  const expires = new Date(Number(expiration) * 1000);
  if (Number.isNaN(expires.getTime())) {
    throw new CookieFormatError(`invalid expiration time for cookie ${name}: ${expiration}`, name);
  }
  if (expires.getTime() < now.getTime() + ONE_WEEK_MS) {
    throw new CookieExpiredError(name);
  }

  return {
    domain,
    path: cookiePath,
    secure: secure.toUpperCase() === 'TRUE',
    expires,
    name,
    value
  };
}

export function addToJar(jar: CookieJar, rec: CookieRecord) {
  const host = rec.domain.replace(/^\./, '');
  const url = `${rec.secure ? 'https' : 'http'}://${host}${rec.path}`;
  const cookie = new Cookie({
    key: rec.name,
    value: rec.value,
    domain: host,
    path: rec.path,
    secure: rec.secure,
    expires: rec.expires
  });
  jar.setCookieSync(cookie, url);
}

// Loads every record into jar and returns how many were added. Nothing is
// added unless the whole file is valid.
export function loadCookies(filename: string, jar: CookieJar, now: Date = new Date()): number {
  const raw = fs.readFileSync(filename, 'utf-8');
  const records: CookieRecord[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const rec = parseCookieLine(line, now);
    if (rec) records.push(rec);
  }
  for (const rec of records) addToJar(jar, rec);
  return records.length;
}
