import * as cheerio from 'cheerio';

const REGISTERED_RE = /(\d+)\s+registered/;

/**
 * Reads the "N registered" users-online figure from a page footer. The modern
 * theme has an `.online-stats` block; the classic theme only has a span titled
 * "Measured in the last 900 seconds" whose grandparent holds the same text.
 * Returns null when neither is present or the text does not parse.
 */
export function parseRegisteredUsersOnline(html: Buffer | string): number | null {
  const $ = cheerio.load(html.toString());
  let text: string;
  const stats = $('.online-stats');
  if (stats.length > 0) {
    text = stats.first().text();
  } else {
    const classic = $('span[title="Measured in the last 900 seconds"]').parent().parent();
    if (classic.length === 0) return null;
    text = classic.text();
  }

  const m = text.match(REGISTERED_RE);
  if (!m) return null;
  const n = parseInt(m[1], 10);
  return Number.isSafeInteger(n) ? n : null;
}

export type DelayPolicy = {
  throttle: boolean;
  highLoadThreshold: number;
  highLoadDelayMs: number;
  defaultDelayMs: number;
};

export function isHighLoad(registeredUsers: number, policy: DelayPolicy): boolean {
  return policy.throttle && registeredUsers > policy.highLoadThreshold;
}

export function delayFor(registeredUsers: number, policy: DelayPolicy): number {
  return isHighLoad(registeredUsers, policy) ? policy.highLoadDelayMs : policy.defaultDelayMs;
}
