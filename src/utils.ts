export function sleep(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, ms));
}

// Replaces characters that are not allowed in Windows filenames. Path
// separators never reach here: callers pass a single URL segment.
export function sanitizeFilename(input: string): string {
  return input.replace(/[<>:"\\|?*]/g, '_');
}

// Last "/"-separated segment of a URL string. Splitting the raw string, rather
// than resolving it, keeps dot segments visible so the caller can reject them.
export function urlBasename(urlStr: string): string {
  const parts = urlStr.split('/');
  return parts[parts.length - 1] ?? '';
}

export function parseUnsignedId(input: string): bigint | null {
  if (!/^\d+$/.test(input)) return null;
  const id = BigInt(input);
  return id <= 0xffffffffffffffffn ? id : null;
}

export function splitList(input: string | undefined): string[] {
  if (!input) return [];
  return input
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}
