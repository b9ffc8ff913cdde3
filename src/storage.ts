import fs from 'node:fs';
import path from 'node:path';
import { InvalidFilePathError } from './errors.js';

export const DIR_MODE = 0o750;

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true, mode: DIR_MODE });
}

export function markerName(filename: string, id: bigint): string {
  return `${filename}.${id}.html`;
}

/**
 * True when the archive marker `<anything>.<id>.html` exists directly in dir.
 * The marker is the only record of a finished download; a missing directory
 * simply means nothing has been saved there yet.
 */
export function isArchived(id: bigint, dir: string): boolean {
  const suffix = `.${id}.html`;
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT') || isErrnoCode(err, 'ENOTDIR')) return false;
    throw err;
  }
  return entries.some((e) => e.isFile() && e.name.endsWith(suffix));
}

// Rejects any target that is not already in canonical form or that would land
// outside dir, before a single byte is written.
export function assertInside(dir: string, filePath: string) {
  if (filePath !== path.normalize(filePath) || path.resolve(path.dirname(filePath)) !== path.resolve(dir)) {
    throw new InvalidFilePathError(filePath);
  }
  const base = path.basename(filePath);
  if (base === '' || base === '.' || base === '..') {
    throw new InvalidFilePathError(filePath);
  }
}

export async function writeFileSynced(filePath: string, data: Buffer) {
  if (filePath !== path.normalize(filePath)) {
    throw new InvalidFilePathError(filePath);
  }
  const fh = await fs.promises.open(filePath, 'w');
  try {
    await fh.writeFile(data);
    await fh.sync();
  } finally {
    await fh.close();
  }
}

/**
 * Writes the payload, then the marker via a synced temp file and a rename.
 * The rename is the only step that makes isArchived() true, and it runs only
 * once the payload is on disk; an interruption at any earlier point leaves the
 * submission unmarked and the next save() overwrites the partial payload.
 */
export async function commitSubmission(dir: string, filename: string, id: bigint, payload: Buffer, page: Buffer): Promise<string> {
  const filePath = path.join(dir, filename);
  const markerPath = path.join(dir, markerName(filename, id));
  const tempPath = `${markerPath}.tmp`;
  assertInside(dir, filePath);
  assertInside(dir, markerPath);
  assertInside(dir, tempPath);

  await writeFileSynced(filePath, payload);
  await writeFileSynced(tempPath, page);
  await fs.promises.rename(tempPath, markerPath);
  await syncDir(dir);
  return filePath;
}

const DIR_SYNC_UNSUPPORTED = ['EISDIR', 'EPERM', 'EINVAL', 'EBADF'];

// Persists the rename itself. Some platforms cannot open or fsync a directory;
// there the rename is as durable as it gets.
export async function syncDir(dir: string) {
  let fh: fs.promises.FileHandle;
  try {
    fh = await fs.promises.open(dir, 'r');
  } catch (err) {
    if (DIR_SYNC_UNSUPPORTED.some((code) => isErrnoCode(err, code))) return;
    throw err;
  }
  try {
    await fh.sync();
  } catch (err) {
    if (!DIR_SYNC_UNSUPPORTED.some((code) => isErrnoCode(err, code))) throw err;
  } finally {
    await fh.close();
  }
}

// fs errors can come from another realm (vm contexts, test runners), so the
// check goes by shape, not by prototype.
function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
