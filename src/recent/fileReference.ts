import fs from 'node:fs';
import path from 'node:path';
import { createLogger } from '../logger.ts';
import { isRecord } from '../utils/guards.ts';
import { err, FileReferenceError, ok, type Result } from './errors.ts';

const log = createLogger('FileReference');

const BOOKMARK_VERSION = 1;

/**
 * Durable pointer to a local file. The bytes are opaque to callers; they are
 * minted once from a readable file and can be resolved again after a restart,
 * following the file if it was renamed inside its directory.
 */
export interface SecureFileReference {
  readonly bookmarkBytes: Buffer;
}

export interface ResolvedFileReference {
  path: string;
  /** The file moved or was replaced since the reference was minted. */
  isStale: boolean;
}

interface BookmarkPayload {
  v: typeof BOOKMARK_VERSION;
  path: string;
  dev: string;
  ino: string;
}

interface FileIdentity {
  dev: string;
  ino: string;
}

function statIdentity(filePath: string): (FileIdentity & { isFile: boolean }) | null {
  try {
    const stats = fs.statSync(filePath, { bigint: true });
    return { dev: stats.dev.toString(), ino: stats.ino.toString(), isFile: stats.isFile() };
  } catch {
    return null;
  }
}

function isReadable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

function decodeBookmark(bytes: Buffer): BookmarkPayload | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bytes.toString('utf8'));
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  const { v, path: filePath, dev, ino } = parsed;
  if (v !== BOOKMARK_VERSION) return null;
  if (typeof filePath !== 'string' || typeof dev !== 'string' || typeof ino !== 'string') return null;
  return { v: BOOKMARK_VERSION, path: filePath, dev, ino };
}

// Finds a file renamed within its original directory by device and inode.
function findRenamedFile(payload: BookmarkPayload): string | null {
  const directory = path.dirname(payload.path);
  let names: string[];
  try {
    names = fs.readdirSync(directory);
  } catch {
    return null;
  }
  for (const name of names) {
    const candidate = path.join(directory, name);
    const identity = statIdentity(candidate);
    if (identity?.isFile && identity.dev === payload.dev && identity.ino === payload.ino) {
      return candidate;
    }
  }
  return null;
}

export function createFileReference(filePath: string): Result<SecureFileReference, FileReferenceError> {
  let realPath: string;
  try {
    realPath = fs.realpathSync(path.resolve(filePath));
  } catch (error) {
    return err(new FileReferenceError('unsupported', `Cannot reference "${filePath}": file not found`, { cause: error }));
  }

  const identity = statIdentity(realPath);
  if (!identity?.isFile) {
    return err(new FileReferenceError('unsupported', `Cannot reference "${filePath}": not a regular file`));
  }
  if (!isReadable(realPath)) {
    return err(new FileReferenceError('unsupported', `Cannot reference "${filePath}": permission denied`));
  }

  const payload: BookmarkPayload = { v: BOOKMARK_VERSION, path: realPath, dev: identity.dev, ino: identity.ino };
  return ok({ bookmarkBytes: Buffer.from(JSON.stringify(payload), 'utf8') });
}

/**
 * Turns a reference back into a readable path. A stale result still succeeds;
 * callers may re-mint the reference but must not refuse to use it.
 */
export function resolveFileReference(ref: SecureFileReference): Result<ResolvedFileReference, FileReferenceError> {
  const payload = decodeBookmark(ref.bookmarkBytes);
  if (!payload) {
    return err(new FileReferenceError('unresolvable', 'Bookmark data is corrupt'));
  }

  let resolved: ResolvedFileReference | null = null;
  const current = statIdentity(payload.path);
  if (current?.isFile && current.dev === payload.dev && current.ino === payload.ino) {
    resolved = { path: payload.path, isStale: false };
  } else {
    // Follow the file, not the name: a renamed original wins over a newcomer at the old path
    const renamed = findRenamedFile(payload);
    if (renamed) {
      resolved = { path: renamed, isStale: true };
    } else if (current?.isFile) {
      resolved = { path: payload.path, isStale: true };
    }
  }

  if (!resolved) {
    return err(new FileReferenceError('unresolvable', `File "${payload.path}" can no longer be located`));
  }
  if (!isReadable(resolved.path)) {
    return err(new FileReferenceError('unresolvable', `Access to "${resolved.path}" was revoked`));
  }
  if (resolved.isStale) {
    log.warn(`Bookmark for "${payload.path}" is stale, resolved to "${resolved.path}". Consider re-saving it.`);
  }
  return ok(resolved);
}

export function encodeBookmark(ref: SecureFileReference): string {
  return ref.bookmarkBytes.toString('base64');
}

export function decodeBookmarkText(text: string): SecureFileReference {
  return { bookmarkBytes: Buffer.from(text, 'base64') };
}
