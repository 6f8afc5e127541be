import { createLogger, type Logger } from '../logger.ts';
import type { KeyValueStore } from '../store.ts';
import { isRecord } from '../utils/guards.ts';
import { describeError, err, ok, StoreError, type FileReferenceError, type Result } from './errors.ts';
import {
  decodeBookmarkText,
  encodeBookmark,
  resolveFileReference,
  type ResolvedFileReference,
  type SecureFileReference,
} from './fileReference.ts';
import { isSameRecentEntry, type RecentEntry } from './recentEntry.ts';

export const RECENT_VIDEOS_KEY = 'recentVideos';
export const MAX_RECENT_VIDEOS = 10;

// --- Persisted shape ---
export interface PersistedRecentVideo {
  id: string;
  bookmarkBytes: string;
  name: string;
  lastWatchedDate: string;
  currentTime?: number;
  duration?: number;
}

export interface PlaybackProgress {
  currentTime: number;
  duration?: number;
}

export type ReferenceResolver = (ref: SecureFileReference) => Result<ResolvedFileReference, FileReferenceError>;

export interface RecentStoreOptions {
  store: KeyValueStore;
  key?: string;
  now?: () => Date;
  resolve?: ReferenceResolver;
  logger?: Logger;
}

interface LoadedEntry {
  entry: RecentEntry;
  path: string;
}

function encodeEntry(entry: RecentEntry): PersistedRecentVideo {
  const record: PersistedRecentVideo = {
    id: entry.id,
    bookmarkBytes: encodeBookmark(entry.fileRef),
    name: entry.displayName,
    // Throws RangeError for an invalid date
    lastWatchedDate: entry.lastWatched.toISOString(),
  };
  if (entry.currentTime !== undefined) record.currentTime = entry.currentTime;
  if (entry.duration !== undefined) record.duration = entry.duration;
  return record;
}

function isOptionalNumber(value: unknown): value is number | undefined {
  return value === undefined || (typeof value === 'number' && Number.isFinite(value));
}

function decodeEntry(value: unknown): RecentEntry | null {
  if (!isRecord(value)) return null;
  const { id, bookmarkBytes, name, lastWatchedDate, currentTime, duration } = value;
  if (typeof id !== 'string' || id === '') return null;
  if (typeof bookmarkBytes !== 'string' || typeof name !== 'string') return null;
  if (typeof lastWatchedDate !== 'string') return null;
  if (!isOptionalNumber(currentTime) || !isOptionalNumber(duration)) return null;

  const lastWatched = new Date(lastWatchedDate);
  if (Number.isNaN(lastWatched.getTime())) return null;

  const entry: RecentEntry = {
    id,
    fileRef: decodeBookmarkText(bookmarkBytes),
    displayName: name,
    lastWatched,
  };
  if (currentTime !== undefined) entry.currentTime = currentTime;
  if (duration !== undefined) entry.duration = duration;
  return entry;
}

function isTrackableProgress(progress: PlaybackProgress): boolean {
  return Number.isFinite(progress.currentTime) && progress.currentTime >= 0;
}

/**
 * Owns the persisted list of recently watched videos, most recent first.
 * Every mutation returns the fresh list; callers re-render from it instead of
 * keeping their own copy.
 */
export class RecentStore {
  private readonly store: KeyValueStore;
  private readonly key: string;
  private readonly now: () => Date;
  private readonly resolve: ReferenceResolver;
  private readonly log: Logger;

  constructor(options: RecentStoreOptions) {
    this.store = options.store;
    this.key = options.key ?? RECENT_VIDEOS_KEY;
    this.now = options.now ?? (() => new Date());
    this.resolve = options.resolve ?? resolveFileReference;
    this.log = options.logger ?? createLogger('RecentStore');
  }

  load(): RecentEntry[] {
    return this.loadResolved().map(({ entry }) => entry);
  }

  save(list: RecentEntry[]): Result<void, StoreError> {
    let records: PersistedRecentVideo[];
    try {
      records = list.slice(0, MAX_RECENT_VIDEOS).map(encodeEntry);
    } catch (error) {
      return err(new StoreError('serialization_failed', `Failed to encode recent videos: ${describeError(error)}`, { cause: error }));
    }

    try {
      this.store.set(this.key, records);
    } catch (error) {
      return err(new StoreError('write_failed', `Failed to write recent videos: ${describeError(error)}`, { cause: error }));
    }
    return ok(undefined);
  }

  addOrPromote(newEntry: RecentEntry): RecentEntry[] {
    const current = this.loadResolved();
    const entries = current.map(({ entry }) => entry);
    const resolved = this.resolve(newEntry.fileRef);
    if (!resolved.ok) {
      // It would be dropped again by the next load
      this.log.warn(`Not remembering "${newEntry.displayName}": ${resolved.error.message}`);
      return entries;
    }

    const pathById = new Map<string, string>(current.map(({ entry, path }) => [entry.id, path]));
    pathById.set(newEntry.id, resolved.value.path);

    const index = entries.findIndex((entry) => isSameRecentEntry(entry, newEntry, (e) => pathById.get(e.id)));

    let next: RecentEntry[];
    if (index > -1) {
      const promoted: RecentEntry = { ...entries[index], lastWatched: this.now() };
      next = [promoted, ...entries.slice(0, index), ...entries.slice(index + 1)];
      this.log.debug(`Promoted "${promoted.displayName}" from position ${index}`);
    } else {
      next = [newEntry, ...entries];
      this.log.debug(`Added "${newEntry.displayName}"`);
    }

    return this.persist(next.slice(0, MAX_RECENT_VIDEOS));
  }

  /** Removes the entry at `index`. Out-of-range indices leave the list untouched. */
  remove(list: RecentEntry[], index: number): RecentEntry[] {
    if (!Number.isInteger(index) || index < 0 || index >= list.length) {
      return list;
    }
    return this.persist([...list.slice(0, index), ...list.slice(index + 1)]);
  }

  /** Stores the playback position of an entry without changing its place in the list. */
  recordProgress(id: string, progress: PlaybackProgress): RecentEntry[] {
    const list = this.load();
    const index = list.findIndex((entry) => entry.id === id);
    if (index === -1 || !isTrackableProgress(progress)) {
      return list;
    }

    const updated: RecentEntry = { ...list[index], currentTime: progress.currentTime };
    if (progress.duration !== undefined && Number.isFinite(progress.duration) && progress.duration > 0) {
      updated.duration = progress.duration;
    }
    return this.persist(list.map((entry, i) => (i === index ? updated : entry)));
  }

  clear(): Result<void, StoreError> {
    try {
      this.store.delete(this.key);
    } catch (error) {
      return err(new StoreError('write_failed', `Failed to clear recent videos: ${describeError(error)}`, { cause: error }));
    }
    return ok(undefined);
  }

  private persist(list: RecentEntry[]): RecentEntry[] {
    const result = this.save(list);
    if (!result.ok) {
      this.log.error('Failed to persist recent videos, keeping in-memory list', result.error);
    }
    return list;
  }

  private readPersisted(): RecentEntry[] {
    let raw: unknown;
    try {
      raw = this.store.get(this.key);
    } catch (error) {
      this.log.warn('Failed to read recent videos, starting empty', error);
      return [];
    }
    if (raw === undefined || raw === null) return [];
    if (!Array.isArray(raw)) {
      this.log.warn('Persisted recent videos are not a list, starting empty');
      return [];
    }

    const entries: RecentEntry[] = [];
    for (const value of raw) {
      const entry = decodeEntry(value);
      if (!entry) {
        this.log.warn('Failed to decode recent videos, starting empty');
        return [];
      }
      entries.push(entry);
    }
    return entries;
  }

  // Decodes the list and drops entries whose file can no longer be reached.
  private loadResolved(): LoadedEntry[] {
    const loaded: LoadedEntry[] = [];
    const seenIds = new Set<string>();

    for (const entry of this.readPersisted()) {
      if (seenIds.has(entry.id)) continue;
      seenIds.add(entry.id);

      const resolved = this.resolve(entry.fileRef);
      if (!resolved.ok) {
        this.log.info(`Dropping "${entry.displayName}": ${resolved.error.message}`);
        continue;
      }
      loaded.push({ entry, path: resolved.value.path });
      if (loaded.length === MAX_RECENT_VIDEOS) break;
    }
    return loaded;
  }
}
