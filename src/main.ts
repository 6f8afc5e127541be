import path from 'node:path';
import { loadConfig } from './config.ts';
import { createLogger, setDefaultLogLevel } from './logger.ts';
import { describeError, type FileReferenceError, type Result } from './recent/errors.ts';
import {
  createFileReference,
  resolveFileReference,
  type SecureFileReference,
} from './recent/fileReference.ts';
import { ProgressTracker } from './recent/progressTracker.ts';
import { createRecentEntry, type RecentEntry } from './recent/recentEntry.ts';
import { RecentStore, type ReferenceResolver } from './recent/recentStore.ts';
import { createConfStore } from './store.ts';
import { formatTime } from './utils/date.ts';

const log = createLogger('Main');

// --- Player boundary ---
export interface PlaybackSession {
  openFile(filePath: string): void;
  play(rate?: number): void;
  pause(): void;
  /** Moves the playhead by `by` seconds relative to the current position. */
  seek(by: number): void;
  readonly currentRate: number;
}

export interface FilePicker {
  /** Resolves to the chosen file, or null when the dialog was cancelled. */
  openFile(): Promise<string | null>;
}

// --- Handler results ---
export interface RecentVideoSummary {
  id: string;
  name: string;
  lastWatched: string;
  currentTime?: number;
  duration?: number;
  resumeLabel?: string;
}

export interface HandlerResult {
  success: boolean;
  error?: string;
}

export interface RecentVideosResult extends HandlerResult {
  recentVideos: RecentVideoSummary[];
  /** Set when playback started but the file could not be remembered. */
  warning?: string;
}

export interface VideoProgressData {
  currentTime: number;
  duration: number;
}

export interface PlayerAppOptions {
  recents: RecentStore;
  session: PlaybackSession;
  picker?: FilePicker;
  progressIntervalMs?: number;
  createReference?: (filePath: string) => Result<SecureFileReference, FileReferenceError>;
  resolve?: ReferenceResolver;
  now?: () => Date;
}

export interface PlayerApp {
  openFile(): Promise<RecentVideosResult | null>;
  openPath(filePath: string): RecentVideosResult;
  openRecent(index: number): RecentVideosResult;
  removeRecent(index: number): RecentVideosResult;
  clearRecent(): RecentVideosResult;
  getRecentVideos(): RecentVideoSummary[];
  saveVideoProgress(data: VideoProgressData): HandlerResult;
  openInitial(argv: string[]): RecentVideosResult | null;
  readonly currentEntryId: string | null;
  dispose(): void;
}

export function toRecentVideoSummary(entry: RecentEntry): RecentVideoSummary {
  const summary: RecentVideoSummary = {
    id: entry.id,
    name: entry.displayName,
    lastWatched: entry.lastWatched.toISOString(),
  };
  if (entry.currentTime !== undefined) {
    summary.currentTime = entry.currentTime;
    if (entry.currentTime > 0) summary.resumeLabel = `Resume at ${formatTime(entry.currentTime)}`;
  }
  if (entry.duration !== undefined) summary.duration = entry.duration;
  return summary;
}

// Saved position clamped to the known duration; 0 when there is nothing to resume.
export function resumePosition(entry: RecentEntry): number {
  const position = entry.currentTime ?? 0;
  if (!(position > 0)) return 0;
  if (entry.duration !== undefined && entry.duration > 0) {
    return Math.min(position, entry.duration);
  }
  return position;
}

export function createPlayerApp(options: PlayerAppOptions): PlayerApp {
  const { recents, session, picker } = options;
  const createReference = options.createReference ?? createFileReference;
  const resolve = options.resolve ?? resolveFileReference;
  const now = options.now ?? (() => new Date());
  const progress = new ProgressTracker(recents, { intervalMs: options.progressIntervalMs });
  let currentEntryId: string | null = null;

  const summaries = (list: RecentEntry[]): RecentVideoSummary[] => list.map(toRecentVideoSummary);

  const startPlayback = (filePath: string): string | null => {
    try {
      session.openFile(filePath);
      session.play(1);
      return null;
    } catch (error) {
      log.error('Failed to start playback:', error);
      return describeError(error);
    }
  };

  const app: PlayerApp = {
    get currentEntryId() {
      return currentEntryId;
    },

    async openFile() {
      if (!picker) return null;
      const filePath = await picker.openFile();
      if (!filePath) return null;
      return app.openPath(filePath);
    },

    openPath(filePath) {
      // Progress of the previous video belongs to its own entry
      progress.flush();
      currentEntryId = null;

      const playbackError = startPlayback(filePath);
      if (playbackError) {
        return { success: false, error: playbackError, recentVideos: summaries(recents.load()) };
      }

      const reference = createReference(filePath);
      if (!reference.ok) {
        log.warn(`Cannot remember "${filePath}":`, reference.error.message);
        return {
          success: true,
          warning: `Cannot remember this file: ${reference.error.message}`,
          recentVideos: summaries(recents.load()),
        };
      }

      const entry = createRecentEntry(reference.value, filePath, { lastWatched: now() });
      const resolved = resolve(entry.fileRef);
      if (!resolved.ok) {
        log.warn(`Cannot remember "${filePath}":`, resolved.error.message);
        return {
          success: true,
          warning: `Cannot remember this file: ${resolved.error.message}`,
          recentVideos: summaries(recents.load()),
        };
      }

      const list = recents.addOrPromote(entry);
      currentEntryId = list[0]?.id ?? null;
      return { success: true, recentVideos: summaries(list) };
    },

    openRecent(index) {
      progress.flush();
      const list = recents.load();
      const entry = list.at(index);
      if (!Number.isInteger(index) || index < 0 || !entry) {
        log.warn('Invalid recent video index:', index);
        return { success: false, error: `No recent video at position ${index}`, recentVideos: summaries(list) };
      }

      const resolved = resolve(entry.fileRef);
      if (!resolved.ok) {
        log.info(`Recent video "${entry.displayName}" is gone:`, resolved.error.message);
        return { success: false, error: resolved.error.message, recentVideos: summaries(recents.load()) };
      }

      currentEntryId = null;
      const playbackError = startPlayback(resolved.value.path);
      if (playbackError) {
        return { success: false, error: playbackError, recentVideos: summaries(list) };
      }
      // A freshly opened file starts at 0, so a relative seek lands on the saved position
      const position = resumePosition(entry);
      if (position > 0) {
        session.seek(position);
      }

      const updated = recents.addOrPromote(entry);
      currentEntryId = entry.id;
      return { success: true, recentVideos: summaries(updated) };
    },

    removeRecent(index) {
      const list = recents.load();
      const updated = recents.remove(list, index);
      if (updated === list) {
        return { success: false, error: `No recent video at position ${index}`, recentVideos: summaries(list) };
      }
      if (list[index].id === currentEntryId) {
        progress.cancel();
        currentEntryId = null;
      }
      return { success: true, recentVideos: summaries(updated) };
    },

    clearRecent() {
      progress.cancel();
      currentEntryId = null;
      const result = recents.clear();
      if (!result.ok) {
        log.error('Failed to clear recent videos:', result.error);
        return { success: false, error: result.error.message, recentVideos: summaries(recents.load()) };
      }
      return { success: true, recentVideos: [] };
    },

    getRecentVideos() {
      return summaries(recents.load());
    },

    saveVideoProgress(data) {
      if (!currentEntryId) {
        return { success: false, error: 'No remembered video is playing' };
      }
      if (!progress.report(currentEntryId, data.currentTime, data.duration)) {
        log.warn('Invalid data received for save-video-progress:', data);
        return { success: false, error: 'Invalid data provided' };
      }
      return { success: true };
    },

    openInitial(argv) {
      const filePath = findFilePathInArgs(argv);
      if (!filePath) return null;
      log.info('Initial launch with file:', filePath);
      return app.openPath(filePath);
    },

    dispose() {
      progress.flush();
    },
  };

  return app;
}

// --- Launch arguments ---
// First non-option argument that looks like a path; argv[0..1] are node and the script.
export function findFilePathInArgs(argv: string[]): string | null {
  for (const arg of argv.slice(2)) {
    if (!arg.startsWith('-') && arg.includes(path.sep)) {
      return path.resolve(arg);
    }
  }
  return null;
}

export interface BootstrapOptions {
  session: PlaybackSession;
  picker?: FilePicker;
  env?: NodeJS.ProcessEnv;
  argv?: string[];
}

export function bootstrap(options: BootstrapOptions): PlayerApp {
  const config = loadConfig(options.env);
  setDefaultLogLevel(config.logLevel);

  const store = createConfStore({ projectName: config.projectName, cwd: config.dataDir });
  log.debug('Recent videos stored at', store.path);

  const app = createPlayerApp({
    recents: new RecentStore({ store }),
    session: options.session,
    picker: options.picker,
    progressIntervalMs: config.progressIntervalMs,
  });
  app.openInitial(options.argv ?? process.argv);
  return app;
}
