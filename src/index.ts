export { loadConfig, type AppConfig } from './config.ts';
export { createLogger, setDefaultLogLevel, type Logger, type LogLevelName } from './logger.ts';
export {
  bootstrap,
  createPlayerApp,
  findFilePathInArgs,
  resumePosition,
  toRecentVideoSummary,
  type BootstrapOptions,
  type FilePicker,
  type HandlerResult,
  type PlaybackSession,
  type PlayerApp,
  type PlayerAppOptions,
  type RecentVideoSummary,
  type RecentVideosResult,
  type VideoProgressData,
} from './main.ts';
export {
  err,
  FileReferenceError,
  ok,
  StoreError,
  type FileReferenceErrorKind,
  type Result,
  type StoreErrorKind,
} from './recent/errors.ts';
export {
  createFileReference,
  resolveFileReference,
  type ResolvedFileReference,
  type SecureFileReference,
} from './recent/fileReference.ts';
export { ProgressTracker, type ProgressTrackerOptions } from './recent/progressTracker.ts';
export { createRecentEntry, isSameRecentEntry, type RecentEntry } from './recent/recentEntry.ts';
export {
  MAX_RECENT_VIDEOS,
  RECENT_VIDEOS_KEY,
  RecentStore,
  type PersistedRecentVideo,
  type PlaybackProgress,
  type RecentStoreOptions,
} from './recent/recentStore.ts';
export { createConfStore, createMemoryStore, type KeyValueStore } from './store.ts';
