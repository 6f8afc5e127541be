import { LOG_LEVELS, type LogLevelName } from './logger.ts';

export const PROJECT_NAME = 'recent-video-player';
export const DEFAULT_PROGRESS_INTERVAL_MS = 5000;

export interface AppConfig {
  projectName: string;
  /** Directory holding the recent-videos file. Undefined means the per-user config directory. */
  dataDir?: string;
  logLevel: LogLevelName;
  progressIntervalMs: number;
}

function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LOG_LEVELS, value);
}

function parseLogLevel(raw: string | undefined, env: NodeJS.ProcessEnv): LogLevelName {
  const value = raw?.trim().toLowerCase();
  if (value && isLogLevelName(value)) return value;
  return env.NODE_ENV === 'development' ? 'debug' : 'warn';
}

function parseInterval(raw: string | undefined): number {
  if (!raw) return DEFAULT_PROGRESS_INTERVAL_MS;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : DEFAULT_PROGRESS_INTERVAL_MS;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.VIDEO_PLAYER_DATA_DIR?.trim();
  return {
    projectName: PROJECT_NAME,
    dataDir: dataDir ? dataDir : undefined,
    logLevel: parseLogLevel(env.VIDEO_PLAYER_LOG_LEVEL, env),
    progressIntervalMs: parseInterval(env.VIDEO_PLAYER_PROGRESS_INTERVAL_MS),
  };
}
