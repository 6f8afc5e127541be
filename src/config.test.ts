import { describe, expect, it } from 'vitest';
import { DEFAULT_PROGRESS_INTERVAL_MS, loadConfig, PROJECT_NAME } from './config.ts';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      projectName: PROJECT_NAME,
      dataDir: undefined,
      logLevel: 'warn',
      progressIntervalMs: DEFAULT_PROGRESS_INTERVAL_MS,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      VIDEO_PLAYER_DATA_DIR: ' /var/lib/player ',
      VIDEO_PLAYER_LOG_LEVEL: 'INFO',
      VIDEO_PLAYER_PROGRESS_INTERVAL_MS: '2500',
    });

    expect(config.dataDir).toBe('/var/lib/player');
    expect(config.logLevel).toBe('info');
    expect(config.progressIntervalMs).toBe(2500);
  });

  it('logs everything in development unless told otherwise', () => {
    expect(loadConfig({ NODE_ENV: 'development' }).logLevel).toBe('debug');
    expect(loadConfig({ NODE_ENV: 'development', VIDEO_PLAYER_LOG_LEVEL: 'error' }).logLevel).toBe('error');
  });

  it.each(['0', '-5', '1.5', 'soon'])('ignores interval %s', (raw) => {
    expect(loadConfig({ VIDEO_PLAYER_PROGRESS_INTERVAL_MS: raw }).progressIntervalMs).toBe(DEFAULT_PROGRESS_INTERVAL_MS);
  });

  it('ignores unknown log levels', () => {
    expect(loadConfig({ VIDEO_PLAYER_LOG_LEVEL: 'verbose' }).logLevel).toBe('warn');
  });
});
