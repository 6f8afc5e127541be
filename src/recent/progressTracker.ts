import lodash from 'lodash';
import type { DebouncedFunc } from 'lodash';
import { DEFAULT_PROGRESS_INTERVAL_MS } from '../config.ts';
import type { RecentStore } from './recentStore.ts';

// Shorter clips are not worth resuming.
export const MIN_TRACKED_DURATION = 5;

export interface ProgressTrackerOptions {
  intervalMs?: number;
}

/**
 * Throttles playback-position reports so the store is written at most once
 * per interval, on the trailing edge.
 */
export class ProgressTracker {
  private readonly persist: DebouncedFunc<(id: string, currentTime: number, duration: number) => void>;

  constructor(recents: RecentStore, options: ProgressTrackerOptions = {}) {
    this.persist = lodash.throttle(
      (id: string, currentTime: number, duration: number) => {
        recents.recordProgress(id, { currentTime, duration });
      },
      options.intervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS,
      { leading: false, trailing: true },
    );
  }

  report(id: string, currentTime: number, duration: number): boolean {
    if (Number.isNaN(duration) || duration <= MIN_TRACKED_DURATION || !(currentTime >= 0)) {
      return false;
    }
    this.persist(id, currentTime, duration);
    return true;
  }

  flush(): void {
    this.persist.flush();
  }

  cancel(): void {
    this.persist.cancel();
  }
}
