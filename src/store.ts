import Conf from 'conf';

// --- Store capability ---
export interface KeyValueStore {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  delete(key: string): void;
}

export interface ConfStoreOptions {
  projectName: string;
  /** Overrides the per-user config directory. */
  cwd?: string;
  configName?: string;
}

export const RECENT_VIDEOS_CONFIG_NAME = 'recent-videos';

// --- conf-backed store (JSON file, atomic writes) ---
export function createConfStore(options: ConfStoreOptions): KeyValueStore & { readonly path: string } {
  const conf = new Conf<Record<string, unknown>>({
    projectName: options.projectName,
    cwd: options.cwd,
    configName: options.configName ?? RECENT_VIDEOS_CONFIG_NAME,
    clearInvalidConfig: true,
    accessPropertiesByDotNotation: false,
  });

  return {
    path: conf.path,
    get: (key) => conf.get(key),
    set: (key, value) => conf.set(key, value),
    delete: (key) => conf.delete(key),
  };
}

// --- In-memory store ---
// Values are held as JSON text; every read returns a fresh copy.
export function createMemoryStore(initial: Record<string, unknown> = {}): KeyValueStore {
  const data = new Map<string, string>();
  for (const [key, value] of Object.entries(initial)) {
    data.set(key, JSON.stringify(value));
  }

  return {
    get(key) {
      const raw = data.get(key);
      return raw === undefined ? undefined : JSON.parse(raw);
    },
    set(key, value) {
      data.set(key, JSON.stringify(value));
    },
    delete(key) {
      data.delete(key);
    },
  };
}
