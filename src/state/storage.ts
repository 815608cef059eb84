import type { StorageLike } from '../logging/logStore.ts';

export function getDefaultStorage(): StorageLike | null {
  try {
    return typeof localStorage === 'undefined' ? null : localStorage;
  } catch (error) {
    console.warn('Storage unavailable', error);
    return null;
  }
}

/** Parsed JSON stored under `key`, or `undefined`. Corrupt entries are cleared. */
export function safeLoadJSON(storage: StorageLike | null, key: string): unknown {
  if (!storage) {
    return undefined;
  }
  const raw = storage.getItem(key);
  if (!raw) {
    return undefined;
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    console.warn(`Failed to parse data for "${key}", clearing`, err);
    storage.removeItem?.(key);
    return undefined;
  }
}
