import type { StorageLike } from '../../logging/logStore.ts';
import { getDefaultStorage, safeLoadJSON } from '../storage.ts';

export interface StructuredTelemetryEntry {
  readonly event: string;
  readonly timestamp: number;
  readonly payload: Record<string, unknown>;
}

function isProduction(): boolean {
  return typeof process !== 'undefined' && process.env.NODE_ENV === 'production';
}

export function emitStructuredTelemetry(
  event: string,
  payload: Record<string, unknown>,
  now: () => number = Date.now
): StructuredTelemetryEntry {
  const entry: StructuredTelemetryEntry = {
    event,
    timestamp: now(),
    payload: { ...payload }
  };
  if (isProduction()) {
    console.info(event, entry);
  } else {
    console.debug(`[telemetry] ${event}`, entry);
  }
  return entry;
}

export interface PersistOptions {
  readonly limit?: number;
  readonly storage?: StorageLike | null;
}

export function isStructuredTelemetryEntry(value: unknown): value is StructuredTelemetryEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'event' in value &&
    typeof value.event === 'string' &&
    'timestamp' in value &&
    typeof value.timestamp === 'number' &&
    'payload' in value &&
    typeof value.payload === 'object' &&
    value.payload !== null
  );
}

export function loadStructuredTelemetry(
  storageKey: string,
  storage: StorageLike | null = getDefaultStorage()
): StructuredTelemetryEntry[] {
  const stored = safeLoadJSON(storage, storageKey);
  if (!Array.isArray(stored)) {
    return [];
  }
  return stored.filter(isStructuredTelemetryEntry);
}

export function persistStructuredTelemetry(
  storageKey: string,
  entry: StructuredTelemetryEntry,
  options: PersistOptions = {}
): void {
  const storage = options.storage === undefined ? getDefaultStorage() : options.storage;
  if (!storage) {
    return;
  }
  const limit = Number.isFinite(options.limit) ? Math.max(1, Math.trunc(options.limit ?? 16)) : 16;
  const existing = loadStructuredTelemetry(storageKey, storage);
  const merged = [...existing, entry].slice(-limit);
  try {
    storage.setItem(storageKey, JSON.stringify(merged));
  } catch (error) {
    console.warn('Failed to persist structured telemetry', { storageKey, error });
  }
}
