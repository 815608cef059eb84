/*
 * Round log store: bounded history of structured engine events.
 */
import { getDefaultStorage } from '../state/storage.ts';

export type LogEventType = 'round' | 'phase' | 'spawn' | 'economy' | 'config' | 'system';

export type LogLevel = 'info' | 'warn';

export interface LogEventMetadata {
  [key: string]: unknown;
}

export interface LogEventPayload {
  type: LogEventType;
  message: string;
  level?: LogLevel;
  metadata?: LogEventMetadata;
}

export interface LogEntry {
  id: string;
  type: LogEventType;
  level: LogLevel;
  message: string;
  metadata: LogEventMetadata;
  timestamp: number;
  occurrences: number;
}

export type LogChange =
  | { kind: 'append'; entry: LogEntry; index: number }
  | { kind: 'update'; entry: LogEntry; index: number }
  | { kind: 'remove'; entries: LogEntry[] };

export type LogListener = (change: LogChange) => void;

export interface StorageLike {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem?(key: string): void;
}

export interface LogStoreOptions {
  storage?: StorageLike | null;
  storageKey?: string;
  maxEntries?: number;
  now?: () => number;
}

const DEFAULT_MAX_ENTRIES = 150;
const LOG_HISTORY_STORAGE_KEY = 'wavewright:log-history:v1';
const LOG_EVENT_TYPES: readonly LogEventType[] = [
  'round',
  'phase',
  'spawn',
  'economy',
  'config',
  'system'
];

let sequence = 0;

const toId = (): string => {
  sequence += 1;
  return `${Date.now().toString(36)}-${sequence.toString(36)}`;
};

const isLogEventType = (value: unknown): value is LogEventType =>
  LOG_EVENT_TYPES.some((type) => type === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const normalizeMetadata = (metadata: unknown): LogEventMetadata => {
  if (!isRecord(metadata)) {
    return {};
  }
  return { ...metadata };
};

const toStringArray = (value: unknown): string[] => {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string' && item.length > 0);
  }
  if (typeof value === 'string' && value.length > 0) {
    return [value];
  }
  return [];
};

const toCountMap = (value: unknown): Record<string, number> => {
  const counts: Record<string, number> = {};
  if (!isRecord(value)) {
    return counts;
  }
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'number' && Number.isFinite(raw)) {
      counts[key] = raw;
    }
  }
  return counts;
};

const mergeSpawnMetadata = (
  previous: LogEventMetadata,
  next: LogEventMetadata
): LogEventMetadata => {
  const unitIds = Array.from(
    new Set([...toStringArray(previous.unitIds ?? previous.unitId), ...toStringArray(next.unitIds ?? next.unitId)])
  );
  const counts = toCountMap(previous.unitCounts);
  const previousTag = typeof previous.unitTag === 'string' ? previous.unitTag : null;
  if (Object.keys(counts).length === 0 && previousTag) {
    counts[previousTag] = 1;
  }
  const nextTag = typeof next.unitTag === 'string' ? next.unitTag : null;
  if (nextTag) {
    counts[nextTag] = (counts[nextTag] ?? 0) + 1;
  }
  return {
    ...previous,
    ...next,
    unitIds,
    unitCounts: counts
  };
};

export class LogStore {
  private history: LogEntry[] = [];

  private readonly listeners = new Set<LogListener>();

  private readonly storage: StorageLike | null;

  private readonly storageKey: string;

  private readonly maxEntries: number;

  private readonly now: () => number;

  constructor(options: LogStoreOptions = {}) {
    this.storage = options.storage === undefined ? getDefaultStorage() : options.storage;
    this.storageKey = options.storageKey ?? LOG_HISTORY_STORAGE_KEY;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.now = options.now ?? Date.now;
    this.hydrate();
  }

  private hydrate(): void {
    if (!this.storage) {
      return;
    }
    try {
      const raw = this.storage.getItem(this.storageKey);
      if (!raw) {
        return;
      }
      const parsed: unknown = JSON.parse(raw);
      if (!Array.isArray(parsed)) {
        return;
      }
      const restored: LogEntry[] = [];
      for (const item of parsed) {
        if (!isRecord(item) || !isLogEventType(item.type) || typeof item.message !== 'string') {
          continue;
        }
        restored.push({
          id: typeof item.id === 'string' ? item.id : toId(),
          type: item.type,
          level: item.level === 'warn' ? 'warn' : 'info',
          message: item.message,
          metadata: normalizeMetadata(item.metadata),
          timestamp:
            typeof item.timestamp === 'number' && Number.isFinite(item.timestamp)
              ? item.timestamp
              : this.now(),
          occurrences:
            typeof item.occurrences === 'number' && item.occurrences >= 1
              ? Math.floor(item.occurrences)
              : 1
        });
      }
      this.history = restored.slice(-this.maxEntries);
    } catch (error) {
      console.warn('LogStore: discarding unreadable log history', error);
      this.history = [];
    }
  }

  private persist(): void {
    if (!this.storage) {
      return;
    }
    try {
      this.storage.setItem(this.storageKey, JSON.stringify(this.history));
    } catch (error) {
      console.warn('LogStore: failed to persist log history', error);
    }
  }

  getHistory(): LogEntry[] {
    return this.history.map((entry) => ({
      ...entry,
      metadata: normalizeMetadata(entry.metadata)
    }));
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    if (this.history.length === 0) {
      return;
    }
    const removed = this.history.slice();
    this.history = [];
    this.persist();
    this.emitChange({ kind: 'remove', entries: removed });
  }

  emit(payload: LogEventPayload): LogEntry {
    const entry: LogEntry = {
      id: toId(),
      type: payload.type,
      level: payload.level ?? 'info',
      message: payload.message,
      metadata: normalizeMetadata(payload.metadata),
      timestamp: this.now(),
      occurrences: 1
    };

    if (entry.level === 'warn') {
      console.warn(entry.message, entry.metadata);
    }

    const aggregated = this.tryAggregate(entry);
    if (aggregated) {
      this.history[aggregated.index] = aggregated.entry;
      this.persist();
      this.emitChange({ kind: 'update', entry: aggregated.entry, index: aggregated.index });
      return aggregated.entry;
    }

    this.history.push(entry);
    const trimmed: LogEntry[] = [];
    while (this.history.length > this.maxEntries) {
      const removed = this.history.shift();
      if (removed) {
        trimmed.push(removed);
      }
    }
    this.persist();
    if (trimmed.length > 0) {
      this.emitChange({ kind: 'remove', entries: trimmed });
    }
    this.emitChange({ kind: 'append', entry, index: this.history.length - 1 });
    return entry;
  }

  /** Consecutive spawn entries of one round fold into a single entry. */
  private tryAggregate(entry: LogEntry): { entry: LogEntry; index: number } | null {
    if (entry.type !== 'spawn' || this.history.length === 0) {
      return null;
    }
    const index = this.history.length - 1;
    const previous = this.history[index];
    if (previous.type !== 'spawn' || previous.metadata.round !== entry.metadata.round) {
      return null;
    }
    const merged: LogEntry = {
      ...previous,
      message: entry.message,
      metadata: mergeSpawnMetadata(previous.metadata, entry.metadata),
      timestamp: entry.timestamp,
      occurrences: previous.occurrences + entry.occurrences
    };
    return { entry: merged, index };
  }

  private emitChange(change: LogChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        console.warn('Failed to handle log change', error);
      }
    }
  }
}
