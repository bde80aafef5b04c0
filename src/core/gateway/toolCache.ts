import { createHash } from 'node:crypto';

export interface ToolCacheEntry {
  key: string;
  toolName: string;
  value: unknown;
  createdAt: number;
  ttlMs: number;
}

export interface ToolResultCacheOptions {
  ttlMs: number;
  maxEntries: number;
}

/** JSON with object keys sorted at every depth; `undefined` properties are dropped. */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const parts = Object.entries(value)
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
  return `{${parts.join(',')}}`;
}

export function buildToolCacheKey(toolName: string, args: unknown): string {
  return createHash('sha256').update(`${toolName}\u0000${stableStringify(args)}`).digest('hex');
}

/**
 * TTL cache for tool results. Expired entries are evicted when read; when
 * full, the oldest entry makes room.
 */
export class ToolResultCache {
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly entries = new Map<string, ToolCacheEntry>();

  constructor(options: ToolResultCacheOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw new RangeError('ttlMs must be a positive number');
    }
    this.ttlMs = options.ttlMs;
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries));
  }

  get size(): number {
    return this.entries.size;
  }

  get(toolName: string, args: unknown): ToolCacheEntry | null {
    const key = buildToolCacheKey(toolName, args);
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (Date.now() - entry.createdAt >= entry.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  set(toolName: string, args: unknown, value: unknown, ttlMs = this.ttlMs): ToolCacheEntry {
    const key = buildToolCacheKey(toolName, args);
    const entry: ToolCacheEntry = { key, toolName, value, createdAt: Date.now(), ttlMs };

    // Re-insert so Map order stays oldest-first.
    this.entries.delete(key);
    this.entries.set(key, entry);

    while (this.entries.size > this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey === undefined) break;
      this.entries.delete(oldestKey);
    }

    return entry;
  }

  /** Drop every expired entry; returns how many were removed. */
  prune(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now - entry.createdAt >= entry.ttlMs) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
