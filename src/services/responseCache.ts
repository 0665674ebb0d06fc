import { z } from 'zod';
import { DIMENSIONS, type AgentResult } from '../types/analysis.js';

export interface CacheEntry {
  fingerprint: string;
  /** Serialized AgentResult. */
  payload: string;
  createdAt: number;
  expiresAt: number;
}

/**
 * Backing store for the response cache. A remote key-value store can be
 * plugged in as long as each set replaces the whole entry.
 */
export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  set(key: string, entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  keys(): Promise<string[]>;
}

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    this.entries.set(key, entry);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async keys(): Promise<string[]> {
    return [...this.entries.keys()];
  }
}

const agentResultSchema = z.object({
  dimension: z.enum(DIMENSIONS),
  agentName: z.string(),
  score: z.number().min(0).max(100),
  findings: z.array(
    z.object({
      severity: z.enum(['INFO', 'WARNING', 'CRITICAL']),
      message: z.string(),
      evidence: z.string().optional(),
    })
  ),
  summary: z.string(),
  usage: z.object({ promptTokens: z.number(), completionTokens: z.number() }),
  calls: z.number(),
  status: z.literal('SUCCESS'),
  error: z.string().optional(),
  fromCache: z.boolean(),
  durationMs: z.number(),
});

export interface CacheStats {
  hits: number;
  misses: number;
}

export interface ResponseCacheOptions {
  defaultTtlMs?: number;
  now?: () => number;
}

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export class ResponseCache {
  private hits = 0;
  private misses = 0;
  private readonly store: CacheStore;
  private readonly defaultTtlMs: number;
  private readonly now: () => number;

  constructor(store: CacheStore = new MemoryCacheStore(), options: ResponseCacheOptions = {}) {
    this.store = store;
    this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  async get(fingerprint: string): Promise<AgentResult | undefined> {
    const entry = await this.store.get(fingerprint);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.now() >= entry.expiresAt) {
      await this.evict(fingerprint, entry);
      this.misses++;
      return undefined;
    }

    const decoded = this.decode(entry.payload);
    if (!decoded) {
      console.warn(`[cache] dropping undecodable entry ${fingerprint.slice(0, 12)}`);
      await this.evict(fingerprint, entry);
      this.misses++;
      return undefined;
    }

    this.hits++;
    return decoded;
  }

  /**
   * Stores a successful result. Failed, timed-out and skipped results are
   * refused so they are retried on the next run.
   */
  async put(fingerprint: string, result: AgentResult, ttlMs = this.defaultTtlMs): Promise<boolean> {
    if (result.status !== 'SUCCESS') {
      return false;
    }
    const createdAt = this.now();
    await this.store.set(fingerprint, {
      fingerprint,
      payload: JSON.stringify(result),
      createdAt,
      expiresAt: createdAt + Math.max(0, ttlMs),
    });
    return true;
  }

  async purge(fingerprint?: string): Promise<void> {
    if (fingerprint === undefined) {
      await this.store.clear();
    } else {
      await this.store.delete(fingerprint);
    }
  }

  /** Evicts expired entries eagerly; returns how many were removed. */
  async prune(): Promise<number> {
    const now = this.now();
    let removed = 0;
    for (const key of await this.store.keys()) {
      const entry = await this.store.get(key);
      if (entry && now >= entry.expiresAt && (await this.evict(key, entry))) {
        removed++;
      }
    }
    return removed;
  }

  /** Stored entries, expired ones included until they are read or pruned. */
  async size(): Promise<number> {
    return (await this.store.keys()).length;
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
  }

  /** Deletes `entry` unless a put has replaced it since it was read. */
  private async evict(fingerprint: string, entry: CacheEntry): Promise<boolean> {
    const current = await this.store.get(fingerprint);
    if (!current || current.createdAt !== entry.createdAt || current.payload !== entry.payload) {
      return false;
    }
    await this.store.delete(fingerprint);
    return true;
  }

  private decode(payload: string): AgentResult | null {
    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch {
      return null;
    }
    const parsed = agentResultSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }
}
