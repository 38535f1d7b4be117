import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { createLogger } from '../logging/logger.js';
import type { CacheEntry, CachedVerdict } from './types.js';

const log = createLogger('scan-cache');

const CacheFileSchema = z.array(z.object({
  fingerprint: z.string().min(1),
  verdict: z.enum(['clean', 'threat']),
  confidence: z.number().min(0).max(1),
  indicators: z.array(z.string()),
  createdAt: z.number(),
}));

export interface ScanCacheOptions {
  cacheDir: string;
  cacheTtlHours?: number;
  now?: () => number;
}

/**
 * Local file-based cache of Stage 1 verdicts, keyed by email fingerprint.
 *
 * Stores entries at:
 *   <cacheDir>/scan-cache.json
 *
 * Entries older than the TTL are never returned, even while they remain on
 * disk; `prune()` removes them. Read and write failures are logged and
 * treated as a miss.
 */
export class ScanCache {
  private cacheDir: string;
  private cacheFile: string;
  private cacheTtlMs: number;
  private now: () => number;
  private entries = new Map<string, CacheEntry>();
  private loading: Promise<void> | null = null;
  private writeSeq = 0;
  private writing: Promise<void> = Promise.resolve();

  constructor(options: ScanCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.cacheFile = path.join(this.cacheDir, 'scan-cache.json');
    this.cacheTtlMs = (options.cacheTtlHours ?? 24) * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Return the entry for a fingerprint if present and younger than the TTL.
   */
  async lookup(fingerprint: string): Promise<CacheEntry | null> {
    try {
      await this.ensureLoaded();
    } catch (error) {
      log.warn('Cache read failed, continuing without cache', error);
      return null;
    }

    const entry = this.entries.get(fingerprint);
    if (!entry || this.isExpired(entry)) return null;
    return { ...entry, indicators: [...entry.indicators] };
  }

  /**
   * Store a verdict under a fingerprint. Last write wins.
   */
  async store(
    fingerprint: string,
    verdict: CachedVerdict,
    confidence: number,
    indicators: string[],
  ): Promise<void> {
    try {
      await this.ensureLoaded();
      this.entries.set(fingerprint, {
        fingerprint,
        verdict,
        confidence,
        indicators: [...indicators],
        createdAt: this.now(),
      });
      await this.persist();
    } catch (error) {
      log.warn('Cache write failed', error);
    }
  }

  /**
   * Remove all expired entries.
   */
  async prune(): Promise<number> {
    await this.ensureLoaded();
    let removed = 0;

    for (const [fingerprint, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(fingerprint);
        removed++;
      }
    }

    if (removed > 0) await this.persist();
    return removed;
  }

  /** Number of entries held, expired ones included until pruned. */
  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.createdAt >= this.cacheTtlMs;
  }

  private ensureLoaded(): Promise<void> {
    this.loading ??= this.load().catch((error: unknown) => {
      // Allow the next call to retry
      this.loading = null;
      throw error;
    });
    return this.loading;
  }

  private async load(): Promise<void> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.cacheFile, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      log.warn(`Discarding unreadable cache file ${this.cacheFile}`, error);
      return;
    }

    const parsed = CacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`Discarding malformed cache file ${this.cacheFile}`);
      return;
    }

    for (const entry of parsed.data) {
      if (!this.isExpired(entry)) {
        this.entries.set(entry.fingerprint, entry);
      }
    }
  }

  /** Queue a snapshot write behind any write already in flight. */
  private persist(): Promise<void> {
    const write = this.writing.then(() => this.writeSnapshot());
    // A failed write is reported to its caller and does not stall the queue
    this.writing = write.catch(() => undefined);
    return write;
  }

  private async writeSnapshot(): Promise<void> {
    await fs.promises.mkdir(this.cacheDir, { recursive: true });
    // Write-then-rename so a concurrent reader never sees a partial file
    const tmpFile = `${this.cacheFile}.${process.pid}.${++this.writeSeq}.tmp`;
    await fs.promises.writeFile(tmpFile, JSON.stringify([...this.entries.values()]), 'utf-8');
    await fs.promises.rename(tmpFile, this.cacheFile);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
