import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { log } from '../log.js';
import type { CacheStats } from '../types.js';

export const CACHE_DIR_NAME = '.codevitals_cache';
const CACHE_FILE_NAME = 'file_metadata.json';

// Rough per-file cost of re-reading and counting a file.
const SECONDS_SAVED_PER_HIT = 0.0001;

const CacheEntrySchema = z.object({
  file_path:  z.string(),
  size_bytes: z.number().int().nonnegative(),
  mtime:      z.number(),
  lines:      z.number().int().nonnegative(),
  binary:     z.boolean(),
  language:   z.string().nullable(),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface FileStamp {
  size: number;
  mtimeMs: number;
}

/**
 * Per-file metadata memo keyed on (size, mtime). Entries are reused only
 * while both still match; otherwise the file is re-read. When disabled,
 * every operation is a no-op.
 */
export class MetadataCache {
  private entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  readonly cacheFile: string;

  constructor(readonly cacheDir: string, readonly enabled: boolean = true) {
    this.cacheFile = join(cacheDir, CACHE_FILE_NAME);
    if (enabled) this.load();
  }

  static forRoot(root: string, enabled: boolean): MetadataCache {
    return new MetadataCache(join(root, CACHE_DIR_NAME), enabled);
  }

  get(filePath: string, stamp: FileStamp): CacheEntry | null {
    if (!this.enabled) return null;

    const entry = this.entries.get(filePath);
    if (entry && entry.size_bytes === stamp.size && entry.mtime === stamp.mtimeMs) {
      this.hits++;
      return entry;
    }

    this.misses++;
    return null;
  }

  set(
    filePath: string,
    stamp: FileStamp,
    data: { lines: number; binary: boolean; language: string | null }
  ): void {
    if (!this.enabled) return;
    this.entries.set(filePath, {
      file_path:  filePath,
      size_bytes: stamp.size,
      mtime:      stamp.mtimeMs,
      ...data,
    });
  }

  clear(): void {
    this.entries.clear();
    if (!existsSync(this.cacheFile)) return;
    try {
      rmSync(this.cacheFile);
      log.debug(`Cache cleared: ${this.cacheFile}`);
    } catch (err) {
      log.warn(`Failed to delete cache file: ${errorMessage(err)}`);
    }
  }

  save(): void {
    if (!this.enabled) return;

    const sorted = [...this.entries.keys()].sort();
    const data: Record<string, CacheEntry> = {};
    for (const key of sorted) {
      const entry = this.entries.get(key);
      if (entry) data[key] = entry;
    }

    try {
      mkdirSync(this.cacheDir, { recursive: true });
      writeFileSync(this.cacheFile, JSON.stringify(data, null, 2), 'utf8');
      log.debug(`Saved ${sorted.length} entries to cache`);
    } catch (err) {
      log.warn(`Failed to save cache: ${errorMessage(err)}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const totalFiles = this.hits + this.misses;
    return {
      enabled:           this.enabled,
      hits:              this.hits,
      misses:            this.misses,
      totalFiles,
      timeSavedEstimate: this.hits * SECONDS_SAVED_PER_HIT,
      hitRate:           totalFiles > 0 ? (this.hits / totalFiles) * 100 : 0,
    };
  }

  private load(): void {
    if (!existsSync(this.cacheFile)) return;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.cacheFile, 'utf8'));
    } catch (err) {
      log.warn(`Failed to load cache, will rebuild: ${errorMessage(err)}`);
      return;
    }

    const parsed = z.record(z.unknown()).safeParse(raw);
    if (!parsed.success) {
      log.warn('Cache file has invalid structure, ignoring');
      return;
    }

    for (const [key, value] of Object.entries(parsed.data)) {
      const entry = CacheEntrySchema.safeParse(value);
      if (entry.success) {
        this.entries.set(key, entry.data);
      } else {
        log.debug(`Skipping invalid cache entry for ${key}`);
      }
    }

    log.debug(`Loaded ${this.entries.size} entries from cache`);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
