/**
 * TTL-gated JSON file cache
 */

import fs from "node:fs/promises";
import path from "node:path";
import { CacheError, toError } from "../errors/index";
import { isRecord } from "../validation/index";
import { Logger } from "../utils/logger";

export interface CacheEntry<T> {
  value: T;
  capturedAt: Date;
}

export interface JsonFileCacheOptions<T> {
  /** Path of the cache file */
  file: string;
  /** Property holding the value in the persisted document */
  valueKey: string;
  ttlMs: number;
  isValue: (value: unknown) => value is T;
  /** Name used in log lines */
  label?: string;
  now?: () => number;
}

/**
 * Persists one value with the time it was captured, as
 * `{ <valueKey>: value, timestamp: ISO-8601 }`. Anything missing, unreadable
 * or malformed on disk reads as a miss; write and invalidate failures are
 * logged and swallowed. No locking: the last writer wins.
 */
export class JsonFileCache<T> {
  readonly file: string;
  readonly ttlMs: number;
  private readonly label: string;
  private readonly now: () => number;

  constructor(private readonly options: JsonFileCacheOptions<T>) {
    this.file = options.file;
    this.ttlMs = options.ttlMs;
    this.label = options.label ?? path.basename(options.file);
    this.now = options.now ?? Date.now;
  }

  /**
   * Loads the persisted entry regardless of age
   * @returns The entry, or null when absent or malformed
   */
  async readEntry(): Promise<CacheEntry<T> | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        Logger.cacheMiss(this.label, "absent");
      } else {
        Logger.warn(`Error reading cache ${this.label}`, {
          cache: this.label,
          error: toError(error).message,
        });
      }
      return null;
    }

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (error) {
      Logger.warn(`Cache ${this.label} is not valid JSON`, {
        cache: this.label,
        error: toError(error).message,
      });
      return null;
    }

    if (!isRecord(doc) || typeof doc.timestamp !== "string") {
      Logger.cacheMiss(this.label, "malformed");
      return null;
    }
    const capturedAt = new Date(doc.timestamp);
    const value = doc[this.options.valueKey];
    if (Number.isNaN(capturedAt.getTime()) || !this.options.isValue(value)) {
      Logger.cacheMiss(this.label, "malformed");
      return null;
    }
    return { value, capturedAt };
  }

  isFresh(entry: CacheEntry<T>): boolean {
    return this.ageMs(entry) < this.ttlMs;
  }

  ageMs(entry: CacheEntry<T>): number {
    return this.now() - entry.capturedAt.getTime();
  }

  /**
   * @returns The cached value while it is younger than the TTL, else null
   */
  async read(): Promise<T | null> {
    const entry = await this.readEntry();
    if (!entry) return null;
    if (!this.isFresh(entry)) {
      Logger.cacheMiss(this.label, "expired");
      return null;
    }
    Logger.cacheHit(this.label, this.ageMs(entry));
    return entry.value;
  }

  /**
   * Stores a value stamped with the current time. Best effort.
   */
  async write(value: T): Promise<void> {
    const doc = {
      [this.options.valueKey]: value,
      timestamp: new Date(this.now()).toISOString(),
    };
    try {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
      await fs.writeFile(this.file, JSON.stringify(doc, null, 2), "utf8");
      Logger.debug(`Cached ${this.label}`, { cache: this.label });
    } catch (error) {
      Logger.error(
        `Error writing cache ${this.label}`,
        new CacheError(toError(error).message, this.file, { cause: error }),
      );
    }
  }

  /**
   * Deletes the persisted entry; a missing file is not an error
   */
  async invalidate(): Promise<void> {
    try {
      await fs.rm(this.file, { force: true });
      Logger.info(`Cache ${this.label} cleared`, { cache: this.label });
    } catch (error) {
      Logger.error(
        `Error clearing cache ${this.label}`,
        new CacheError(toError(error).message, this.file, { cause: error }),
      );
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}
