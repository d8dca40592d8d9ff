import * as crypto from 'crypto';
import { logger } from '../utils/logger';
import { ConfigManager } from '../utils/config';
import { AUTO_DETECT } from '../utils/constants';
import { Tone, TranslationResult } from '../providers/base/translationProvider';

interface CacheEntry {
  result: TranslationResult;
  timestamp: number;
}

export interface TranslationCacheOptions {
  /** Entry lifetime in milliseconds */
  ttlMs?: number;
  maxSize?: number;
  /** Clock returning epoch milliseconds */
  now?: () => number;
}

/**
 * Bounded, time-expiring store of successful translations.
 *
 * Created once per process and passed to every translate call. All
 * operations are synchronous, so each one is atomic on the event loop;
 * two concurrent requests for the same uncached text may both miss.
 */
export class TranslationCache {
  private cache: Map<string, CacheEntry> = new Map();
  readonly ttlMs: number;
  readonly maxSize: number;
  private readonly now: () => number;

  constructor(options: TranslationCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? ConfigManager.getCacheTtl();
    this.maxSize = Math.max(1, options.maxSize ?? ConfigManager.getCacheMaxSize());
    this.now = options.now ?? Date.now;
  }

  private hash(
    text: string,
    sourceLang: string | undefined,
    targetLang: string,
    tone: Tone
  ): string {
    const source = sourceLang && sourceLang !== AUTO_DETECT ? sourceLang : AUTO_DETECT;
    return crypto
      .createHash('sha256')
      .update(JSON.stringify([text, source, targetLang, tone]))
      .digest('hex');
  }

  lookup(
    text: string,
    sourceLang: string | undefined,
    targetLang: string,
    tone: Tone
  ): TranslationResult | undefined {
    const key = this.hash(text, sourceLang, targetLang, tone);
    const entry = this.cache.get(key);

    if (!entry) {
      logger.debug(`Cache MISS for key: ${key.substring(0, 16)}...`);
      return undefined;
    }

    if (this.now() - entry.timestamp >= this.ttlMs) {
      this.cache.delete(key);
      logger.debug(`Cache EXPIRED for key: ${key.substring(0, 16)}...`);
      return undefined;
    }

    logger.debug(`Cache HIT for key: ${key.substring(0, 16)}...`);
    return { ...entry.result };
  }

  store(
    text: string,
    sourceLang: string | undefined,
    targetLang: string,
    tone: Tone,
    result: TranslationResult
  ): void {
    if (result.error !== undefined || !result.translation) {
      return;
    }

    const key = this.hash(text, sourceLang, targetLang, tone);
    // Re-insert so that map order follows timestamps
    this.cache.delete(key);
    this.cache.set(key, { result: { ...result }, timestamp: this.now() });
    logger.debug(`Cache SET for key: ${key.substring(0, 16)}...`);

    this.evict();
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Drop the oldest entries until the size bound holds
   */
  private evict(): void {
    if (this.cache.size <= this.maxSize) {
      return;
    }

    const byAge = [...this.cache.entries()].sort(
      (a, b) => a[1].timestamp - b[1].timestamp
    );
    const excess = this.cache.size - this.maxSize;
    for (const [key] of byAge.slice(0, excess)) {
      this.cache.delete(key);
    }
    logger.debug(`Cache evicted ${excess} entr${excess === 1 ? 'y' : 'ies'}`);
  }
}
