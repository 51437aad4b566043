/**
 * Fee estimate cache
 *
 * Fronts `blockchain.estimatefee` with a per-target TTL. A cached value is
 * served while `now < expiresAt`; after that the next call fetches again.
 * Concurrent misses for one target share a single fetch.
 *
 * @module performance/FeeCache
 */

import type { Logger } from 'pino';
import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { CacheManager } from './CacheManager.js';

export type FeeFetcher = (targetBlocks: number) => Promise<number>;

export const DEFAULT_FEE_TTL_MINUTES = 10;

export interface FeeCacheOptions {
  /** @default Date.now */
  now?: () => number;
  logger?: Logger;
}

export class FeeCache {
  private cache: CacheManager<number>;
  private inFlight = new Map<number, Promise<number>>();
  private fetcher: FeeFetcher;
  private logger: Logger;

  constructor(fetcher: FeeFetcher, options: FeeCacheOptions = {}) {
    this.fetcher = fetcher;
    this.cache = new CacheManager<number>({
      capacity: 64,
      defaultTTL: DEFAULT_FEE_TTL_MINUTES * 60_000,
      now: options.now,
    });
    this.logger = options.logger ?? createLogger('fee-cache');
  }

  async get(targetBlocks: number, ttlMinutes: number = DEFAULT_FEE_TTL_MINUTES): Promise<number> {
    if (!Number.isInteger(targetBlocks) || targetBlocks < 1) {
      throw ValidationError.invalidParameter('targetBlocks', 'positive integer', targetBlocks);
    }
    if (!Number.isFinite(ttlMinutes) || ttlMinutes < 0) {
      throw ValidationError.invalidParameter('ttlMinutes', 'non-negative number', ttlMinutes);
    }

    const key = CacheManager.generateKey('fee', targetBlocks);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const pending = this.inFlight.get(targetBlocks);
    if (pending) {
      return pending;
    }

    const fetch = this.fetcher(targetBlocks)
      .then((fee) => {
        this.cache.set(key, fee, ttlMinutes * 60_000);
        this.logger.debug({ targetBlocks, fee, ttlMinutes }, 'Fee estimate refreshed');
        return fee;
      })
      .finally(() => {
        this.inFlight.delete(targetBlocks);
      });

    this.inFlight.set(targetBlocks, fetch);
    return fetch;
  }

  invalidate(targetBlocks?: number): void {
    if (targetBlocks === undefined) {
      this.cache.clear();
      return;
    }
    this.cache.delete(CacheManager.generateKey('fee', targetBlocks));
  }

  getStats() {
    return this.cache.getStats();
  }
}
