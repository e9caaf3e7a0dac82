/**
 * Caller-owned memo for engine results, keyed by a SHA-256 hash of the
 * inputs. The engines never read it; a page or job that recomputes the
 * same basket snapshot wraps its call in `getOrCompute`.
 */

import { createHash } from "node:crypto";
import { ENGINE_CONFIG } from "./_core/env";

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export interface ResultCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * Deterministic JSON: object keys sorted, Dates as ISO strings, Maps and
 * Sets as arrays of their entries.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value));
}

function normalize(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Map) return [...value.entries()].map(([k, v]) => [normalize(k), normalize(v)]);
  if (value instanceof Set) return [...value].map(normalize);
  if (Array.isArray(value)) return value.map(normalize);
  if (typeof value === "number" && !Number.isFinite(value)) return String(value);
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = normalize(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

export function hashInputs(...inputs: unknown[]): string {
  return createHash("sha256").update(stableStringify(inputs)).digest("hex");
}

export class ResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ResultCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? ENGINE_CONFIG.resultCacheTtlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry<T>, now: number): boolean {
    return now - entry.storedAt >= this.ttlMs;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /** Stores under a raw key, sweeping expired entries first. */
  set(key: string, value: T): void {
    const now = this.now();
    this.prune(now);
    this.entries.set(key, { value, storedAt: now });
  }

  /** Drops every expired entry; returns how many were dropped. */
  prune(now: number = this.now()): number {
    let dropped = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        dropped++;
      }
    }
    return dropped;
  }

  /** Cached value for these inputs, computing and storing it on a miss. */
  getOrCompute(inputs: readonly unknown[], compute: () => T): T {
    const key = hashInputs(...inputs);
    const hit = this.get(key);
    if (hit !== undefined) return hit;

    const value = compute();
    this.set(key, value);
    return value;
  }

  /** Removes the entry stored under a raw key. */
  invalidate(key: string): boolean {
    const removed = this.entries.delete(key);
    if (removed) console.log("[ResultCache] Invalidated 1 entry");
    return removed;
  }

  /** Removes the entry `getOrCompute` stored for these inputs. */
  invalidateInputs(...inputs: unknown[]): boolean {
    return this.invalidate(hashInputs(...inputs));
  }

  clear(): void {
    const count = this.entries.size;
    this.entries.clear();
    if (count > 0) console.log(`[ResultCache] Cleared ${count} entries`);
  }
}
