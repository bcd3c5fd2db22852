import { PerformanceError, describeError } from "./errors.js";
import { log } from "./log.js";
import type { ColumnObservation, Hemisphere, MetricType, PossibleColumn, ValueRange } from "./model.js";

export type EyemapCache<V> = {
  get: (key: string) => V | undefined;
  put: (key: string, value: V) => void;
  clear: () => void;
};

export type CacheStats = { hits: number; misses: number; size: number };

export type CacheKeyParts = {
  region: string;
  side: Hemisphere;
  metric: MetricType;
  neuronType: string;
  valueRange: ValueRange;
  layerRange?: ValueRange;
  data: string;
};

export function thresholdSignature(range: ValueRange, layerRange?: ValueRange): string {
  const base = `${range.minValue}..${range.maxValue}`;
  return layerRange ? `${base}|${layerRange.minValue}..${layerRange.maxValue}` : base;
}

// The whole lattice counts: cells of other regions still shape the grid.
export function dataSignature(
  possibleColumns: readonly PossibleColumn[],
  observed: readonly ColumnObservation[],
  region: string,
  side: Hemisphere,
): string {
  const lattice = possibleColumns.map((c) => [c.region, c.side ?? "", c.hex1, c.hex2]);
  const values = observed
    .filter((o) => o.region === region && o.side === side)
    .map((o) => [o.hex1, o.hex2, o.synapseCount, o.neuronCount, o.layers.map((l) => [l.synapseCount, l.neuronCount])]);
  return JSON.stringify([lattice, values]);
}

export function cacheKey(p: CacheKeyParts): string {
  return [p.region, p.side, p.metric, p.neuronType, thresholdSignature(p.valueRange, p.layerRange), p.data].join("\u0000");
}

export class MemoryCache<V> implements EyemapCache<V> {
  private readonly entries = new Map<string, V>();
  private hits = 0;
  private misses = 0;

  get(key: string): V | undefined {
    const v = this.entries.get(key);
    if (v === undefined) this.misses += 1;
    else this.hits += 1;
    return v;
  }

  // Every writer computes the same value for a key, so last write wins.
  put(key: string, value: V): void {
    this.entries.set(key, value);
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}

export class NullCache<V> implements EyemapCache<V> {
  get(_key: string): V | undefined {
    return undefined;
  }

  put(_key: string, _value: V): void {}

  clear(): void {}
}

// A throwing backend behaves like a miss.
export function cacheGet<V>(cache: EyemapCache<V>, key: string): V | undefined {
  try {
    return cache.get(key);
  } catch (e) {
    const pe = new PerformanceError(`cache read failed: ${describeError(e)}`, "cache_get");
    log.cache("%s", pe.message);
    return undefined;
  }
}

export function cachePut<V>(cache: EyemapCache<V>, key: string, value: V): void {
  try {
    cache.put(key, value);
  } catch (e) {
    const pe = new PerformanceError(`cache write failed: ${describeError(e)}`, "cache_put");
    log.cache("%s", pe.message);
  }
}

export function cacheClear<V>(cache: EyemapCache<V>): boolean {
  try {
    cache.clear();
    return true;
  } catch (e) {
    log.cache("%s", new PerformanceError(`cache clear failed: ${describeError(e)}`, "cache_clear").message);
    return false;
  }
}
