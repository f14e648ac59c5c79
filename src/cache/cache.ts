/**
 * Bounded Cache
 * Least-recently-used key/value cache, partitioned by entity type
 */

export const DEFAULT_CACHE_CAPACITY = 50;

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  puts: number;
  evictions: number;
  hitRate: number;
}

export interface LruCacheOptions {
  maxSize: number;
}

/**
 * Single LRU segment. Map iteration order is insertion order, so the first
 * key is always the least recently used one: every access re-inserts.
 */
export class LruCache<V> {
  private entries: Map<string, { value: V }> = new Map();
  private maxSize: number;
  private hits = 0;
  private misses = 0;
  private puts = 0;
  private evictions = 0;

  constructor(options: LruCacheOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new Error(`Cache capacity must be a positive integer, got ${options.maxSize}`);
    }
    this.maxSize = options.maxSize;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /** Presence check that neither promotes nor counts */
  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, value: V): void {
    this.puts++;
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }
    this.entries.set(key, { value });

    while (this.entries.size > this.maxSize) {
      this.evictOldest();
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      puts: this.puts,
      evictions: this.evictions,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }
}

export type PartitionCapacities<M> = Partial<Record<keyof M, number>>;

export interface PartitionedCacheOptions<M> {
  /** Capacity applied to every partition without its own entry (default 50) */
  defaultCapacity?: number;
  capacities?: PartitionCapacities<M>;
}

/**
 * Cache with one independent LRU segment per entity type. The type map `M`
 * fixes the value type of each partition, e.g.
 * `PartitionedCache<{ schedule: Schedule; quote: Quote }>`.
 *
 * Every operation is synchronous, so calls on a partition never interleave.
 */
export class PartitionedCache<M extends object> {
  private partitions: { [K in keyof M]?: LruCache<M[K]> } = {};
  private types: Array<keyof M> = [];
  private defaultCapacity: number;
  private capacities: PartitionCapacities<M>;

  constructor(options: PartitionedCacheOptions<M> = {}) {
    this.defaultCapacity = options.defaultCapacity ?? DEFAULT_CACHE_CAPACITY;
    this.capacities = options.capacities ?? {};
  }

  put<K extends keyof M>(type: K, key: string, value: M[K]): void {
    this.partition(type).set(key, value);
  }

  get<K extends keyof M>(type: K, key: string): M[K] | undefined {
    return this.partition(type).get(key);
  }

  has<K extends keyof M>(type: K, key: string): boolean {
    return this.partition(type).has(key);
  }

  remove<K extends keyof M>(type: K, key: string): void {
    this.partition(type).delete(key);
  }

  clear<K extends keyof M>(type: K): void {
    this.partition(type).clear();
  }

  clearAll(): void {
    for (const type of this.types) {
      this.partition(type).clear();
    }
  }

  stats<K extends keyof M>(type: K): CacheStats {
    return this.partition(type).getStats();
  }

  /** Stats of every partition touched so far */
  allStats(): Array<{ type: keyof M } & CacheStats> {
    return this.types.map((type) => ({ type, ...this.partition(type).getStats() }));
  }

  private partition<K extends keyof M>(type: K): LruCache<M[K]> {
    const existing = this.partitions[type];
    if (existing) return existing;

    const partition = new LruCache<M[K]>({
      maxSize: this.capacities[type] ?? this.defaultCapacity,
    });
    this.partitions[type] = partition;
    this.types.push(type);
    return partition;
  }
}
