import { Transform } from './transform';

export interface TransformCacheStats {
  lookups: number;
  hits: number;
  entries: number;
  bytes: number;
}

// Two Float64 4x4 matrices per entry.
const BYTES_PER_ENTRY = 2 * 16 * Float64Array.BYTES_PER_ELEMENT;

/**
 * Content-addressed intern table for transforms.
 *
 * `lookup` returns the stored instance structurally equal to its argument,
 * inserting the argument on a miss. Buckets are keyed by `Transform.hash()`
 * and every candidate in a bucket is checked with `equals`, so a hash
 * collision never aliases two different transforms. Entries are never
 * evicted: handles stay valid for the lifetime of the cache.
 */
export class TransformCache {
  private readonly hashOf: (t: Transform) => number;
  private buckets = new Map<number, Transform[]>();
  private count = 0;
  private lookups = 0;
  private hits = 0;

  constructor(hashOf: (t: Transform) => number = t => t.hash()) {
    this.hashOf = hashOf;
  }

  lookup(t: Transform): Transform {
    this.lookups++;
    const h = this.hashOf(t);
    const bucket = this.buckets.get(h);
    if (bucket) {
      for (const entry of bucket) {
        if (entry.equals(t)) {
          this.hits++;
          return entry;
        }
      }
      bucket.push(t);
    } else {
      this.buckets.set(h, [t]);
    }
    this.count++;
    return t;
  }

  get size(): number {
    return this.count;
  }

  get stats(): TransformCacheStats {
    return {
      lookups: this.lookups,
      hits: this.hits,
      entries: this.count,
      bytes: this.count * BYTES_PER_ENTRY,
    };
  }
}
