import type { FrequencyEntry } from '../types/metrics';

interface Bucket {
  order: number;
  count: number;
  casings: Map<string, number>;
}

/**
 * Case-insensitive counter. Entries sort by count, ties by first appearance;
 * each entry is displayed in its most frequent casing (ties to the first seen).
 */
export class FrequencyTable {
  private buckets = new Map<string, Bucket>();

  add(value: string): void {
    if (value.length === 0) return;

    const key = value.toLowerCase();
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { order: this.buckets.size, count: 0, casings: new Map() };
      this.buckets.set(key, bucket);
    }
    bucket.count++;
    bucket.casings.set(value, (bucket.casings.get(value) ?? 0) + 1);
  }

  addAll(values: Iterable<string>): this {
    for (const value of values) {
      this.add(value);
    }
    return this;
  }

  get size(): number {
    return this.buckets.size;
  }

  entries(limit?: number): FrequencyEntry[] {
    const sorted = Array.from(this.buckets.values())
      .sort((a, b) => b.count - a.count || a.order - b.order)
      .map((bucket) => ({ value: displayForm(bucket.casings), count: bucket.count }));
    return limit === undefined ? sorted : sorted.slice(0, Math.max(0, limit));
  }
}

function displayForm(casings: Map<string, number>): string {
  let best = '';
  let bestCount = 0;
  for (const [casing, count] of casings) {
    if (count > bestCount) {
      best = casing;
      bestCount = count;
    }
  }
  return best;
}
