import type { FileRecord, SizeBucket } from './types.js';

/**
 * Groups records by exact byte size. Buckets keep discovery order, both for
 * the buckets themselves and for their members.
 */
export class SizeBucketer {
  private readonly buckets = new Map<number, FileRecord[]>();
  private records = 0;

  add(record: FileRecord) {
    const bucket = this.buckets.get(record.size);
    if (bucket) bucket.push(record);
    else this.buckets.set(record.size, [record]);
    this.records += 1;
  }

  get bucketCount() {
    return this.buckets.size;
  }

  get recordCount() {
    return this.records;
  }

  // Single-member buckets cannot hold a duplicate and never reach the hasher.
  collisions(): SizeBucket[] {
    const out: SizeBucket[] = [];
    for (const [size, members] of this.buckets) {
      if (members.length >= 2) out.push({ size, members: [...members] });
    }
    return out;
  }
}
