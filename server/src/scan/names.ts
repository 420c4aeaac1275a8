import path from 'node:path';
import type { FileRecord, NameGroup } from './types.js';

export type NameOptions = { ignoreExt: boolean };

// Leading date stamp: YYYY-MM-DD (any of - _ . between parts), YYYYMMDD or
// YYMMDD, optionally followed by a four digit time. The digits are not
// checked against a calendar.
const TIMESTAMP_PREFIX =
  /^(?:\d{4}[-_.]\d{2}[-_.]\d{2}|\d{8}|\d{6})(?:[-_ ]?\d{4})?[-_. ]*/u;

const SEPARATORS = /[-_.\s]+/gu;

export function splitExtension(fileName: string): {
  stem: string;
  ext: string;
} {
  const dot = fileName.lastIndexOf('.');
  // A leading dot names a hidden file, not an extension.
  if (dot <= 0) return { stem: fileName, ext: '' };
  return { stem: fileName.slice(0, dot), ext: fileName.slice(dot) };
}

export function stripTimestamp(stem: string): string {
  const match = TIMESTAMP_PREFIX.exec(stem);
  if (!match) return stem;
  const rest = stem.slice(match[0].length);
  // Nothing left after the stamp: compare on the whole name instead.
  return rest.length > 0 ? rest : stem;
}

/**
 * Canonical comparison key for a file name (the directory part is ignored).
 *
 * @example
 * normalizeName('250915_report-final.pdf', { ignoreExt: true }); // 'report final'
 */
export function normalizeName(fileName: string, options: NameOptions): string {
  const base = path.basename(fileName);
  const { stem, ext } = splitExtension(base);
  const stripped = stripTimestamp(stem);
  const candidate = options.ignoreExt ? stripped : stripped + ext;
  return candidate.replace(SEPARATORS, ' ').trim().toLowerCase();
}

export type NameBucketerOptions = NameOptions & { requireSameSize: boolean };

type NameBucket = { nameKey: string; size?: number; members: FileRecord[] };

export class NameBucketer {
  private readonly buckets = new Map<string, NameBucket>();
  private readonly options: NameBucketerOptions;

  constructor(options: NameBucketerOptions) {
    this.options = options;
  }

  keyFor(record: FileRecord): string {
    return normalizeName(record.path, this.options);
  }

  add(record: FileRecord): boolean {
    const nameKey = this.keyFor(record);
    if (!nameKey) return false;
    const bucketKey = this.options.requireSameSize
      ? `${record.size}\u0000${nameKey}`
      : nameKey;
    const bucket = this.buckets.get(bucketKey);
    if (bucket) {
      bucket.members.push(record);
    } else {
      this.buckets.set(bucketKey, {
        nameKey,
        size: this.options.requireSameSize ? record.size : undefined,
        members: [record],
      });
    }
    return true;
  }

  get bucketCount() {
    return this.buckets.size;
  }

  /**
   * Buckets with at least two members whose size still meets `minSize`.
   * Members below a threshold raised mid-run are left out.
   */
  groups(minSize = 0): NameGroup[] {
    const out: NameGroup[] = [];
    for (const bucket of this.buckets.values()) {
      const members = bucket.members.filter((m) => m.size >= minSize);
      if (members.length < 2) continue;
      const group: NameGroup = {
        kind: 'name',
        nameKey: bucket.nameKey,
        ...(bucket.size !== undefined ? { size: bucket.size } : {}),
        members: Object.freeze(members),
      };
      out.push(Object.freeze(group));
    }
    return out;
  }
}
