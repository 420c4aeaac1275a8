import type { ScanProgressDto } from '@dupsweep/common';

export type FileRecord = Readonly<{
  path: string;
  size: number;
  mtimeMs: number;
  isCloudPlaceholder: boolean;
  // Discovery sequence within one scan; used for deterministic ordering.
  order: number;
}>;

export type SizeBucket = Readonly<{
  size: number;
  members: readonly FileRecord[];
}>;

export type DigestGroup = Readonly<{
  kind: 'digest';
  size: number;
  digest: string;
  members: readonly FileRecord[];
}>;

export type NameGroup = Readonly<{
  kind: 'name';
  nameKey: string;
  // Set when groups are split by size as well as by name.
  size?: number;
  members: readonly FileRecord[];
}>;

export type CandidateGroup = DigestGroup | NameGroup;

export type DuplicateGroup = CandidateGroup &
  Readonly<{
    key: string;
    wastedBytes: number;
    firstOrder: number;
  }>;

export type ScanProgress = Readonly<
  ScanProgressDto & {
    startedAtMs: number;
    phaseStartedAtMs: number;
  }
>;

export type TimeBudget = Readonly<{
  requestedMinutes: number;
  minSize: number;
  raiseRequests: number;
}>;
