import type {
  DuplicateGroupDto,
  DuplicateMemberDto,
  ScanSummaryDto,
} from '@dupsweep/common';
import type { CandidateGroup, DuplicateGroup, FileRecord } from './types.js';

/** Bytes recovered by keeping one member of the group and deleting the rest. */
export function wastedBytes(group: CandidateGroup): number {
  if (group.kind === 'digest') {
    return group.size * Math.max(0, group.members.length - 1);
  }
  let total = 0;
  let largest = 0;
  for (const member of group.members) {
    total += member.size;
    if (member.size > largest) largest = member.size;
  }
  return total - largest;
}

function groupKey(group: CandidateGroup): string {
  if (group.kind === 'digest') return `${group.size}:${group.digest}`;
  return group.size === undefined
    ? group.nameKey
    : `${group.nameKey}:${group.size}`;
}

function firstOrder(members: readonly FileRecord[]): number {
  let min = Number.POSITIVE_INFINITY;
  for (const member of members) {
    if (member.order < min) min = member.order;
  }
  return min;
}

/**
 * Orders groups by wasted bytes, then member count (both descending), then by
 * the discovery order of their earliest member.
 */
export function rankGroups(
  groups: readonly CandidateGroup[],
): DuplicateGroup[] {
  const ranked = groups.map(
    (group): DuplicateGroup =>
      Object.freeze({
        ...group,
        key: groupKey(group),
        wastedBytes: wastedBytes(group),
        firstOrder: firstOrder(group.members),
      }),
  );
  ranked.sort(
    (a, b) =>
      b.wastedBytes - a.wastedBytes ||
      b.members.length - a.members.length ||
      a.firstOrder - b.firstOrder,
  );
  return ranked;
}

export function summarize(groups: readonly DuplicateGroup[]): ScanSummaryDto {
  let files = 0;
  let wasted = 0;
  for (const group of groups) {
    files += group.members.length;
    wasted += group.wastedBytes;
  }
  return { groups: groups.length, files, wastedBytes: wasted };
}

function toMemberDto(record: FileRecord): DuplicateMemberDto {
  return {
    path: record.path,
    size: record.size,
    mtimeMs: record.mtimeMs,
    isCloudPlaceholder: record.isCloudPlaceholder,
  };
}

export function toGroupDto(group: DuplicateGroup): DuplicateGroupDto {
  const members = group.members.map(toMemberDto);
  if (group.kind === 'digest') {
    return {
      kind: 'digest',
      key: group.key,
      size: group.size,
      digest: group.digest,
      wastedBytes: group.wastedBytes,
      members,
    };
  }
  return {
    kind: 'name',
    key: group.key,
    nameKey: group.nameKey,
    wastedBytes: group.wastedBytes,
    members,
  };
}
