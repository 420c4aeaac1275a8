import type {
  DuplicateGroupDto,
  ScanStatusDto,
  ScanSummaryDto,
} from '@dupsweep/common';

const UNITS = ['KB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(1)} ${UNITS[unit]}`;
}

export function formatEta(seconds: number): string {
  const total = Math.max(0, Math.round(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  if (hours > 0) return `${hours} h ${minutes} min`;
  if (minutes > 0) return `${minutes} min ${secs} s`;
  return `${secs} s`;
}

function groupHeading(group: DuplicateGroupDto, index: number): string {
  const count = group.members.length;
  const wasted = `${formatBytes(group.wastedBytes)} reclaimable`;
  if (group.kind === 'digest') {
    return `[${index}] ${formatBytes(group.size)} x ${count}, ${wasted}  sha256 ${group.digest.slice(0, 12)}`;
  }
  return `[${index}] "${group.nameKey}" x ${count}, ${wasted}`;
}

export function renderReport(results: {
  groups: readonly DuplicateGroupDto[];
  summary: ScanSummaryDto;
}): string {
  const { groups, summary } = results;
  if (groups.length === 0) return 'No duplicates found.\n';
  const lines = [
    `Duplicate groups: ${summary.groups} (${summary.files} files, ${formatBytes(summary.wastedBytes)} reclaimable)`,
  ];
  groups.forEach((group, i) => {
    lines.push('', groupHeading(group, i + 1));
    for (const member of group.members) {
      const size = group.kind === 'name' ? `  ${formatBytes(member.size)}` : '';
      const cloud = member.isCloudPlaceholder ? '  (cloud)' : '';
      lines.push(`    ${member.path}${size}${cloud}`);
    }
  });
  return `${lines.join('\n')}\n`;
}

/** One status line for interactive progress output. */
export function renderProgress(status: ScanStatusDto): string {
  const { progress } = status;
  const parts = [
    status.state,
    `${progress.filesVisited} files`,
    formatBytes(progress.bytesVisited),
  ];
  if (progress.phase === 'hashing') {
    parts.push(`hashed ${progress.hashDone}/${progress.hashTotal}`);
  }
  if (status.etaSeconds !== null) {
    parts.push(`ETA ${formatEta(status.etaSeconds)}`);
  }
  return parts.join('  ');
}
