import { execFile as execFileCb } from 'node:child_process';
import type { Stats } from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';

const execFile = promisify(execFileCb);

/**
 * Decides whether a file is a sync-client stub whose content lives remotely.
 * Must not read file content: opening a stub triggers a download.
 */
export type PlaceholderDetector = (
  filePath: string,
  stats: Stats,
) => Promise<boolean>;

export type AttribLister = (dir: string) => Promise<string>;

// Dataless files (iCloud Drive, File Provider based sync clients) report a
// size but have no blocks allocated on disk.
export function isDatalessStub(stats: Pick<Stats, 'size' | 'blocks'>) {
  return stats.size > 0 && stats.blocks === 0;
}

async function listAttrib(dir: string): Promise<string> {
  const { stdout } = await execFile(
    'attrib',
    [path.win32.join(dir, '*')],
    { windowsHide: true, maxBuffer: 32 * 1024 * 1024 },
  );
  return stdout;
}

/**
 * Parses `attrib` output into the set of lower-cased file names flagged
 * offline (O) or unpinned (U).
 */
export function parseAttribOutput(output: string, dir: string): Set<string> {
  const flagged = new Set<string>();
  const prefix = dir.replace(/[\\/]+$/, '').toLowerCase() + '\\';
  for (const line of output.split(/\r?\n/u)) {
    const idx = line.toLowerCase().indexOf(prefix);
    if (idx <= 0) continue;
    const flags = line.slice(0, idx).toUpperCase();
    if (!flags.includes('O') && !flags.includes('U')) continue;
    flagged.add(line.slice(idx + prefix.length).trim().toLowerCase());
  }
  return flagged;
}

export function createAttribDetector(
  list: AttribLister = listAttrib,
): PlaceholderDetector {
  // The scanner finishes one directory before the next, so one slot is enough.
  let cachedKey: string | null = null;
  let cached: Promise<Set<string>> = Promise.resolve(new Set());
  return async (filePath) => {
    const dir = path.win32.dirname(filePath);
    const key = dir.toLowerCase();
    if (key !== cachedKey) {
      cachedKey = key;
      cached = list(dir).then(
        (output) => parseAttribOutput(output, dir),
        () => new Set<string>(),
      );
    }
    const flagged = await cached;
    return flagged.has(path.win32.basename(filePath).toLowerCase());
  };
}

export const neverPlaceholder: PlaceholderDetector = async () => false;

export function createPlaceholderDetector(
  platform: NodeJS.Platform = process.platform,
): PlaceholderDetector {
  if (platform === 'win32') return createAttribDetector();
  if (platform === 'darwin') return async (_p, stats) => isDatalessStub(stats);
  return neverPlaceholder;
}
