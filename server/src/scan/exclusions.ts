import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const WINDOWS_SYSTEM_DIRS = [
  'C:\\Windows',
  'C:\\Program Files',
  'C:\\Program Files (x86)',
  'C:\\ProgramData',
  'C:\\$Recycle.Bin',
  'C:\\Recovery',
  'C:\\PerfLogs',
];

const POSIX_SYSTEM_DIRS = ['/proc', '/sys', '/dev', '/run'];

// Sync-client roots whose files are usually online-only stubs.
const DARWIN_CLOUD_DIRS = ['Library/CloudStorage', 'Library/Mobile Documents'];

const ONEDRIVE_ENV_VARS = ['OneDrive', 'OneDriveCommercial', 'OneDriveConsumer'];

export type DefaultExcludeParams = {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  listDir?: (dir: string) => string[];
};

function listDirNames(dir: string): string[] {
  try {
    return fs.readdirSync(dir);
  } catch {
    return [];
  }
}

function segmentsOf(p: string): string[] {
  return p.replace(/\\/g, '/').toLowerCase().split('/').filter(Boolean);
}

function dedupeCaseInsensitive(paths: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const p of paths) {
    const key = segmentsOf(p).join('/');
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(p);
  }
  return out;
}

export function oneDriveRoots({
  platform = process.platform,
  env = process.env,
  homeDir = os.homedir(),
  listDir = listDirNames,
}: DefaultExcludeParams = {}): string[] {
  const join = platform === 'win32' ? path.win32.join : path.posix.join;
  const roots: string[] = [];
  for (const name of ONEDRIVE_ENV_VARS) {
    const value = env[name]?.trim();
    if (value) roots.push(value);
  }
  if (homeDir) {
    for (const name of listDir(homeDir)) {
      if (name.toLowerCase().startsWith('onedrive')) {
        roots.push(join(homeDir, name));
      }
    }
  }
  return dedupeCaseInsensitive(roots);
}

export function defaultExcludes(params: DefaultExcludeParams = {}): string[] {
  const platform = params.platform ?? process.platform;
  const homeDir = params.homeDir ?? os.homedir();
  const system =
    platform === 'win32' ? WINDOWS_SYSTEM_DIRS : [...POSIX_SYSTEM_DIRS];
  const cloud =
    platform === 'darwin' && homeDir
      ? DARWIN_CLOUD_DIRS.map((rel) => path.posix.join(homeDir, rel))
      : [];
  return dedupeCaseInsensitive([
    ...system,
    ...cloud,
    ...oneDriveRoots({ ...params, platform, homeDir }),
  ]);
}

type TrieNode = { terminal: boolean; children: Map<string, TrieNode> };

function createNode(): TrieNode {
  return { terminal: false, children: new Map() };
}

/**
 * Case-insensitive set of excluded directory prefixes, indexed by path
 * segment so a lookup costs one map probe per segment of the candidate.
 */
export class ExclusionSet {
  private readonly root = createNode();
  private readonly list: string[] = [];

  constructor(entries: Iterable<string> = []) {
    for (const entry of entries) this.add(entry);
  }

  add(entry: string): boolean {
    const segments = segmentsOf(entry);
    // A bare root would exclude everything; callers use noExcludes for that.
    if (segments.length === 0) return false;
    let node = this.root;
    for (const segment of segments) {
      if (node.terminal) return false;
      let next = node.children.get(segment);
      if (!next) {
        next = createNode();
        node.children.set(segment, next);
      }
      node = next;
    }
    if (node.terminal) return false;
    node.terminal = true;
    node.children.clear();
    this.list.push(entry);
    return true;
  }

  isExcluded(candidate: string): boolean {
    let node = this.root;
    for (const segment of segmentsOf(candidate)) {
      const next = node.children.get(segment);
      if (!next) return false;
      if (next.terminal) return true;
      node = next;
    }
    return false;
  }

  get size() {
    return this.list.length;
  }

  entries(): string[] {
    return [...this.list];
  }
}

export function buildExclusionSet({
  noExcludes,
  addExclude,
  defaults = defaultExcludes(),
}: {
  noExcludes: boolean;
  addExclude: string[];
  defaults?: string[];
}): ExclusionSet {
  const set = new ExclusionSet(noExcludes ? [] : defaults);
  // User entries apply even in noExcludes mode.
  for (const entry of addExclude) {
    set.add(path.resolve(entry));
  }
  return set;
}
