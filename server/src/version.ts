import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { getAppInfo, type VersionInfo } from '@dupsweep/common';
import { z } from 'zod';

const PackageSchema = z.object({ version: z.string() });

export function readPackageVersion(
  packageUrl: URL = new URL('../package.json', import.meta.url),
): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(fileURLToPath(packageUrl), 'utf8'),
    );
    const parsed = PackageSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function versionInfo(app: 'server' | 'cli'): VersionInfo {
  return getAppInfo(app, readPackageVersion(), `node ${process.version}`);
}
