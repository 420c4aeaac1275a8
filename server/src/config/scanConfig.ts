import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { InvalidConfigurationError, type ConfigIssue } from '../scan/errors.js';

export const DEFAULT_MIN_SIZE = 10 * 1024 * 1024;
export const DEFAULT_TIME_BUDGET_MINUTES = 60;
export const DEFAULT_HASH_CONCURRENCY = 4;
export const MAX_HASH_CONCURRENCY = 64;

export const ScanOptionsSchema = z
  .object({
    root: z.string().trim().min(1).optional(),
    minSize: z.number().int().nonnegative().optional(),
    timeBudgetMinutes: z.number().positive().optional(),
    noExcludes: z.boolean().optional(),
    addExclude: z.array(z.string().trim().min(1)).optional(),
    includeCloud: z.boolean().optional(),
    ignoreExt: z.boolean().optional(),
    keepExt: z.boolean().optional(),
    requireSameSize: z.boolean().optional(),
    hashConcurrency: z
      .number()
      .int()
      .min(1)
      .max(MAX_HASH_CONCURRENCY)
      .optional(),
  })
  .strict();

export type ScanOptionsInput = z.input<typeof ScanOptionsSchema>;

export type ScanOptions = {
  root: string;
  minSize: number;
  timeBudgetMinutes: number;
  noExcludes: boolean;
  addExclude: string[];
  includeCloud: boolean;
  ignoreExt: boolean;
  requireSameSize: boolean;
  hashConcurrency: number;
};

// Unset or unparsable variables fall back to the built-in default.
const ScanEnvSchema = z.object({
  DUPSWEEP_ROOT: z.string().trim().min(1).optional().catch(undefined),
  DUPSWEEP_MIN_SIZE: z.coerce
    .number()
    .int()
    .nonnegative()
    .catch(DEFAULT_MIN_SIZE),
  DUPSWEEP_TIME_BUDGET_MIN: z.coerce
    .number()
    .positive()
    .catch(DEFAULT_TIME_BUDGET_MINUTES),
  DUPSWEEP_HASH_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_HASH_CONCURRENCY)
    .catch(DEFAULT_HASH_CONCURRENCY),
});

export type ScanDefaults = {
  root: string;
  minSize: number;
  timeBudgetMinutes: number;
  hashConcurrency: number;
};

export function resolveScanDefaults(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ScanDefaults {
  const parsed = ScanEnvSchema.parse({
    DUPSWEEP_ROOT: env.DUPSWEEP_ROOT,
    DUPSWEEP_MIN_SIZE: env.DUPSWEEP_MIN_SIZE,
    DUPSWEEP_TIME_BUDGET_MIN: env.DUPSWEEP_TIME_BUDGET_MIN,
    DUPSWEEP_HASH_CONCURRENCY: env.DUPSWEEP_HASH_CONCURRENCY,
  });
  return {
    // Whole volume the process runs on unless told otherwise.
    root: parsed.DUPSWEEP_ROOT ?? path.parse(path.resolve(cwd)).root,
    minSize: parsed.DUPSWEEP_MIN_SIZE,
    timeBudgetMinutes: parsed.DUPSWEEP_TIME_BUDGET_MIN,
    hashConcurrency: parsed.DUPSWEEP_HASH_CONCURRENCY,
  };
}

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validates raw options (request body or CLI flags) and fills the gaps from
 * `defaults`. Throws InvalidConfigurationError listing every problem found.
 */
export function parseScanOptions(
  input: unknown,
  defaults: ScanDefaults = resolveScanDefaults(),
): ScanOptions {
  const result = ScanOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidConfigurationError(toIssues(result.error));
  }
  const data = result.data;
  if (data.ignoreExt === true && data.keepExt === true) {
    throw new InvalidConfigurationError([
      {
        path: 'keepExt',
        message: 'ignoreExt and keepExt cannot both be set',
      },
    ]);
  }
  return {
    root: path.resolve(data.root ?? defaults.root),
    minSize: data.minSize ?? defaults.minSize,
    timeBudgetMinutes: data.timeBudgetMinutes ?? defaults.timeBudgetMinutes,
    noExcludes: data.noExcludes ?? false,
    addExclude: data.addExclude ?? [],
    includeCloud: data.includeCloud ?? false,
    ignoreExt: data.keepExt !== true && data.ignoreExt !== false,
    requireSameSize: data.requireSameSize ?? false,
    hashConcurrency: data.hashConcurrency ?? defaults.hashConcurrency,
  };
}

export async function assertScanRoot(root: string): Promise<void> {
  let isDirectory = false;
  try {
    const stats = await fs.stat(root);
    isDirectory = stats.isDirectory();
    if (isDirectory) await fs.access(root, fs.constants.R_OK);
  } catch (error) {
    const code =
      error instanceof Error && 'code' in error ? String(error.code) : '';
    throw new InvalidConfigurationError([
      {
        path: 'root',
        message: code
          ? `${root} is not readable (${code})`
          : `${root} is not readable`,
      },
    ]);
  }
  if (!isDirectory) {
    throw new InvalidConfigurationError([
      { path: 'root', message: `${root} is not a directory` },
    ]);
  }
}

const BYTE_UNITS: Record<string, number> = {
  '': 1,
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3,
  t: 1024 ** 4,
};

/** Parses `1048576`, `512K`, `50MB` or `1.5GiB` into a byte count. */
export function parseByteSize(value: string): number | null {
  const match = /^(\d+(?:\.\d+)?)\s*([kmgt]?)(?:i?b)?$/iu.exec(value.trim());
  if (!match) return null;
  const factor = BYTE_UNITS[match[2].toLowerCase()];
  if (factor === undefined) return null;
  return Math.floor(Number(match[1]) * factor);
}
