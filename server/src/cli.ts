#!/usr/bin/env -S node --import=tsx
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { stderr, stdin, stdout } from 'node:process';
import readline from 'node:readline/promises';
import { fileURLToPath } from 'node:url';
import type {
  BudgetDecision,
  BudgetSuggestion,
  ScanMode,
  ScanStatusDto,
} from '@dupsweep/common';
import { Command, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import {
  assertScanRoot,
  parseByteSize,
  parseScanOptions,
  type ScanDefaults,
  type ScanOptions,
} from './config/scanConfig.js';
import { baseLogger } from './logger.js';
import { InvalidConfigurationError, describeError } from './scan/errors.js';
import {
  formatBytes,
  formatEta,
  renderProgress,
  renderReport,
} from './scan/report.js';
import {
  cancelScan,
  decide,
  getResults,
  getStatus,
  startScan,
  subscribeScan,
  waitForScan,
  type ScanDeps,
} from './scan/scanJob.js';
import { readPackageVersion } from './version.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export type BudgetPolicy = 'ask' | 'continue' | 'raise';

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
  // Absent when there is no terminal to prompt on.
  ask?: (question: string) => Promise<string>;
  progressIntervalMs?: number;
  signal?: AbortSignal;
};

const CliOptionsSchema = z.object({
  root: z.string().optional(),
  minSize: z.number().int().nonnegative().optional(),
  timeBudgetMin: z.number().positive().optional(),
  excludes: z.boolean().default(true),
  addExclude: z.array(z.string()).default([]),
  includeCloud: z.boolean().default(false),
  ignoreExt: z.boolean().optional(),
  keepExt: z.boolean().optional(),
  sameSize: z.boolean().default(false),
  hashConcurrency: z.number().int().optional(),
  onBudget: z.enum(['ask', 'continue', 'raise']).default('ask'),
  json: z.boolean().default(false),
});

export type CliOptions = z.input<typeof CliOptionsSchema>;

function parseSizeOption(value: string): number {
  const parsed = parseByteSize(value);
  if (parsed === null) {
    throw new InvalidArgumentError('expected a size such as 1048576 or 50MB');
  }
  return parsed;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('expected a positive number');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('expected an integer');
  }
  return parsed;
}

const NO_PATHS: string[] = [];

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Asks until the answer is usable. Returns null when the user chooses to
 * stop the scan.
 */
export async function promptDecision(
  ask: (question: string) => Promise<string>,
  suggestion: BudgetSuggestion,
  currentMinSize: number,
  err: (text: string) => void,
): Promise<BudgetDecision | null> {
  const question = `[c]ontinue, [r]aise minimum to ${formatBytes(
    suggestion.suggestedMinSize,
  )}, type a new minimum (e.g. 200MB), or [q]uit: `;
  for (;;) {
    const answer = (await ask(question)).trim().toLowerCase();
    if (answer === '' || answer === 'c' || answer === 'continue') {
      return { action: 'continue' };
    }
    if (answer === 'r' || answer === 'raise') {
      return { action: 'raise', minSize: suggestion.suggestedMinSize };
    }
    if (answer === 'q' || answer === 'quit') return null;
    const minSize = parseByteSize(answer);
    if (minSize === null) {
      err(`Could not read "${answer}" as a size.\n`);
    } else if (minSize < currentMinSize) {
      err(`The minimum can only go up from ${formatBytes(currentMinSize)}.\n`);
    } else {
      return { action: 'raise', minSize };
    }
  }
}

async function resolveBudget(
  status: ScanStatusDto,
  policy: BudgetPolicy,
  io: CliIo,
) {
  const { suggestion } = status;
  if (!suggestion) return;
  io.err(
    `Time budget: about ${formatEta(suggestion.etaSeconds)} of work left, ` +
      `${formatEta(suggestion.remainingSeconds)} of budget remaining.\n`,
  );
  let decision: BudgetDecision | null;
  if (policy === 'raise') {
    decision = { action: 'raise', minSize: suggestion.suggestedMinSize };
  } else if (policy === 'ask' && io.ask) {
    decision = await promptDecision(
      io.ask,
      suggestion,
      status.budget.minSize,
      io.err,
    );
  } else {
    decision = { action: 'continue' };
  }
  if (decision === null) {
    cancelScan(status.runId);
    return;
  }
  if (decision.action === 'raise') {
    io.err(`Raising the minimum size to ${formatBytes(decision.minSize)}.\n`);
  }
  decide(status.runId, decision);
}

function toScanOptions(
  options: z.output<typeof CliOptionsSchema>,
  defaults?: ScanDefaults,
): ScanOptions {
  return parseScanOptions(
    {
      root: options.root,
      minSize: options.minSize,
      timeBudgetMinutes: options.timeBudgetMin,
      noExcludes: !options.excludes,
      addExclude: options.addExclude,
      includeCloud: options.includeCloud,
      ignoreExt: options.ignoreExt,
      keepExt: options.keepExt,
      requireSameSize: options.sameSize,
      hashConcurrency: options.hashConcurrency,
    },
    defaults,
  );
}

/** Runs one scan in process and prints its report. Resolves to the exit code. */
export async function runScanCommand(
  mode: ScanMode,
  rawOptions: unknown,
  io: CliIo,
  { deps = {}, defaults }: { deps?: ScanDeps; defaults?: ScanDefaults } = {},
): Promise<number> {
  let cliOptions: z.output<typeof CliOptionsSchema>;
  let options: ScanOptions;
  try {
    const parsed = CliOptionsSchema.safeParse(rawOptions);
    if (!parsed.success) {
      throw new InvalidConfigurationError(
        parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      );
    }
    cliOptions = parsed.data;
    options = toScanOptions(cliOptions, defaults);
    await assertScanRoot(options.root);
  } catch (err) {
    if (err instanceof InvalidConfigurationError) {
      io.err(`${err.message}\n`);
      return EXIT_FAILURE;
    }
    throw err;
  }

  const runId = startScan({ mode, options }, deps);
  const policy = cliOptions.onBudget;
  const unsubscribe = subscribeScan((status) => {
    if (status.runId !== runId || status.state !== 'needs_decision') return;
    resolveBudget(status, policy, io).catch((err: unknown) => {
      io.err(`Could not apply the budget decision: ${describeError(err)}\n`);
      cancelScan(runId);
    });
  });
  const onAbort = () => {
    cancelScan(runId);
  };
  io.signal?.addEventListener('abort', onAbort, { once: true });
  const interval = io.progressIntervalMs ?? 0;
  const ticker =
    interval > 0 && !cliOptions.json
      ? setInterval(() => {
          const status = getStatus(runId);
          if (status && status.state !== 'needs_decision') {
            io.err(`${renderProgress(status)}\n`);
          }
        }, interval)
      : undefined;

  let final: ScanStatusDto;
  try {
    final = await waitForScan(runId);
  } finally {
    if (ticker) clearInterval(ticker);
    unsubscribe();
    io.signal?.removeEventListener('abort', onAbort);
  }

  if (final.state === 'error') {
    io.err(`Scan failed: ${final.lastError ?? 'unknown error'}\n`);
    return EXIT_FAILURE;
  }
  const results = getResults(runId);
  if (results) {
    io.out(
      cliOptions.json
        ? `${JSON.stringify(results, null, 2)}\n`
        : renderReport(results),
    );
  }
  if (final.state === 'cancelled') {
    io.err('Scan cancelled; only fully verified groups are listed.\n');
    return EXIT_CANCELLED;
  }
  return EXIT_OK;
}

function addScanOptions(command: Command): Command {
  return command
    .option('--root <path>', 'directory to scan (default: volume root)')
    .option(
      '--min-size <size>',
      'ignore files smaller than this (bytes, or 50MB style)',
      parseSizeOption,
    )
    .option(
      '--time-budget-min <minutes>',
      'time budget for the whole scan',
      parsePositiveNumber,
    )
    .option('--no-excludes', 'do not skip system and sync-client folders')
    .option(
      '--add-exclude <path>',
      'extra directory to skip (repeatable)',
      collect,
      NO_PATHS,
    )
    .option('--include-cloud', 'include cloud placeholder files', false)
    .option(
      '--hash-concurrency <n>',
      'files hashed in parallel',
      parseInteger,
    )
    .addOption(
      new Option(
        '--on-budget <policy>',
        'what to do when the time budget would be exceeded',
      )
        .choices(['ask', 'continue', 'raise'])
        .default('ask'),
    )
    .option('--json', 'print results as JSON', false);
}

export function buildProgram(
  io: CliIo,
  options: { deps?: ScanDeps; defaults?: ScanDefaults } = {},
): Command {
  const program = new Command()
    .name('dupsweep')
    .description('Find duplicate files by content or by name')
    .version(readPackageVersion());

  addScanOptions(
    program
      .command('size')
      .description('group files with identical size and SHA-256 digest'),
  ).action(async (_opts: unknown, command: Command) => {
    process.exitCode = await runScanCommand(
      'size',
      command.opts(),
      io,
      options,
    );
  });

  addScanOptions(
    program
      .command('names')
      .description('group files whose normalized names match'),
  )
    .addOption(
      new Option('--ignore-ext', 'ignore file extensions (default)').conflicts(
        'keepExt',
      ),
    )
    .option('--keep-ext', 'treat report.pdf and report.docx as different')
    .option('--same-size', 'only group names whose files share a size', false)
    .action(async (_opts: unknown, command: Command) => {
      process.exitCode = await runScanCommand(
        'name',
        command.opts(),
        io,
        options,
      );
    });

  program
    .command('serve')
    .description('start the HTTP API')
    .action(async () => {
      await import('./index.js');
    });

  return program;
}

export async function main(argv: string[] = process.argv) {
  const rl = stdin.isTTY
    ? readline.createInterface({ input: stdin, output: stderr })
    : null;
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.on('SIGINT', onSigint);
  rl?.on('SIGINT', onSigint);
  const io: CliIo = {
    out: (text) => {
      stdout.write(text);
    },
    err: (text) => {
      stderr.write(text);
    },
    ask: rl ? (question) => rl.question(question) : undefined,
    progressIntervalMs: stderr.isTTY ? 2000 : 0,
    signal: controller.signal,
  };
  try {
    await buildProgram(io).parseAsync(argv);
  } finally {
    rl?.close();
    process.off('SIGINT', onSigint);
  }
}

function isEntrypoint() {
  const invoked = process.argv[1];
  if (!invoked) return false;
  try {
    return (
      fs.realpathSync(path.resolve(invoked)) ===
      fs.realpathSync(fileURLToPath(import.meta.url))
    );
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  main().catch((err: unknown) => {
    baseLogger.error({ err }, 'cli failed');
    stderr.write(`${describeError(err)}\n`);
    process.exitCode = EXIT_FAILURE;
  });
}
