export type ConfigIssue = { path: string; message: string };

function formatIssue(issue: ConfigIssue) {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

export class InvalidConfigurationError extends Error {
  readonly code = 'INVALID_CONFIGURATION';
  readonly issues: ConfigIssue[];
  constructor(issues: ConfigIssue[]) {
    super(`INVALID_CONFIGURATION: ${issues.map(formatIssue).join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

export class ScanBusyError extends Error {
  readonly code = 'BUSY';
  readonly activeRunId: string | null;
  constructor(activeRunId: string | null) {
    super('BUSY');
    this.name = 'ScanBusyError';
    this.activeRunId = activeRunId;
  }
}

export class ScanNotFoundError extends Error {
  readonly code = 'NOT_FOUND';
  constructor(runId: string) {
    super(`NOT_FOUND: ${runId}`);
    this.name = 'ScanNotFoundError';
  }
}

export class NoPendingDecisionError extends Error {
  readonly code = 'NO_PENDING_DECISION';
  constructor(runId: string) {
    super(`NO_PENDING_DECISION: ${runId}`);
    this.name = 'NoPendingDecisionError';
  }
}

function errorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isPermissionDenied(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'EACCES' || code === 'EPERM';
}

// File vanished, locked or otherwise unreadable for this pass only.
export function isTransientIoError(error: unknown): boolean {
  const code = errorCode(error);
  return (
    code === 'ENOENT' ||
    code === 'EBUSY' ||
    code === 'ETXTBSY' ||
    code === 'EIO' ||
    code === 'EAGAIN' ||
    code === 'ESTALE' ||
    code === 'ENOTDIR' ||
    code === 'ELOOP'
  );
}

export type IoFailureReason = 'permission' | 'transient' | 'io';

export function ioFailureReason(error: unknown): IoFailureReason {
  if (isPermissionDenied(error)) return 'permission';
  if (isTransientIoError(error)) return 'transient';
  return 'io';
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === 'AbortError' || errorCode(error) === 'ABORT_ERR';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = errorCode(error);
    return code ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}
