export type ScanMode = 'size' | 'name';

export type ScanPhase =
  | 'scanning'
  | 'hashing'
  | 'grouping'
  | 'done'
  | 'cancelled'
  | 'error';

export type ScanState = 'queued' | 'needs_decision' | ScanPhase;

export type ScanProgressDto = {
  phase: ScanPhase;
  filesVisited: number;
  filesSkipped: number;
  filesMatched: number;
  bytesVisited: number;
  directoriesPending: number;
  hashTotal: number;
  hashDone: number;
  bytesToHash: number;
  bytesHashed: number;
  elapsedMs: number;
  minSize: number;
};

export type BudgetSuggestion = {
  suggestedMinSize: number;
  etaSeconds: number;
  remainingSeconds: number;
};

export type BudgetDecision =
  | { action: 'continue' }
  | { action: 'raise'; minSize: number };

export type ScanStatusDto = {
  runId: string;
  mode: ScanMode;
  state: ScanState;
  root: string;
  progress: ScanProgressDto;
  etaSeconds: number | null;
  budget: {
    requestedMinutes: number;
    minSize: number;
    raiseRequests: number;
  };
  suggestion: BudgetSuggestion | null;
  message?: string;
  lastError: string | null;
};

export type DuplicateMemberDto = {
  path: string;
  size: number;
  mtimeMs: number;
  isCloudPlaceholder: boolean;
};

export type DuplicateGroupDto =
  | {
      kind: 'digest';
      key: string;
      size: number;
      digest: string;
      wastedBytes: number;
      members: DuplicateMemberDto[];
    }
  | {
      kind: 'name';
      key: string;
      nameKey: string;
      wastedBytes: number;
      members: DuplicateMemberDto[];
    };

export type ScanSummaryDto = {
  groups: number;
  files: number;
  wastedBytes: number;
};

export type ScanResultsDto = {
  runId: string;
  state: ScanState;
  groups: DuplicateGroupDto[];
  summary: ScanSummaryDto;
};

export function isBudgetDecision(value: unknown): value is BudgetDecision {
  if (!value || typeof value !== 'object' || !('action' in value)) {
    return false;
  }
  if (value.action === 'continue') return true;
  if (value.action !== 'raise' || !('minSize' in value)) return false;
  const { minSize } = value;
  return typeof minSize === 'number' && Number.isInteger(minSize) && minSize >= 0;
}
