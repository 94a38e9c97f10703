export type Phase = 'INGEST' | 'PLAN' | 'IMPLEMENT' | 'VERIFY' | 'REPAIR' | 'DONE';

export const PHASES: readonly Phase[] = ['INGEST', 'PLAN', 'IMPLEMENT', 'VERIFY', 'REPAIR', 'DONE'];

/** Phases whose body runs a model turn or the verification command */
export type WorkPhase = Exclude<Phase, 'INGEST' | 'DONE'>;

export type ResultTag = 'plan_ok' | 'plan_failed' | 'plan_missing' | 'implement_ok' | 'implement_failed' | 'tests_passed' | 'tests_failed' | 'no_test_cmd' | 'repair_ok' | 'repair_failed' | 'iteration_limit' | 'unknown_phase';

export interface TaskConstraints {
  test_cmd?: string;
  iteration_limit?: number;
  /** Older task files use this name for the iteration limit */
  time_budget_iters?: number;
  [key: string]: unknown;
}

export interface Task {
  id: string;
  title: string;
  goal: string;
  constraints: TaskConstraints;
  context: Record<string, unknown>;
}

export interface RunState {
  phase: Phase;
  iteration: number;
  lastResult: ResultTag | null;
  openItems: string[];
  /** Workspace-relative paths, first write first */
  filesTouched: string[];
}

export type RunStatus = 'passed' | 'exhausted' | 'failed';

export interface RunResult {
  taskId: string;
  phase: Phase;
  lastResult: ResultTag | null;
  iteration: number;
  filesTouched: string[];
  durationMs: number;
  status: RunStatus;
}

export const DEFAULT_ITERATION_LIMIT = 8;

export function initialRunState(): RunState {
  return { phase: 'INGEST', iteration: 0, lastResult: null, openItems: [], filesTouched: [] };
}

export function isPhase(value: unknown): value is Phase {
  return typeof value === 'string' && (PHASES as readonly string[]).includes(value);
}

/** `iteration_limit`, then `time_budget_iters`, then the default; zero counts */
export function resolveIterationLimit(constraints: TaskConstraints): number {
  return constraints.iteration_limit ?? constraints.time_budget_iters ?? DEFAULT_ITERATION_LIMIT;
}

export function statusFor(result: ResultTag | null): RunStatus {
  if (result === 'tests_passed' || result === 'no_test_cmd') return 'passed';
  if (result === 'iteration_limit') return 'exhausted';
  return 'failed';
}

const RESULT_TAGS: readonly ResultTag[] = ['plan_ok', 'plan_failed', 'plan_missing', 'implement_ok', 'implement_failed', 'tests_passed', 'tests_failed', 'no_test_cmd', 'repair_ok', 'repair_failed', 'iteration_limit', 'unknown_phase'];

export function isResultTag(value: unknown): value is ResultTag {
  return typeof value === 'string' && (RESULT_TAGS as readonly string[]).includes(value);
}
