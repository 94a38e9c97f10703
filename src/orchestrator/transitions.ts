import type { Phase, ResultTag } from './states';

export type Trigger = 'START' | 'PLAN_OK' | 'PLAN_FAILED' | 'PLAN_MISSING' | 'IMPLEMENT_OK' | 'IMPLEMENT_FAILED' | 'NO_TEST_CMD' | 'TESTS_PASSED' | 'TESTS_FAILED' | 'REPAIR_OK' | 'REPAIR_FAILED';

export interface TransitionTarget {
  to: Phase;
  /** Outcome tag recorded on the run state; absent keeps the previous one */
  result?: ResultTag;
}

/** Phase-keyed transition table. DONE has no outgoing edges. */
export const transitions: Record<Phase, Partial<Record<Trigger, TransitionTarget>>> = {
  INGEST: {
    START: { to: 'PLAN' },
  },
  PLAN: {
    PLAN_FAILED: { to: 'REPAIR', result: 'plan_failed' },
    PLAN_MISSING: { to: 'REPAIR', result: 'plan_missing' },
    PLAN_OK: { to: 'IMPLEMENT', result: 'plan_ok' },
  },
  IMPLEMENT: {
    IMPLEMENT_FAILED: { to: 'REPAIR', result: 'implement_failed' },
    IMPLEMENT_OK: { to: 'VERIFY', result: 'implement_ok' },
  },
  VERIFY: {
    NO_TEST_CMD: { to: 'DONE', result: 'no_test_cmd' },
    TESTS_PASSED: { to: 'DONE', result: 'tests_passed' },
    TESTS_FAILED: { to: 'REPAIR', result: 'tests_failed' },
  },
  REPAIR: {
    REPAIR_FAILED: { to: 'REPAIR', result: 'repair_failed' },
    REPAIR_OK: { to: 'VERIFY', result: 'repair_ok' },
  },
  DONE: {},
};
