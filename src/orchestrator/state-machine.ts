import { initialRunState, isPhase, isResultTag, type Phase, type RunState } from './states';
import { type Trigger, transitions } from './transitions';
import { StateMachineEvents, type PhaseTrigger } from './events';
import type { StateStore } from './state-store';

export class InvalidTransitionError extends Error {
  constructor(
    public phase: Phase,
    public trigger: Trigger,
  ) {
    super(`Invalid transition: Trigger [${trigger}] is not valid from phase [${phase}]`);
    this.name = 'InvalidTransitionError';
  }
}

const WORK_PHASES: readonly Phase[] = ['PLAN', 'IMPLEMENT', 'VERIFY', 'REPAIR'];

/**
 * Table-driven phase machine for one task run. Every transition is
 * persisted before listeners hear about it, so a crash after an event
 * never loses the state that event describes.
 */
export class StateMachine {
  private state: RunState = initialRunState();
  /** Phase name read from disk that is not part of the machine */
  private unrecognized: string | null = null;

  public events = new StateMachineEvents();

  constructor(
    private store: StateStore,
    private taskId: string,
  ) {}

  /**
   * Load persisted state if present. Only an absent phase means INGEST;
   * any other value that is not a phase name is kept as unrecognized.
   */
  async initialize(): Promise<void> {
    const loaded = await this.store.load();
    if (!loaded) return;

    const phase = loaded.phase === undefined ? 'INGEST' : String(loaded.phase);
    this.unrecognized = isPhase(phase) ? null : phase;
    this.state = {
      phase: isPhase(phase) ? phase : 'INGEST',
      iteration: loaded.iteration,
      lastResult: isResultTag(loaded.lastResult) ? loaded.lastResult : null,
      openItems: loaded.openItems,
      filesTouched: loaded.filesTouched,
    };
  }

  getState(): Readonly<RunState> {
    return { ...this.state, openItems: [...this.state.openItems], filesTouched: [...this.state.filesTouched] };
  }

  getPhase(): Phase {
    return this.state.phase;
  }

  getTaskId(): string {
    return this.taskId;
  }

  /** The raw phase name when the persisted one was not recognised */
  getUnrecognizedPhase(): string | null {
    return this.unrecognized;
  }

  /** Append newly written paths, keeping first-seen order */
  recordFilesTouched(paths: Iterable<string>): void {
    for (const p of paths) {
      if (!this.state.filesTouched.includes(p)) this.state.filesTouched.push(p);
    }
  }

  async transition(trigger: Trigger): Promise<void> {
    const from = this.state.phase;
    const target = transitions[from][trigger];
    if (!target) {
      throw new InvalidTransitionError(from, trigger);
    }

    if (WORK_PHASES.includes(from)) {
      this.state.iteration += 1;
    }
    this.state.phase = target.to;
    if (target.result) {
      this.state.lastResult = target.result;
    }
    await this.commit(from, trigger);
  }

  /** Jump straight to DONE outside the table (iteration cutoff, unknown phase) */
  async forceDone(reason: 'ITERATION_LIMIT' | 'UNKNOWN_PHASE'): Promise<void> {
    const from = this.unrecognized ?? this.state.phase;
    this.unrecognized = null;
    this.state.phase = 'DONE';
    this.state.lastResult = reason === 'ITERATION_LIMIT' ? 'iteration_limit' : 'unknown_phase';
    await this.commit(from, reason);
  }

  async persist(): Promise<void> {
    await this.store.save(this.getState());
  }

  private async commit(from: string, trigger: PhaseTrigger): Promise<void> {
    await this.persist();
    this.events.emitTransition({
      from,
      to: this.state.phase,
      trigger,
      taskId: this.taskId,
      iteration: this.state.iteration,
      result: this.state.lastResult,
      timestamp: new Date().toISOString(),
    });
  }
}
