import type { ActionSandbox } from '../sandbox/sandbox';
import type { ActionExecutor } from '../agents/action-executor';
import type { ErrorAnalyzer } from '../agents/error-analyzer';
import type { ModelTurn } from '../agents/model-turn';
import type { ChatMessage } from '../models/types';
import type { JsonlLog } from '../utils/jsonl-log';
import type { Task, WorkPhase } from './states';
import type { Trigger } from './transitions';

/** Everything a phase body may touch during one run */
export interface PhaseRuntime {
  task: Task;
  sandbox: ActionSandbox;
  turn: ModelTurn;
  executor: ActionExecutor;
  analyzer: ErrorAnalyzer;
  actionsLog: JsonlLog;
  /** System prompt, task context and memories; reused by every turn */
  baseMessages: ChatMessage[];
  lastFeedback: string;
  /** Absolute location the PLAN phase must produce */
  planPath: string;
  /** `planPath` as the model should name it (workspace-relative when possible) */
  planDisplayPath: string;
}

export interface PhaseOutcome {
  trigger: Trigger;
  /** Feedback for the next turn; undefined keeps the previous feedback */
  feedback?: string;
  touched: string[];
}

/**
 * A handler runs the body of one work phase and reports which trigger the
 * state machine should fire next.
 */
export type PhaseHandler = (runtime: Readonly<PhaseRuntime>) => Promise<PhaseOutcome>;

/**
 * AgentCoordinator maps each work phase to its handler. Handlers are
 * registered from outside, the real ones by `createPhaseCoordinator` and
 * scripted ones in tests.
 */
export class AgentCoordinator {
  private handlers = new Map<WorkPhase, PhaseHandler>();

  registerHandler(phase: WorkPhase, handler: PhaseHandler): void {
    this.handlers.set(phase, handler);
  }

  hasHandler(phase: WorkPhase): boolean {
    return this.handlers.has(phase);
  }

  /** @throws Error if no handler is registered for the phase */
  async execute(phase: WorkPhase, runtime: PhaseRuntime): Promise<PhaseOutcome> {
    const handler = this.handlers.get(phase);
    if (!handler) {
      throw new Error(`No handler registered for phase: ${phase}`);
    }
    return handler(runtime);
  }

  getRegisteredPhases(): WorkPhase[] {
    return [...this.handlers.keys()];
  }
}
