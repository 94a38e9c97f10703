import fs from 'fs/promises';
import path from 'path';
import { ActionExecutor } from '../agents/action-executor';
import { goalMentionsPrint } from '../agents/action-guards';
import { ContextBuilder } from '../agents/context-builder';
import { ErrorAnalyzer } from '../agents/error-analyzer';
import { ModelTurn } from '../agents/model-turn';
import type { MemoryStore } from '../memory/store';
import type { ModelGateway } from '../models/types';
import { isWithin, toWorkspaceRelative } from '../sandbox/paths';
import { ActionSandbox } from '../sandbox/sandbox';
import type { SandboxOptions } from '../sandbox/types';
import { JsonlLog } from '../utils/jsonl-log';
import { silentLogger, type Logger } from '../utils/logger';
import { errorCode, errorMessage } from '../utils/errors';
import { AgentCoordinator, type PhaseRuntime } from './agent-coordinator';
import { TaskNotFoundError } from './errors';
import type { PhaseChangeEvent } from './events';
import { createPhaseCoordinator } from './register-handlers';
import { StateMachine } from './state-machine';
import { StateStore } from './state-store';
import { resolveIterationLimit, statusFor, type RunResult, type Task } from './states';
import { loadTaskFile, parseTaskDefinition, serializeTask } from './task-loader';

// ── Options ─────────────────────────────────────────────────────────────

export interface TaskRunnerOptions {
  gateway: ModelGateway;
  model: string;
  memory: MemoryStore;
  /** Directory holding one run directory per task id */
  workspacesRoot: string;
  sandbox?: SandboxOptions;
  logger?: Logger;
  /** Listener for every persisted phase change */
  onPhaseChange?: (event: PhaseChangeEvent) => void;
  /** Pre-built coordinator; primarily for testing */
  coordinator?: AgentCoordinator;
  /** Clock used for lesson dates (default: `new Date()`) */
  now?: () => Date;
}

export function formatLocalDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

async function writeIfMissing(target: string, content: string): Promise<void> {
  try {
    await fs.writeFile(target, content, { encoding: 'utf8', flag: 'wx' });
  } catch (error) {
    if (errorCode(error) !== 'EEXIST') throw error;
  }
}

// ── Runner ──────────────────────────────────────────────────────────────

/**
 * TaskRunner drives one task from INGEST to DONE.
 *
 * Every run owns an artifacts directory (task.json, state.json, plan.md,
 * llm.log, actions.log, notes.md). Batch runs use that directory as the
 * workspace too; interactive runs point the workspace at the project root.
 * Run directories are created and reused, never removed.
 */
export class TaskRunner {
  private coordinator: AgentCoordinator;
  private logger: Logger;
  private now: () => Date;

  constructor(private options: TaskRunnerOptions) {
    this.coordinator = options.coordinator ?? createPhaseCoordinator();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  runDir(taskId: string): string {
    return path.join(this.options.workspacesRoot, taskId);
  }

  /** Load a task file and run it in `<workspacesRoot>/<id>` */
  async runTask(taskPath: string): Promise<RunResult> {
    const task = await loadTaskFile(taskPath);
    const runDir = this.runDir(task.id);
    return this.runTaskWithRoots(task, runDir, runDir);
  }

  /** Run `task` from a fresh state with explicit workspace and artifacts roots */
  async runTaskWithRoots(task: Task, workspaceRoot: string, artifactsRoot: string): Promise<RunResult> {
    await this.prepareArtifacts(task, artifactsRoot);
    const machine = new StateMachine(new StateStore(path.join(artifactsRoot, 'state.json')), task.id);
    this.logger.info('Starting task', { taskId: task.id, workspace: workspaceRoot });
    return this.runLoop(task, workspaceRoot, artifactsRoot, machine);
  }

  /**
   * Continue a run from its persisted state.json.
   *
   * @throws {TaskNotFoundError} when the run directory has no task.json
   */
  async resumeTask(taskId: string): Promise<RunResult> {
    const runDir = this.runDir(taskId);
    const taskPath = path.join(runDir, 'task.json');

    let raw: string;
    try {
      raw = await fs.readFile(taskPath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') throw new TaskNotFoundError(taskId, taskPath);
      throw error;
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new TaskNotFoundError(taskId, `${taskPath} (${errorMessage(error)})`);
    }
    const task = parseTaskDefinition(data, taskPath);

    const machine = new StateMachine(new StateStore(path.join(runDir, 'state.json')), task.id);
    await machine.initialize();
    this.logger.info('Resuming task', { taskId, phase: machine.getUnrecognizedPhase() ?? machine.getPhase(), iteration: machine.getState().iteration });
    return this.runLoop(task, runDir, runDir, machine);
  }

  // ── Execution Loop ──────────────────────────────────────────────────

  private async prepareArtifacts(task: Task, artifactsRoot: string): Promise<void> {
    await fs.mkdir(artifactsRoot, { recursive: true });
    await fs.writeFile(path.join(artifactsRoot, 'task.json'), serializeTask(task), 'utf8');
    await writeIfMissing(path.join(artifactsRoot, 'notes.md'), '');
  }

  private async buildRuntime(task: Task, workspaceRoot: string, artifactsRoot: string): Promise<PhaseRuntime> {
    const sandbox = new ActionSandbox(workspaceRoot, this.options.sandbox);
    const actionsLog = new JsonlLog(path.join(artifactsRoot, 'actions.log'));
    const llmLog = new JsonlLog(path.join(artifactsRoot, 'llm.log'));
    const planPath = path.resolve(artifactsRoot, 'plan.md');
    const absoluteWorkspace = path.resolve(workspaceRoot);

    const memories = await this.options.memory.retrieve(ContextBuilder.memoryQuery(task));
    if (memories.length > 0) {
      this.logger.debug('Retrieved memories', { count: memories.length });
    }

    return {
      task,
      sandbox,
      turn: new ModelTurn({ gateway: this.options.gateway, model: this.options.model, llmLog, logger: this.logger }),
      executor: new ActionExecutor({ sandbox, actionsLog, guard: { goalPrints: goalMentionsPrint(task.goal) }, logger: this.logger }),
      analyzer: new ErrorAnalyzer(),
      actionsLog,
      baseMessages: ContextBuilder.baseMessages(task, absoluteWorkspace, memories),
      lastFeedback: '',
      planPath,
      planDisplayPath: isWithin(absoluteWorkspace, planPath) ? toWorkspaceRelative(absoluteWorkspace, planPath) : planPath,
    };
  }

  private async runLoop(task: Task, workspaceRoot: string, artifactsRoot: string, machine: StateMachine): Promise<RunResult> {
    const startTime = Date.now();
    const iterationLimit = resolveIterationLimit(task.constraints);
    const runtime = await this.buildRuntime(task, workspaceRoot, artifactsRoot);

    machine.events.removeAllListeners('phaseChange');
    machine.events.onTransition((event) => {
      this.logger.debug('Phase transition', { from: event.from, to: event.to, trigger: event.trigger, iteration: event.iteration });
      this.options.onPhaseChange?.(event);
    });

    for (;;) {
      if (machine.getState().iteration >= iterationLimit) {
        this.logger.warn(`Iteration limit reached (${iterationLimit})`);
        await machine.forceDone('ITERATION_LIMIT');
        await this.writeLesson(task, workspaceRoot, machine);
        break;
      }

      const unrecognized = machine.getUnrecognizedPhase();
      if (unrecognized !== null) {
        this.logger.error(`Unknown phase in persisted state: ${unrecognized}`);
        await machine.forceDone('UNKNOWN_PHASE');
        break;
      }

      const phase = machine.getPhase();
      if (phase === 'INGEST') {
        await machine.transition('START');
        continue;
      }
      if (phase === 'DONE') {
        await this.writeLesson(task, workspaceRoot, machine);
        await machine.persist();
        break;
      }

      this.logger.info(`Executing: ${phase}`, { iteration: machine.getState().iteration });
      const phaseStart = Date.now();
      try {
        const outcome = await this.coordinator.execute(phase, runtime);
        machine.recordFilesTouched(outcome.touched);
        if (outcome.feedback !== undefined) {
          runtime.lastFeedback = outcome.feedback;
        }
        this.logger.info(`Completed: ${phase} (${Date.now() - phaseStart}ms)`, { trigger: outcome.trigger });
        await machine.transition(outcome.trigger);
      } catch (error) {
        this.logger.error(`Failed: ${phase} (${Date.now() - phaseStart}ms)`, { error: errorMessage(error) });
        throw error;
      }
    }

    return this.buildResult(machine, startTime);
  }

  private async writeLesson(task: Task, workspaceRoot: string, machine: StateMachine): Promise<void> {
    const state = machine.getState();
    const lesson = `Task ${task.id} completed with result ${state.lastResult ?? 'none'}.\n` + `Files touched: ${state.filesTouched.join(', ')}\n` + `Workspace: ${path.resolve(workspaceRoot)}\n`;
    const notePath = await this.options.memory.writeLesson(task.id, lesson, {
      type: 'lesson',
      tags: ['kiln', 'task'],
      confidence: 0.5,
      created: formatLocalDate(this.now()),
    });
    this.logger.debug('Lesson written', { path: notePath });
  }

  private buildResult(machine: StateMachine, startTime: number): RunResult {
    const state = machine.getState();
    const result: RunResult = {
      taskId: machine.getTaskId(),
      phase: state.phase,
      lastResult: state.lastResult,
      iteration: state.iteration,
      filesTouched: state.filesTouched,
      durationMs: Date.now() - startTime,
      status: statusFor(state.lastResult),
    };
    this.logger.info('Run result', { status: result.status, lastResult: result.lastResult, iteration: result.iteration, durationMs: result.durationMs });
    return result;
  }
}
