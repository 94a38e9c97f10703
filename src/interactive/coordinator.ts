import path from 'node:path';
import type { RunResult, Task } from '../orchestrator/states';
import { silentLogger, type Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { Mutex } from './lock';

/** The part of TaskRunner the coordinator drives */
export interface GoalRunner {
  runTaskWithRoots(task: Task, workspaceRoot: string, artifactsRoot: string): Promise<RunResult>;
}

export interface ChangeSource {
  poll(): Promise<string[]>;
}

export interface InteractiveCoordinatorOptions {
  projectRoot: string;
  /** Parent of the per-run artifacts directories */
  artifactsBase: string;
  runner: GoalRunner;
  watcher: ChangeSource;
  testCmd: string;
  iterationLimit: number;
  watch: boolean;
  pollIntervalMs?: number;
  /** Minimum time after a run completes before the watcher may trigger again */
  quietIntervalMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export type TickOutcome = 'disabled' | 'busy' | 'quiet' | 'no_changes' | 'dropped' | 'ran' | 'failed';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function autoGoal(changes: string[]): string {
  return `User edited files detected: ${changes.join('; ')}. Review these changes and improve or fix issues. Focus only on the changed files unless necessary.`;
}

/**
 * Owns the mutable state of an interactive session: one single-flight run
 * lock shared by user goals and watcher triggers, and a state lock around
 * the last completion time. A watcher trigger that finds a run in flight is
 * dropped, never queued.
 */
export class InteractiveCoordinator {
  private runLock = new Mutex();
  private stateLock = new Mutex();
  private lastRunCompletedAt = 0;
  private sequence = 0;
  private watching: boolean;
  private ticking = false;
  private timer?: NodeJS.Timeout;
  private logger: Logger;
  private now: () => Date;
  private pollIntervalMs: number;
  private quietIntervalMs: number;

  constructor(private options: InteractiveCoordinatorOptions) {
    this.watching = options.watch;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.quietIntervalMs = options.quietIntervalMs ?? 2000;
  }

  isWatching(): boolean {
    return this.watching;
  }

  setWatching(enabled: boolean): void {
    this.watching = enabled;
  }

  isRunning(): boolean {
    return this.runLock.isLocked();
  }

  nextTaskId(): string {
    const d = this.now();
    this.sequence += 1;
    const stamp = `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
    return `live_${stamp}_${this.sequence}`;
  }

  buildTask(goal: string): Task {
    return {
      id: this.nextTaskId(),
      title: 'Interactive task',
      goal,
      constraints: { test_cmd: this.options.testCmd, iteration_limit: this.options.iterationLimit },
      context: { repo_path: this.options.projectRoot, notes: 'interactive' },
    };
  }

  /**
   * Run a goal against the project root, waiting for any run in flight.
   * The completion time is recorded and the lock released even when the
   * run throws.
   */
  async runGoal(goal: string, auto: boolean): Promise<RunResult> {
    return this.runLock.runExclusive(async () => {
      const task = this.buildTask(goal);
      this.logger.info(auto ? 'Auto-run started' : 'Run started', { taskId: task.id });
      try {
        return await this.options.runner.runTaskWithRoots(task, this.options.projectRoot, path.join(this.options.artifactsBase, task.id));
      } finally {
        await this.stateLock.runExclusive(() => {
          this.lastRunCompletedAt = this.now().getTime();
        });
        if (auto) this.logger.info('Auto-run complete.');
      }
    });
  }

  /** One watcher step; the outcome says why nothing ran, when nothing did */
  async watcherTick(): Promise<TickOutcome> {
    if (!this.watching) return 'disabled';
    if (this.runLock.isLocked()) return 'busy';

    const sinceLastRun = await this.stateLock.runExclusive(() => this.now().getTime() - this.lastRunCompletedAt);
    if (sinceLastRun < this.quietIntervalMs) return 'quiet';

    const changes = await this.options.watcher.poll();
    if (changes.length === 0) return 'no_changes';

    if (this.runLock.isLocked()) {
      this.logger.debug('Watcher trigger dropped: a run is in progress', { changes: changes.length });
      return 'dropped';
    }

    try {
      await this.runGoal(autoGoal(changes), true);
      return 'ran';
    } catch (error) {
      this.logger.error('Auto-run failed', { error: errorMessage(error) });
      return 'failed';
    }
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.pollIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private async tick(): Promise<void> {
    if (this.ticking) {
      this.logger.debug('Watcher tick skipped: previous tick still running');
      return;
    }
    this.ticking = true;
    try {
      await this.watcherTick();
    } catch (error) {
      this.logger.error('Watcher tick failed', { error: errorMessage(error) });
    } finally {
      this.ticking = false;
    }
  }
}
