import fs from 'node:fs/promises';
import path from 'node:path';
import { StateFileError } from '../orchestrator/errors';
import { StateStore, type PersistedRunState } from '../orchestrator/state-store';

export type HistoryStoreOptions = {
  /** Directory holding one run directory per task (default: `.kiln/workspaces`) */
  rootDir?: string;
};

export type HistoryFilter = {
  phase?: string;
  result?: string;
  limit?: number;
};

export type HistoryEntrySummary = {
  taskId: string;
  phase: string;
  lastResult: string | null;
  iteration: number;
  filesTouched: string[];
  /** Modification time of state.json */
  updatedAt: string;
};

/** Read-only view over persisted runs for `status` and `history` */
export class HistoryStore {
  private rootDir: string;

  constructor(opts?: HistoryStoreOptions) {
    this.rootDir = opts?.rootDir ?? path.join('.kiln', 'workspaces');
  }

  private statePath(taskId: string): string {
    return path.join(this.rootDir, taskId, 'state.json');
  }

  async load(taskId: string): Promise<PersistedRunState | null> {
    return new StateStore(this.statePath(taskId)).load();
  }

  async listTaskIds(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch {
      return [];
    }
  }

  /** Summary of one run; null when it has no state file or an unreadable one */
  async summary(taskId: string): Promise<HistoryEntrySummary | null> {
    let state: PersistedRunState | null;
    try {
      state = await this.load(taskId);
    } catch (error) {
      if (error instanceof StateFileError) return null;
      throw error;
    }
    if (!state) return null;

    let updatedAt: string;
    try {
      updatedAt = (await fs.stat(this.statePath(taskId))).mtime.toISOString();
    } catch {
      return null;
    }

    return {
      taskId,
      phase: state.phase === undefined ? 'INGEST' : String(state.phase),
      lastResult: state.lastResult,
      iteration: state.iteration,
      filesTouched: state.filesTouched,
      updatedAt,
    };
  }

  private matchesFilter(summary: HistoryEntrySummary, filter: HistoryFilter): boolean {
    if (filter.phase && summary.phase !== filter.phase.toUpperCase()) return false;
    if (filter.result && summary.lastResult !== filter.result) return false;
    return true;
  }

  /** Runs newest first */
  async list(filter: HistoryFilter = {}): Promise<HistoryEntrySummary[]> {
    const taskIds = await this.listTaskIds();
    const summaries = (await Promise.all(taskIds.map((id) => this.summary(id))))
      .filter((s): s is HistoryEntrySummary => s !== null)
      .filter((s) => this.matchesFilter(s, filter))
      .sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt));

    if (filter.limit && filter.limit > 0) {
      return summaries.slice(0, filter.limit);
    }
    return summaries;
  }

  async latest(): Promise<HistoryEntrySummary | null> {
    const list = await this.list({ limit: 1 });
    return list[0] ?? null;
  }
}
