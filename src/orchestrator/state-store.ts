import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { errorCode, errorMessage } from '../utils/errors';
import { StateFileError } from './errors';
import type { RunState } from './states';

/**
 * state.json as written on disk. The phase stays loose so that the state
 * machine, not the parser, decides what an unknown value means.
 */
const StateFileSchema = z.object({
  phase: z.unknown().optional(),
  iteration: z.number().int().nonnegative().default(0),
  last_result: z.string().nullable().default(null),
  open_items: z.array(z.string()).default([]),
  files_touched: z.array(z.string()).default([]),
});

export interface PersistedRunState {
  /** Raw phase value; undefined only when the key is absent */
  phase: unknown;
  iteration: number;
  lastResult: string | null;
  openItems: string[];
  filesTouched: string[];
}

export class StateStore {
  constructor(private storagePath: string) {}

  async save(state: RunState): Promise<void> {
    const dir = path.dirname(this.storagePath);
    await fs.mkdir(dir, { recursive: true });
    const file = {
      phase: state.phase,
      iteration: state.iteration,
      last_result: state.lastResult,
      open_items: state.openItems,
      files_touched: state.filesTouched,
    };
    await fs.writeFile(this.storagePath, JSON.stringify(file, null, 2), 'utf-8');
  }

  /**
   * The persisted state, or null when no state file exists.
   *
   * @throws {StateFileError} when the file is not JSON or does not match the state shape
   */
  async load(): Promise<PersistedRunState | null> {
    let data: string;
    try {
      data = await fs.readFile(this.storagePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return null;
      throw new StateFileError(this.storagePath, errorMessage(error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      throw new StateFileError(this.storagePath, errorMessage(error));
    }

    const parsed = StateFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateFileError(this.storagePath, parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '));
    }
    const { phase, iteration, last_result, open_items, files_touched } = parsed.data;
    return { phase, iteration, lastResult: last_result, openItems: open_items, filesTouched: files_touched };
  }
}
