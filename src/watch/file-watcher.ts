import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

/** Directories never scanned, on top of every dot-directory */
export const WATCH_IGNORE_DIRS: ReadonlySet<string> = new Set(['.kiln', '.git', '.venv', '__pycache__', 'node_modules', 'workspaces', 'memories']);

export const MAX_REPORTED_CHANGES = 25;

/** Relative path (forward slashes) → mtime in ms */
export type Snapshot = Map<string, number>;

/**
 * Polling change detector for a project tree. Each `poll` compares a fresh
 * mtime snapshot against the previous one and then replaces it, so every
 * change is reported once.
 */
export class FileWatcher {
  private snapshot: Snapshot = new Map();

  private constructor(
    private root: string,
    private ignoreDirs: ReadonlySet<string>,
  ) {}

  /** Build a watcher whose baseline is the tree as it is now */
  static async create(root: string, ignoreDirs: ReadonlySet<string> = WATCH_IGNORE_DIRS): Promise<FileWatcher> {
    const watcher = new FileWatcher(path.resolve(root), ignoreDirs);
    watcher.snapshot = await watcher.scan();
    return watcher;
  }

  async poll(maxChanges = MAX_REPORTED_CHANGES): Promise<string[]> {
    const current = await this.scan();
    const changes: string[] = [];

    for (const [rel, mtime] of current) {
      const previous = this.snapshot.get(rel);
      if (previous === undefined) {
        changes.push(`added: ${rel}`);
      } else if (mtime > previous) {
        changes.push(`modified: ${rel}`);
      }
    }
    for (const rel of this.snapshot.keys()) {
      if (!current.has(rel)) changes.push(`deleted: ${rel}`);
    }

    this.snapshot = current;
    return changes.slice(0, maxChanges);
  }

  async scan(): Promise<Snapshot> {
    const snapshot: Snapshot = new Map();
    await this.walk(this.root, snapshot);
    return snapshot;
  }

  private async walk(dir: string, snapshot: Snapshot): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith('.') || this.ignoreDirs.has(entry.name)) continue;
        await this.walk(fullPath, snapshot);
      } else if (entry.isFile()) {
        try {
          const stat = await fs.stat(fullPath);
          snapshot.set(path.relative(this.root, fullPath).split(path.sep).join('/'), stat.mtimeMs);
        } catch {
          // removed between readdir and stat
        }
      }
    }
  }
}
