import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

export interface LessonMetadata {
  type: string;
  tags: string[];
  confidence: number;
  /** ISO date (YYYY-MM-DD) */
  created: string;
  [key: string]: unknown;
}

/** Token → note paths (relative to the store root) */
export type RetrievalIndex = Record<string, string[]>;

const IndexSchema = z.record(z.array(z.string()));

const NOTE_FOLDERS = ['facts', 'lessons', 'snippets', 'projects'] as const;

/** Lowercase alphanumeric tokens, repeats kept */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * File-backed note store with a flat token-overlap index.
 *
 * Notes are written once and never edited; `index.json` maps every token
 * of a note to its relative path. Entries whose note file has disappeared
 * are skipped when retrieving.
 */
export class MemoryStore {
  private indexPath: string;
  private ready?: Promise<void>;

  constructor(private baseDir: string) {
    this.indexPath = path.join(baseDir, 'index.json');
  }

  async retrieve(query: string, limit = 3): Promise<string[]> {
    await this.ensureLayout();
    const index = await this.loadIndex();

    const scores = new Map<string, number>();
    for (const token of tokenize(query)) {
      for (const notePath of index[token] ?? []) {
        scores.set(notePath, (scores.get(notePath) ?? 0) + 1);
      }
    }

    const ranked = [...scores.entries()].sort((a, b) => b[1] - a[1]);
    const results: string[] = [];
    for (const [notePath] of ranked) {
      if (results.length >= limit) break;
      try {
        results.push(await fs.readFile(path.join(this.baseDir, notePath), 'utf8'));
      } catch {
        // stale index entry
      }
    }
    return results;
  }

  /** Persist a lesson note for `taskId` and merge its tokens into the index */
  async writeLesson(taskId: string, content: string, metadata: LessonMetadata): Promise<string> {
    await this.ensureLayout();
    const notePath = path.join(this.baseDir, 'lessons', `${taskId}.md`);
    const note = MemoryStore.formatNote(metadata, content);
    await fs.writeFile(notePath, note, 'utf8');
    await this.updateIndex(`lessons/${taskId}.md`, note);
    return notePath;
  }

  static formatNote(metadata: Record<string, unknown>, content: string): string {
    const header = Object.entries(metadata)
      .map(([key, value]) => `${key}: ${JSON.stringify(value)}\n`)
      .join('');
    return `---\n${header}---\n\n${content.trim()}\n`;
  }

  async loadIndex(): Promise<RetrievalIndex> {
    try {
      const raw: unknown = JSON.parse(await fs.readFile(this.indexPath, 'utf8'));
      const parsed = IndexSchema.safeParse(raw);
      return parsed.success ? parsed.data : {};
    } catch {
      return {};
    }
  }

  private async updateIndex(relPath: string, note: string): Promise<void> {
    const index = await this.loadIndex();
    for (const token of tokenize(note)) {
      const paths = index[token] ?? (index[token] = []);
      if (!paths.includes(relPath)) {
        paths.push(relPath);
      }
    }
    await fs.writeFile(this.indexPath, JSON.stringify(index, null, 2), 'utf8');
  }

  private ensureLayout(): Promise<void> {
    this.ready ??= (async () => {
      for (const folder of NOTE_FOLDERS) {
        await fs.mkdir(path.join(this.baseDir, folder), { recursive: true });
      }
      try {
        await fs.writeFile(this.indexPath, '{}', { encoding: 'utf8', flag: 'wx' });
      } catch {
        // already present
      }
    })();
    return this.ready;
  }
}
