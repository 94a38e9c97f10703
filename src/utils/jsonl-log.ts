import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

const RecordSchema = z.record(z.unknown());

/**
 * Append-only JSON-lines sink. Each call to `append` writes exactly one
 * line; the parent directory is created on first write.
 */
export class JsonlLog {
  private ready = false;

  constructor(private filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async append(record: Record<string, unknown>): Promise<void> {
    if (!this.ready) {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      this.ready = true;
    }
    await fs.appendFile(this.filePath, `${JSON.stringify(record)}\n`, 'utf8');
  }

  /** Read every record back; a missing file yields an empty list */
  async readAll(): Promise<Record<string, unknown>[]> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf8');
    } catch {
      return [];
    }
    return data
      .split('\n')
      .filter((line) => line.trim() !== '')
      .map((line) => RecordSchema.parse(JSON.parse(line)));
  }
}
