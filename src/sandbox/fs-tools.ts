import type { Dirent, Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { canonicalize, containPath, toWorkspaceRelative } from './paths';
import { SandboxError, SandboxPathNotFoundError } from './errors';
import type { SearchMatch } from './types';
import { errorCode } from '../utils/errors';

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') return null;
    throw error;
  }
}

export async function readFile(root: string, requested: string): Promise<string> {
  const target = await containPath(root, requested);
  const stat = await statOrNull(target);
  if (!stat) throw new SandboxPathNotFoundError(target);
  return fs.readFile(target, 'utf8');
}

/**
 * Write `content` to `requested`, creating parent directories. The data is
 * written to a sibling temp file first and renamed into place, so readers
 * never observe a partial file. The root itself and existing directories
 * are rejected before anything touches the disk.
 */
export async function writeFile(root: string, requested: string, content: string): Promise<string> {
  const target = await containPath(root, requested);
  if (target === (await canonicalize(root)) || (await statOrNull(target))?.isDirectory()) {
    throw new SandboxError(`Cannot write to a directory: ${target}`);
  }
  await fs.mkdir(path.dirname(target), { recursive: true });

  const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(temp, content, 'utf8');
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
  return `wrote ${target}`;
}

/** Sorted entry names; directories carry a trailing `/` */
export async function listDir(root: string, requested: string): Promise<string[]> {
  const target = await containPath(root, requested);
  const stat = await statOrNull(target);
  if (!stat) throw new SandboxPathNotFoundError(target);
  if (!stat.isDirectory()) throw new SandboxError(`Not a directory: ${target}`);

  const names = (await fs.readdir(target)).sort();
  const entries: string[] = [];
  for (const name of names) {
    const entryStat = await statOrNull(path.join(target, name));
    entries.push(entryStat?.isDirectory() ? `${name}/` : name);
  }
  return entries;
}

/**
 * Recursive literal substring search. Files that cannot be read or that
 * contain NUL bytes are skipped; symlinks are not followed.
 */
export async function searchInFiles(root: string, requested: string, query: string): Promise<SearchMatch[]> {
  const canonicalRoot = await canonicalize(root);
  const base = await containPath(root, requested);
  const stat = await statOrNull(base);
  if (!stat) throw new SandboxPathNotFoundError(base);

  const files = stat.isDirectory() ? await collectFiles(base) : [base];
  const matches: SearchMatch[] = [];

  for (const file of files) {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(file);
    } catch {
      continue;
    }
    if (buffer.includes(0)) continue;

    const lines = buffer.toString('utf8').split(/\r\n|\n|\r/);
    lines.forEach((line, idx) => {
      if (line.includes(query)) {
        matches.push({ path: toWorkspaceRelative(canonicalRoot, file), line: idx + 1, text: line.trim() });
      }
    });
  }
  return matches;
}

async function collectFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    return [];
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}
