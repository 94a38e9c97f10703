import fs from 'node:fs/promises';
import path from 'node:path';
import { PathContainmentError } from './errors';
import { errorCode } from '../utils/errors';

/**
 * Resolve `target` to its canonical absolute form. Symlinks are resolved
 * through the longest existing ancestor so that paths which do not exist
 * yet (write targets) still canonicalize against real directories.
 */
export async function canonicalize(target: string): Promise<string> {
  const absolute = path.resolve(target);
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = await fs.realpath(current);
      return missing.length ? path.join(real, ...missing.reverse()) : real;
    } catch (error) {
      const code = errorCode(error);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') throw error;

      const parent = path.dirname(current);
      if (parent === current) return absolute;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

/** True when `candidate` equals `root` or is nested under it (both canonical) */
export function isWithin(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  if (rel === '') return true;
  if (path.isAbsolute(rel)) return false;
  return rel !== '..' && !rel.startsWith(`..${path.sep}`);
}

/**
 * Contain `requested` (absolute or workspace-relative) inside `root`.
 *
 * @returns the canonical absolute path
 * @throws {PathContainmentError} when the resolved path leaves the root,
 *   whether through `..` segments, an absolute path or a symlink
 */
export async function containPath(root: string, requested: string): Promise<string> {
  const canonicalRoot = await canonicalize(root);
  const candidate = path.isAbsolute(requested) ? requested : path.join(canonicalRoot, requested);
  const resolved = await canonicalize(candidate);

  if (!isWithin(canonicalRoot, resolved)) {
    throw new PathContainmentError(requested);
  }
  return resolved;
}

/** Root-relative form of a contained path, with forward slashes */
export function toWorkspaceRelative(root: string, absolute: string): string {
  return path.relative(root, absolute).split(path.sep).join('/');
}
