import { containPath, canonicalize, toWorkspaceRelative } from './paths';
import { runCommand } from './commands';
import { listDir, readFile, searchInFiles, writeFile } from './fs-tools';
import type { CommandResult, SandboxOptions, SearchMatch } from './types';

/**
 * ActionSandbox confines every filesystem and command side effect to a
 * single workspace root. Each operation performs its own containment check
 * before touching the disk.
 */
export class ActionSandbox {
  private options: SandboxOptions;

  constructor(
    private root: string,
    options: SandboxOptions = {},
  ) {
    this.options = { ...options };
  }

  get workspaceRoot(): string {
    return this.root;
  }

  /** Canonical absolute path for `requested`, or a containment error */
  resolve(requested: string): Promise<string> {
    return containPath(this.root, requested);
  }

  async relative(requested: string): Promise<string> {
    const [canonicalRoot, resolved] = await Promise.all([canonicalize(this.root), this.resolve(requested)]);
    return toWorkspaceRelative(canonicalRoot, resolved);
  }

  readFile(requested: string): Promise<string> {
    return readFile(this.root, requested);
  }

  writeFile(requested: string, content: string): Promise<string> {
    return writeFile(this.root, requested, content);
  }

  listDir(requested: string): Promise<string[]> {
    return listDir(this.root, requested);
  }

  searchInFiles(requested: string, query: string): Promise<SearchMatch[]> {
    return searchInFiles(this.root, requested, query);
  }

  runCommand(command: string, cwd = '.'): Promise<CommandResult> {
    return runCommand(command, cwd, this.root, this.options);
  }
}
