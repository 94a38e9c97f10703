import type { ActionSandbox } from './sandbox';
import type { CommandResult } from './types';

/** Short-branch status of the workspace repository */
export function gitStatus(sandbox: ActionSandbox): Promise<CommandResult> {
  return sandbox.runCommand('git status -sb', '.');
}

export function gitDiff(sandbox: ActionSandbox): Promise<CommandResult> {
  return sandbox.runCommand('git diff', '.');
}
