import type { ActionSandbox } from '../sandbox/sandbox';
import type { CommandResult, SearchMatch } from '../sandbox/types';
import type { JsonlLog } from '../utils/jsonl-log';
import { silentLogger, truncateForLog, type Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import type { ActionRequest } from './schema';
import { validateAction, type GuardContext } from './action-guards';

export interface ToolError {
  error: string;
}

export type ToolResult = string | string[] | SearchMatch[] | CommandResult | ToolError;

export interface ExecutionOutcome {
  results: ToolResult[];
  /** Workspace-relative paths written by this batch */
  touched: string[];
}

export interface ActionExecutorOptions {
  sandbox: ActionSandbox;
  actionsLog: JsonlLog;
  guard: GuardContext;
  logger?: Logger;
}

export function isToolError(result: ToolResult): result is ToolError {
  return typeof result === 'object' && !Array.isArray(result) && 'error' in result;
}

export function hasErrors(results: ToolResult[]): boolean {
  return results.some(isToolError);
}

export function formatResults(results: ToolResult[]): string {
  return JSON.stringify(results, null, 2);
}

/**
 * Runs a model's actions in order against the sandbox. One failing action
 * never stops the batch: its error is recorded as that action's result.
 */
export class ActionExecutor {
  private logger: Logger;

  constructor(private options: ActionExecutorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async execute(actions: ActionRequest[]): Promise<ExecutionOutcome> {
    const results: ToolResult[] = [];
    const touched: string[] = [];

    for (const action of actions) {
      let result: ToolResult;
      try {
        validateAction(action, this.options.guard);
        result = await this.dispatch(action, touched);
      } catch (error) {
        result = { error: errorMessage(error) };
      }

      const payload = { tool: action.tool, input: action, result };
      await this.options.actionsLog.append(payload);
      this.logger.debug(`Tool ${action.tool}`, { payload: truncateForLog(JSON.stringify(payload, null, 2)) });
      results.push(result);
    }

    return { results, touched };
  }

  private async dispatch(action: ActionRequest, touched: string[]): Promise<ToolResult> {
    const { sandbox } = this.options;
    switch (action.tool) {
      case 'write_file': {
        const written = await sandbox.writeFile(action.path, action.content);
        const rel = await sandbox.relative(action.path);
        if (!touched.includes(rel)) touched.push(rel);
        return written;
      }
      case 'read_file':
        return sandbox.readFile(action.path);
      case 'list_dir':
        return sandbox.listDir(action.path);
      case 'search_in_files':
        return sandbox.searchInFiles(action.path, action.query);
      case 'run_cmd':
        return sandbox.runCommand(action.cmd, action.cwd);
      default: {
        const unknown: never = action;
        return { error: `Unknown tool ${JSON.stringify(unknown)}` };
      }
    }
  }
}
