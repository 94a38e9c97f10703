import { Command } from 'commander';
import path from 'node:path';
import { loadConfig } from '../../config/loader';
import { errorMessage } from '../../utils/errors';
import { HistoryStore, type HistoryEntrySummary } from '../history-store';
import { formatError, formatInfo, formatSuccess } from '../formatters';
import { resolveHome } from '../runtime';

type StatusCommandOptions = {
  json?: boolean;
};

async function resolveSummary(store: HistoryStore, taskId?: string): Promise<HistoryEntrySummary | null> {
  if (taskId) return store.summary(taskId);
  return store.latest();
}

function renderText(summary: HistoryEntrySummary): void {
  console.log(formatSuccess('Run status'));
  console.log(formatInfo(`taskId: ${summary.taskId}`));
  console.log(formatInfo(`phase: ${summary.phase}`));
  console.log(formatInfo(`lastResult: ${summary.lastResult ?? 'none'}`));
  console.log(formatInfo(`iteration: ${summary.iteration}`));
  console.log(formatInfo(`updatedAt: ${summary.updatedAt}`));
  if (summary.filesTouched.length) {
    console.log(formatInfo(`filesTouched: ${summary.filesTouched.join(', ')}`));
  }
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the persisted state of a run (latest when no id is given)')
    .argument('[taskId]', 'Task id')
    .option('--json', 'Output status as JSON', false)
    .action(async (taskId: string | undefined, options: StatusCommandOptions) => {
      try {
        const config = loadConfig();
        const store = new HistoryStore({ rootDir: path.join(resolveHome(config, process.cwd()), 'workspaces') });
        const summary = await resolveSummary(store, taskId);

        if (!summary) {
          console.log(formatInfo(taskId ? `No state found for task: ${taskId}` : 'No run state found.'));
          return;
        }

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }
        renderText(summary);
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
