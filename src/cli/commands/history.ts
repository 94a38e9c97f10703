import { Command } from 'commander';
import path from 'node:path';
import { loadConfig } from '../../config/loader';
import { errorMessage } from '../../utils/errors';
import { HistoryStore } from '../history-store';
import { formatError, formatInfo, formatSuccess } from '../formatters';
import { parsePositiveInt, resolveHome } from '../runtime';

type HistoryCommandOptions = {
  phase?: string;
  result?: string;
  limit?: string;
  json?: boolean;
};

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List past runs, newest first')
    .option('--phase <phase>', 'Filter by phase')
    .option('--result <tag>', 'Filter by last result tag')
    .option('--limit <n>', 'Limit number of results')
    .option('--json', 'Output as JSON', false)
    .action(async (options: HistoryCommandOptions) => {
      try {
        const config = loadConfig();
        const store = new HistoryStore({ rootDir: path.join(resolveHome(config, process.cwd()), 'workspaces') });
        const entries = await store.list({ phase: options.phase, result: options.result, limit: parsePositiveInt(options.limit) });

        if (options.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }
        if (!entries.length) {
          console.log(formatInfo('No history entries found.'));
          return;
        }

        console.log(formatSuccess('Run history'));
        for (const e of entries) {
          console.log(formatInfo(`${e.updatedAt} ${e.taskId} ${e.phase} ${e.lastResult ?? ''} (iterations: ${e.iteration})`));
        }
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
