import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { errorMessage } from '../../utils/errors';
import { formatError, formatRunResult, formatStep } from '../formatters';
import { createRuntime } from '../runtime';

type ResumeCommandOptions = {
  model?: string;
  verbose?: boolean;
};

export function registerResumeCommand(program: Command): void {
  program
    .command('resume')
    .description('Resume a task from its persisted state')
    .argument('<taskId>', 'Id of the task to resume')
    .option('-m, --model <name>', 'Model to use')
    .option('-v, --verbose', 'Show debug output, model responses and tool payloads', false)
    .action(async (taskId: string, options: ResumeCommandOptions) => {
      try {
        const config = loadConfig({ model: { name: options.model } });
        const { runner } = createRuntime(config, { baseDir: process.cwd(), verbose: options.verbose });

        console.log(formatStep(`Resuming ${taskId}`));
        const result = await runner.resumeTask(taskId);
        console.log(formatRunResult(result));
        if (result.status !== 'passed') process.exitCode = 1;
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
