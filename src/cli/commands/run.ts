import { Command } from 'commander';
import path from 'node:path';
import { loadConfig } from '../../config/loader';
import { errorMessage } from '../../utils/errors';
import { formatError, formatRunResult, formatStep } from '../formatters';
import { createRuntime } from '../runtime';

type RunCommandOptions = {
  model?: string;
  verbose?: boolean;
};

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a task definition file (JSON or YAML)')
    .argument('<task>', 'Path to the task file')
    .option('-m, --model <name>', 'Model to use')
    .option('-v, --verbose', 'Show debug output, model responses and tool payloads', false)
    .action(async (taskPath: string, options: RunCommandOptions) => {
      try {
        const config = loadConfig({ model: { name: options.model } });
        const { runner } = createRuntime(config, { baseDir: process.cwd(), verbose: options.verbose });

        console.log(formatStep(`Running ${path.basename(taskPath)} with ${config.model.name}`));
        const result = await runner.runTask(taskPath);
        console.log(formatRunResult(result));
        if (result.status !== 'passed') process.exitCode = 1;
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
