import { Command } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';
import { loadConfig } from '../../config/loader';
import { InteractiveCoordinator } from '../../interactive/coordinator';
import { Repl } from '../../interactive/repl';
import { ActionSandbox } from '../../sandbox/sandbox';
import { errorMessage } from '../../utils/errors';
import { FileWatcher, WATCH_IGNORE_DIRS } from '../../watch/file-watcher';
import { formatError } from '../formatters';
import { createRuntime, parseNonNegativeInt } from '../runtime';

type InteractiveCommandOptions = {
  projectRoot: string;
  watch?: boolean;
  testCmd?: string;
  iterationLimit?: number;
  quiet?: boolean;
  model?: string;
};

export function registerInteractiveCommand(program: Command): void {
  program
    .command('interactive')
    .description('Type goals and let file edits trigger runs against a project')
    .option('--project-root <dir>', 'Project root to edit', '.')
    .option('--watch', 'Watch for file changes and auto-run')
    .option('--no-watch', 'Disable watch mode')
    .option('--test-cmd <cmd>', 'Verification command run in VERIFY')
    .option('--iteration-limit <n>', 'Iteration limit per run', parseNonNegativeInt)
    .option('--quiet', 'Disable verbose output', false)
    .option('-m, --model <name>', 'Model to use')
    .action(async (options: InteractiveCommandOptions) => {
      try {
        const projectRoot = path.resolve(options.projectRoot);
        const config = loadConfig({
          model: { name: options.model },
          interactive: { watch: options.watch, test_cmd: options.testCmd, iteration_limit: options.iterationLimit },
        });
        const { runner, workspacesRoot, logger, sandboxOptions } = createRuntime(config, { baseDir: projectRoot, verbose: !options.quiet });
        await fs.mkdir(workspacesRoot, { recursive: true });

        const ignore = new Set([...WATCH_IGNORE_DIRS, path.basename(path.resolve(projectRoot, config.paths.home))]);
        const watcher = await FileWatcher.create(projectRoot, ignore);
        const coordinator = new InteractiveCoordinator({
          projectRoot,
          artifactsBase: workspacesRoot,
          runner,
          watcher,
          testCmd: config.interactive.test_cmd,
          iterationLimit: config.interactive.iteration_limit,
          watch: config.interactive.watch,
          pollIntervalMs: config.interactive.poll_interval_ms,
          quietIntervalMs: config.interactive.quiet_interval_ms,
          logger,
        });

        await new Repl({ coordinator, sandbox: new ActionSandbox(projectRoot, sandboxOptions) }).run();
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
