import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { loadConfig } from '../../config/loader';
import { errorMessage } from '../../utils/errors';
import { formatError } from '../formatters';
import { promptForModelSettings, toEnvFile } from '../prompts';

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command('config').description('Manage configuration');

  configCommand
    .command('init')
    .description('Write model settings to .env interactively')
    .action(async () => {
      try {
        console.log(chalk.blue('Initializing configuration...'));
        const current = loadConfig();
        const settings = await promptForModelSettings(current.model);

        const targetPath = path.join(process.cwd(), '.env');
        if (fs.existsSync(targetPath)) {
          console.log(chalk.yellow('.env file already exists. Overwriting...'));
        }
        fs.writeFileSync(targetPath, toEnvFile(settings));
        console.log(chalk.green(`Configuration saved to ${targetPath}`));
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });

  configCommand
    .command('show')
    .description('Show the merged configuration')
    .action(() => {
      try {
        console.log(JSON.stringify(loadConfig(), null, 2));
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
