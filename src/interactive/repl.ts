import readline from 'node:readline';
import type { ActionSandbox } from '../sandbox/sandbox';
import { gitDiff, gitStatus } from '../sandbox/git';
import { formatError, formatInfo, formatRunResult, formatStep } from '../cli/formatters';
import { errorMessage } from '../utils/errors';
import type { InteractiveCoordinator } from './coordinator';

export const HELP_TEXT = 'Commands: /help, /exit, /watch on, /watch off, /status, /diff\nType any other text to run a task.';

export interface ReplOptions {
  coordinator: InteractiveCoordinator;
  /** Sandbox rooted at the project, used for /status and /diff */
  sandbox: ActionSandbox;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  print?: (text: string) => void;
}

export type LineOutcome = 'continue' | 'exit';

/**
 * Foreground loop of interactive mode. Each line is handled to completion
 * before the next is read, so a user goal never overlaps another.
 */
export class Repl {
  private print: (text: string) => void;

  constructor(private options: ReplOptions) {
    this.print = options.print ?? ((text) => console.log(text));
  }

  async handleLine(rawLine: string): Promise<LineOutcome> {
    const line = rawLine.trim();
    if (!line) return 'continue';

    if (line === '/exit' || line === '/quit') return 'exit';

    if (line.startsWith('/watch')) {
      const enabled = !line.toLowerCase().includes('off');
      this.options.coordinator.setWatching(enabled);
      this.print(formatInfo(`watch=${enabled ? 'on' : 'off'}`));
      return 'continue';
    }

    if (line.startsWith('/help')) {
      this.print(HELP_TEXT);
      return 'continue';
    }

    if (line === '/status' || line === '/diff') {
      try {
        const result = line === '/status' ? await gitStatus(this.options.sandbox) : await gitDiff(this.options.sandbox);
        this.print(result.output.trimEnd() || formatInfo('(no output)'));
      } catch (error) {
        this.print(formatError(errorMessage(error)));
      }
      return 'continue';
    }

    this.print(formatStep(`Running: ${line}`));
    try {
      const result = await this.options.coordinator.runGoal(line, false);
      this.print(formatRunResult(result));
    } catch (error) {
      this.print(formatError(errorMessage(error)));
    }
    return 'continue';
  }

  /** Read lines until /exit, /quit or end of input */
  async run(): Promise<void> {
    const rl = readline.createInterface({
      input: this.options.input ?? process.stdin,
      output: this.options.output ?? process.stdout,
      terminal: false,
    });
    this.print('Kiln interactive mode. Type a goal or /help.');
    this.options.coordinator.start();
    try {
      rl.setPrompt('> ');
      rl.prompt();
      for await (const line of rl) {
        if ((await this.handleLine(line)) === 'exit') break;
        rl.prompt();
      }
    } finally {
      this.options.coordinator.stop();
      rl.close();
    }
  }
}
