import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'shell-quote';
import { containPath } from './paths';
import { BlockedCommandError, CommandNotAllowedError, CommandTimeoutError, SandboxError, SandboxPathNotFoundError } from './errors';
import { BLOCKED_TOKENS, DEFAULT_ALLOWED_COMMANDS, DEFAULT_COMMAND_TIMEOUT_MS, DEFAULT_MAX_OUTPUT, TRUNCATION_MARKER } from './types';
import type { CommandResult, SandboxOptions } from './types';

export interface ContainedCommand {
  /** First token as written (may be a path) */
  executable: string;
  /** Basename that was matched against the allow-list */
  name: string;
  args: string[];
}

/**
 * Split a command string with shell-quoting rules. Variables are kept
 * literally and glob patterns are passed through as plain arguments; shell
 * control operators are rejected because commands are spawned without a
 * shell.
 */
export function splitCommand(command: string): string[] {
  const tokens: string[] = [];
  for (const entry of parse(command, (key) => `$${key}`)) {
    if (typeof entry === 'string') {
      tokens.push(entry);
      continue;
    }
    if ('comment' in entry) break;
    if (entry.op === 'glob') {
      tokens.push(entry.pattern);
      continue;
    }
    throw new CommandNotAllowedError(entry.op, `Shell operator not allowed: ${entry.op}`);
  }
  return tokens;
}

function executableName(token: string): string {
  const base = process.platform === 'win32' ? path.win32.basename(token) : path.basename(token);
  return process.platform === 'win32' ? base.toLowerCase() : base;
}

/**
 * Validate a command against the blocked substrings and the executable
 * allow-list. Both checks must pass; nothing is executed here.
 *
 * @throws {BlockedCommandError} if a blocked substring occurs anywhere
 * @throws {CommandNotAllowedError} if the executable is not allow-listed
 */
export function containCommand(command: string, options: Pick<SandboxOptions, 'allowedCommands' | 'blockedTokens'> = {}): ContainedCommand {
  const lowered = command.toLowerCase();
  const blocked = options.blockedTokens ?? BLOCKED_TOKENS;
  for (const token of blocked) {
    if (lowered.includes(token.toLowerCase())) {
      throw new BlockedCommandError(token);
    }
  }

  const tokens = splitCommand(command);
  const [executable, ...args] = tokens;
  if (executable === undefined || executable === '') {
    throw new CommandNotAllowedError('', 'Empty command');
  }

  const allowed = new Set([...(options.allowedCommands ?? DEFAULT_ALLOWED_COMMANDS)].map(executableName));
  const name = executableName(executable);
  if (!allowed.has(name)) {
    throw new CommandNotAllowedError(name);
  }

  return { executable, name, args };
}

export function truncateOutput(output: string, maxOutput: number = DEFAULT_MAX_OUTPUT): string {
  return output.length > maxOutput ? output.slice(0, maxOutput) + TRUNCATION_MARKER : output;
}

/**
 * Run a contained command with its working directory contained under
 * `root`. A nonzero exit code is a normal result; only containment
 * violations, spawn failures and timeouts reject.
 */
export async function runCommand(command: string, cwd: string, root: string, options: SandboxOptions = {}): Promise<CommandResult> {
  const contained = containCommand(command, options);
  const safeCwd = await containPath(root, cwd);
  const cwdStat = await fs.stat(safeCwd).catch(() => null);
  if (!cwdStat?.isDirectory()) {
    throw new SandboxPathNotFoundError(safeCwd);
  }
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const maxOutput = options.maxOutput ?? DEFAULT_MAX_OUTPUT;

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(contained.executable, contained.args, { cwd: safeCwd, shell: false, windowsHide: true, stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    // Decoded per stream so multi-byte characters split across chunks survive.
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (data: string) => {
      stdout += data;
    });

    child.stderr.on('data', (data: string) => {
      stderr += data;
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      const reason = err.code === 'ENOENT' ? `${contained.executable} is not installed or not on PATH` : err.message;
      reject(new SandboxError(`Failed to start command: ${reason}`, err));
    });

    child.on('close', (code: number | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (timedOut) {
        reject(new CommandTimeoutError(command, timeoutMs));
        return;
      }
      resolve({ returncode: code ?? 1, output: truncateOutput(stdout + stderr, maxOutput) });
    });
  });
}
