export interface CommandResult {
  returncode: number;
  output: string;
}

export interface SearchMatch {
  /** Path relative to the workspace root */
  path: string;
  /** 1-based line number */
  line: number;
  text: string;
}

export interface SandboxOptions {
  /** Executable basenames that may be spawned */
  allowedCommands?: Iterable<string>;
  /** Substrings that reject a command outright (matched lowercased) */
  blockedTokens?: Iterable<string>;
  timeoutMs?: number;
  /** Maximum characters of combined output kept per command */
  maxOutput?: number;
}

export const DEFAULT_ALLOWED_COMMANDS: readonly string[] = ['python', 'python3', 'python.exe', 'pytest', 'git', 'pip', 'ruff'];

export const BLOCKED_TOKENS: readonly string[] = ['sudo', 'rm -rf', 'curl', 'wget'];

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export const DEFAULT_MAX_OUTPUT = 4000;

export const TRUNCATION_MARKER = '\n...[truncated]';
