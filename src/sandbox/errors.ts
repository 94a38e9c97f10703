export class SandboxError extends Error {
  constructor(
    message: string,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'SandboxError';
  }
}

export class PathContainmentError extends SandboxError {
  constructor(public requestedPath: string) {
    super(`Path escapes workspace: ${requestedPath}`);
    this.name = 'PathContainmentError';
  }
}

export class SandboxPathNotFoundError extends SandboxError {
  constructor(public resolvedPath: string) {
    super(`Path not found: ${resolvedPath}`);
    this.name = 'SandboxPathNotFoundError';
  }
}

export class CommandNotAllowedError extends SandboxError {
  constructor(
    public executable: string,
    message = `Command not allowed: ${executable}`,
  ) {
    super(message);
    this.name = 'CommandNotAllowedError';
  }
}

export class BlockedCommandError extends SandboxError {
  constructor(public blockedToken: string) {
    super('Command contains blocked token');
    this.name = 'BlockedCommandError';
  }
}

export class CommandTimeoutError extends SandboxError {
  constructor(
    public command: string,
    public timeoutMs: number,
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = 'CommandTimeoutError';
  }
}
