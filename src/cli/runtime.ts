import path from 'node:path';
import type { Config } from '../config/validator';
import { MemoryStore } from '../memory/store';
import { OllamaClient } from '../models/ollama-client';
import type { PhaseChangeEvent } from '../orchestrator/events';
import { TaskRunner } from '../orchestrator/workflow';
import type { SandboxOptions } from '../sandbox/types';
import { ConsoleLogger } from '../utils/logger';
import { formatPhaseTransition } from './formatters';

export interface RuntimeOptions {
  /** Directory that a relative `paths.home` is resolved against */
  baseDir: string;
  verbose?: boolean;
  /** Print each phase change to stdout (default: true) */
  showTransitions?: boolean;
}

export interface Runtime {
  home: string;
  workspacesRoot: string;
  runner: TaskRunner;
  logger: ConsoleLogger;
  sandboxOptions: SandboxOptions;
}

export function resolveHome(config: Config, baseDir: string): string {
  return path.resolve(baseDir, config.paths.home);
}

export function sandboxOptionsFrom(config: Config): SandboxOptions {
  return {
    allowedCommands: config.sandbox.allowed_commands,
    timeoutMs: config.sandbox.command_timeout_ms,
    maxOutput: config.sandbox.max_output,
  };
}

/** Wire gateway, memory and runner from a loaded configuration */
export function createRuntime(config: Config, options: RuntimeOptions): Runtime {
  const home = resolveHome(config, options.baseDir);
  const workspacesRoot = path.join(home, 'workspaces');
  const logger = new ConsoleLogger({ verbose: options.verbose });
  const sandboxOptions = sandboxOptionsFrom(config);

  const gateway = new OllamaClient({ baseUrl: config.model.base_url, timeoutMs: config.model.timeout_ms, logRequests: options.verbose }, logger);
  const showTransitions = options.showTransitions ?? true;

  const runner = new TaskRunner({
    gateway,
    model: config.model.name,
    memory: new MemoryStore(path.join(home, 'memories')),
    workspacesRoot,
    sandbox: sandboxOptions,
    logger,
    onPhaseChange: showTransitions ? (event: PhaseChangeEvent) => console.log(formatPhaseTransition(event)) : undefined,
  });

  return { home, workspacesRoot, runner, logger, sandboxOptions };
}

export function parsePositiveInt(input: string | undefined): number | undefined {
  if (!input) return undefined;
  const n = Number.parseInt(input, 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export function parseNonNegativeInt(input: string): number {
  const n = Number.parseInt(input, 10);
  if (!Number.isFinite(n) || n < 0 || String(n) !== input.trim()) {
    throw new Error(`Expected a non-negative integer, got: ${input}`);
  }
  return n;
}
