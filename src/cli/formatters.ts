import chalk from 'chalk';
import type { PhaseChangeEvent } from '../orchestrator/events';
import type { Phase, RunResult } from '../orchestrator/states';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Phase progress ──────────────────────────────────────────────────────

const PHASE_LABELS: Record<Phase, string> = {
  INGEST: 'Loading task...',
  PLAN: 'Planning...',
  IMPLEMENT: 'Implementing...',
  VERIFY: 'Verifying...',
  REPAIR: 'Repairing...',
  DONE: 'Done',
};

export function formatPhaseTransition(event: Pick<PhaseChangeEvent, 'from' | 'to' | 'result'>): string {
  const label = PHASE_LABELS[event.to];
  const tag = event.result ? chalk.gray(` (${event.result})`) : '';
  return chalk.cyan(`  [${event.from} -> ${event.to}] ${label}`) + tag;
}

// ── Final result ────────────────────────────────────────────────────────

export function formatRunResult(result: RunResult): string {
  const lines: string[] = [''];

  if (result.status === 'passed') {
    lines.push(chalk.green.bold('Task completed.'));
  } else if (result.status === 'exhausted') {
    lines.push(chalk.yellow.bold('Iteration limit reached.'));
  } else {
    lines.push(chalk.red.bold('Task did not pass.'));
  }

  lines.push(formatInfo(`Task ID:    ${result.taskId}`));
  lines.push(formatInfo(`Result:     ${result.lastResult ?? 'none'}`));
  lines.push(formatInfo(`Iterations: ${result.iteration}`));
  lines.push(formatInfo(`Duration:   ${(result.durationMs / 1000).toFixed(1)}s`));

  if (result.filesTouched.length) {
    lines.push(formatInfo(`Files:      ${result.filesTouched.join(', ')}`));
  }

  return lines.join('\n');
}
