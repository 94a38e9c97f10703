export { ActionSandbox } from './sandbox';
export { containPath, canonicalize, isWithin, toWorkspaceRelative } from './paths';
export { containCommand, runCommand, splitCommand, truncateOutput } from './commands';
export type { ContainedCommand } from './commands';
export { gitDiff, gitStatus } from './git';
export * from './errors';
export * from './types';
