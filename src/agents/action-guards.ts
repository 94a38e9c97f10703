import type { ActionRequest } from './schema';
import { ActionValidationError } from './errors';

export interface GuardContext {
  /** The task goal asks for printed output, so tests must capture stdout */
  goalPrints: boolean;
}

/** True when the goal text talks about printing */
export function goalMentionsPrint(goal: string): boolean {
  return goal.toLowerCase().includes('print');
}

function isPlaceholder(value: string): boolean {
  const stripped = value.trim();
  return stripped === '' || stripped === '...';
}

/** Any path segment named `test_*` marks a pytest module */
export function isTestFilePath(filePath: string): boolean {
  return filePath
    .replace(/\\/g, '/')
    .toLowerCase()
    .split('/')
    .some((segment) => segment.startsWith('test_'));
}

/**
 * Pytest-oriented heuristics applied before an action reaches the sandbox.
 * They catch the usual mistakes of small code models: placeholder values
 * copied from the prompt, a malformed pytest.ini, unittest-style tests and
 * tests that assert on return values of printing code.
 *
 * @throws {ActionValidationError}
 */
export function validateAction(action: ActionRequest, context: GuardContext): void {
  switch (action.tool) {
    case 'write_file':
      validateWrite(action.path, action.content, context);
      return;
    case 'read_file':
    case 'list_dir':
      if (isPlaceholder(action.path)) {
        throw new ActionValidationError(`${action.tool} path is missing or placeholder`, action.tool);
      }
      return;
    case 'search_in_files':
      if (isPlaceholder(action.path) || isPlaceholder(action.query)) {
        throw new ActionValidationError('search_in_files path/query is missing or placeholder', action.tool);
      }
      return;
    case 'run_cmd':
      if (isPlaceholder(action.cmd) || isPlaceholder(action.cwd)) {
        throw new ActionValidationError('run_cmd cmd/cwd is missing or placeholder', action.tool);
      }
      return;
  }
}

function validateWrite(filePath: string, content: string, context: GuardContext): void {
  if (isPlaceholder(filePath)) {
    throw new ActionValidationError('write_file path is missing or placeholder', 'write_file');
  }

  const normalized = filePath.replace(/\\/g, '/').toLowerCase();
  if (normalized.endsWith('pytest.ini') && !content.trimStart().toLowerCase().startsWith('[pytest]')) {
    throw new ActionValidationError('pytest.ini must start with [pytest]', 'write_file');
  }

  if (!isTestFilePath(filePath)) return;

  if (!content.includes('def test_')) {
    throw new ActionValidationError('test file must include pytest-style test functions', 'write_file');
  }
  if (content.includes('unittest')) {
    throw new ActionValidationError('test file must use pytest, not unittest', 'write_file');
  }
  if (context.goalPrints && !['capsys', 'capfd', 'subprocess'].some((marker) => content.includes(marker))) {
    throw new ActionValidationError('tests must capture stdout (capsys/capfd or subprocess)', 'write_file');
  }
}
