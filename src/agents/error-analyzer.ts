import type { CommandResult } from '../sandbox/types';
import { formatResults } from './action-executor';

export const STDOUT_HINT = 'Hint: The code is printing output. Update tests to capture stdout (pytest capsys or subprocess) instead of expecting return values.';

export const NO_TESTS_HINT = 'Hint: Create a pytest test file named test_*.py with at least one def test_* function.';

/**
 * Turns a failed verification run into feedback for the next repair turn:
 * the raw result followed by hints for failure patterns that small models
 * tend to repeat.
 */
export class ErrorAnalyzer {
  hints(output: string): string[] {
    const hints: string[] = [];
    if (output.includes('Captured stdout') && output.includes('None !=')) hints.push(STDOUT_HINT);
    if (output.toLowerCase().includes('no tests ran')) hints.push(NO_TESTS_HINT);
    return hints;
  }

  feedback(result: CommandResult): string {
    const base = formatResults([result]);
    if (result.returncode === 0) return base;
    return [base, ...this.hints(result.output)].join('\n');
  }
}
