import fs from 'node:fs/promises';
import { formatResults, hasErrors, type ToolResult } from '../agents/action-executor';
import { PHASE_PROMPTS } from '../agents/context-builder';
import type { CommandResult } from '../sandbox/types';
import { errorMessage } from '../utils/errors';
import { AgentCoordinator, type PhaseRuntime } from './agent-coordinator';

interface TurnOutcome {
  results: ToolResult[];
  touched: string[];
}

/** Ask the model for actions and run them; a parse failure becomes an error result */
async function actOnTurn(runtime: Readonly<PhaseRuntime>, prompt: string): Promise<TurnOutcome> {
  const { response, parseError } = await runtime.turn.run(runtime.baseMessages, prompt, runtime.lastFeedback);
  const { results, touched } = await runtime.executor.execute(response.actions);
  if (parseError) {
    results.push({ error: parseError });
  }
  return { results, touched };
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export function createPhaseCoordinator(): AgentCoordinator {
  const coordinator = new AgentCoordinator();

  // ── PLAN ──────────────────────────────────────────────────────────────

  coordinator.registerHandler('PLAN', async (runtime) => {
    const { results, touched } = await actOnTurn(runtime, PHASE_PROMPTS.plan(runtime.planDisplayPath));
    if (hasErrors(results)) {
      return { trigger: 'PLAN_FAILED', feedback: formatResults(results), touched };
    }
    if (!(await exists(runtime.planPath))) {
      return { trigger: 'PLAN_MISSING', feedback: `${runtime.planDisplayPath} was not created.`, touched };
    }
    return { trigger: 'PLAN_OK', touched };
  });

  // ── IMPLEMENT ─────────────────────────────────────────────────────────

  coordinator.registerHandler('IMPLEMENT', async (runtime) => {
    const { results, touched } = await actOnTurn(runtime, PHASE_PROMPTS.implement);
    if (hasErrors(results)) {
      return { trigger: 'IMPLEMENT_FAILED', feedback: formatResults(results), touched };
    }
    return { trigger: 'IMPLEMENT_OK', touched };
  });

  // ── VERIFY ────────────────────────────────────────────────────────────

  coordinator.registerHandler('VERIFY', async (runtime) => {
    const testCmd = runtime.task.constraints.test_cmd;
    if (!testCmd || !testCmd.trim()) {
      return { trigger: 'NO_TEST_CMD', touched: [] };
    }

    let result: CommandResult;
    try {
      result = await runtime.sandbox.runCommand(testCmd, '.');
    } catch (error) {
      result = { returncode: 1, output: errorMessage(error) };
    }
    await runtime.actionsLog.append({ tool: 'run_cmd', cmd: testCmd, result });

    if (result.returncode === 0) {
      return { trigger: 'TESTS_PASSED', feedback: formatResults([result]), touched: [] };
    }
    return { trigger: 'TESTS_FAILED', feedback: runtime.analyzer.feedback(result), touched: [] };
  });

  // ── REPAIR ────────────────────────────────────────────────────────────

  coordinator.registerHandler('REPAIR', async (runtime) => {
    const { results, touched } = await actOnTurn(runtime, PHASE_PROMPTS.repair);
    return {
      trigger: hasErrors(results) ? 'REPAIR_FAILED' : 'REPAIR_OK',
      feedback: formatResults(results),
      touched,
    };
  });

  return coordinator;
}
