/**
 * Integration tests for the task runner.
 *
 * Each run goes through the real state machine, sandbox, memory store and
 * phase handlers; only the model is replaced by a scripted gateway. Test
 * commands run the current Node binary so no pytest install is needed.
 */
import fs from 'node:fs';
import path from 'node:path';
import { TaskRunner } from '../../../src/orchestrator/workflow';
import { StateFileError, TaskNotFoundError } from '../../../src/orchestrator/errors';
import type { PhaseChangeEvent } from '../../../src/orchestrator/events';
import type { Task } from '../../../src/orchestrator/states';
import { MemoryStore } from '../../../src/memory/store';
import { ScriptedGateway, reply } from '../../helpers/scripted-gateway';
import { makeTempDir, NODE, NODE_NAME, removeDir } from '../../helpers/tmp';

// ── Helpers ─────────────────────────────────────────────────────────────

const PLAN_REPLY = reply('plan', [{ tool: 'write_file', path: 'plan.md', content: '1. write calc.py\n2. run tests\n' }]);
const IMPLEMENT_REPLY = reply('implement', [{ tool: 'write_file', path: 'calc.py', content: 'def add(a, b):\n    return a + b\n' }]);

function task(overrides: Partial<Task> = {}): Task {
  return { id: 'calc', title: 'Calculator', goal: 'Add two numbers', constraints: {}, context: {}, ...overrides };
}

function lastUserMessage(gateway: ScriptedGateway, index: number): string[] {
  const request = gateway.requests[index];
  if (!request) throw new Error(`no request at ${index}`);
  return request.messages.filter((m) => m.role === 'user').map((m) => m.content);
}

describe('TaskRunner', () => {
  let dir: string;
  let workspacesRoot: string;
  let memory: MemoryStore;
  let events: PhaseChangeEvent[];

  const createRunner = (gateway: ScriptedGateway): TaskRunner =>
    new TaskRunner({
      gateway,
      model: 'test-model',
      memory,
      workspacesRoot,
      sandbox: { allowedCommands: [NODE_NAME] },
      onPhaseChange: (event) => events.push(event),
      now: () => new Date(2024, 4, 1),
    });

  const readState = (taskId: string): unknown => JSON.parse(fs.readFileSync(path.join(workspacesRoot, taskId, 'state.json'), 'utf8'));

  beforeEach(() => {
    dir = makeTempDir();
    workspacesRoot = path.join(dir, 'workspaces');
    memory = new MemoryStore(path.join(dir, 'memories'));
    events = [];
  });

  afterEach(() => {
    removeDir(dir);
  });

  // ── Happy paths ─────────────────────────────────────────────────────

  describe('runTaskWithRoots', () => {
    it('finishes with no_test_cmd when the task has no test command', async () => {
      const gateway = new ScriptedGateway([PLAN_REPLY, IMPLEMENT_REPLY]);
      const runDir = path.join(workspacesRoot, 'calc');

      const result = await createRunner(gateway).runTaskWithRoots(task(), runDir, runDir);

      expect(result).toMatchObject({ taskId: 'calc', phase: 'DONE', lastResult: 'no_test_cmd', iteration: 3, status: 'passed', filesTouched: ['plan.md', 'calc.py'] });
      expect(gateway.requests).toHaveLength(2);
      expect(events.map((e) => `${e.from}->${e.to}`)).toEqual(['INGEST->PLAN', 'PLAN->IMPLEMENT', 'IMPLEMENT->VERIFY', 'VERIFY->DONE']);
      expect(readState('calc')).toEqual({ phase: 'DONE', iteration: 3, last_result: 'no_test_cmd', open_items: [], files_touched: ['plan.md', 'calc.py'] });
    });

    it('writes the run artifacts', async () => {
      const runDir = path.join(workspacesRoot, 'calc');
      await createRunner(new ScriptedGateway([PLAN_REPLY, IMPLEMENT_REPLY])).runTaskWithRoots(task(), runDir, runDir);

      for (const name of ['task.json', 'state.json', 'plan.md', 'llm.log', 'actions.log', 'notes.md', 'calc.py']) {
        expect(fs.existsSync(path.join(runDir, name))).toBe(true);
      }
      const llmLines = fs.readFileSync(path.join(runDir, 'llm.log'), 'utf8').trim().split('\n');
      expect(llmLines).toHaveLength(4);
      expect(JSON.parse(llmLines[1] ?? '')).toEqual({ response: PLAN_REPLY });
    });

    it('writes a lesson to memory when the run ends', async () => {
      const runDir = path.join(workspacesRoot, 'calc');
      await createRunner(new ScriptedGateway([PLAN_REPLY, IMPLEMENT_REPLY])).runTaskWithRoots(task(), runDir, runDir);

      const lesson = fs.readFileSync(path.join(dir, 'memories', 'lessons', 'calc.md'), 'utf8');
      expect(lesson).toBe(
        '---\ntype: "lesson"\ntags: ["kiln","task"]\nconfidence: 0.5\ncreated: "2024-05-01"\n---\n\n' +
          `Task calc completed with result no_test_cmd.\nFiles touched: plan.md, calc.py\nWorkspace: ${runDir}\n`,
      );
    });

    it('passes when the test command exits 0', async () => {
      const gateway = new ScriptedGateway([PLAN_REPLY, IMPLEMENT_REPLY]);
      const runDir = path.join(workspacesRoot, 'calc');
      const t = task({ constraints: { test_cmd: `${NODE} -e "process.exit(0)"` } });

      const result = await createRunner(gateway).runTaskWithRoots(t, runDir, runDir);

      expect(result).toMatchObject({ lastResult: 'tests_passed', iteration: 3, status: 'passed' });
      const actions = fs.readFileSync(path.join(runDir, 'actions.log'), 'utf8').trim().split('\n');
      expect(JSON.parse(actions[actions.length - 1] ?? '')).toMatchObject({ tool: 'run_cmd', result: { returncode: 0, output: '' } });
    });

    it('sends failed test output to REPAIR until the limit', async () => {
      const gateway = new ScriptedGateway([PLAN_REPLY, IMPLEMENT_REPLY]);
      const runDir = path.join(workspacesRoot, 'calc');
      const t = task({ constraints: { test_cmd: `${NODE} -e "process.exit(1)"`, iteration_limit: 5 } });

      const result = await createRunner(gateway).runTaskWithRoots(t, runDir, runDir);

      expect(result).toMatchObject({ lastResult: 'iteration_limit', iteration: 5, status: 'exhausted', phase: 'DONE' });
      expect(events.map((e) => e.trigger)).toEqual(['START', 'PLAN_OK', 'IMPLEMENT_OK', 'TESTS_FAILED', 'REPAIR_OK', 'TESTS_FAILED', 'ITERATION_LIMIT']);
      expect(gateway.requests).toHaveLength(3);
      expect(lastUserMessage(gateway, 2)).toContain('Last feedback:\n[\n  {\n    "returncode": 1,\n    "output": ""\n  }\n]');
    });
  });

  // ── Failure feedback ────────────────────────────────────────────────

  describe('failure handling', () => {
    it('routes an unparseable reply through REPAIR with the parse error as feedback', async () => {
      const gateway = new ScriptedGateway(['Sure! Here is my plan.']);
      const runDir = path.join(workspacesRoot, 'calc');

      const result = await createRunner(gateway).runTaskWithRoots(task({ constraints: { iteration_limit: 3 } }), runDir, runDir);

      expect(result).toMatchObject({ lastResult: 'iteration_limit', iteration: 3 });
      expect(events.map((e) => e.result)).toEqual([null, 'plan_failed', 'repair_failed', 'repair_failed', 'iteration_limit']);
      const feedback = lastUserMessage(gateway, 1).find((m) => m.startsWith('Last feedback:'));
      expect(feedback).toMatch(/"error": "Invalid JSON from model: /);
    });

    it('reports a missing plan file', async () => {
      const gateway = new ScriptedGateway([reply('plan', [{ tool: 'write_file', path: 'notes.txt', content: 'thinking' }])]);
      const runDir = path.join(workspacesRoot, 'calc');

      const result = await createRunner(gateway).runTaskWithRoots(task({ constraints: { iteration_limit: 2 } }), runDir, runDir);

      expect(result.lastResult).toBe('iteration_limit');
      expect(events[1]).toMatchObject({ from: 'PLAN', to: 'REPAIR', result: 'plan_missing' });
      expect(lastUserMessage(gateway, 1)).toContain('Last feedback:\nplan.md was not created.');
    });

    it('rejects a test file without pytest functions', async () => {
      const badTest = reply('tests', [{ tool: 'write_file', path: 'tests/test_calc.py', content: 'import unittest\n' }]);
      const gateway = new ScriptedGateway([PLAN_REPLY, badTest]);
      const runDir = path.join(workspacesRoot, 'calc');

      const result = await createRunner(gateway).runTaskWithRoots(task({ constraints: { iteration_limit: 3 } }), runDir, runDir);

      expect(events[2]).toMatchObject({ from: 'IMPLEMENT', to: 'REPAIR', result: 'implement_failed' });
      expect(result.filesTouched).toEqual(['plan.md']);
      expect(fs.existsSync(path.join(runDir, 'tests', 'test_calc.py'))).toBe(false);
      expect(lastUserMessage(gateway, 2).join('\n')).toContain('"error": "test file must include pytest-style test functions"');
    });

    it('stops before any turn when the limit is zero', async () => {
      const gateway = new ScriptedGateway([PLAN_REPLY]);
      const runDir = path.join(workspacesRoot, 'calc');

      const result = await createRunner(gateway).runTaskWithRoots(task({ constraints: { iteration_limit: 0 } }), runDir, runDir);

      expect(result).toMatchObject({ phase: 'DONE', iteration: 0, lastResult: 'iteration_limit', status: 'exhausted' });
      expect(gateway.requests).toHaveLength(0);
      expect(fs.readFileSync(path.join(dir, 'memories', 'lessons', 'calc.md'), 'utf8')).toContain('Task calc completed with result iteration_limit.\n');
    });
  });

  // ── Task files and resume ───────────────────────────────────────────

  describe('runTask', () => {
    it('loads the task file and runs in its own directory', async () => {
      const taskFile = path.join(dir, 'calc.yaml');
      fs.writeFileSync(taskFile, 'id: calc\ngoal: Add two numbers\n');

      const result = await createRunner(new ScriptedGateway([PLAN_REPLY, IMPLEMENT_REPLY])).runTask(taskFile);

      expect(result.lastResult).toBe('no_test_cmd');
      expect(JSON.parse(fs.readFileSync(path.join(workspacesRoot, 'calc', 'task.json'), 'utf8'))).toEqual({ id: 'calc', title: '', goal: 'Add two numbers', constraints: {}, context: {} });
    });
  });

  describe('resumeTask', () => {
    const seedRun = (state: Record<string, unknown>, t: Task = task()): void => {
      const runDir = path.join(workspacesRoot, t.id);
      fs.mkdirSync(runDir, { recursive: true });
      fs.writeFileSync(path.join(runDir, 'task.json'), JSON.stringify(t));
      fs.writeFileSync(path.join(runDir, 'state.json'), JSON.stringify(state));
    };

    it('continues from the persisted phase and iteration', async () => {
      seedRun({ phase: 'VERIFY', iteration: 2, last_result: 'implement_ok', open_items: [], files_touched: ['calc.py'] });
      const gateway = new ScriptedGateway([PLAN_REPLY]);

      const result = await createRunner(gateway).resumeTask('calc');

      expect(result).toMatchObject({ lastResult: 'no_test_cmd', iteration: 3, filesTouched: ['calc.py'] });
      expect(gateway.requests).toHaveLength(0);
    });

    it('finishes a completed run again without a turn', async () => {
      seedRun({ phase: 'DONE', iteration: 3, last_result: 'tests_passed', open_items: [], files_touched: [] });

      const result = await createRunner(new ScriptedGateway([PLAN_REPLY])).resumeTask('calc');

      expect(result).toMatchObject({ phase: 'DONE', lastResult: 'tests_passed', iteration: 3 });
      expect(events).toHaveLength(0);
    });

    it('ends an unknown phase without writing a lesson', async () => {
      seedRun({ phase: 'DEPLOY', iteration: 1 });

      const result = await createRunner(new ScriptedGateway([PLAN_REPLY])).resumeTask('calc');

      expect(result).toMatchObject({ phase: 'DONE', lastResult: 'unknown_phase', iteration: 1, status: 'failed' });
      expect(events[0]).toMatchObject({ from: 'DEPLOY', to: 'DONE', trigger: 'UNKNOWN_PHASE' });
      expect(fs.existsSync(path.join(dir, 'memories', 'lessons', 'calc.md'))).toBe(false);
    });

    it('ends a non-string phase as unknown without running a turn', async () => {
      seedRun({ phase: 3, iteration: 5 });
      const gateway = new ScriptedGateway([PLAN_REPLY, IMPLEMENT_REPLY]);

      const result = await createRunner(gateway).resumeTask('calc');

      expect(result).toMatchObject({ phase: 'DONE', lastResult: 'unknown_phase', iteration: 5, status: 'failed' });
      expect(events[0]).toMatchObject({ from: '3', to: 'DONE', trigger: 'UNKNOWN_PHASE' });
      expect(gateway.requests).toHaveLength(0);
    });

    it('keeps the recorded result and touched files from state.json', async () => {
      seedRun({ phase: 'VERIFY', iteration: 2, last_result: 'implement_ok', files_touched: ['a.py'] });

      const result = await createRunner(new ScriptedGateway([PLAN_REPLY])).resumeTask('calc');

      expect(result).toMatchObject({ lastResult: 'no_test_cmd', iteration: 3, filesTouched: ['a.py'] });
      expect(readState('calc')).toEqual({ phase: 'DONE', iteration: 3, last_result: 'no_test_cmd', open_items: [], files_touched: ['a.py'] });
    });

    it('reports a malformed state file instead of starting over', async () => {
      seedRun({ phase: 'REPAIR', iteration: 'many' });
      const gateway = new ScriptedGateway([PLAN_REPLY]);

      await expect(createRunner(gateway).resumeTask('calc')).rejects.toThrow(StateFileError);
      expect(gateway.requests).toHaveLength(0);
    });

    it('throws TaskNotFoundError when the run has no task.json', async () => {
      await expect(createRunner(new ScriptedGateway([PLAN_REPLY])).resumeTask('nothing')).rejects.toThrow(TaskNotFoundError);
    });
  });
});
