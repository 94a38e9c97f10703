import fs from 'fs/promises';
import path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { errorCode, errorMessage } from '../utils/errors';
import { TaskDefinitionError } from './errors';
import type { Task } from './states';

const ConstraintsSchema = z
  .object({
    test_cmd: z.string().optional(),
    iteration_limit: z.number().int().nonnegative().optional(),
    time_budget_iters: z.number().int().nonnegative().optional(),
  })
  .passthrough();

export const TaskDefinitionSchema = z.object({
  id: z.string().min(1, 'id is required'),
  title: z.string().default(''),
  goal: z.string().default(''),
  constraints: ConstraintsSchema.default({}),
  context: z.record(z.unknown()).default({}),
});

function isYamlPath(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

/** Validate an already-decoded task definition */
export function parseTaskDefinition(data: unknown, source: string): Task {
  const result = TaskDefinitionSchema.safeParse(data);
  if (!result.success) {
    throw new TaskDefinitionError(
      source,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Read a task definition from JSON, or YAML when the extension says so.
 *
 * @throws {TaskDefinitionError} for unreadable, undecodable or invalid files
 */
export async function loadTaskFile(taskPath: string): Promise<Task> {
  let raw: string;
  try {
    raw = await fs.readFile(taskPath, 'utf8');
  } catch (error) {
    const reason = errorCode(error) === 'ENOENT' ? 'file not found' : errorMessage(error);
    throw new TaskDefinitionError(taskPath, [reason]);
  }

  let data: unknown;
  try {
    data = isYamlPath(taskPath) ? YAML.parse(raw) : JSON.parse(raw);
  } catch (error) {
    throw new TaskDefinitionError(taskPath, [errorMessage(error)]);
  }
  return parseTaskDefinition(data, taskPath);
}

export function serializeTask(task: Task): string {
  const { id, title, goal, constraints, context } = task;
  return JSON.stringify({ id, title, goal, constraints, context }, null, 2);
}
