import type { Task } from '../orchestrator/states';
import type { ChatMessage } from '../models/types';
import { goalMentionsPrint } from './action-guards';

export const SYSTEM_PROMPT = `You are Kiln, a coding agent working inside a sandboxed workspace.
Reply with ONLY a JSON object of this exact shape:
{
  "thought": "string",
  "actions": [
    { "tool": "write_file", "path": "...", "content": "..." },
    { "tool": "read_file", "path": "..." },
    { "tool": "list_dir", "path": "..." },
    { "tool": "search_in_files", "path": "...", "query": "..." },
    { "tool": "run_cmd", "cmd": "...", "cwd": "..." }
  ]
}
No prose, no markdown, no code fences and no keys beyond those shown.
When nothing needs doing, answer {"thought": "...", "actions": []}.
The "..." above are placeholders: always give real paths, commands and queries.
Write pytest-style tests unless the task names another framework.
Leave pytest.ini alone unless the task asks for it.
Tool rules: every path and cwd stays inside the workspace root, and only allowed commands run.`;

const PRINT_TESTING_HINT = 'Testing hint: the goal mentions printing, so tests should capture stdout rather than check return values. In pytest use the capsys fixture.\n';

/** Per-phase instructions appended as the final user message of a turn */
export const PHASE_PROMPTS = {
  plan: (planPath: string) => `Create a short plan with steps and a verification strategy, then write it to ${planPath} using write_file.`,
  implement: 'Implement the task. Use tools to read/write files as needed.',
  repair: 'Fix the issues from the last step. Use tools to update files.',
} as const;

export class ContextBuilder {
  /** Task description block shown to the model on every turn */
  static buildTaskContext(task: Task, workspaceRoot: string): string {
    const hint = goalMentionsPrint(task.goal) ? PRINT_TESTING_HINT : '';
    return [
      `Workspace root: ${workspaceRoot}`,
      `Task id: ${task.id}`,
      `Title: ${task.title}`,
      `Goal: ${task.goal}`,
      `Constraints: ${JSON.stringify(task.constraints)}`,
      `Context: ${JSON.stringify(task.context)}`,
      'Tool rules: paths and cwd must stay inside the workspace.',
      '',
    ].join('\n') + hint;
  }

  /** Query used to pull lessons from memory for a task */
  static memoryQuery(task: Task): string {
    const notes = typeof task.context.notes === 'string' ? task.context.notes : '';
    return `${task.title} ${task.goal} ${notes}`;
  }

  /**
   * Messages shared by every turn of a run: system prompt, task context
   * and, when retrieval found anything, one block of memories.
   */
  static baseMessages(task: Task, workspaceRoot: string, memories: string[]): ChatMessage[] {
    const messages: ChatMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: ContextBuilder.buildTaskContext(task, workspaceRoot) },
    ];
    if (memories.length > 0) {
      messages.push({ role: 'user', content: `Relevant memories:\n${memories.join('\n\n')}` });
    }
    return messages;
  }

  static turnMessages(base: ChatMessage[], phasePrompt: string, lastFeedback: string): ChatMessage[] {
    const messages = [...base];
    if (lastFeedback) {
      messages.push({ role: 'user', content: `Last feedback:\n${lastFeedback}` });
    }
    messages.push({ role: 'user', content: phasePrompt });
    return messages;
  }
}
