import { z } from 'zod';
import { ModelResponseParseError } from './errors';

const WriteFileSchema = z.object({ tool: z.literal('write_file'), path: z.string(), content: z.string() }).strict();
const ReadFileSchema = z.object({ tool: z.literal('read_file'), path: z.string() }).strict();
const ListDirSchema = z.object({ tool: z.literal('list_dir'), path: z.string() }).strict();
const SearchInFilesSchema = z.object({ tool: z.literal('search_in_files'), path: z.string(), query: z.string() }).strict();
const RunCmdSchema = z.object({ tool: z.literal('run_cmd'), cmd: z.string(), cwd: z.string() }).strict();

export const ActionRequestSchema = z.discriminatedUnion('tool', [WriteFileSchema, ReadFileSchema, ListDirSchema, SearchInFilesSchema, RunCmdSchema]);

export const ModelTurnResultSchema = z
  .object({
    thought: z.string(),
    actions: z.array(ActionRequestSchema).default([]),
  })
  .strict();

export type ActionRequest = z.infer<typeof ActionRequestSchema>;
export type ToolName = ActionRequest['tool'];
export type ModelTurnResult = z.infer<typeof ModelTurnResultSchema>;

/**
 * Parse a raw completion into a ModelTurnResult. The trimmed text must be
 * a single JSON document; prose around it is not tolerated.
 *
 * @throws {ModelResponseParseError}
 */
export function parseActionResponse(raw: string): ModelTurnResult {
  let data: unknown;
  try {
    data = JSON.parse(raw.trim());
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ModelResponseParseError(`Invalid JSON from model: ${detail}`, raw);
  }

  const result = ModelTurnResultSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new ModelResponseParseError(`Invalid action schema: ${issues}`, raw);
  }
  return result.data;
}
