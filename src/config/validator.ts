import { z } from 'zod';

export const ConfigSchema = z.object({
  model: z.object({
    name: z.string().min(1, 'Model name is required'),
    base_url: z.string().url('Base URL must be a valid URL'),
    timeout_ms: z.coerce.number().int().positive(),
  }),
  sandbox: z.object({
    allowed_commands: z.array(z.string().min(1)).min(1),
    command_timeout_ms: z.coerce.number().int().positive(),
    max_output: z.coerce.number().int().positive(),
  }),
  interactive: z.object({
    watch: z.boolean(),
    test_cmd: z.string(),
    iteration_limit: z.coerce.number().int().nonnegative(),
    poll_interval_ms: z.coerce.number().int().positive(),
    quiet_interval_ms: z.coerce.number().int().nonnegative(),
  }),
  paths: z.object({
    home: z.string().min(1),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? U[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export class ConfigValidationError extends Error {
  constructor(public issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigValidationError';
  }
}
