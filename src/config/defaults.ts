import type { Config } from './validator';
import { DEFAULT_ALLOWED_COMMANDS, DEFAULT_COMMAND_TIMEOUT_MS, DEFAULT_MAX_OUTPUT } from '../sandbox/types';
import { DEFAULT_OLLAMA_BASE_URL } from '../models/ollama-client';
import { DEFAULT_ITERATION_LIMIT } from '../orchestrator/states';

export const CONFIG_FILE_NAME = 'kiln.config.yaml';

export const defaults: Config = {
  model: {
    name: 'qwen2.5-coder:1.5b',
    base_url: DEFAULT_OLLAMA_BASE_URL,
    timeout_ms: 60_000,
  },
  sandbox: {
    allowed_commands: [...DEFAULT_ALLOWED_COMMANDS],
    command_timeout_ms: DEFAULT_COMMAND_TIMEOUT_MS,
    max_output: DEFAULT_MAX_OUTPUT,
  },
  interactive: {
    watch: true,
    test_cmd: 'pytest -q',
    iteration_limit: DEFAULT_ITERATION_LIMIT,
    poll_interval_ms: 2000,
    quiet_interval_ms: 2000,
  },
  paths: {
    home: '.kiln',
  },
};
