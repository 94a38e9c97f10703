import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, ConfigValidationError, type Config, type DeepPartial } from './validator';
import { CONFIG_FILE_NAME, defaults } from './defaults';

export interface LoadConfigOptions {
  /** Directory holding `.env` and `kiln.config.yaml` (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Layered configuration: defaults, then kiln.config.yaml, then KILN_*
 * environment variables (a `.env` file is loaded first), then CLI flags.
 *
 * @throws {ConfigValidationError} listing every invalid field
 */
export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  dotenv.config({ path: path.join(cwd, '.env'), processEnv: env });

  const config: Record<string, unknown> = structuredClone(defaults);

  const yamlPath = path.join(cwd, CONFIG_FILE_NAME);
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    }
  }

  deepMerge(config, {
    model: {
      name: env.KILN_MODEL,
      base_url: env.KILN_BASE_URL,
      timeout_ms: env.KILN_TIMEOUT_MS,
    },
    paths: { home: env.KILN_HOME },
  });

  deepMerge(config, { ...cliOverrides });

  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return result.data;
}

/** Merge `source` into `target` in place; undefined values never overwrite */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    if (isRecord(sourceValue)) {
      const existing = target[key];
      const nested: Record<string, unknown> = isRecord(existing) ? existing : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = sourceValue;
    }
  }
}
