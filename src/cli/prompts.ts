import inquirer from 'inquirer';
import type { Config } from '../config/validator';

interface PromptAnswers {
  modelName: string;
  baseUrl: string;
}

export type ModelSettings = Pick<Config['model'], 'name' | 'base_url'>;

export const promptForModelSettings = async (current: ModelSettings): Promise<ModelSettings> => {
  const answers = await inquirer.prompt<PromptAnswers>([
    {
      type: 'input',
      name: 'modelName',
      message: 'Model name (as installed in Ollama):',
      default: current.name,
      validate: (input: string) => input.trim().length > 0 || 'Model name is required',
    },
    {
      type: 'input',
      name: 'baseUrl',
      message: 'Ollama base URL:',
      default: current.base_url,
      validate: (input: string) => /^https?:\/\//.test(input.trim()) || 'Base URL must start with http:// or https://',
    },
  ]);

  return { name: answers.modelName.trim(), base_url: answers.baseUrl.trim() };
};

/** Render settings as `.env` lines */
export function toEnvFile(settings: ModelSettings): string {
  return `KILN_MODEL=${settings.name}\nKILN_BASE_URL=${settings.base_url}\n`;
}
