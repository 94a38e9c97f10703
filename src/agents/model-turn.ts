import type { ChatMessage, ModelGateway } from '../models/types';
import type { JsonlLog } from '../utils/jsonl-log';
import { silentLogger, truncateForLog, type Logger } from '../utils/logger';
import { ContextBuilder } from './context-builder';
import { ModelResponseParseError } from './errors';
import { parseActionResponse, type ModelTurnResult } from './schema';

export interface ModelTurnOutcome {
  response: ModelTurnResult;
  /** Set when the completion could not be parsed; the response is then empty */
  parseError: string | null;
}

export interface ModelTurnOptions {
  gateway: ModelGateway;
  model: string;
  llmLog: JsonlLog;
  logger?: Logger;
}

/** One request/response exchange with the model, logged to llm.log */
export class ModelTurn {
  private logger: Logger;

  constructor(private options: ModelTurnOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async run(base: ChatMessage[], phasePrompt: string, lastFeedback: string): Promise<ModelTurnOutcome> {
    const { gateway, model, llmLog } = this.options;
    const messages = ContextBuilder.turnMessages(base, phasePrompt, lastFeedback);

    await llmLog.append({ request: messages });
    const text = await gateway.complete({ model, messages });
    await llmLog.append({ response: text });
    this.logger.debug('Model response', { text: truncateForLog(text) });

    try {
      return { response: parseActionResponse(text), parseError: null };
    } catch (error) {
      if (!(error instanceof ModelResponseParseError)) throw error;
      await llmLog.append({ parse_error: error.message });
      this.logger.warn('Model response did not parse', { error: error.message });
      return { response: { thought: 'invalid_json', actions: [] }, parseError: error.message };
    }
  }
}
