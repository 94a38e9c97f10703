import axios, { AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ChatMessage, CompletionRequest, ModelGateway, OllamaClientOptions } from './types';
import { EndpointNotFoundError, GatewayError, GatewayUnreachableError, ModelNotFoundError } from './errors';
import { silentLogger, type Logger } from '../utils/logger';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

const ChatResponseSchema = z.object({ message: z.object({ content: z.string().optional() }).optional() });
const GenerateResponseSchema = z.object({ response: z.string().optional() });

/** Strip a trailing slash and a trailing `/api` segment */
export function normalizeBaseUrl(baseUrl: string = DEFAULT_OLLAMA_BASE_URL): string {
  let base = baseUrl.replace(/\/+$/, '');
  if (base.endsWith('/api')) base = base.slice(0, -4);
  return base;
}

/** Flatten a chat transcript for the plain completion endpoint */
export function messagesToPrompt(messages: ChatMessage[]): string {
  const blocks = messages.map((message) => `${message.role.toUpperCase()}:\n${message.content}`);
  blocks.push('ASSISTANT:');
  return blocks.join('\n\n');
}

function extractErrorText(data: unknown): string {
  if (typeof data === 'string') return data.trim();
  if (data && typeof data === 'object' && 'error' in data) return String(data.error).trim();
  return data === undefined || data === null ? '' : JSON.stringify(data);
}

function mentionsMissingModel(data: unknown): boolean {
  const text = extractErrorText(data).toLowerCase();
  return text.includes('model') && text.includes('not found');
}

/**
 * Gateway for an Ollama-compatible server. Chat completions go to
 * `/api/chat`; when that endpoint answers 404 without naming the model the
 * client retries once against `/api/generate` with a flattened prompt.
 */
export class OllamaClient implements ModelGateway {
  private http: AxiosInstance;
  private baseUrl: string;
  private logRequests: boolean;

  constructor(
    options: OllamaClientOptions = {},
    private logger: Logger = silentLogger,
  ) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.logRequests = options.logRequests ?? false;
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? 60_000,
      headers: { 'Content-Type': 'application/json' },
      // 404 is inspected by the caller to tell a missing model from a missing endpoint
      validateStatus: (status) => (status >= 200 && status < 300) || status === 404,
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    if (this.logRequests) {
      this.http.interceptors.request.use((config) => {
        this.logger.debug(`[ollama] ${config.method?.toUpperCase() ?? 'POST'} ${config.url ?? ''}`);
        return config;
      });
    }

    this.http.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        const response = error.response;
        if (!response) {
          if (error.code === 'ECONNABORTED') {
            throw new GatewayError(`Model request timed out: ${error.message}`, 0, error);
          }
          throw new GatewayUnreachableError(this.baseUrl, error);
        }
        const detail = extractErrorText(response.data) || response.statusText;
        throw new GatewayError(`Model server returned ${response.status}: ${detail}`, response.status, error);
      },
    );
  }

  async complete({ model, messages }: CompletionRequest): Promise<string> {
    const chat = await this.http.post<unknown>('/api/chat', { model, messages, stream: false });
    if (chat.status !== 404) {
      const parsed = ChatResponseSchema.safeParse(chat.data);
      return parsed.success ? (parsed.data.message?.content ?? '') : '';
    }
    if (mentionsMissingModel(chat.data)) {
      throw new ModelNotFoundError(model);
    }

    this.logger.debug('Chat endpoint missing, falling back to /api/generate');
    const generate = await this.http.post<unknown>('/api/generate', { model, prompt: messagesToPrompt(messages), stream: false });
    if (generate.status === 404) {
      if (mentionsMissingModel(generate.data)) throw new ModelNotFoundError(model);
      throw new EndpointNotFoundError(this.baseUrl);
    }
    const parsed = GenerateResponseSchema.safeParse(generate.data);
    return parsed.success ? (parsed.data.response ?? '') : '';
  }
}
