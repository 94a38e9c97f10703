export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
}

/** Anything that turns a chat transcript into one completion string */
export interface ModelGateway {
  complete(request: CompletionRequest): Promise<string>;
}

export interface OllamaClientOptions {
  /** Server root, e.g. http://localhost:11434 (a trailing `/api` is dropped) */
  baseUrl?: string;
  timeoutMs?: number;
  /** Log each request line through the given logger at debug level */
  logRequests?: boolean;
}
