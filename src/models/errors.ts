export class GatewayError extends Error {
  constructor(
    message: string,
    public status?: number,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

export class GatewayUnreachableError extends GatewayError {
  constructor(baseUrl: string, originalError?: unknown) {
    super(`Model server unreachable at ${baseUrl}`, 0, originalError);
    this.name = 'GatewayUnreachableError';
  }
}

export class ModelNotFoundError extends GatewayError {
  constructor(public model: string) {
    super(`Ollama model not found: ${model}. Set KILN_MODEL to an installed model or run \`ollama pull ${model}\`.`, 404);
    this.name = 'ModelNotFoundError';
  }
}

export class EndpointNotFoundError extends GatewayError {
  constructor(baseUrl: string) {
    super(`Ollama API not found at base URL ${baseUrl}. Set KILN_BASE_URL to the server root, e.g. http://localhost:11434.`, 404);
    this.name = 'EndpointNotFoundError';
  }
}
