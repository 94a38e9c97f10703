import axios, { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosInstance } from 'axios';
import { OllamaClient, messagesToPrompt, normalizeBaseUrl } from '../../../src/models/ollama-client';
import { EndpointNotFoundError, GatewayError, GatewayUnreachableError, ModelNotFoundError } from '../../../src/models/errors';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('OllamaClient', () => {
  let client: OllamaClient;
  const mockAxiosInstance = {
    post: jest.fn(),
    interceptors: {
      request: { use: jest.fn() },
      response: { use: jest.fn() },
    },
  };
  const getResponseErrorInterceptor = (): ((error: AxiosError) => unknown) => {
    const call = mockAxiosInstance.interceptors.response.use.mock.calls[0] as unknown[];
    const handler = call[1];
    if (typeof handler !== 'function') throw new Error('no error interceptor registered');
    return (error: AxiosError) => handler(error) as unknown;
  };
  const messages = [
    { role: 'system' as const, content: 'be brief' },
    { role: 'user' as const, content: 'hi' },
  ];

  beforeEach(() => {
    jest.clearAllMocks();
    mockedAxios.create.mockReturnValue(mockAxiosInstance as unknown as AxiosInstance);
    client = new OllamaClient({ baseUrl: 'http://localhost:11434/api/' });
  });

  it('normalizes the base URL before creating the instance', () => {
    expect(mockedAxios.create).toHaveBeenCalledWith(expect.objectContaining({ baseURL: 'http://localhost:11434', timeout: 60000 }));
  });

  it('posts to /api/chat without streaming and returns the message content', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({ status: 200, data: { message: { role: 'assistant', content: '{"thought":"x"}' } } });

    await expect(client.complete({ model: 'tiny', messages })).resolves.toBe('{"thought":"x"}');
    expect(mockAxiosInstance.post).toHaveBeenCalledWith('/api/chat', { model: 'tiny', messages, stream: false });
  });

  it('returns an empty string when the chat reply has no content', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({ status: 200, data: {} });
    await expect(client.complete({ model: 'tiny', messages })).resolves.toBe('');
  });

  it('reports a missing model on a chat 404 that says so', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({ status: 404, data: { error: "model 'tiny' not found" } });

    await expect(client.complete({ model: 'tiny', messages })).rejects.toThrow(ModelNotFoundError);
    expect(mockAxiosInstance.post).toHaveBeenCalledTimes(1);
  });

  it('falls back to /api/generate with a flattened prompt', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({ status: 404, data: '404 page not found' }).mockResolvedValueOnce({ status: 200, data: { response: 'generated' } });

    await expect(client.complete({ model: 'tiny', messages })).resolves.toBe('generated');
    expect(mockAxiosInstance.post).toHaveBeenLastCalledWith('/api/generate', {
      model: 'tiny',
      prompt: 'SYSTEM:\nbe brief\n\nUSER:\nhi\n\nASSISTANT:',
      stream: false,
    });
  });

  it('reports a missing endpoint when the fallback also 404s', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({ status: 404, data: '' }).mockResolvedValueOnce({ status: 404, data: '' });
    await expect(client.complete({ model: 'tiny', messages })).rejects.toThrow(EndpointNotFoundError);
  });

  it('reports a missing model from the fallback endpoint', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({ status: 404, data: '' }).mockResolvedValueOnce({ status: 404, data: { error: 'model not found, try pulling it first' } });
    await expect(client.complete({ model: 'tiny', messages })).rejects.toThrow(ModelNotFoundError);
  });

  describe('error interceptor', () => {
    const config = { headers: new AxiosHeaders() };

    it('maps a missing response to GatewayUnreachableError', () => {
      const error = new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
      expect(() => getResponseErrorInterceptor()(error)).toThrow(GatewayUnreachableError);
    });

    it('maps a timeout to GatewayError', () => {
      const error = new AxiosError('timeout of 60000ms exceeded', 'ECONNABORTED', config);
      expect(() => getResponseErrorInterceptor()(error)).toThrow('Model request timed out: timeout of 60000ms exceeded');
    });

    it('maps other statuses to GatewayError with the server message', () => {
      const error = new AxiosError('Request failed', 'ERR_BAD_RESPONSE', config, undefined, {
        status: 500,
        statusText: 'Internal Server Error',
        data: { error: 'out of memory' },
        headers: {},
        config,
      });
      try {
        getResponseErrorInterceptor()(error);
        throw new Error('expected the interceptor to throw');
      } catch (thrown) {
        expect(thrown).toBeInstanceOf(GatewayError);
        if (thrown instanceof GatewayError) {
          expect(thrown.status).toBe(500);
          expect(thrown.message).toBe('Model server returned 500: out of memory');
        }
      }
    });
  });
});

describe('helpers', () => {
  it('normalizeBaseUrl strips trailing slash and /api', () => {
    expect(normalizeBaseUrl('http://host:1/')).toBe('http://host:1');
    expect(normalizeBaseUrl('http://host:1/api')).toBe('http://host:1');
    expect(normalizeBaseUrl()).toBe('http://localhost:11434');
  });

  it('messagesToPrompt ends with the assistant cue', () => {
    expect(messagesToPrompt([])).toBe('ASSISTANT:');
  });
});
