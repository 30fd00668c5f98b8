import { beforeEach, describe, it, expect, vi } from 'vitest';
import { APIConnectionError, APIError, APIUserAbortError } from 'openai';
import { OpenAIProvider } from '../src/server/services/llm/OpenAIProvider.js';
import { ExternalServiceError, RequestTimeoutError } from '../src/server/types/errors.js';
import {
  ServiceConfigurationError,
  ServiceConnectionError,
  ServiceRateLimitError,
} from '../src/server/utils/serviceErrors.js';

const { create, clientOptions } = vi.hoisted(() => ({
  create: vi.fn(),
  clientOptions: vi.fn(),
}));

vi.mock('openai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('openai')>();
  class FakeOpenAI {
    chat = { completions: { create } };
    constructor(options: unknown) {
      clientOptions(options);
    }
  }
  return { ...actual, default: FakeOpenAI };
});

const messages = [
  { role: 'system' as const, content: 'Extract.' },
  { role: 'user' as const, content: 'Document Text:\nAcme' },
];

function completion(content: string | null) {
  return {
    model: 'gpt-4o-mini-2024-07-18',
    choices: [{ message: { content }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 120, completion_tokens: 40, total_tokens: 160 },
  };
}

describe('OpenAIProvider', () => {
  beforeEach(() => {
    create.mockReset();
    clientOptions.mockReset();
  });

  it('requires an API key', async () => {
    const provider = new OpenAIProvider({});
    await expect(provider.generate(messages)).rejects.toBeInstanceOf(ServiceConfigurationError);
    expect(create).not.toHaveBeenCalled();
  });

  it('sends a deterministic JSON-mode request and maps the response', async () => {
    create.mockResolvedValue(completion('  {"vendor_name":"Acme"}\n'));
    const provider = new OpenAIProvider({ apiKey: 'test-key' });
    const controller = new AbortController();

    const response = await provider.generate(messages, { responseFormat: 'json', signal: controller.signal });

    expect(clientOptions).toHaveBeenCalledWith(expect.objectContaining({ apiKey: 'test-key', maxRetries: 0 }));
    expect(create).toHaveBeenCalledWith(
      {
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: 'Extract.' },
          { role: 'user', content: 'Document Text:\nAcme' },
        ],
        temperature: 0,
        response_format: { type: 'json_object' },
      },
      { signal: controller.signal }
    );
    expect(response).toEqual({
      content: '{"vendor_name":"Acme"}',
      model: 'gpt-4o-mini-2024-07-18',
      usage: { promptTokens: 120, completionTokens: 40, totalTokens: 160 },
    });
  });

  it('uses the requested model', async () => {
    create.mockResolvedValue(completion('{}'));
    await new OpenAIProvider({ apiKey: 'test-key', defaultModel: 'gpt-4o' }).generate(messages, { model: 'gpt-4.1' });
    expect(create.mock.calls[0][0]).toMatchObject({ model: 'gpt-4.1' });
  });

  it('treats an empty completion as a service error', async () => {
    create.mockResolvedValue(completion(null));
    await expect(new OpenAIProvider({ apiKey: 'test-key' }).generate(messages)).rejects.toBeInstanceOf(
      ExternalServiceError
    );
  });

  it('maps 429 to a rate limit error with the retry-after hint', async () => {
    create.mockRejectedValue(new APIError(429, undefined, 'Rate limit reached', { 'retry-after': '7' }));

    const error = await new OpenAIProvider({ apiKey: 'test-key' }).generate(messages).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceRateLimitError);
    expect(error).toMatchObject({ statusCode: 429, retryAfterSeconds: 7 });
  });

  it('maps other API errors to connection errors carrying the status', async () => {
    create.mockRejectedValue(new APIError(503, undefined, 'Service Unavailable', undefined));

    const error = await new OpenAIProvider({ apiKey: 'test-key' }).generate(messages).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceConnectionError);
    expect(error).toMatchObject({ statusCode: 503 });
  });

  it('maps transport failures to connection errors without a status', async () => {
    create.mockRejectedValue(new APIConnectionError({ message: 'Connection error.' }));

    const error = await new OpenAIProvider({ apiKey: 'test-key' }).generate(messages).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceConnectionError);
    expect(error).toMatchObject({ statusCode: undefined });
  });

  it('surfaces the abort reason when the request is aborted', async () => {
    const controller = new AbortController();
    const deadline = new RequestTimeoutError('openai completion timed out after 10ms');
    controller.abort(deadline);
    create.mockRejectedValue(new APIUserAbortError());

    const error = await new OpenAIProvider({ apiKey: 'test-key' })
      .generate(messages, { signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBe(deadline);
  });
});
