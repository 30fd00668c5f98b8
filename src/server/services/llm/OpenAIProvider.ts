/**
 * OpenAI LLM Provider
 *
 * Implements LLMProvider interface for the OpenAI chat-completions API.
 * SDK-level retries are disabled; retry policy lives in the caller.
 */

import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { ExternalServiceError, OperationCancelledError } from '../../types/errors.js';
import {
  ServiceConfigurationError,
  ServiceConnectionError,
  ServiceRateLimitError,
} from '../../utils/serviceErrors.js';

export interface OpenAIProviderConfig {
  apiKey?: string;
  defaultModel?: string;
  baseURL?: string;
}

function toChatMessage(message: LLMMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

function parseRetryAfter(error: APIError): number | undefined {
  const header = error.headers?.['retry-after'];
  if (!header) {
    return undefined;
  }
  const seconds = parseInt(header, 10);
  return isNaN(seconds) ? undefined : seconds;
}

export class OpenAIProvider implements LLMProvider {
  private readonly config: OpenAIProviderConfig;
  private client: OpenAI | null = null;

  constructor(config: OpenAIProviderConfig = {}) {
    this.config = {
      defaultModel: 'gpt-4o-mini',
      ...config,
    };
  }

  getName(): string {
    return 'openai';
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new ServiceConfigurationError('OpenAI', ['OPENAI_API_KEY']);
      }
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseURL,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async generate(messages: readonly LLMMessage[], options: LLMGenerateOptions = {}): Promise<LLMResponse> {
    const client = this.getClient();
    const model = options.model || this.config.defaultModel || 'gpt-4o-mini';
    const temperature = options.temperature ?? 0;
    const maxTokens = options.max_tokens;

    try {
      const response = await client.chat.completions.create(
        {
          model,
          messages: messages.map(toChatMessage),
          temperature,
          ...(maxTokens !== undefined && { max_tokens: maxTokens }),
          ...(options.responseFormat === 'json' && { response_format: { type: 'json_object' as const } }),
        },
        { signal: options.signal }
      );

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ExternalServiceError('OpenAI', 'Empty response from OpenAI', {
          reason: 'empty_response',
          model,
          finishReason: response.choices[0]?.finish_reason,
        });
      }

      return {
        content,
        model: response.model,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      throw this.translateError(error, options.signal, model);
    }
  }

  /**
   * Map SDK errors onto the service error types the retry policy understands
   */
  private translateError(error: unknown, signal: AbortSignal | undefined, model: string): unknown {
    if (error instanceof APIUserAbortError) {
      const reason: unknown = signal?.reason;
      return reason instanceof Error ? reason : new OperationCancelledError('OpenAI request was aborted');
    }
    if (error instanceof APIConnectionError) {
      logger.warn({ error: error.message, model }, 'OpenAI connection error');
      return new ServiceConnectionError('OpenAI', undefined, error.message);
    }
    if (error instanceof APIError) {
      logger.warn({ status: error.status, error: error.message, model }, 'OpenAI API error');
      if (error.status === 429) {
        return new ServiceRateLimitError('OpenAI', parseRetryAfter(error));
      }
      return new ServiceConnectionError('OpenAI', error.status, error.message);
    }
    logger.error({ error, model }, 'Error calling OpenAI');
    return error;
  }
}
