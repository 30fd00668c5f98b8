/**
 * LLM Provider Abstraction
 *
 * Unified interface over completion backends so the extraction client can be
 * exercised against an in-process fake.
 */

export interface LLMProvider {
  /**
   * Generate a completion from the LLM
   * @param messages Array of messages (system, user, assistant)
   * @param options Optional configuration (temperature, max_tokens, abort signal, etc.)
   */
  generate(messages: readonly LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse>;

  /**
   * Get provider name
   */
  getName(): string;
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMGenerateOptions {
  temperature?: number;
  max_tokens?: number;
  model?: string;
  /** Ask the backend to constrain output to a single JSON object */
  responseFormat?: 'text' | 'json';
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}
