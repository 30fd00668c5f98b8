/**
 * ExtractionClient - one completion call per prompt, bounded in time
 *
 * Each attempt runs under its own deadline. Transient failures (timeouts, 429,
 * 5xx, connection errors) get `maxRetries` more attempts with backoff; whatever
 * fails last decides between Timeout and ServiceUnavailable.
 */

import type { Logger } from 'pino';
import type { LLMProvider } from '../llm/LLMProvider.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { withDeadline } from '../../utils/withTimeout.js';
import { OperationCancelledError, RequestTimeoutError } from '../../types/errors.js';
import type { ExtractionPrompt, RawModelOutput, StageResult } from './types.js';

export type ExtractionFailureReason = 'Timeout' | 'ServiceUnavailable' | 'Cancelled';

export interface ExtractionClientOptions {
  /** Per-attempt deadline */
  timeoutMs: number;
  /** Retries after the first attempt */
  maxRetries: number;
  /** Backoff before the first retry; doubles per retry */
  retryDelayMs: number;
  model?: string;
  /** Request JSON-object output from backends that support it */
  jsonMode?: boolean;
  logger?: Logger;
}

export class ExtractionClient {
  private readonly logger: Logger;

  constructor(
    private readonly provider: LLMProvider,
    private readonly options: ExtractionClientOptions
  ) {
    this.logger = options.logger ?? rootLogger;
  }

  async extract(
    prompt: ExtractionPrompt,
    signal?: AbortSignal
  ): Promise<StageResult<RawModelOutput, ExtractionFailureReason>> {
    let attempts = 0;
    const startedAt = Date.now();

    try {
      const response = await retryWithBackoff(
        () =>
          withDeadline(
            (attemptSignal) =>
              this.provider.generate(prompt.messages, {
                model: this.options.model,
                temperature: 0,
                responseFormat: this.options.jsonMode ? 'json' : 'text',
                signal: attemptSignal,
              }),
            this.options.timeoutMs,
            { operationName: `${this.provider.getName()} completion`, signal }
          ),
        {
          maxRetries: this.options.maxRetries,
          initialDelay: this.options.retryDelayMs,
          signal,
          onAttempt: (attempt) => {
            attempts = attempt + 1;
          },
        },
        'offer extraction'
      );

      this.logger.info(
        {
          provider: this.provider.getName(),
          model: response.model,
          attempts,
          durationMs: Date.now() - startedAt,
          usage: response.usage,
          promptVersion: prompt.version,
        },
        'Model extraction completed'
      );

      return { ok: true, value: { content: response.content, model: response.model, attempts } };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const reason = classifyFailure(error);

      this.logger.warn(
        { provider: this.provider.getName(), attempts, reason, error: message, durationMs: Date.now() - startedAt },
        'Model extraction failed'
      );

      return { ok: false, failure: { reason, message } };
    }
  }
}

function classifyFailure(error: unknown): ExtractionFailureReason {
  if (error instanceof OperationCancelledError) {
    return 'Cancelled';
  }
  if (error instanceof RequestTimeoutError) {
    return 'Timeout';
  }
  return 'ServiceUnavailable';
}
