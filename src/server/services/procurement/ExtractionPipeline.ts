/**
 * ExtractionPipeline - offer PDF in, procurement record and commodity suggestion out
 *
 * Received → Sanitizing → Prompting → AwaitingModel → Validating → Succeeded | Failed(stage, reason)
 *
 * Every outcome is returned as a PipelineResult; nothing thrown by a stage
 * escapes `run`. The commodity suggestion is attached to failures as well.
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../../utils/logger.js';
import type { TitleClassifier } from './CommodityClassifier.js';
import type { ExtractionClient } from './ExtractionClient.js';
import type { PromptBuilder } from './PromptBuilder.js';
import type { SchemaValidator } from './SchemaValidator.js';
import type { TextSanitizer } from './TextSanitizer.js';
import type {
  CommodityGroupSuggestion,
  FailureReason,
  PipelineFailure,
  PipelineResult,
  PipelineStage,
  ProcurementRecord,
  RawDocument,
  StageFailure,
} from './types.js';

export interface ExtractionPipelineDeps {
  sanitizer: Pick<TextSanitizer, 'sanitize'>;
  promptBuilder: Pick<PromptBuilder, 'build'>;
  client: Pick<ExtractionClient, 'extract'>;
  validator: Pick<SchemaValidator, 'validate'>;
  classifier: TitleClassifier;
}

export interface RunOptions {
  /** Title entered by the user; classified for the commodity suggestion */
  title?: string;
  /** Aborted when the requester goes away */
  signal?: AbortSignal;
}

/**
 * Title used for classification: the caller's, else the extracted one
 */
function classificationTitle(title: string | undefined, record?: ProcurementRecord): string {
  if (title && title.trim().length > 0) {
    return title;
  }
  return record?.title ?? record?.description_text ?? '';
}

export class ExtractionPipeline {
  constructor(private readonly deps: ExtractionPipelineDeps) {}

  async run(document: RawDocument, options: RunOptions = {}): Promise<PipelineResult> {
    const log = createChildLogger({ component: 'extraction-pipeline', fileName: document.fileName });
    const startedAt = Date.now();
    let stage: PipelineStage = 'Received';

    const enter = (next: PipelineStage) => {
      log.debug({ from: stage, to: next }, 'Pipeline stage transition');
      stage = next;
    };

    const fail = (failure: StageFailure, record?: ProcurementRecord): PipelineFailure => {
      log.warn(
        { stage, reason: failure.reason, field: failure.field, durationMs: Date.now() - startedAt },
        `Extraction failed: ${failure.message}`
      );
      return { status: 'failed', stage, ...failure, suggestion: this.suggest(options.title, log, record) };
    };

    const cancelled = (): PipelineFailure => fail({ reason: 'Cancelled', message: 'Extraction was cancelled' });

    try {
      if (options.signal?.aborted) {
        return cancelled();
      }

      enter('Sanitizing');
      const cleaned = await this.deps.sanitizer.sanitize(document);
      if (!cleaned.ok) {
        return fail(cleaned.failure);
      }
      if (options.signal?.aborted) {
        return cancelled();
      }

      enter('Prompting');
      const prompt = this.deps.promptBuilder.build(cleaned.value);

      enter('AwaitingModel');
      const output = await this.deps.client.extract(prompt, options.signal);
      if (!output.ok) {
        return fail(output.failure);
      }

      enter('Validating');
      const validated = this.deps.validator.validate(output.value);
      if (!validated.ok) {
        return fail(validated.failure);
      }

      const { record, warnings } = validated.value;
      log.info(
        {
          vendor: record.vendor_name,
          lineItems: record.line_items.length,
          warnings: warnings.length,
          truncated: cleaned.value.truncated,
          durationMs: Date.now() - startedAt,
        },
        'Extraction succeeded'
      );

      return {
        status: 'succeeded',
        record,
        warnings,
        suggestion: this.suggest(options.title, log, record),
        meta: {
          pageCount: cleaned.value.pageCount,
          truncated: cleaned.value.truncated,
          model: output.value.model,
          attempts: output.value.attempts,
        },
      };
    } catch (error) {
      log.error({ error, stage }, 'Unexpected error in extraction pipeline');
      return fail({ reason: reasonForUnexpected(stage), message: error instanceof Error ? error.message : String(error) });
    }
  }

  private suggest(title: string | undefined, log: Logger, record?: ProcurementRecord): CommodityGroupSuggestion {
    const suggestion = this.deps.classifier.classify(classificationTitle(title, record));
    log.debug({ label: suggestion.label, confidence: suggestion.confidence }, 'Commodity group suggested');
    return suggestion;
  }
}

/**
 * Failure reason for an exception a stage did not turn into a result itself
 */
function reasonForUnexpected(stage: PipelineStage): FailureReason {
  switch (stage) {
    case 'Received':
    case 'Sanitizing':
      return 'UnreadableDocument';
    case 'Prompting':
    case 'AwaitingModel':
      return 'ServiceUnavailable';
    case 'Validating':
      return 'MalformedOutput';
  }
}
