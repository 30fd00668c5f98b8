import type { Env } from '../../config/env.js';
import { PdfExtractor } from '../../extraction/pdf/PdfExtractor.js';
import type { LLMProvider } from '../llm/LLMProvider.js';
import { OpenAIProvider } from '../llm/OpenAIProvider.js';
import type { TitleClassifier } from './CommodityClassifier.js';
import { ExtractionClient } from './ExtractionClient.js';
import { ExtractionPipeline } from './ExtractionPipeline.js';
import { PromptBuilder } from './PromptBuilder.js';
import { SchemaValidator } from './SchemaValidator.js';
import { TextSanitizer } from './TextSanitizer.js';

export { ExtractionPipeline } from './ExtractionPipeline.js';
export { CommodityClassifier, type TitleClassifier } from './CommodityClassifier.js';
export { loadCommodityClassifier, ModelArtifactError } from './commodityModelLoader.js';
export type * from './types.js';

/**
 * Wire the pipeline from configuration. The classifier is loaded by the caller at startup.
 */
export function createExtractionPipeline(
  env: Env,
  classifier: TitleClassifier,
  provider: LLMProvider = new OpenAIProvider({ apiKey: env.OPENAI_API_KEY, defaultModel: env.OPENAI_MODEL })
): ExtractionPipeline {
  return new ExtractionPipeline({
    sanitizer: new TextSanitizer(new PdfExtractor(), {
      maxChars: env.EXTRACTION_MAX_CHARS,
      maxPages: env.EXTRACTION_MAX_PAGES,
    }),
    promptBuilder: new PromptBuilder(),
    client: new ExtractionClient(provider, {
      timeoutMs: env.AI_REQUEST_TIMEOUT_MS,
      maxRetries: env.AI_MAX_RETRIES,
      retryDelayMs: env.AI_RETRY_DELAY_MS,
      model: env.OPENAI_MODEL,
      jsonMode: env.OPENAI_JSON_MODE,
    }),
    validator: new SchemaValidator({ lineTotalTolerance: env.LINE_TOTAL_TOLERANCE }),
    classifier,
  });
}
