/**
 * Shared types for the offer extraction pipeline
 */

import type { LLMMessage } from '../llm/LLMProvider.js';
import type { ProcurementRecord } from '../../validation/procurementSchemas.js';

export type { LineItem, ProcurementRecord } from '../../validation/procurementSchemas.js';

export interface RawDocument {
  bytes: Buffer;
  /** Declared media type, e.g. from the multipart part header */
  mediaType: string;
  fileName?: string;
}

export interface CleanedText {
  text: string;
  pageCount: number;
  pagesWithText: number;
  truncated: boolean;
  /** Length before truncation */
  originalLength: number;
}

export interface ExtractionPrompt {
  readonly version: string;
  readonly messages: readonly LLMMessage[];
}

export interface RawModelOutput {
  content: string;
  model: string;
  attempts: number;
}

export interface CommodityGroupSuggestion {
  label: string;
  /** Probability of the chosen label, in [0, 1] */
  confidence: number;
  modelVersion: string;
}

export type PipelineStage = 'Received' | 'Sanitizing' | 'Prompting' | 'AwaitingModel' | 'Validating';

export type FailureReason =
  | 'UnreadableDocument'
  | 'Timeout'
  | 'ServiceUnavailable'
  | 'Cancelled'
  | 'MalformedOutput'
  | 'SchemaViolation';

export interface FieldIssue {
  field: string;
  message: string;
}

export interface ReconciliationWarning {
  kind: 'line_total_mismatch';
  lineIndex: number;
  expected: number;
  stated: number;
}

/**
 * Stage outcomes. Each stage returns one of these instead of throwing.
 */
export type StageResult<T, R extends FailureReason> =
  | { ok: true; value: T }
  | { ok: false; failure: StageFailure<R> };

export interface StageFailure<R extends FailureReason = FailureReason> {
  reason: R;
  message: string;
  /** First offending field for SchemaViolation */
  field?: string;
  issues?: FieldIssue[];
}

export interface ValidatedRecord {
  record: ProcurementRecord;
  warnings: ReconciliationWarning[];
}

export interface PipelineSuccess {
  status: 'succeeded';
  record: ProcurementRecord;
  warnings: ReconciliationWarning[];
  suggestion: CommodityGroupSuggestion;
  meta: {
    pageCount: number;
    truncated: boolean;
    model: string;
    attempts: number;
  };
}

export interface PipelineFailure extends StageFailure {
  status: 'failed';
  stage: PipelineStage;
  suggestion: CommodityGroupSuggestion;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;
