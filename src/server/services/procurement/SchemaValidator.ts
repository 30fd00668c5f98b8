/**
 * SchemaValidator - turns untrusted model output into a ProcurementRecord
 *
 * Decoding and schema checks never throw; every problem becomes a
 * MalformedOutput or SchemaViolation result naming what was wrong.
 */

import type { ZodIssue } from 'zod';
import { procurementRecordSchema } from '../../validation/procurementSchemas.js';
import type {
  FieldIssue,
  ProcurementRecord,
  RawModelOutput,
  ReconciliationWarning,
  StageResult,
  ValidatedRecord,
} from './types.js';

export type ValidationFailureReason = 'MalformedOutput' | 'SchemaViolation';

export interface SchemaValidatorOptions {
  /** Allowed absolute difference between amount × unit_price and a stated line total */
  lineTotalTolerance: number;
}

/** Whole output wrapped in a single Markdown code fence */
const FENCED_BLOCK = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/;

function unwrapCodeFence(content: string): string {
  const trimmed = content.trim();
  const match = FENCED_BLOCK.exec(trimmed);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

function toFieldIssue(issue: ZodIssue): FieldIssue {
  return {
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  };
}

function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Render a record with the field names the model is asked to produce
 */
export function serializeRecord(record: ProcurementRecord): string {
  return JSON.stringify(record);
}

export class SchemaValidator {
  constructor(private readonly options: SchemaValidatorOptions = { lineTotalTolerance: 0.01 }) {}

  validate(output: Pick<RawModelOutput, 'content'>): StageResult<ValidatedRecord, ValidationFailureReason> {
    let decoded: unknown;
    try {
      decoded = JSON.parse(unwrapCodeFence(output.content));
    } catch (error) {
      return {
        ok: false,
        failure: {
          reason: 'MalformedOutput',
          message: `Model output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        },
      };
    }

    if (decoded === null || typeof decoded !== 'object' || Array.isArray(decoded)) {
      return {
        ok: false,
        failure: {
          reason: 'MalformedOutput',
          message: `Model output must be a JSON object, got ${Array.isArray(decoded) ? 'array' : decoded === null ? 'null' : typeof decoded}`,
        },
      };
    }

    const parsed = procurementRecordSchema.safeParse(decoded);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(toFieldIssue);
      const first = issues[0];
      return {
        ok: false,
        failure: {
          reason: 'SchemaViolation',
          message: first ? `Invalid field "${first.field}": ${first.message}` : 'Record does not match schema',
          field: first?.field,
          issues,
        },
      };
    }

    return { ok: true, value: { record: parsed.data, warnings: this.reconcile(parsed.data) } };
  }

  /**
   * Flag line items whose stated total disagrees with amount × unit price
   */
  reconcile(record: ProcurementRecord): ReconciliationWarning[] {
    const warnings: ReconciliationWarning[] = [];
    for (const [lineIndex, item] of record.line_items.entries()) {
      if (item.total_price === undefined) {
        continue;
      }
      const expected = roundToCents(item.amount * item.unit_price);
      if (Math.abs(expected - item.total_price) > this.options.lineTotalTolerance) {
        warnings.push({ kind: 'line_total_mismatch', lineIndex, expected, stated: item.total_price });
      }
    }
    return warnings;
  }
}
