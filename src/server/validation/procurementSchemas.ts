import { z } from 'zod';
import {
    DEFAULT_CURRENCY,
    LINE_ITEM_FIELDS,
    RECORD_FIELDS,
    SUPPORTED_CURRENCIES,
} from '../services/procurement/fieldMapping.js';

/**
 * Only plain decimal literals are accepted as numeric strings ("1200.50", "-3", ".5").
 * Thousands separators, currency symbols and exponents are not.
 */
const NUMERIC_LITERAL = /^[+-]?(\d+(\.\d+)?|\.\d+)$/;

/** EU VAT shape after removing spaces, dots and hyphens: country prefix + 2-12 chars */
const VAT_ID_PATTERN = /^[A-Z]{2}[A-Z0-9+*]{2,12}$/;

const ABSENT_MARKERS = new Set(['', 'UNKNOWN', 'N/A', 'NA', 'NONE']);

const CURRENCY_SYMBOLS: Record<string, string> = {
    '€': 'EUR',
    '$': 'USD',
    '£': 'GBP',
};

export function coerceNumericLiteral(value: unknown): unknown {
    if (typeof value === 'string') {
        const trimmed = value.trim();
        if (NUMERIC_LITERAL.test(trimmed)) {
            return Number(trimmed);
        }
    }
    return value;
}

function blankToUndefined(value: unknown): unknown {
    if (value === null || value === undefined) {
        return undefined;
    }
    if (typeof value === 'string' && value.trim() === '') {
        return undefined;
    }
    return value;
}

function normalizeVatId(value: unknown): unknown {
    if (value === null || value === undefined) {
        return undefined;
    }
    if (typeof value === 'string') {
        const compact = value.replace(/[\s.-]/g, '').toUpperCase();
        return ABSENT_MARKERS.has(compact) ? undefined : compact;
    }
    return value;
}

function normalizeCurrency(value: unknown): unknown {
    const present = blankToUndefined(value);
    if (typeof present === 'string') {
        const trimmed = present.trim();
        return CURRENCY_SYMBOLS[trimmed] ?? trimmed.toUpperCase();
    }
    return present;
}

const decimal = () =>
    z.number({ required_error: 'Required', invalid_type_error: 'Expected a number or numeric string' }).finite();

const nonNegativeDecimal = z.preprocess(coerceNumericLiteral, decimal().nonnegative('Must not be negative'));
const positiveDecimal = z.preprocess(coerceNumericLiteral, decimal().positive('Must be greater than zero'));
const optionalNonNegativeDecimal = z.preprocess(
    (value) => coerceNumericLiteral(blankToUndefined(value)),
    decimal().nonnegative('Must not be negative').optional()
);

const requiredText = z
    .string({ required_error: 'Required', invalid_type_error: 'Expected a string' })
    .trim()
    .min(1, 'Must not be empty');
const optionalText = z.preprocess(blankToUndefined, z.string({ invalid_type_error: 'Expected a string' }).trim().optional());

export const lineItemSchema = z.object({
    [LINE_ITEM_FIELDS.description]: requiredText,
    [LINE_ITEM_FIELDS.amount]: positiveDecimal,
    [LINE_ITEM_FIELDS.unitPrice]: nonNegativeDecimal,
    [LINE_ITEM_FIELDS.unit]: optionalText,
    [LINE_ITEM_FIELDS.totalPrice]: optionalNonNegativeDecimal,
});

/**
 * Procurement record as emitted by the extraction model.
 * Key order is significant: the first failing key is reported as the offending field.
 */
export const procurementRecordSchema = z.object({
    [RECORD_FIELDS.vendorName]: requiredText,
    [RECORD_FIELDS.vatId]: z.preprocess(
        normalizeVatId,
        z
            .string({ invalid_type_error: 'Expected a string' })
            .regex(VAT_ID_PATTERN, 'Invalid VAT identifier format')
            .optional()
    ),
    [RECORD_FIELDS.totalCost]: nonNegativeDecimal,
    [RECORD_FIELDS.currency]: z.preprocess(normalizeCurrency, z.enum(SUPPORTED_CURRENCIES).default(DEFAULT_CURRENCY)),
    [RECORD_FIELDS.lineItems]: z.array(lineItemSchema, {
        required_error: 'Required',
        invalid_type_error: 'Expected an array of line items',
    }),
    [RECORD_FIELDS.title]: optionalText,
    [RECORD_FIELDS.department]: optionalText,
    [RECORD_FIELDS.requestorName]: optionalText,
    [RECORD_FIELDS.descriptionText]: optionalText,
});

export type LineItem = z.infer<typeof lineItemSchema>;
export type ProcurementRecord = z.infer<typeof procurementRecordSchema>;

/**
 * Request schemas for the procurement routes
 */
export const procurementRequestSchemas = {
    extractBody: z.object({
        title: z.string().max(300, 'Title must be at most 300 characters').optional(),
    }),
    classifyBody: z.object({
        title: z.string({ required_error: 'title is required' }).max(300, 'Title must be at most 300 characters'),
    }),
};
