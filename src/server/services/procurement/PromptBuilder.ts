/**
 * PromptBuilder - few-shot instruction payload for offer extraction
 *
 * Pure: the same cleaned text always yields the same messages.
 */

import type { LLMMessage } from '../llm/LLMProvider.js';
import type { CleanedText, ExtractionPrompt, ProcurementRecord } from './types.js';
import {
  FIELD_MAPPING_VERSION,
  LINE_ITEM_FIELDS,
  RECORD_FIELDS,
  SUPPORTED_CURRENCIES,
  DEFAULT_CURRENCY,
  VENDOR_LABEL_REMAPS,
} from './fieldMapping.js';

export const PROMPT_VERSION = `offer-extraction/v3+${FIELD_MAPPING_VERSION}`;

interface FewShotExample {
  input: string;
  output: ProcurementRecord;
}

const FEW_SHOT_EXAMPLES: readonly FewShotExample[] = [
  {
    input: [
      '--- Page 1 ---',
      'Northwind Software GmbH',
      'USt-IdNr.: DE 123 456 789',
      'Offer 2024-117 for Creative Marketing',
      'Description | Quantity | Unit | Unit Price | Total',
      'Design Suite annual license | 10 | licenses | 150,00 € | 1.500,00 €',
      'Net total: 1.500,00 EUR',
    ].join('\n'),
    output: {
      vendor_name: 'Northwind Software GmbH',
      vat_id: 'DE123456789',
      total_cost: 1500,
      currency: 'EUR',
      line_items: [
        { description: 'Design Suite annual license', amount: 10, unit_price: 150, unit: 'licenses', total_price: 1500 },
      ],
      title: 'Design software licenses',
      department: 'Creative Marketing',
      description_text: 'Annual licenses for the design suite',
    },
  },
  {
    input: [
      '--- Page 1 ---',
      'Harbor Office Supplies Ltd.',
      'Quote for 2 items',
      'Ergonomic desk chair   Quantity: 4   Unit Price: $289.50',
      'Monitor arm            Quantity: 4   Unit Price: $64.00',
      'Grand total $1,414.00',
    ].join('\n'),
    output: {
      vendor_name: 'Harbor Office Supplies Ltd.',
      total_cost: 1414,
      currency: 'USD',
      line_items: [
        { description: 'Ergonomic desk chair', amount: 4, unit_price: 289.5 },
        { description: 'Monitor arm', amount: 4, unit_price: 64 },
      ],
      title: 'Office chairs and monitor arms',
      description_text: 'Ergonomic desk chairs with monitor arms',
    },
  },
];

function buildSystemPrompt(): string {
  const recordFields = Object.values(RECORD_FIELDS).join(', ');
  const lineItemFields = Object.values(LINE_ITEM_FIELDS).join(', ');
  const remapRules = VENDOR_LABEL_REMAPS.map(
    (remap) => `   - vendor column "${remap.vendorLabel}" -> "${remap.field}"`
  ).join('\n');

  return [
    'You are a procurement data extractor. Convert the vendor offer text into ONE JSON object.',
    '',
    'RULES',
    `1. Use ONLY these top-level keys: ${recordFields}.`,
    `2. "${RECORD_FIELDS.lineItems}" is an array of objects with EXACTLY these keys: ${lineItemFields}.`,
    '3. Map vendor column labels to keys as follows:',
    remapRules,
    `4. "${RECORD_FIELDS.currency}" is an ISO code, one of: ${SUPPORTED_CURRENCIES.join(', ')}. Use ${DEFAULT_CURRENCY} if the offer does not say.`,
    '5. All prices, totals and quantities are plain JSON numbers with "." as decimal separator: no currency symbols, no thousands separators.',
    `6. "${RECORD_FIELDS.totalCost}" is the net total of the offer. Never invent quantities or prices.`,
    `7. Use null for any value that is not in the document (for example a missing "${RECORD_FIELDS.vatId}").`,
    `8. "${RECORD_FIELDS.title}" is a short summary of the purchase; "${RECORD_FIELDS.descriptionText}" summarizes all items.`,
    '',
    'OUTPUT',
    'Return ONLY the JSON object. No prose, no explanations, no Markdown code fences.',
  ].join('\n');
}

function documentMessage(text: string): string {
  return `Document Text:\n${text}`;
}

export class PromptBuilder {
  private readonly preamble: readonly LLMMessage[];

  constructor() {
    const messages: LLMMessage[] = [{ role: 'system', content: buildSystemPrompt() }];
    for (const example of FEW_SHOT_EXAMPLES) {
      messages.push({ role: 'user', content: documentMessage(example.input) });
      messages.push({ role: 'assistant', content: JSON.stringify(example.output) });
    }
    this.preamble = Object.freeze(messages.map((message) => Object.freeze(message)));
  }

  build(cleaned: CleanedText): ExtractionPrompt {
    const messages: readonly LLMMessage[] = Object.freeze([
      ...this.preamble,
      Object.freeze({ role: 'user' as const, content: documentMessage(cleaned.text) }),
    ]);
    return Object.freeze({ version: PROMPT_VERSION, messages });
  }
}
