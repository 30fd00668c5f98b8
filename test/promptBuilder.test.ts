import { describe, it, expect } from 'vitest';
import { PromptBuilder, PROMPT_VERSION } from '../src/server/services/procurement/PromptBuilder.js';
import { SchemaValidator } from '../src/server/services/procurement/SchemaValidator.js';
import type { CleanedText } from '../src/server/services/procurement/types.js';

function cleaned(text: string): CleanedText {
  return { text, pageCount: 1, pagesWithText: 1, truncated: false, originalLength: text.length };
}

describe('PromptBuilder', () => {
  const builder = new PromptBuilder();

  it('stamps the prompt with its version', () => {
    expect(builder.build(cleaned('x')).version).toBe('offer-extraction/v3+procurement-fields/v1');
    expect(PROMPT_VERSION).toBe('offer-extraction/v3+procurement-fields/v1');
  });

  it('puts the system rules first and the document last', () => {
    const { messages } = builder.build(cleaned('--- Page 1 ---\nAcme GmbH'));

    expect(messages).toHaveLength(6);
    expect(messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user', 'assistant', 'user']);
    expect(messages[5]).toEqual({ role: 'user', content: 'Document Text:\n--- Page 1 ---\nAcme GmbH' });
  });

  it('renders the vendor column remapping rules', () => {
    const system = builder.build(cleaned('x')).messages[0].content;

    expect(system).toContain('   - vendor column "Quantity" -> "amount"');
    expect(system).toContain('   - vendor column "Unit Price" -> "unit_price"');
    expect(system).toContain(
      'Use ONLY these top-level keys: vendor_name, vat_id, total_cost, currency, line_items, title, department, requestor_name, description_text.'
    );
    expect(system.endsWith('Return ONLY the JSON object. No prose, no explanations, no Markdown code fences.')).toBe(
      true
    );
  });

  it('is deterministic for the same text', () => {
    expect(builder.build(cleaned('same'))).toEqual(new PromptBuilder().build(cleaned('same')));
  });

  it('returns frozen messages', () => {
    const prompt = builder.build(cleaned('x'));
    expect(Object.isFrozen(prompt)).toBe(true);
    expect(Object.isFrozen(prompt.messages)).toBe(true);
    expect(Object.isFrozen(prompt.messages[5])).toBe(true);
  });

  it('ships few-shot answers that pass record validation', () => {
    const validator = new SchemaValidator();
    const answers = builder.build(cleaned('x')).messages.filter((m) => m.role === 'assistant');

    for (const answer of answers) {
      expect(validator.validate({ content: answer.content })).toMatchObject({ ok: true, value: { warnings: [] } });
    }
  });
});
