import { describe, it, expect } from 'vitest';
import { SchemaValidator, serializeRecord } from '../src/server/services/procurement/SchemaValidator.js';

const validator = new SchemaValidator();

function validate(value: unknown) {
  return validator.validate({ content: typeof value === 'string' ? value : JSON.stringify(value) });
}

const offer = {
  vendor_name: 'Acme GmbH',
  vat_id: 'DE123456789',
  total_cost: 1200.5,
  currency: 'EUR',
  line_items: [{ description: 'Laptop', amount: 2, unit_price: 600.25 }],
};

describe('SchemaValidator', () => {
  it('accepts a complete record', () => {
    expect(validate(offer)).toEqual({
      ok: true,
      value: {
        record: {
          vendor_name: 'Acme GmbH',
          vat_id: 'DE123456789',
          total_cost: 1200.5,
          currency: 'EUR',
          line_items: [{ description: 'Laptop', amount: 2, unit_price: 600.25 }],
        },
        warnings: [],
      },
    });
  });

  it('coerces plain numeric strings', () => {
    const result = validate({
      ...offer,
      total_cost: '1200.50',
      line_items: [{ description: 'Laptop', amount: '2', unit_price: ' 600.25 ' }],
    });

    expect(result.ok && result.value.record.total_cost).toBe(1200.5);
    expect(result.ok && result.value.record.line_items[0]).toEqual({
      description: 'Laptop',
      amount: 2,
      unit_price: 600.25,
    });
  });

  it('names total_cost when it is not numeric', () => {
    const result = validate({ ...offer, total_cost: 'twelve hundred' });

    expect(result).toMatchObject({
      ok: false,
      failure: {
        reason: 'SchemaViolation',
        field: 'total_cost',
        message: 'Invalid field "total_cost": Expected a number or numeric string',
      },
    });
  });

  it('rejects numbers with thousands separators', () => {
    const result = validate({ ...offer, total_cost: '1,200.50' });
    expect(!result.ok && result.failure.field).toBe('total_cost');
  });

  it('reports the first offending field in key order', () => {
    const result = validate({ vendor_name: '', total_cost: -1, line_items: [] });

    expect(!result.ok && result.failure.field).toBe('vendor_name');
    expect(!result.ok && result.failure.issues?.map((issue) => issue.field)).toEqual(['vendor_name', 'total_cost']);
  });

  it('points into line items by index', () => {
    const result = validate({
      ...offer,
      line_items: [offer.line_items[0], { description: 'Dock', amount: 0, unit_price: 80 }],
    });

    expect(!result.ok && result.failure.field).toBe('line_items.1.amount');
    expect(!result.ok && result.failure.message).toBe('Invalid field "line_items.1.amount": Must be greater than zero');
  });

  it('requires line_items but accepts an empty list', () => {
    const { line_items: _omitted, ...withoutItems } = offer;

    expect(validate(withoutItems)).toMatchObject({
      ok: false,
      failure: { field: 'line_items', message: 'Invalid field "line_items": Required' },
    });
    expect(validate({ ...offer, line_items: [] }).ok).toBe(true);
  });

  it('normalizes VAT identifiers and treats placeholders as absent', () => {
    const spaced = validate({ ...offer, vat_id: 'de 123.456-789' });
    const unknown = validate({ ...offer, vat_id: 'Unknown' });
    const nulled = validate({ ...offer, vat_id: null });

    expect(spaced.ok && spaced.value.record.vat_id).toBe('DE123456789');
    expect(unknown.ok && unknown.value.record.vat_id).toBeUndefined();
    expect(nulled.ok && nulled.value.record.vat_id).toBeUndefined();
  });

  it('rejects a malformed VAT identifier', () => {
    const result = validate({ ...offer, vat_id: '123456789' });
    expect(result).toMatchObject({
      ok: false,
      failure: { field: 'vat_id', message: 'Invalid field "vat_id": Invalid VAT identifier format' },
    });
  });

  it('defaults and normalizes the currency', () => {
    const { currency: _omitted, ...withoutCurrency } = offer;
    const defaulted = validate(withoutCurrency);
    const symbol = validate({ ...offer, currency: '$' });
    const lower = validate({ ...offer, currency: 'chf' });

    expect(defaulted.ok && defaulted.value.record.currency).toBe('EUR');
    expect(symbol.ok && symbol.value.record.currency).toBe('USD');
    expect(lower.ok && lower.value.record.currency).toBe('CHF');
    expect(validate({ ...offer, currency: 'BTC' })).toMatchObject({ ok: false, failure: { field: 'currency' } });
  });

  it('strips a Markdown code fence around the whole output', () => {
    const result = validate('```json\n' + JSON.stringify(offer) + '\n```');
    expect(result.ok).toBe(true);
  });

  it('reports output that is not JSON as malformed', () => {
    const result = validate('Here is the extracted data: {vendor_name: Acme}');
    expect(result.ok).toBe(false);
    expect(!result.ok && result.failure.reason).toBe('MalformedOutput');
    expect(!result.ok && result.failure.message.startsWith('Model output is not valid JSON: ')).toBe(true);
  });

  it('reports a JSON array as malformed', () => {
    expect(validate('[1, 2]')).toEqual({
      ok: false,
      failure: { reason: 'MalformedOutput', message: 'Model output must be a JSON object, got array' },
    });
  });

  it('drops keys outside the record shape', () => {
    const result = validate({ ...offer, confidence: 0.9 });
    expect(result.ok && Object.keys(result.value.record)).toEqual([
      'vendor_name',
      'vat_id',
      'total_cost',
      'currency',
      'line_items',
    ]);
  });

  it('keeps optional request fields, dropping blank ones', () => {
    const result = validate({ ...offer, title: ' Laptops ', department: '', requestor_name: null });

    expect(result.ok && result.value.record.title).toBe('Laptops');
    expect(result.ok && 'department' in result.value.record).toBe(true);
    expect(result.ok && result.value.record.department).toBeUndefined();
    expect(result.ok && result.value.record.requestor_name).toBeUndefined();
  });

  it('warns about line totals that disagree with amount times unit price', () => {
    const result = validate({
      ...offer,
      line_items: [
        { description: 'Laptop', amount: 2, unit_price: 600.25, total_price: 1200.5 },
        { description: 'Dock', amount: 3, unit_price: 79.99, total_price: 250 },
      ],
    });

    expect(result.ok && result.value.warnings).toEqual([
      { kind: 'line_total_mismatch', lineIndex: 1, expected: 239.97, stated: 250 },
    ]);
  });

  it('round-trips a validated record through serialization', () => {
    const first = validate(offer);
    if (!first.ok) {
      throw new Error('expected a valid record');
    }
    const again = validate(serializeRecord(first.value.record));
    expect(again.ok && again.value.record).toEqual(first.value.record);
  });
});
