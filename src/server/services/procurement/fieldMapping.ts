/**
 * Output field names of the extracted procurement record and the vendor
 * column labels that map onto them.
 *
 * The prompt renders its remapping rules from this table and the record schema
 * is keyed by the same names, so the two cannot drift. Bump the version when a
 * name changes; it is stamped on every prompt.
 */

export const FIELD_MAPPING_VERSION = 'procurement-fields/v1';

export const RECORD_FIELDS = {
  vendorName: 'vendor_name',
  vatId: 'vat_id',
  totalCost: 'total_cost',
  currency: 'currency',
  lineItems: 'line_items',
  title: 'title',
  department: 'department',
  requestorName: 'requestor_name',
  descriptionText: 'description_text',
} as const;

export const LINE_ITEM_FIELDS = {
  description: 'description',
  amount: 'amount',
  unitPrice: 'unit_price',
  unit: 'unit',
  totalPrice: 'total_price',
} as const;

export type LineItemField = (typeof LINE_ITEM_FIELDS)[keyof typeof LINE_ITEM_FIELDS];

export interface VendorLabelRemap {
  /** Column label as it typically appears on a vendor offer */
  vendorLabel: string;
  /** Field name the model must emit */
  field: LineItemField;
}

/**
 * Vendor column label → output field. Order is the order rules appear in the prompt.
 */
export const VENDOR_LABEL_REMAPS: readonly VendorLabelRemap[] = Object.freeze([
  { vendorLabel: 'Quantity', field: LINE_ITEM_FIELDS.amount },
  { vendorLabel: 'Unit Price', field: LINE_ITEM_FIELDS.unitPrice },
  { vendorLabel: 'Description', field: LINE_ITEM_FIELDS.description },
  { vendorLabel: 'Unit', field: LINE_ITEM_FIELDS.unit },
  { vendorLabel: 'Total', field: LINE_ITEM_FIELDS.totalPrice },
]);

export const SUPPORTED_CURRENCIES = ['EUR', 'USD', 'GBP', 'CHF', 'SEK', 'NOK', 'DKK', 'PLN', 'CZK'] as const;

export type CurrencyCode = (typeof SUPPORTED_CURRENCIES)[number];

export const DEFAULT_CURRENCY: CurrencyCode = 'EUR';
