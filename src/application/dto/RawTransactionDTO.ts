import { z } from 'zod';

const absentToNull = (value: unknown) => (value === undefined ? null : value);
const blankToNull = (value: unknown) =>
  value === undefined || (typeof value === 'string' && value.trim() === '') ? null : value;

const text = z.preprocess(absentToNull, z.string().nullable());
const date = z.preprocess(blankToNull, z.string().trim().nullable());
const amount = z.preprocess(blankToNull, z.coerce.number().nullable());
const integer = z.preprocess(blankToNull, z.coerce.number().int().nullable());

// Export headers from the ERP arrive as Purchase_ID, Spend_Amount_INR, ...
const fieldAliases: Record<string, string> = {
  category: 'category',
  region: 'region',
  purchase_id: 'purchaseId',
  vendor_name: 'vendorName',
  sub_category: 'subCategory',
  spend_amount: 'spendAmount',
  spend_amount_inr: 'spendAmount',
  purchase_date: 'purchaseDate',
  payment_terms: 'paymentTerms',
  delivery_time_days: 'deliveryTimeDays',
  quality_score: 'qualityScore',
  vendor_score: 'vendorScore',
};

const canonicalizeKeys = (value: unknown): unknown => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, field]) => [fieldAliases[key.toLowerCase()] ?? key, field]),
  );
};

export const RawTransactionSchema = z.preprocess(
  canonicalizeKeys,
  z.object({
    purchaseId: text,
    vendorName: text,
    category: text,
    subCategory: text,
    spendAmount: amount,
    purchaseDate: date,
    region: text,
    paymentTerms: text,
    deliveryTimeDays: integer,
    qualityScore: integer,
    vendorScore: integer,
  }),
);

export const RawTransactionBatchSchema = z.array(RawTransactionSchema);
