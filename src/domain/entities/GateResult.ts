import type { RawTransaction } from './RawTransaction.js';

export type QualityRule =
  | 'PURCHASE_ID_MISSING'
  | 'VENDOR_NAME_MISSING'
  | 'SPEND_NOT_POSITIVE'
  | 'PURCHASE_DATE_MISSING'
  | 'QUALITY_SCORE_OUT_OF_RANGE'
  | 'VENDOR_SCORE_OUT_OF_RANGE'
  | 'DUPLICATE_PURCHASE_ID';

export interface AcceptedTransaction {
  sourceRow: number;
  purchaseId: string;
  vendorName: string;
  category: string | null;
  subCategory: string | null;
  spendAmount: number;
  purchaseDate: string; // ISO date
  region: string | null;
  paymentTerms: string | null;
  deliveryTimeDays: number | null;
  qualityScore: number | null;
  vendorScore: number | null;
  qualityFlag: 'VALID';
  loadTimestamp: string; // ISO timestamp
}

export interface RejectedTransaction {
  sourceRow: number;
  purchaseId: string | null;
  rejectReason: string;
  failedRules: QualityRule[];
  rejectTime: string; // ISO timestamp
  raw: RawTransaction;
}
