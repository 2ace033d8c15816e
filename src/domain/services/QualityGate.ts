import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import type { AcceptedTransaction, QualityRule, RejectedTransaction } from '../entities/GateResult.js';
import type { RawTransaction } from '../entities/RawTransaction.js';

dayjs.extend(customParseFormat);

export const REJECT_REASON = 'FAILED DATA QUALITY RULES';

const inRange = (value: number, min: number, max: number) => value >= min && value <= max;

export const isValidPurchaseDate = (value: string | null): value is string =>
  value !== null && dayjs(value, 'YYYY-MM-DD', true).isValid();

interface Clause {
  rule: QualityRule;
  fails: (row: RawTransaction) => boolean;
}

// An absent score passes its range clause.
const clauses: Clause[] = [
  { rule: 'PURCHASE_ID_MISSING', fails: (row) => row.purchaseId === null },
  { rule: 'VENDOR_NAME_MISSING', fails: (row) => row.vendorName === null },
  {
    rule: 'SPEND_NOT_POSITIVE',
    fails: (row) => row.spendAmount === null || !Number.isFinite(row.spendAmount) || row.spendAmount <= 0,
  },
  { rule: 'PURCHASE_DATE_MISSING', fails: (row) => !isValidPurchaseDate(row.purchaseDate) },
  {
    rule: 'QUALITY_SCORE_OUT_OF_RANGE',
    fails: (row) => row.qualityScore !== null && !inRange(row.qualityScore, 1, 10),
  },
  {
    rule: 'VENDOR_SCORE_OUT_OF_RANGE',
    fails: (row) => row.vendorScore !== null && !inRange(row.vendorScore, 1, 100),
  },
];

export const evaluateRecord = (row: RawTransaction): QualityRule[] =>
  clauses.filter((clause) => clause.fails(row)).map((clause) => clause.rule);

export interface GatePartition {
  accepted: AcceptedTransaction[];
  rejected: RejectedTransaction[];
}

const toAccepted = (row: RawTransaction, sourceRow: number, loadTimestamp: string): AcceptedTransaction | null => {
  const { purchaseId, vendorName, spendAmount, purchaseDate } = row;

  if (purchaseId === null || vendorName === null || spendAmount === null || purchaseDate === null) {
    return null;
  }

  return {
    sourceRow,
    purchaseId,
    vendorName,
    category: row.category,
    subCategory: row.subCategory,
    spendAmount,
    purchaseDate,
    region: row.region,
    paymentTerms: row.paymentTerms,
    deliveryTimeDays: row.deliveryTimeDays,
    qualityScore: row.qualityScore,
    vendorScore: row.vendorScore,
    qualityFlag: 'VALID',
    loadTimestamp,
  };
};

/**
 * Every row lands in exactly one of the two lists, in input order. A row is accepted
 * iff `evaluateRecord` reports no failing clause and its purchase id was not already
 * accepted earlier in the batch.
 */
export const partitionRecords = (rows: readonly RawTransaction[], loadTimestamp: string): GatePartition => {
  const accepted: AcceptedTransaction[] = [];
  const rejected: RejectedTransaction[] = [];
  const acceptedIds = new Set<string>();

  rows.forEach((row, sourceRow) => {
    const failedRules = evaluateRecord(row);

    if (failedRules.length === 0 && row.purchaseId !== null && acceptedIds.has(row.purchaseId)) {
      failedRules.push('DUPLICATE_PURCHASE_ID');
    }

    const candidate = failedRules.length === 0 ? toAccepted(row, sourceRow, loadTimestamp) : null;

    if (candidate) {
      acceptedIds.add(candidate.purchaseId);
      accepted.push(candidate);
      return;
    }

    rejected.push({
      sourceRow,
      purchaseId: row.purchaseId,
      rejectReason: REJECT_REASON,
      failedRules,
      rejectTime: loadTimestamp,
      raw: row,
    });
  });

  return { accepted, rejected };
};
