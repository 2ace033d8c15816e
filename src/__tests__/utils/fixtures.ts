import type { AcceptedTransaction } from '../../domain/entities/GateResult.js';
import type { RawTransaction } from '../../domain/entities/RawTransaction.js';

export const LOAD_TIME = '2024-07-01T00:00:00.000Z';

export const fixedClock = () => new Date(LOAD_TIME);

export function rawRow(overrides: Partial<RawTransaction> = {}): RawTransaction {
  return {
    purchaseId: 'PO-1001',
    vendorName: 'Acme Pvt. Ltd.',
    category: 'IT',
    subCategory: 'Laptops',
    spendAmount: 1200,
    purchaseDate: '2024-03-15',
    region: 'North',
    paymentTerms: 'Net 30',
    deliveryTimeDays: 7,
    qualityScore: 8,
    vendorScore: 80,
    ...overrides,
  };
}

export function acceptedRow(overrides: Partial<AcceptedTransaction> = {}): AcceptedTransaction {
  return {
    sourceRow: 0,
    purchaseId: 'PO-1001',
    vendorName: 'Acme Pvt. Ltd.',
    category: 'IT',
    subCategory: 'Laptops',
    spendAmount: 1200,
    purchaseDate: '2024-03-15',
    region: 'North',
    paymentTerms: 'Net 30',
    deliveryTimeDays: 7,
    qualityScore: 8,
    vendorScore: 80,
    qualityFlag: 'VALID',
    loadTimestamp: LOAD_TIME,
    ...overrides,
  };
}
