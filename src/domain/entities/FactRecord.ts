export type ContractStatus = 'Contract' | 'Non-Contract';

export type RiskLevel = 'HIGH' | 'MEDIUM' | 'LOW';

export interface FactRecord {
  purchaseId: string;
  cleanVendorName: string | null;
  category: string | null;
  subCategory: string | null;
  spendAmount: number;
  purchaseDate: string; // ISO date
  purchaseMonth: string; // YYYY-MM
  region: string | null;
  paymentTerms: string | null;
  deliveryTimeDays: number | null;
  qualityScore: number | null;
  vendorScore: number | null;
  contractStatus: ContractStatus;
  riskLevel: RiskLevel;
  outlierFlag: boolean;
  loadTimestamp: string; // ISO timestamp
}
