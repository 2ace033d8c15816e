export interface RawTransaction {
  purchaseId: string | null;
  vendorName: string | null;
  category: string | null;
  subCategory: string | null;
  spendAmount: number | null;
  purchaseDate: string | null; // ISO date
  region: string | null;
  paymentTerms: string | null;
  deliveryTimeDays: number | null;
  qualityScore: number | null;
  vendorScore: number | null;
}
