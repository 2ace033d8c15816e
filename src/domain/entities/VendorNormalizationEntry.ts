export interface VendorNormalizationEntry {
  rawVendorName: string;
  cleanVendorName: string;
  ruleApplied: string;
  createdAt: string; // ISO timestamp
}

export interface VendorOverride {
  rawVendorName: string;
  cleanVendorName: string;
  note?: string;
  updatedAt: string; // ISO timestamp
}
