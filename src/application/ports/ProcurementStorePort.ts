import type { FactRecord } from '../../domain/entities/FactRecord.js';
import type { AcceptedTransaction, RejectedTransaction } from '../../domain/entities/GateResult.js';
import type { PipelineRunSummary } from '../../domain/entities/PipelineRunSummary.js';
import type { RawTransaction } from '../../domain/entities/RawTransaction.js';
import type { VendorNormalizationEntry, VendorOverride } from '../../domain/entities/VendorNormalizationEntry.js';

export interface DerivedSnapshot {
  vendorMap: VendorNormalizationEntry[];
  accepted: AcceptedTransaction[];
  rejected: RejectedTransaction[];
  facts: FactRecord[];
}

export interface ProcurementStorePort {
  readRawTransactions(): Promise<RawTransaction[]>;
  replaceRawTransactions(rows: RawTransaction[]): Promise<void>;
  /**
   * Replaces all four derived collections together. Readers observe either the previous
   * snapshot or the new one, never a mix.
   */
  commitDerived(snapshot: DerivedSnapshot): Promise<void>;
  loadVendorMap(): Promise<VendorNormalizationEntry[]>;
  loadAccepted(): Promise<AcceptedTransaction[]>;
  loadRejected(): Promise<RejectedTransaction[]>;
  loadFacts(params?: { purchaseMonth?: string; riskLevel?: FactRecord['riskLevel'] }): Promise<FactRecord[]>;
  listVendorOverrides(): Promise<VendorOverride[]>;
  upsertVendorOverride(override: VendorOverride): Promise<void>;
  deleteVendorOverride(rawVendorName: string): Promise<boolean>;
  appendRunSummary(summary: PipelineRunSummary): Promise<void>;
  listRunSummaries(): Promise<PipelineRunSummary[]>;
}
