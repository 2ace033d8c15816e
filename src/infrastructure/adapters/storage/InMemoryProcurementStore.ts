import type { FactRecord } from '../../../domain/entities/FactRecord.js';
import type { AcceptedTransaction, RejectedTransaction } from '../../../domain/entities/GateResult.js';
import type { PipelineRunSummary } from '../../../domain/entities/PipelineRunSummary.js';
import type { RawTransaction } from '../../../domain/entities/RawTransaction.js';
import type { VendorNormalizationEntry, VendorOverride } from '../../../domain/entities/VendorNormalizationEntry.js';
import type { DerivedSnapshot, ProcurementStorePort } from '../../../application/ports/ProcurementStorePort.js';

interface DerivedTables {
  vendorMap: Map<string, VendorNormalizationEntry>;
  accepted: Map<string, AcceptedTransaction>;
  rejected: RejectedTransaction[];
  facts: Map<string, FactRecord>;
}

const emptyTables = (): DerivedTables => ({
  vendorMap: new Map(),
  accepted: new Map(),
  rejected: [],
  facts: new Map(),
});

export class InMemoryProcurementStore implements ProcurementStorePort {
  private raw: RawTransaction[] = [];
  private derived: DerivedTables = emptyTables();
  private readonly overrides = new Map<string, VendorOverride>();
  private readonly runLog: PipelineRunSummary[] = [];

  async readRawTransactions(): Promise<RawTransaction[]> {
    return [...this.raw];
  }

  async replaceRawTransactions(rows: RawTransaction[]): Promise<void> {
    this.raw = [...rows];
  }

  async commitDerived(snapshot: DerivedSnapshot): Promise<void> {
    // Build the shadow copy completely, then swap it in with a single assignment.
    const shadow = emptyTables();

    for (const entry of snapshot.vendorMap) {
      if (shadow.vendorMap.has(entry.rawVendorName)) {
        throw new Error(`Duplicate raw vendor name in normalization map: ${entry.rawVendorName}`);
      }
      shadow.vendorMap.set(entry.rawVendorName, entry);
    }

    for (const txn of snapshot.accepted) {
      if (shadow.accepted.has(txn.purchaseId)) {
        throw new Error(`Duplicate purchase id in clean gate: ${txn.purchaseId}`);
      }
      shadow.accepted.set(txn.purchaseId, txn);
    }

    for (const fact of snapshot.facts) {
      if (shadow.facts.has(fact.purchaseId)) {
        throw new Error(`Duplicate purchase id in fact table: ${fact.purchaseId}`);
      }
      shadow.facts.set(fact.purchaseId, fact);
    }

    shadow.rejected = [...snapshot.rejected];
    this.derived = shadow;
  }

  async loadVendorMap(): Promise<VendorNormalizationEntry[]> {
    return Array.from(this.derived.vendorMap.values());
  }

  async loadAccepted(): Promise<AcceptedTransaction[]> {
    return Array.from(this.derived.accepted.values());
  }

  async loadRejected(): Promise<RejectedTransaction[]> {
    return [...this.derived.rejected];
  }

  async loadFacts(params: { purchaseMonth?: string; riskLevel?: FactRecord['riskLevel'] } = {}): Promise<FactRecord[]> {
    return Array.from(this.derived.facts.values()).filter((fact) => {
      const monthMatches = params.purchaseMonth ? fact.purchaseMonth === params.purchaseMonth : true;
      const riskMatches = params.riskLevel ? fact.riskLevel === params.riskLevel : true;
      return monthMatches && riskMatches;
    });
  }

  async listVendorOverrides(): Promise<VendorOverride[]> {
    return Array.from(this.overrides.values());
  }

  async upsertVendorOverride(override: VendorOverride): Promise<void> {
    this.overrides.set(override.rawVendorName, override);
  }

  async deleteVendorOverride(rawVendorName: string): Promise<boolean> {
    return this.overrides.delete(rawVendorName);
  }

  async appendRunSummary(summary: PipelineRunSummary): Promise<void> {
    this.runLog.push(summary);
  }

  async listRunSummaries(): Promise<PipelineRunSummary[]> {
    return [...this.runLog];
  }
}
