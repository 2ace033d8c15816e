import type { FactRecord } from '../../domain/entities/FactRecord.js';
import type { MonthlyKpiDTO, PipelineCountsDTO } from '../dto/ReportingDTO.js';
import type { ProcurementStorePort } from '../ports/ProcurementStorePort.js';

interface MonthBucket {
  totalSpend: number;
  vendors: Set<string>;
  highRiskOrders: number;
  deliveryTotal: number;
  deliveryCount: number;
}

export class ReportingService {
  constructor(private readonly storage: ProcurementStorePort) {}

  async monthlyKpis(): Promise<MonthlyKpiDTO[]> {
    const facts = await this.storage.loadFacts();
    return summarizeByMonth(facts);
  }

  async counts(): Promise<PipelineCountsDTO> {
    const [raw, accepted, rejected, facts] = await Promise.all([
      this.storage.readRawTransactions(),
      this.storage.loadAccepted(),
      this.storage.loadRejected(),
      this.storage.loadFacts(),
    ]);

    return {
      totalRows: raw.length,
      cleanRows: accepted.length,
      rejectedRows: rejected.length,
      factRows: facts.length,
    };
  }
}

/**
 * Vendors with no resolved clean name are not counted as active; months without any
 * delivery time report `avgDeliveryDays: null`.
 */
export const summarizeByMonth = (facts: readonly FactRecord[]): MonthlyKpiDTO[] => {
  const buckets = new Map<string, MonthBucket>();

  facts.forEach((fact) => {
    const bucket = buckets.get(fact.purchaseMonth) ?? {
      totalSpend: 0,
      vendors: new Set<string>(),
      highRiskOrders: 0,
      deliveryTotal: 0,
      deliveryCount: 0,
    };

    bucket.totalSpend += fact.spendAmount;

    if (fact.cleanVendorName !== null) {
      bucket.vendors.add(fact.cleanVendorName);
    }

    if (fact.riskLevel === 'HIGH') {
      bucket.highRiskOrders += 1;
    }

    if (fact.deliveryTimeDays !== null) {
      bucket.deliveryTotal += fact.deliveryTimeDays;
      bucket.deliveryCount += 1;
    }

    buckets.set(fact.purchaseMonth, bucket);
  });

  return Array.from(buckets.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([purchaseMonth, bucket]) => ({
      purchaseMonth,
      totalSpend: Math.round(bucket.totalSpend * 100) / 100,
      activeVendors: bucket.vendors.size,
      highRiskOrders: bucket.highRiskOrders,
      avgDeliveryDays: bucket.deliveryCount > 0 ? bucket.deliveryTotal / bucket.deliveryCount : null,
    }));
};
