import dayjs from 'dayjs';
import type { FactRecord } from '../entities/FactRecord.js';
import type { AcceptedTransaction } from '../entities/GateResult.js';
import type { VendorNormalizationEntry } from '../entities/VendorNormalizationEntry.js';
import { classifyContract, classifyRisk, isOutlier } from './FactClassifier.js';
import { type SpendStatistics, outlierThreshold } from './SpendStatistics.js';

export interface FactBuildOptions {
  outlierSigma: number;
  loadTimestamp: string;
}

export interface FactBuildResult {
  facts: FactRecord[];
  unresolvedVendorCount: number;
}

export const toPurchaseMonth = (purchaseDate: string): string => dayjs(purchaseDate).format('YYYY-MM');

export const buildFacts = (
  accepted: readonly AcceptedTransaction[],
  normalizationMap: ReadonlyMap<string, VendorNormalizationEntry>,
  stats: SpendStatistics,
  options: FactBuildOptions,
): FactBuildResult => {
  const threshold = outlierThreshold(stats, options.outlierSigma);
  let unresolvedVendorCount = 0;

  const facts = accepted.map((txn): FactRecord => {
    // Left join: a miss leaves the clean name unresolved.
    const vendor = normalizationMap.get(txn.vendorName);

    if (!vendor) {
      unresolvedVendorCount += 1;
    }

    return {
      purchaseId: txn.purchaseId,
      cleanVendorName: vendor?.cleanVendorName ?? null,
      category: txn.category,
      subCategory: txn.subCategory,
      spendAmount: txn.spendAmount,
      purchaseDate: txn.purchaseDate,
      purchaseMonth: toPurchaseMonth(txn.purchaseDate),
      region: txn.region,
      paymentTerms: txn.paymentTerms,
      deliveryTimeDays: txn.deliveryTimeDays,
      qualityScore: txn.qualityScore,
      vendorScore: txn.vendorScore,
      contractStatus: classifyContract(txn),
      riskLevel: classifyRisk(txn),
      outlierFlag: isOutlier(txn.spendAmount, threshold),
      loadTimestamp: options.loadTimestamp,
    };
  });

  return { facts, unresolvedVendorCount };
};
