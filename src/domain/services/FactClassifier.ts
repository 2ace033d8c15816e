import type { ContractStatus, RiskLevel } from '../entities/FactRecord.js';

interface Scores {
  vendorScore: number | null;
  qualityScore: number | null;
}

// A missing score never satisfies a comparison, mirroring SQL NULL semantics.
const atLeast = (value: number | null, bound: number) => value !== null && value >= bound;
const below = (value: number | null, bound: number) => value !== null && value < bound;
const between = (value: number | null, min: number, max: number) => value !== null && value >= min && value <= max;

export const classifyContract = ({ vendorScore, qualityScore }: Scores): ContractStatus =>
  atLeast(vendorScore, 75) && atLeast(qualityScore, 7) ? 'Contract' : 'Non-Contract';

/**
 * Branch order is significant: vendor 60 with quality 3 is HIGH, not MEDIUM.
 */
export const classifyRisk = ({ vendorScore, qualityScore }: Scores): RiskLevel => {
  if (below(vendorScore, 50) || below(qualityScore, 5)) {
    return 'HIGH';
  }

  if (between(vendorScore, 50, 70)) {
    return 'MEDIUM';
  }

  return 'LOW';
};

export const isOutlier = (spendAmount: number, threshold: number | null): boolean =>
  threshold !== null && spendAmount > threshold;
