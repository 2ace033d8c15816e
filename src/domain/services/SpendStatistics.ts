export type StdDevMode = 'sample' | 'population';

export interface SpendStatistics {
  count: number;
  mean: number | null;
  stdDev: number | null;
}

/**
 * Two-pass mean and standard deviation. `sample` divides by n - 1 and is undefined
 * below two values; `population` divides by n. Undefined values are `null`.
 */
export const computeSpendStatistics = (amounts: readonly number[], mode: StdDevMode = 'sample'): SpendStatistics => {
  const count = amounts.length;

  if (count === 0) {
    return { count, mean: null, stdDev: null };
  }

  const mean = amounts.reduce((sum, amount) => sum + amount, 0) / count;
  const divisor = mode === 'sample' ? count - 1 : count;

  if (divisor === 0) {
    return { count, mean, stdDev: null };
  }

  const squaredDeviations = amounts.reduce((sum, amount) => sum + (amount - mean) ** 2, 0);

  return { count, mean, stdDev: Math.sqrt(squaredDeviations / divisor) };
};

/**
 * Strict upper bound `mean + sigma * stdDev`, or `null` when either statistic is undefined.
 */
export const outlierThreshold = (stats: SpendStatistics, sigma: number): number | null => {
  if (stats.mean === null || stats.stdDev === null) {
    return null;
  }

  return stats.mean + sigma * stats.stdDev;
};
