import crypto from 'node:crypto';
import { PipelineError, PipelineRunError, describeError } from '../../domain/errors/PipelineError.js';
import type { PipelineRunSummary } from '../../domain/entities/PipelineRunSummary.js';
import { buildFacts } from '../../domain/services/FactBuilder.js';
import { partitionRecords } from '../../domain/services/QualityGate.js';
import { type StdDevMode, computeSpendStatistics } from '../../domain/services/SpendStatistics.js';
import type { ProcurementStorePort } from '../ports/ProcurementStorePort.js';
import type { RunLockPort } from '../ports/RunLockPort.js';
import type { VendorNormalizationService } from './VendorNormalizationService.js';

export interface PipelineOptions {
  stdDevMode: StdDevMode;
  outlierSigma: number;
  clock?: () => Date;
}

export interface PipelineRunResult {
  summary: PipelineRunSummary;
  statistics: { mean: number | null; stdDev: number | null; outlierCount: number };
}

/**
 * Full-refresh batch run: normalize and gate the raw set, aggregate accepted spend,
 * build facts, then commit every derived collection in one step.
 */
export class PipelineService {
  private readonly clock: () => Date;

  constructor(
    private readonly storage: ProcurementStorePort,
    private readonly vendorNormalization: VendorNormalizationService,
    private readonly runLock: RunLockPort,
    private readonly options: PipelineOptions,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async run(): Promise<PipelineRunResult> {
    const release = await this.runLock.tryAcquire();

    if (!release) {
      throw new PipelineError({ code: 'RUN_IN_PROGRESS', message: 'A pipeline run is already in progress' });
    }

    try {
      return await this.execute();
    } finally {
      await release();
    }
  }

  private async execute(): Promise<PipelineRunResult> {
    const loadTimestamp = this.clock().toISOString();
    let rawCount = 0;

    try {
      const raw = await this.storage.readRawTransactions();
      rawCount = raw.length;

      const vendorMap = await this.vendorNormalization.buildMap(raw, loadTimestamp);
      const { accepted, rejected } = partitionRecords(raw, loadTimestamp);

      const stats = computeSpendStatistics(
        accepted.map((txn) => txn.spendAmount),
        this.options.stdDevMode,
      );

      const { facts, unresolvedVendorCount } = buildFacts(accepted, vendorMap, stats, {
        outlierSigma: this.options.outlierSigma,
        loadTimestamp,
      });

      console.log('🧮 Pipeline stages complete:', {
        raw: raw.length,
        vendors: vendorMap.size,
        accepted: accepted.length,
        rejected: rejected.length,
        facts: facts.length,
        mean: stats.mean,
        stdDev: stats.stdDev,
      });

      if (unresolvedVendorCount > 0) {
        console.warn(`⚠️ ${unresolvedVendorCount} fact rows have no resolved vendor`);
      }

      await this.storage.commitDerived({
        vendorMap: Array.from(vendorMap.values()),
        accepted,
        rejected,
        facts,
      });

      const summary: PipelineRunSummary = {
        id: crypto.randomUUID(),
        actionType: 'PIPELINE_RUN',
        description: `Staging Rows: ${raw.length} | Fact Rows: ${facts.length}`,
        rawCount: raw.length,
        acceptedCount: accepted.length,
        rejectedCount: rejected.length,
        factCount: facts.length,
        unresolvedVendorCount,
        actionTime: this.clock().toISOString(),
      };

      await this.storage.appendRunSummary(summary);

      return {
        summary,
        statistics: {
          mean: stats.mean,
          stdDev: stats.stdDev,
          outlierCount: facts.filter((fact) => fact.outlierFlag).length,
        },
      };
    } catch (error) {
      throw await this.recordFailure(error, rawCount);
    }
  }

  private async recordFailure(error: unknown, rawCount: number): Promise<PipelineRunError> {
    const message = `Pipeline run failed: ${describeError(error)}`;
    console.error(message, error);

    try {
      await this.storage.appendRunSummary({
        id: crypto.randomUUID(),
        actionType: 'PIPELINE_FAILURE',
        description: message,
        rawCount,
        acceptedCount: 0,
        rejectedCount: 0,
        factCount: 0,
        unresolvedVendorCount: 0,
        actionTime: this.clock().toISOString(),
      });
    } catch (auditError) {
      console.error('Unable to record pipeline failure', auditError);
    }

    return new PipelineRunError(message, error);
  }
}
