import crypto from 'node:crypto';
import { PipelineError } from '../../domain/errors/PipelineError.js';
import type { RawTransaction } from '../../domain/entities/RawTransaction.js';
import { RawTransactionBatchSchema } from '../dto/RawTransactionDTO.js';
import type { ProcurementStorePort } from '../ports/ProcurementStorePort.js';

/**
 * Stands in for the external loader: replaces the raw set wholesale with a validated batch.
 * Field-level business rules are left to the quality gate; this only checks shape.
 */
export class RawIngestionService {
  constructor(private readonly storage: ProcurementStorePort) {}

  async load(input: unknown): Promise<{ rowCount: number }> {
    const parsed = RawTransactionBatchSchema.safeParse(input);

    if (!parsed.success) {
      throw new PipelineError({
        code: 'VALIDATION_ERROR',
        message: 'Raw transaction batch is malformed',
        details: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    const rows: RawTransaction[] = parsed.data;

    await this.storage.replaceRawTransactions(rows);
    await this.storage.appendRunSummary({
      id: crypto.randomUUID(),
      actionType: 'RAW_LOAD',
      description: `Loaded ${rows.length} raw rows`,
      rawCount: rows.length,
      acceptedCount: 0,
      rejectedCount: 0,
      factCount: 0,
      unresolvedVendorCount: 0,
      actionTime: new Date().toISOString(),
    });

    console.log('📥 Raw transactions loaded:', { rowCount: rows.length });

    return { rowCount: rows.length };
  }

  async list(): Promise<RawTransaction[]> {
    return this.storage.readRawTransactions();
  }
}
