import { PipelineError } from '../../domain/errors/PipelineError.js';
import type { RawTransaction } from '../../domain/entities/RawTransaction.js';
import type { VendorNormalizationEntry, VendorOverride } from '../../domain/entities/VendorNormalizationEntry.js';
import { buildNormalizationMap } from '../../domain/services/VendorNameNormalizer.js';
import type { ProcurementStorePort } from '../ports/ProcurementStorePort.js';

export class VendorNormalizationService {
  constructor(private readonly storage: ProcurementStorePort) {}

  async buildMap(rows: readonly RawTransaction[], createdAt: string): Promise<Map<string, VendorNormalizationEntry>> {
    const overrides = await this.storage.listVendorOverrides();
    return buildNormalizationMap(rows, overrides, createdAt);
  }

  async listMap(): Promise<VendorNormalizationEntry[]> {
    return this.storage.loadVendorMap();
  }

  async listOverrides(): Promise<VendorOverride[]> {
    return this.storage.listVendorOverrides();
  }

  /**
   * Takes effect on the next pipeline run.
   */
  async setOverride(params: { rawVendorName: string; cleanVendorName: string; note?: string }): Promise<VendorOverride> {
    const cleanVendorName = params.cleanVendorName.trim();

    if (!cleanVendorName) {
      throw new PipelineError({ code: 'VALIDATION_ERROR', message: 'cleanVendorName must not be blank' });
    }

    const override: VendorOverride = {
      rawVendorName: params.rawVendorName,
      cleanVendorName,
      note: params.note,
      updatedAt: new Date().toISOString(),
    };

    await this.storage.upsertVendorOverride(override);
    return override;
  }

  async removeOverride(rawVendorName: string): Promise<void> {
    const removed = await this.storage.deleteVendorOverride(rawVendorName);

    if (!removed) {
      throw new PipelineError({ code: 'NOT_FOUND', message: `No override for vendor "${rawVendorName}"` });
    }
  }
}
