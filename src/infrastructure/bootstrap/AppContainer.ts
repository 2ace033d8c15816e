import { PipelineService } from '../../application/services/PipelineService.js';
import { RawIngestionService } from '../../application/services/RawIngestionService.js';
import { ReportingService } from '../../application/services/ReportingService.js';
import { VendorNormalizationService } from '../../application/services/VendorNormalizationService.js';
import type { ProcurementStorePort } from '../../application/ports/ProcurementStorePort.js';
import type { RunLockPort } from '../../application/ports/RunLockPort.js';
import { InMemoryRunLock } from '../adapters/lock/InMemoryRunLock.js';
import { InMemoryProcurementStore } from '../adapters/storage/InMemoryProcurementStore.js';
import { type AppConfig, loadConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  storage?: ProcurementStorePort;
  runLock?: RunLockPort;
  clock?: () => Date;
}

export class AppContainer {
  readonly config: AppConfig;

  readonly storage: ProcurementStorePort;
  readonly runLock: RunLockPort;
  readonly rawIngestion: RawIngestionService;
  readonly vendorNormalization: VendorNormalizationService;
  readonly pipelineService: PipelineService;
  readonly reportingService: ReportingService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.storage = overrides.storage ?? new InMemoryProcurementStore();
    this.runLock = overrides.runLock ?? new InMemoryRunLock();

    this.rawIngestion = new RawIngestionService(this.storage);
    this.vendorNormalization = new VendorNormalizationService(this.storage);
    this.pipelineService = new PipelineService(this.storage, this.vendorNormalization, this.runLock, {
      stdDevMode: this.config.pipeline.stdDevMode,
      outlierSigma: this.config.pipeline.outlierSigma,
      clock: overrides.clock,
    });
    this.reportingService = new ReportingService(this.storage);
  }
}
