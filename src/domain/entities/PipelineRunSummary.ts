export type RunActionType = 'RAW_LOAD' | 'PIPELINE_RUN' | 'PIPELINE_FAILURE';

export interface PipelineRunSummary {
  id: string;
  actionType: RunActionType;
  description: string;
  rawCount: number;
  acceptedCount: number;
  rejectedCount: number;
  factCount: number;
  unresolvedVendorCount: number;
  actionTime: string; // ISO timestamp
}
