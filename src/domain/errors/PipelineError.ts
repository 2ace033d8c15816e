export type PipelineErrorCode =
  | 'VALIDATION_ERROR'
  | 'PAYLOAD_TOO_LARGE'
  | 'RUN_IN_PROGRESS'
  | 'RUN_FAILED'
  | 'NOT_FOUND'
  | 'INTERNAL';

const statusByCode: Record<PipelineErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  PAYLOAD_TOO_LARGE: 413,
  RUN_IN_PROGRESS: 409,
  RUN_FAILED: 500,
  INTERNAL: 500,
};

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(opts: { code: PipelineErrorCode; message: string; details?: unknown; cause?: unknown }) {
    super(opts.message, { cause: opts.cause });
    this.name = 'PipelineError';
    this.code = opts.code;
    this.statusCode = statusByCode[opts.code];
    this.details = opts.details;
  }
}

/**
 * Raised when a run aborts after it started. Nothing derived from the run was committed.
 */
export class PipelineRunError extends PipelineError {
  constructor(message: string, cause: unknown) {
    super({ code: 'RUN_FAILED', message, cause });
    this.name = 'PipelineRunError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
