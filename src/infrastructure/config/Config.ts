import { z } from 'zod';
import type { StdDevMode } from '../../domain/services/SpendStatistics.js';

export interface AppConfig {
  server: {
    port: number;
    maxUploadBytes: number;
  };
  pipeline: {
    stdDevMode: StdDevMode;
    outlierSigma: number;
  };
  app: {
    environment: string;
  };
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  STDDEV_MODE: z.enum(['sample', 'population']).default('sample'),
  OUTLIER_SIGMA: z.coerce.number().positive().default(2),
  NODE_ENV: z.string().default('development'),
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.parse(env);

  return {
    server: {
      port: parsed.PORT,
      maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    },
    pipeline: {
      stdDevMode: parsed.STDDEV_MODE,
      outlierSigma: parsed.OUTLIER_SIGMA,
    },
    app: {
      environment: parsed.NODE_ENV,
    },
  };
};
