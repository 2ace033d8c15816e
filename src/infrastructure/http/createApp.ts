import cors from 'cors';
import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { PipelineError } from '../../domain/errors/PipelineError.js';
import type { AppContainer } from '../bootstrap/AppContainer.js';

const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

const FactQuerySchema = z.object({
  month: z
    .string()
    .regex(/^\d{4}-\d{2}$/, 'month must be YYYY-MM')
    .optional(),
  riskLevel: z.enum(['HIGH', 'MEDIUM', 'LOW']).optional(),
});

const OverrideBodySchema = z.object({
  cleanVendorName: z.string(),
  note: z.string().optional(),
});

const RawBodySchema = z.object({ rows: z.unknown() });

const parseOrThrow = <S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.infer<S> => {
  const parsed = schema.safeParse(value);

  if (!parsed.success) {
    throw new PipelineError({
      code: 'VALIDATION_ERROR',
      message: `Invalid ${label}`,
      details: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }

  return parsed.data;
};

const parseUploadedJson = (buffer: Buffer): unknown => {
  try {
    return JSON.parse(buffer.toString('utf-8'));
  } catch (error) {
    throw new PipelineError({ code: 'VALIDATION_ERROR', message: 'Uploaded file is not valid JSON', cause: error });
  }
};

const isTooLarge = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large';

/** Maps body-parser and multer failures onto the pipeline error codes. */
const toPipelineError = (err: unknown): PipelineError => {
  if (err instanceof PipelineError) {
    return err;
  }

  if (isTooLarge(err) || (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE')) {
    return new PipelineError({ code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large', cause: err });
  }

  if (err instanceof SyntaxError) {
    return new PipelineError({ code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON', cause: err });
  }

  if (err instanceof multer.MulterError) {
    return new PipelineError({ code: 'VALIDATION_ERROR', message: err.message, cause: err });
  }

  console.error('Unhandled error', err);
  return new PipelineError({ code: 'INTERNAL', message: 'Internal server error', cause: err });
};

export const createApp = (container: AppContainer) => {
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: container.config.server.maxUploadBytes,
    },
    fileFilter: (req, file, cb) => {
      if (file.mimetype === 'application/json' || file.originalname.endsWith('.json')) {
        cb(null, true);
      } else {
        cb(new PipelineError({ code: 'VALIDATION_ERROR', message: 'Only JSON files are allowed' }));
      }
    },
  });

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: container.config.server.maxUploadBytes }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Procurement Intelligence Pipeline',
      version: '0.1.0',
      environment: container.config.app.environment,
      stdDevMode: container.config.pipeline.stdDevMode,
      outlierSigma: container.config.pipeline.outlierSigma,
    });
  });

  app.post(
    '/api/raw-transactions',
    asyncRoute(async (req, res) => {
      const { rows } = parseOrThrow(RawBodySchema, req.body, 'request body');
      const result = await container.rawIngestion.load(rows);
      res.status(201).json(result);
    }),
  );

  app.post(
    '/api/raw-transactions/upload',
    upload.single('file'),
    asyncRoute(async (req, res) => {
      if (!req.file) {
        throw new PipelineError({ code: 'VALIDATION_ERROR', message: 'No JSON file provided in field "file"' });
      }

      const result = await container.rawIngestion.load(parseUploadedJson(req.file.buffer));
      res.status(201).json({ ...result, fileName: req.file.originalname });
    }),
  );

  app.get(
    '/api/raw-transactions',
    asyncRoute(async (req, res) => {
      res.json({ rows: await container.rawIngestion.list() });
    }),
  );

  app.post(
    '/api/pipeline/run',
    asyncRoute(async (req, res) => {
      const result = await container.pipelineService.run();
      res.json(result);
    }),
  );

  app.get(
    '/api/pipeline/runs',
    asyncRoute(async (req, res) => {
      res.json({ runs: await container.storage.listRunSummaries() });
    }),
  );

  app.get(
    '/api/facts',
    asyncRoute(async (req, res) => {
      const query = parseOrThrow(FactQuerySchema, req.query, 'query');
      const facts = await container.storage.loadFacts({ purchaseMonth: query.month, riskLevel: query.riskLevel });
      res.json({ count: facts.length, facts });
    }),
  );

  app.get(
    '/api/rejects',
    asyncRoute(async (req, res) => {
      const rejects = await container.storage.loadRejected();
      res.json({ count: rejects.length, rejects });
    }),
  );

  app.get(
    '/api/vendors',
    asyncRoute(async (req, res) => {
      const [entries, overrides] = await Promise.all([
        container.vendorNormalization.listMap(),
        container.vendorNormalization.listOverrides(),
      ]);
      res.json({ entries, overrides });
    }),
  );

  app.put(
    '/api/vendors/overrides/:rawVendorName',
    asyncRoute(async (req, res) => {
      const body = parseOrThrow(OverrideBodySchema, req.body, 'override');
      const override = await container.vendorNormalization.setOverride({
        rawVendorName: req.params.rawVendorName,
        cleanVendorName: body.cleanVendorName,
        note: body.note,
      });
      res.json(override);
    }),
  );

  app.delete(
    '/api/vendors/overrides/:rawVendorName',
    asyncRoute(async (req, res) => {
      await container.vendorNormalization.removeOverride(req.params.rawVendorName);
      res.status(204).end();
    }),
  );

  app.get(
    '/api/reports/monthly-kpis',
    asyncRoute(async (req, res) => {
      res.json({ months: await container.reportingService.monthlyKpis() });
    }),
  );

  app.get(
    '/api/reports/summary',
    asyncRoute(async (req, res) => {
      res.json(await container.reportingService.counts());
    }),
  );

  app.use('/api', (req, res) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'API endpoint not found' } });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = toPipelineError(err);

    res.status(error.statusCode).json({
      error: { code: error.code, message: error.message, details: error.details },
    });
  });

  return app;
};
