/**
 * Extraction API
 *
 * HTTP surface of the extraction pipeline: multipart document uploads and
 * raw-text submissions, each answered with an InsuranceRecord.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ulid } from 'ulid';
import { z } from 'zod';
import {
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  logger,
  runWithContext,
  runWithContextAsync,
  type Config,
  type ExtractionPipeline,
  type HealthResponse,
  type InsuranceRecord,
} from '@policy-extract/shared';
import { requireApiKey } from './lib/auth';
import { correlationIdOf, createErrorHandler, HttpError, sendError } from './lib/errors';

export const SERVICE_NAME = 'policy-extract';
export const SERVICE_VERSION = '2.0.0';

const ExtractTextBodySchema = z.object({
  text: z.string({ required_error: 'text is required', invalid_type_error: 'text must be a string' }),
});

export interface AppDependencies {
  config: Config;
  /** null when the service started without its provider keys */
  pipeline: ExtractionPipeline | null;
  providers: Record<string, boolean>;
}

interface RequestDeadline {
  signal: AbortSignal;
  release: () => void;
}

/**
 * Abort signal for one request: fires when the deadline passes or the
 * client goes away before the response is written.
 */
function startDeadline(res: Response, timeoutMs: number): RequestDeadline {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Request deadline of ${timeoutMs}ms exceeded`));
  }, timeoutMs);

  const onClose = () => {
    if (!res.writableEnded) {
      controller.abort(new Error('Client disconnected'));
    }
  };
  res.on('close', onClose);

  return {
    signal: controller.signal,
    release: () => {
      clearTimeout(timer);
      res.off('close', onClose);
    },
  };
}

export function createApp(deps: AppDependencies): Express {
  const { config, pipeline, providers } = deps;
  const app = express();

  // Middleware
  app.use(express.json({ limit: '10mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('X-Correlation-Id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  const unavailable = () =>
    new HttpError(
      503,
      'service_unavailable',
      'Extraction is unavailable: provider API keys are not configured'
    );

  // Checked before the upload is read
  const requirePipeline = (_req: Request, _res: Response, next: NextFunction): void => {
    next(pipeline ? undefined : unavailable());
  };

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxDocumentBytes, files: 1 },
  });

  const authenticate = requireApiKey(config.apiAuthToken);

  /**
   * Run the pipeline under the request deadline and send the record.
   */
  async function respondWithRecord(
    res: Response,
    run: (signal: AbortSignal) => Promise<InsuranceRecord>
  ): Promise<void> {
    const deadline = startDeadline(res, config.requestTimeoutMs);
    try {
      const record = await runWithContextAsync({ correlationId: correlationIdOf(res) }, () =>
        run(deadline.signal)
      );
      res.json(record);
    } finally {
      deadline.release();
    }
  }

  // Service info
  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      description: 'Insurance policy document data extraction',
      deployment_mode: config.deploymentMode,
      endpoints: {
        'POST /extract': 'Upload a document (multipart field "file") and extract insurance data',
        'POST /extract-text': 'Extract insurance data from raw text ({ "text": "..." })',
        'GET /health': 'Service and provider status',
        'GET /metrics': 'Prometheus metrics',
      },
    });
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    const body: HealthResponse = {
      status: pipeline ? 'healthy' : 'degraded',
      service: SERVICE_NAME,
      deployment_mode: config.deploymentMode,
      prompt_variant: config.promptVariant,
      providers,
      supported_formats: config.supportedExtensions,
      max_document_bytes: config.maxDocumentBytes,
      timestamp: new Date().toISOString(),
    };
    res.json(body);
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const metrics = await getMetrics();
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(metrics);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /extract
   * Multipart upload of one insurance document
   */
  app.post(
    '/extract',
    authenticate,
    requirePipeline,
    upload.single('file'),
    async (req: Request, res: Response, next: NextFunction) => {
      const file = req.file;
      if (!pipeline) {
        next(unavailable());
        return;
      }
      if (!file) {
        next(new HttpError(400, 'invalid_input', 'No file uploaded (expected multipart field "file")'));
        return;
      }

      logger.info('Document received', {
        filename: file.originalname,
        size_bytes: file.size,
      });

      try {
        await respondWithRecord(res, (signal) =>
          pipeline.process(file.buffer, file.originalname, { signal })
        );
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /extract-text
   * JSON body { text } for documents whose text is already available
   */
  app.post(
    '/extract-text',
    authenticate,
    requirePipeline,
    async (req: Request, res: Response, next: NextFunction) => {
      if (!pipeline) {
        next(unavailable());
        return;
      }

      const parsed = ExtractTextBodySchema.safeParse(req.body);
      if (!parsed.success) {
        const message = parsed.error.issues.map((issue) => issue.message).join('; ');
        next(new HttpError(400, 'invalid_input', message));
        return;
      }

      try {
        await respondWithRecord(res, (signal) => pipeline.processText(parsed.data.text, { signal }));
      } catch (error) {
        next(error);
      }
    }
  );

  // Unknown routes
  app.use((req: Request, res: Response) => {
    sendError(res, 404, 'not_found', `Route ${req.method} ${req.path} not found`);
  });

  app.use(createErrorHandler(config.maxDocumentBytes));

  return app;
}
