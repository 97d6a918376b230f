import path from 'node:path';
import type { IncomingMessage } from 'http';
import type { Level } from 'pino';
import type { Request, Response } from 'express';
import express from 'express';
import pinoHttp from 'pino-http';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';

import {
  config,
  logger,
  metricsRouter,
  metricsMiddleware,
  traceMiddleware,
  getCurrentTraceId
} from '@makerspace/shared';

import type { SchedulingCore } from './application/schedulingCore';
import { createReservationController } from './controllers/reservationController';
import { errorMapper } from './infrastructure/http/errorMapper';
import { REQUESTER_HEADER } from './infrastructure/http/requesterIdentity';
import { createAvailabilityRouter } from './modules/availability/http/availabilityController';
import { createCertificationRouter } from './modules/certification/http/certificationController';
import { createResourceRouter } from './modules/registry/http/resourceController';

const openApiPath = path.resolve(process.cwd(), 'docs/openapi.yaml');
let openApiDocument: unknown;

try {
  openApiDocument = YAML.load(openApiPath);
} catch (error) {
  logger.warn({ error, openApiPath }, 'Failed to load OpenAPI document');
}

export interface CreateAppOptions {
  core: SchedulingCore;
}

export function createApp({ core }: CreateAppOptions) {
  const app = express();

  app.use(traceMiddleware);
  app.disable('x-powered-by');
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use(
    pinoHttp({
      logger,
      customLogLevel: (
        _req: IncomingMessage,
        res: Response,
        err: Error | undefined
      ): Level => {
        if (err || res.statusCode >= 500) return 'error';
        if (res.statusCode >= 400) return 'warn';
        return 'info';
      }
    })
  );

  app.use((req, res, next) => {
    const contextFields = {
      requesterId: req.header(REQUESTER_HEADER) ?? undefined,
      traceId: getCurrentTraceId()
    };
    res.locals.logContext = contextFields;
    res.locals.logger = logger.withContext(contextFields);
    res.locals.logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  if (config.METRICS_ENABLED) {
    app.use(metricsMiddleware);
    app.use(metricsRouter);
  }

  if (openApiDocument) {
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  }

  app.get('/health', (_req: Request, res: Response) => {
    const status = core.isInitialized ? 'ok' : 'starting';
    res.status(core.isInitialized ? 200 : 503).json({
      status,
      service: config.SERVICE_NAME,
      version: config.NODE_ENV,
      storage: config.STORAGE_DRIVER,
      indexedReservations: core.index.size()
    });
  });

  app.use(createResourceRouter(core.registry));
  app.use(createCertificationRouter(core.gate));
  app.use(createAvailabilityRouter(core.availability));
  app.use(createReservationController({ service: core.reservations }));

  app.use(errorMapper);

  return app;
}
