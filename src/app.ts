import express, { type Express, type Router } from 'express';
import { errorHandler, notFoundHandler } from './lib/errorHandler';
import { createHealthRouter, type Probe } from './lib/health';
import type { Logger } from './lib/logger';
import type { Pipeline } from './lib/pipeline';
import { requestContext } from './lib/pipeline';
import { requestLogger } from './lib/requestLogger';

export type RegisterRoutes = (router: Router, pipeline: Pipeline) => void;

export type CreateAppOptions = {
  logger: Logger;
  pipeline: Pipeline;
  service?: string;
  version?: string;
  /** Readiness checks, e.g. database and shared store pings. */
  probes?: Record<string, Probe>;
  trustProxy?: boolean;
  bodyLimit?: string;
};

/**
 * Request logger, request context, JSON body parser, health routes, the
 * caller's routes, then the 404 and error handlers.
 */
export function createApp(options: CreateAppOptions, register: RegisterRoutes): Express {
  const { logger, pipeline, service = 'api-stack', version, probes, trustProxy = true, bodyLimit = '1mb' } = options;
  const app = express();

  app.disable('x-powered-by');
  // Client addresses come from X-Forwarded-For when running behind a reverse proxy.
  app.set('trust proxy', trustProxy);

  app.use(requestLogger(logger));
  app.use(requestContext());
  app.use(express.json({ limit: bodyLimit }));
  app.use(createHealthRouter({ service, version, probes, logger }));

  const router = express.Router();
  register(router, pipeline);
  app.use(router);

  app.use(notFoundHandler);
  app.use(errorHandler(logger));
  return app;
}
