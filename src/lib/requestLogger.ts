import { randomUUID } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import pinoHttp from 'pino-http';
import type { Logger } from './logger';

const QUIET_PATHS = new Set(['/health', '/health/live', '/health/ready', '/favicon.ico']);

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function requestId(req: IncomingMessage): string {
  return headerValue(req.headers['x-request-id']) || headerValue(req.headers['x-correlation-id']) || randomUUID();
}

/**
 * One structured line per finished request. Reuses the caller's
 * `x-request-id` when present and always echoes it back.
 */
export function requestLogger(logger: Logger) {
  return pinoHttp({
    logger,
    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id = requestId(req);
      res.setHeader('x-request-id', id);
      return id;
    },
    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },
    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has((req.url ?? '').split('?')[0]),
    },
  });
}
