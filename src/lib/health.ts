import express, { type Request, type Response, type Router } from 'express';
import { errorMessage } from './errors';
import type { Logger } from './logger';
import { withTimeout } from './timeout';

export type Probe = () => Promise<void>;

export type HealthOptions = {
  service: string;
  version?: string;
  /** Named dependency checks run by the readiness endpoint. */
  probes?: Record<string, Probe>;
  timeoutMs?: number;
  logger?: Logger;
};

export type ProbeResult = { ok: true; latencyMs: number } | { ok: false; error: string };

export async function runProbes(probes: Record<string, Probe>, timeoutMs: number): Promise<Record<string, ProbeResult>> {
  const entries = await Promise.all(
    Object.entries(probes).map(async ([name, probe]): Promise<[string, ProbeResult]> => {
      const started = Date.now();
      try {
        await withTimeout(probe(), timeoutMs);
        return [name, { ok: true, latencyMs: Date.now() - started }];
      } catch (error) {
        return [name, { ok: false, error: errorMessage(error) }];
      }
    }),
  );
  return Object.fromEntries(entries);
}

/**
 * GET /health and /health/live answer while the process serves HTTP.
 * GET /health/ready runs every probe and answers 503 if any fails.
 */
export function createHealthRouter(options: HealthOptions): Router {
  const { service, version, probes = {}, timeoutMs = 1000, logger } = options;
  const router = express.Router();
  const base = { service, version };

  const liveness = (_req: Request, res: Response) => {
    res.json({ status: 'ok', ...base });
  };

  router.get('/health', liveness);
  router.get('/health/live', liveness);
  router.get('/health/ready', async (_req: Request, res: Response) => {
    const checks = await runProbes(probes, timeoutMs);
    const ok = Object.values(checks).every((check) => check.ok);
    if (!ok) logger?.warn({ checks }, 'readiness check failed');
    res.status(ok ? 200 : 503).json({ status: ok ? 'ok' : 'unavailable', ...base, checks });
  });

  return router;
}
