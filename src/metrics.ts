import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures SECONDS.
 * This module records milliseconds to match *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_relay_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

const artifactsCreatedTotal = new client.Counter({
  name: `${METRICS_PREFIX}artifacts_created_total`,
  help: 'Audio artifacts written to the store',
  labelNames: ['format'] as const,
  registers: [register],
});

const janitorEvictionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}janitor_evictions_total`,
  help: 'Expired audio artifacts deleted by the janitor',
  registers: [register],
});

const janitorDeleteFailuresTotal = new client.Counter({
  name: `${METRICS_PREFIX}janitor_delete_failures_total`,
  help: 'Per-artifact deletion failures during janitor sweeps',
  registers: [register],
});

const janitorSweepsTotal = new client.Counter({
  name: `${METRICS_PREFIX}janitor_sweeps_total`,
  help: 'Janitor sweeps by outcome',
  labelNames: ['status'] as const,
  registers: [register],
});

const janitorSweepDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}janitor_sweep_duration_ms`,
  help: 'Janitor sweep duration in milliseconds',
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 5000],
  registers: [register],
});

const playbackAttemptsTotal = new client.Counter({
  name: `${METRICS_PREFIX}playback_attempts_total`,
  help: 'Player candidate attempts by player and result',
  labelNames: ['player', 'result'] as const,
  registers: [register],
});

const playbackExhaustedTotal = new client.Counter({
  name: `${METRICS_PREFIX}playback_exhausted_total`,
  help: 'Playback requests where every player candidate failed',
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

function routePathOf(req: Request): string | undefined {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return route.path;
  }
  return undefined;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const routePath = routePathOf(req);
  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{12}-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':id')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id');
}

// ---------- recorders ----------

export function recordArtifactCreated(format: string): void {
  artifactsCreatedTotal.inc({ format });
}

export function recordSweep(status: string, durationMs: number, evicted: number, failed: number): void {
  janitorSweepsTotal.inc({ status });
  janitorSweepDurationMs.observe(durationMs);
  if (evicted > 0) janitorEvictionsTotal.inc(evicted);
  if (failed > 0) janitorDeleteFailuresTotal.inc(failed);
}

export function recordPlaybackAttempt(player: string, result: 'ok' | 'failed' | 'timeout' | 'spawn_error'): void {
  playbackAttemptsTotal.inc({ player, result });
}

export function recordPlaybackExhausted(): void {
  playbackExhaustedTotal.inc();
}

// ---------- exports used by server ----------

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}
