import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import {
  NoPlayableCandidateError,
  NotFoundError,
  ProtectedArtifactError,
  RelayError,
} from './errors';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import type { PlaybackDispatcher } from './playback/dispatcher';
import { createAudioRouter } from './routes/audio';
import { healthRouter } from './routes/health';
import type { AudioArtifactStore } from './storage/audioStore';

type RequestWithId = Request & { id?: string };

export interface ServerDeps {
  store: AudioArtifactStore;
  dispatcher: PlaybackDispatcher;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  (req as RequestWithId).id = requestId;
  next();
}

function statusFor(err: RelayError): number {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof ProtectedArtifactError) return 403;
  if (err instanceof NoPlayableCandidateError) return 503;
  return 500;
}

function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const requestId = (req as RequestWithId).id;

  if (err instanceof NoPlayableCandidateError) {
    res.status(statusFor(err)).json({ error: err.code, attempted: err.attempted });
    return;
  }
  if (err instanceof RelayError) {
    const status = statusFor(err);
    if (status >= 500) {
      log.error({ err, requestId }, 'request failed');
    }
    res.status(status).json({ error: err.code });
    return;
  }

  // body-parser rejections (malformed JSON, oversized uploads) carry their own status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    res.status(err.status).json({ error: err.status === 413 ? 'payload_too_large' : 'bad_request' });
    return;
  }

  log.error({ err, requestId }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function buildServer(deps: ServerDeps): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);
  app.use(express.json());

  app.use('/health', healthRouter);
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/v1/audio', createAudioRouter(deps));

  app.use(errorHandler);

  const server = http.createServer(app);
  return { app, server };
}
