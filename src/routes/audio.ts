import express, { NextFunction, Request, Response, Router } from 'express';
import fs from 'fs';
import type { ServerResponse } from 'http';
import type { Readable } from 'stream';
import { z } from 'zod';
import { NotFoundError } from '../errors';
import { log } from '../log';
import type { PlaybackDispatcher } from '../playback/dispatcher';
import type { AudioArtifactStore } from '../storage/audioStore';
import { CONTENT_TYPES, formatFromContentType } from '../storage/types';

const MAX_UPLOAD_BYTES = '50mb';

const PlayRequestSchema = z
  .object({
    removeAfter: z.boolean().optional(),
  })
  .strict();

type RequestWithId = Request & { id?: string };

export interface AudioRouterDeps {
  store: AudioArtifactStore;
  dispatcher: PlaybackDispatcher;
}

/**
 * Streams an artifact file into a response. A source that fails before any
 * bytes were sent is reported as a missing artifact, and the source is
 * released as soon as the response closes, including on client disconnect.
 */
export function pipeArtifact(
  source: Readable,
  res: ServerResponse,
  id: string,
  next: NextFunction,
): void {
  source.on('error', (error) => {
    // the janitor may have removed the file between get() and open
    if (!res.headersSent) {
      next(new NotFoundError(id));
      return;
    }
    log.warn({ err: error, id }, 'audio stream aborted');
    res.destroy(error);
  });
  res.on('close', () => source.destroy());
  source.pipe(res);
}

export function createAudioRouter({ store, dispatcher }: AudioRouterDeps): Router {
  const router = Router();

  router.post(
    '/',
    express.raw({ type: () => true, limit: MAX_UPLOAD_BYTES }),
    async (req: Request, res: Response, next: NextFunction) => {
      const format = formatFromContentType(req.header('content-type'));
      if (!format) {
        res.status(415).json({ error: 'unsupported_audio_format' });
        return;
      }
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        res.status(400).json({ error: 'empty_audio_body' });
        return;
      }

      try {
        const artifact = await store.create(body, format);
        log.info(
          { event: 'artifact_uploaded', id: artifact.id, format, bytes: body.length, requestId: (req as RequestWithId).id },
          'audio artifact stored',
        );
        res.setHeader('X-Audio-Id', artifact.id);
        res.status(201).json({ id: artifact.id, format: artifact.format, createdAt: artifact.createdAt });
      } catch (error) {
        next(error);
      }
    },
  );

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const artifact = await store.get(req.params.id);
      res.setHeader('Content-Type', CONTENT_TYPES[artifact.format]);
      res.setHeader('X-Audio-Id', artifact.id);

      pipeArtifact(fs.createReadStream(artifact.path), res, artifact.id, next);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/play', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = PlayRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'invalid_play_request' });
      return;
    }

    try {
      const artifact = await store.get(req.params.id);
      const outcome = await dispatcher.play(artifact);
      let removed = false;
      // protected files stay in place; the playback itself still counts as done
      if (parsed.data.removeAfter && !store.isProtected(artifact.path)) {
        removed = await store.delete(artifact.id);
      }
      res.status(200).json({ status: 'played', id: artifact.id, player: outcome.candidateUsed.name, removed });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await store.delete(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
