import { Router, type Request, type Response } from 'express';
import { pipeline as pipeStreams } from 'stream/promises';
import { z } from 'zod';
import { CONTENT_TYPES } from '../audio/audioInfo';
import { StorageError } from '../errors';
import { asyncHandler, capacityGuard, createApiError, getRequestId, validateBody } from '../middleware';
import type { SynthesisPipeline, SynthesisResult } from '../pipeline/synthesisPipeline';
import type { ArtifactStore, OpenedArtifact } from '../storage/artifactStore';

export const synthesizeBodySchema = z.object({
  text: z.string({ required_error: 'text is required', invalid_type_error: 'text must be a string' }),
  language: z.string().trim().min(2).max(35).optional(),
  voice_id: z.string().min(1).max(100).optional(),
  format: z.string().min(1).max(10).optional(),
});

export interface TtsRouterDeps {
  pipeline: SynthesisPipeline;
  store: ArtifactStore;
  maxConcurrentSyntheses: number;
  publicBaseUrl?: string;
}

const OFFERED_TYPES = ['application/json', CONTENT_TYPES.wav, CONTENT_TYPES.mp3];

function wantsAudio(req: Request): boolean {
  const preferred = req.accepts(OFFERED_TYPES);
  return typeof preferred === 'string' && preferred.startsWith('audio/');
}

async function streamArtifact(res: Response, opened: OpenedArtifact, headers: Record<string, string> = {}): Promise<void> {
  res.status(200);
  res.setHeader('Content-Type', CONTENT_TYPES[opened.format]);
  res.setHeader('Content-Length', String(opened.sizeBytes));
  res.setHeader('Cache-Control', 'private, max-age=31536000, immutable');
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader(name, value);
  }
  await pipeStreams(opened.stream, res);
}

export function createTtsRouter(deps: TtsRouterDeps): Router {
  const router = Router();
  const artifactUrl = (artifactId: string): string => `${deps.publicBaseUrl ?? ''}/v1/tts/artifacts/${artifactId}`;

  const renderResult = (result: SynthesisResult) => ({
    artifact_id: result.artifact.artifactId,
    url: artifactUrl(result.artifact.artifactId),
    format: result.artifact.format,
    sample_rate: result.artifact.sampleRate,
    size_bytes: result.artifact.sizeBytes,
    duration_estimate: Math.round(result.artifact.durationEstimateSec * 1000) / 1000,
    voice_id: result.voice.id,
    created_at: result.artifact.createdAt.toISOString(),
  });

  router.post(
    '/synthesize',
    capacityGuard(deps.maxConcurrentSyntheses),
    asyncHandler(async (req, res) => {
      const body = validateBody(synthesizeBodySchema, req.body);

      // a client that hangs up cancels the engine call
      const controller = new AbortController();
      const onClose = (): void => {
        if (!res.writableEnded) controller.abort();
      };
      res.on('close', onClose);

      let result: SynthesisResult;
      try {
        result = await deps.pipeline.run(
          { text: body.text, voiceId: body.voice_id, language: body.language, format: body.format },
          { signal: controller.signal, requestId: getRequestId(res) },
        );
      } finally {
        res.off('close', onClose);
      }

      if (!wantsAudio(req)) {
        res.status(200).json(renderResult(result));
        return;
      }

      const opened = await deps.store.open(result.artifact.artifactId);
      await streamArtifact(res, opened, {
        'X-Artifact-Id': result.artifact.artifactId,
        'X-Processing-Time': (result.processingMs / 1000).toFixed(3),
        'X-Text-Length': String(result.textLength),
        'X-Voice-ID': result.voice.id,
      });
    }),
  );

  router.get(
    '/artifacts/:artifactId',
    asyncHandler(async (req, res) => {
      let opened: OpenedArtifact;
      try {
        opened = await deps.store.open(req.params.artifactId);
      } catch (err) {
        if (err instanceof StorageError && err.code === 'NotFound') {
          throw createApiError(err.message, 404, 'NotFound');
        }
        throw err;
      }
      await streamArtifact(res, opened, { 'X-Artifact-Id': opened.artifactId });
    }),
  );

  return router;
}
