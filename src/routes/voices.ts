import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler, validateQuery } from '../middleware';
import { VOICE_BACKENDS, type VoiceProfile, type VoiceRegistry } from '../voices/voiceRegistry';

const listQuerySchema = z.object({
  language: z.string().trim().min(2).max(35).optional(),
  backend: z.enum(VOICE_BACKENDS).optional(),
});

export function renderVoice(voice: VoiceProfile) {
  return {
    id: voice.id,
    display_name: voice.displayName,
    language: voice.language,
    backend: voice.backend,
    native_voice_key: voice.nativeVoiceKey,
    ...(voice.gender ? { gender: voice.gender } : {}),
    ...(voice.style ? { style: voice.style } : {}),
  };
}

export function createVoicesRouter(registry: VoiceRegistry): Router {
  const router = Router();

  router.get(
    '/available',
    asyncHandler(async (req, res) => {
      const filter = validateQuery(listQuerySchema, req.query);
      const voices = registry.list(filter).map(renderVoice);
      res.json({
        voices,
        total: voices.length,
        supported_languages: registry.languages(),
      });
    }),
  );

  return router;
}
