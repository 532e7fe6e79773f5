import express from 'express';
import http from 'http';
import { SERVICE_NAME, SERVICE_VERSION, type AppConfig } from './config';
import { HealthReporter } from './health/healthReporter';
import { corsAllowlist, globalErrorHandler, ipRateLimit, notFoundHandler, requestIdMiddleware, requestLogger } from './middleware';
import { SynthesisPipeline } from './pipeline/synthesisPipeline';
import { createHealthRouter } from './routes/health';
import { createMetricsRouter } from './routes/metrics';
import { createTtsRouter } from './routes/tts';
import { createVoicesRouter } from './routes/voices';
import type { ArtifactStore } from './storage/artifactStore';
import type { EngineAdapters } from './tts/types';
import type { VoiceRegistry } from './voices/voiceRegistry';

export interface ServerDeps {
  config: AppConfig;
  registry: VoiceRegistry;
  engines: EngineAdapters;
  store: ArtifactStore;
}

export function buildServer(deps: ServerDeps): {
  app: express.Express;
  server: http.Server;
  pipeline: SynthesisPipeline;
  health: HealthReporter;
} {
  const { config, registry, engines, store } = deps;

  const pipeline = new SynthesisPipeline({ config, registry, engines, store });
  const health = new HealthReporter({
    engines,
    store,
    probeTimeoutMs: config.healthProbeTimeoutMs,
    version: SERVICE_VERSION,
  });

  const app = express();
  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(requestLogger);
  app.use(express.json({ limit: config.requestBodyLimit }));

  app.get('/', (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      description: 'Text-to-speech over cloud and local engines',
    });
  });

  app.use('/health', createHealthRouter(health));
  app.use('/metrics', createMetricsRouter());

  app.use('/v1', corsAllowlist(config.allowedOrigins));
  if (config.apiRateLimit > 0) {
    app.use('/v1', ipRateLimit({ windowMs: 60_000, max: config.apiRateLimit }));
  }
  app.use('/v1/voices', createVoicesRouter(registry));
  app.use(
    '/v1/tts',
    createTtsRouter({
      pipeline,
      store,
      maxConcurrentSyntheses: config.maxConcurrentSyntheses,
      publicBaseUrl: config.publicBaseUrl,
    }),
  );

  app.use(notFoundHandler);
  app.use(globalErrorHandler({ isProduction: config.nodeEnv === 'production' }));

  const server = http.createServer(app);
  return { app, server, pipeline, health };
}
