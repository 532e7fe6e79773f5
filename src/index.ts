import dotenv from 'dotenv';

dotenv.config();

import { loadConfig } from './config';
import { log } from './log';
import { buildServer } from './server';
import { ArtifactStore } from './storage/artifactStore';
import { CloudEngineAdapter } from './tts/cloudEngine';
import { LocalEngineAdapter } from './tts/localEngine';
import { VoiceRegistry } from './voices/voiceRegistry';

// Graceful shutdown configuration
const SHUTDOWN_TIMEOUT_MS = 30_000; // Max time to wait for syntheses to drain
const SHUTDOWN_CHECK_INTERVAL_MS = 500;

async function main(): Promise<void> {
  const config = loadConfig();
  log.level = config.logLevel;
  const registry = VoiceRegistry.fromFile(config.voicesFile);
  const store = new ArtifactStore({ outputDir: config.outputDir });
  await store.init();

  const engines = {
    cloud: new CloudEngineAdapter(config.cloud),
    local: new LocalEngineAdapter(config.local),
  };
  if (!config.cloud.url) {
    log.warn('CLOUD_TTS_URL is not set; cloud voices will fail with EngineUnavailable');
  }

  const { server, pipeline } = buildServer({ config, registry, engines, store });

  let isShuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
      log.warn({ signal }, 'shutdown already in progress');
      return;
    }
    isShuttingDown = true;
    log.info({ signal }, 'graceful shutdown initiated');

    // Stop accepting new connections
    server.close(() => {
      log.info('http server closed');
    });

    const startMs = Date.now();
    const remaining = await pipeline.waitForIdle(SHUTDOWN_TIMEOUT_MS, SHUTDOWN_CHECK_INTERVAL_MS);
    if (remaining > 0) {
      log.warn({ active_syntheses: remaining, elapsed_ms: Date.now() - startMs }, 'shutdown timeout reached, forcing exit');
    } else {
      log.info({ elapsed_ms: Date.now() - startMs }, 'all syntheses drained');
    }

    log.info('shutdown complete');
    process.exit(0);
  }

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  server.listen(config.port, config.host, () => {
    log.info(
      { port: config.port, host: config.host, voices: registry.size, output_dir: config.outputDir },
      'server listening',
    );
  });
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  log.fatal({ err: error }, 'uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.error({ reason }, 'unhandled rejection');
});

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'startup failed');
  process.exit(1);
});
