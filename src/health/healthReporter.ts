import { withDeadline } from '../deadline';
import { describeError } from '../errors';
import { log } from '../log';
import type { ArtifactStore } from '../storage/artifactStore';
import type { EngineAdapters } from '../tts/types';

export type ComponentState = 'up' | 'down';
export type OverallState = 'healthy' | 'degraded' | 'down';

export interface ComponentCheck {
  status: ComponentState;
  latency_ms: number;
  error?: string;
}

export interface HealthStatus {
  overall: OverallState;
  version: string;
  checks: {
    engine_cloud: ComponentCheck;
    engine_local: ComponentCheck;
    storage: ComponentCheck;
  };
  uptime_seconds: number;
  timestamp: string;
}

export interface HealthReporterDeps {
  engines: EngineAdapters;
  store: ArtifactStore;
  probeTimeoutMs: number;
  version: string;
}

const startTime = Date.now();

/**
 * Probes each engine and the artifact directory in parallel. A probe that
 * does not answer within its budget is reported down, so `report()` is
 * bounded by the probe timeout.
 */
export class HealthReporter {
  constructor(private readonly deps: HealthReporterDeps) {}

  async report(): Promise<HealthStatus> {
    const { engines, store } = this.deps;
    const [cloud, local, storage] = await Promise.all([
      this.check('engine_cloud', (signal) => engines.cloud.probe(signal)),
      this.check('engine_local', (signal) => engines.local.probe(signal)),
      this.check('storage', () => store.checkWritable()),
    ]);

    const checks = { engine_cloud: cloud, engine_local: local, storage };
    const overall = overallStatus(checks);

    if (overall !== 'healthy') {
      log.warn({ event: 'health_check_degraded', overall, checks }, 'health check not fully ok');
    }

    return {
      overall,
      version: this.deps.version,
      checks,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
    };
  }

  private async check(label: string, probe: (signal: AbortSignal) => Promise<void>): Promise<ComponentCheck> {
    const start = Date.now();
    try {
      await withDeadline(probe, { label, timeoutMs: this.deps.probeTimeoutMs });
      return { status: 'up', latency_ms: Date.now() - start };
    } catch (error) {
      return { status: 'down', latency_ms: Date.now() - start, error: describeError(error) };
    }
  }
}

export function overallStatus(checks: HealthStatus['checks']): OverallState {
  const enginesUp = [checks.engine_cloud, checks.engine_local].filter((c) => c.status === 'up').length;
  if (checks.storage.status === 'down' || enginesUp === 0) return 'down';
  return enginesUp === 2 ? 'healthy' : 'degraded';
}
