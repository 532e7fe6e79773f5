/**
 * Prometheus-compatible metrics.
 *
 * Counters and gauges live in process memory and are rendered in the text
 * exposition format on scrape.
 */

// ── In-memory samples (single-threaded, no locking) ─────

interface Sample {
  value: number;
  labels: Record<string, string>;
}

const gauges: Map<string, Sample[]> = new Map();
const counters: Map<string, Sample[]> = new Map();

const HELP: Record<string, string> = {
  tts_synthesis_requests_total: 'Synthesis requests by outcome',
  tts_engine_invocations_total: 'Engine calls by backend',
  tts_synthesis_duration_ms_sum: 'Total engine time in milliseconds by backend',
  tts_synthesis_duration_ms_count: 'Timed engine calls by backend',
  tts_artifact_bytes_total: 'Bytes written to the artifact store',
  tts_inflight_syntheses: 'Synthesis requests currently in flight',
};

function sameLabels(a: Record<string, string>, b: Record<string, string>): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((k) => a[k] === b[k]);
}

function findOrCreate(map: Map<string, Sample[]>, name: string, labels: Record<string, string>): Sample {
  let arr = map.get(name);
  if (!arr) {
    arr = [];
    map.set(name, arr);
  }
  const existing = arr.find((item) => sameLabels(item.labels, labels));
  if (existing) return existing;
  const entry: Sample = { value: 0, labels: { ...labels } };
  arr.push(entry);
  return entry;
}

// ── Public API ───────────────────────────────────────

export function setGauge(name: string, value: number, labels: Record<string, string> = {}): void {
  findOrCreate(gauges, name, labels).value = value;
}

export function incrementCounter(name: string, amount: number = 1, labels: Record<string, string> = {}): void {
  findOrCreate(counters, name, labels).value += amount;
}

export function readMetric(name: string, labels: Record<string, string> = {}): number | undefined {
  const arr = counters.get(name) ?? gauges.get(name);
  return arr?.find((item) => sameLabels(item.labels, labels))?.value;
}

export function resetMetrics(): void {
  gauges.clear();
  counters.clear();
}

export function recordSynthesisOutcome(outcome: string): void {
  incrementCounter('tts_synthesis_requests_total', 1, { outcome });
}

export function recordEngineCall(backend: string, durationMs: number): void {
  incrementCounter('tts_engine_invocations_total', 1, { backend });
  incrementCounter('tts_synthesis_duration_ms_sum', durationMs, { backend });
  incrementCounter('tts_synthesis_duration_ms_count', 1, { backend });
}

// ── Exposition ───────────────────────────────────────

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function renderFamily(lines: string[], name: string, type: 'gauge' | 'counter', entries: Sample[]): void {
  const help = HELP[name];
  if (help) lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} ${type}`);
  for (const entry of entries) {
    const labelStr = Object.entries(entry.labels)
      .map(([k, v]) => `${k}="${escapeLabel(v)}"`)
      .join(',');
    lines.push(`${name}${labelStr ? `{${labelStr}}` : ''} ${entry.value}`);
  }
}

/**
 * Generate Prometheus-format metrics text.
 */
export function generateMetrics(): string {
  const lines: string[] = [];

  const mem = process.memoryUsage();
  lines.push('# HELP tts_process_heap_bytes Heap memory usage');
  lines.push('# TYPE tts_process_heap_bytes gauge');
  lines.push(`tts_process_heap_bytes ${mem.heapUsed}`);
  lines.push('# HELP tts_process_uptime_seconds Process uptime');
  lines.push('# TYPE tts_process_uptime_seconds gauge');
  lines.push(`tts_process_uptime_seconds ${Math.floor(process.uptime())}`);

  for (const [name, entries] of gauges) {
    renderFamily(lines, name, 'gauge', entries);
  }
  for (const [name, entries] of counters) {
    renderFamily(lines, name, 'counter', entries);
  }

  return lines.join('\n') + '\n';
}
