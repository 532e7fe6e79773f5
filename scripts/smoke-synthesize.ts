#!/usr/bin/env npx tsx
/**
 * Fires concurrent synthesis requests at a running gateway and checks that
 * every request produced its own artifact.
 *
 * Usage:
 *   npx tsx scripts/smoke-synthesize.ts [options]
 *
 * Options:
 *   --url <url>           Gateway base URL (default: http://localhost:8000)
 *   --concurrency <n>     Simultaneous requests (default: 10)
 *   --voice <id>          Voice id (default: the gateway's default voice)
 *   --format <wav|mp3>    Output format (default: wav)
 *   --text <text>         Text to speak (default: "Olá! Teste.")
 */

interface SmokeOptions {
  url: string;
  concurrency: number;
  voice?: string;
  format: string;
  text: string;
}

interface Outcome {
  ok: boolean;
  status: number;
  latencyMs: number;
  artifactId?: string;
  error?: string;
}

function parseArgs(): SmokeOptions {
  const args = process.argv.slice(2);
  const options: SmokeOptions = {
    url: 'http://localhost:8000',
    concurrency: 10,
    format: 'wav',
    text: 'Olá! Teste.',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1] ?? '';

    switch (arg) {
      case '--url':
        options.url = nextArg.replace(/\/+$/, '');
        i++;
        break;
      case '--concurrency':
        options.concurrency = parseInt(nextArg, 10);
        i++;
        break;
      case '--voice':
        options.voice = nextArg;
        i++;
        break;
      case '--format':
        options.format = nextArg;
        i++;
        break;
      case '--text':
        options.text = nextArg;
        i++;
        break;
      default:
        console.error(`unknown option: ${arg}`);
        process.exit(2);
    }
  }

  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    console.error('--concurrency must be a positive integer');
    process.exit(2);
  }
  return options;
}

async function synthesizeOnce(options: SmokeOptions): Promise<Outcome> {
  const start = Date.now();
  try {
    const res = await fetch(`${options.url}/v1/tts/synthesize`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify({ text: options.text, voice_id: options.voice, format: options.format }),
    });
    const body: unknown = await res.json();
    const latencyMs = Date.now() - start;
    if (!res.ok) {
      return { ok: false, status: res.status, latencyMs, error: JSON.stringify(body) };
    }
    const artifactId =
      typeof body === 'object' && body !== null && 'artifact_id' in body && typeof body.artifact_id === 'string'
        ? body.artifact_id
        : undefined;
    return { ok: artifactId !== undefined, status: res.status, latencyMs, artifactId };
  } catch (error) {
    return {
      ok: false,
      status: 0,
      latencyMs: Date.now() - start,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

async function main(): Promise<void> {
  const options = parseArgs();
  console.log(`Sending ${options.concurrency} concurrent requests to ${options.url}`);

  const outcomes = await Promise.all(Array.from({ length: options.concurrency }, () => synthesizeOnce(options)));

  const ids = outcomes.flatMap((o) => (o.artifactId ? [o.artifactId] : []));
  const distinct = new Set(ids).size;
  const latencies = outcomes.map((o) => o.latencyMs).sort((a, b) => a - b);
  const failed = outcomes.filter((o) => !o.ok);

  console.log(`  succeeded:  ${ids.length}/${outcomes.length}`);
  console.log(`  distinct:   ${distinct}`);
  console.log(`  latency ms: min ${latencies[0]} / max ${latencies[latencies.length - 1]}`);
  for (const f of failed) {
    console.log(`  failed (${f.status}): ${f.error ?? 'no artifact id'}`);
  }

  if (failed.length > 0 || distinct !== ids.length) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
