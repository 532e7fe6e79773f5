import pino from 'pino';

/**
 * Level used until the validated config is applied in `main()`. An unknown
 * value falls back to info so the config error can still be logged.
 */
export function startupLogLevel(raw: string | undefined): string {
  if (raw === undefined) return 'info';
  const level = raw.trim().toLowerCase();
  return level === 'silent' || level in pino.levels.values ? level : 'info';
}

export const log = pino({
  level: startupLogLevel(process.env.LOG_LEVEL),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'tts-gateway',
    environment: process.env.NODE_ENV ?? 'development',
  },
});
