/**
 * Voice registry.
 *
 * Profiles are read once at startup from a JSON seed file and frozen, so
 * concurrent requests read them without coordination. Registration order is
 * preserved for listings and default-voice selection.
 */
import fs from 'fs';
import { z } from 'zod';
import { VoiceNotFoundError } from '../errors';
import { log } from '../log';

export const VOICE_BACKENDS = ['cloud', 'local'] as const;
export type VoiceBackend = (typeof VOICE_BACKENDS)[number];

export const voiceProfileSchema = z.object({
  id: z
    .string()
    .min(1)
    .max(100)
    .regex(/^[a-zA-Z0-9_-]+$/, 'voice id must be alphanumeric with dashes/underscores'),
  displayName: z.string().min(1).max(200),
  language: z
    .string()
    .regex(/^[a-zA-Z]{2,3}(-[a-zA-Z0-9]{2,8})*$/, 'language must be a BCP-47 style tag')
    .transform((value) => value.toLowerCase()),
  backend: z.enum(VOICE_BACKENDS),
  nativeVoiceKey: z.string().min(1).max(200),
  gender: z.enum(['female', 'male', 'neutral']).optional(),
  style: z.string().max(100).optional(),
});

export const voiceSeedSchema = z.object({
  voices: z.array(voiceProfileSchema).min(1, 'at least one voice is required'),
});

export type VoiceProfile = Readonly<z.infer<typeof voiceProfileSchema>>;

export interface VoiceFilter {
  language?: string;
  backend?: VoiceBackend;
}

/** `pt` matches `pt` and `pt-br`; `pt-br` matches only `pt-br`. */
export function languageMatches(profileLanguage: string, wanted: string): boolean {
  const want = wanted.toLowerCase();
  return profileLanguage === want || profileLanguage.startsWith(`${want}-`);
}

export class VoiceRegistry {
  private readonly byId: ReadonlyMap<string, VoiceProfile>;
  private readonly ordered: readonly VoiceProfile[];

  private constructor(profiles: VoiceProfile[]) {
    const byId = new Map<string, VoiceProfile>();
    for (const profile of profiles) {
      if (byId.has(profile.id)) {
        throw new Error(`duplicate voice id: ${profile.id}`);
      }
      byId.set(profile.id, Object.freeze({ ...profile }));
    }
    this.byId = byId;
    this.ordered = Object.freeze(Array.from(byId.values()));
  }

  static fromProfiles(input: unknown[]): VoiceRegistry {
    const parsed = voiceSeedSchema.safeParse({ voices: input });
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      throw new Error(`Invalid voice profiles: ${issues}`);
    }
    return new VoiceRegistry(parsed.data.voices);
  }

  static fromFile(filePath: string): VoiceRegistry {
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new Error(`voice seed file unreadable: ${filePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(`voice seed file is not valid JSON: ${filePath}`, { cause: error });
    }

    const seed = voiceSeedSchema.safeParse(parsed);
    if (!seed.success) {
      const issues = seed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      throw new Error(`Invalid voice profiles in ${filePath}: ${issues}`);
    }

    const registry = new VoiceRegistry(seed.data.voices);
    log.info({ event: 'voices_loaded', file: filePath, count: registry.size }, 'voice registry loaded');
    return registry;
  }

  get size(): number {
    return this.ordered.length;
  }

  resolve(voiceId: string): VoiceProfile {
    const profile = this.byId.get(voiceId);
    if (!profile) {
      throw new VoiceNotFoundError(voiceId);
    }
    return profile;
  }

  list(filter: VoiceFilter = {}): VoiceProfile[] {
    return this.ordered.filter(
      (profile) =>
        (filter.language === undefined || languageMatches(profile.language, filter.language)) &&
        (filter.backend === undefined || profile.backend === filter.backend),
    );
  }

  /** First registered voice for a language, used when a request names none. */
  defaultFor(language: string): VoiceProfile | undefined {
    return this.ordered.find((profile) => languageMatches(profile.language, language));
  }

  languages(): string[] {
    return Array.from(new Set(this.ordered.map((profile) => profile.language)));
  }
}
