import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

import { VoiceNotFoundError } from '../src/errors';
import { VoiceRegistry, languageMatches } from '../src/voices/voiceRegistry';
import { makeTempDir, removeDir, seedRegistry } from './helpers';

const profile = (id: string, language: string, backend: 'cloud' | 'local') => ({
  id,
  displayName: id,
  language,
  backend,
  nativeVoiceKey: `${id}-key`,
});

describe('VoiceRegistry', () => {
  test('loads the seed file in registration order', () => {
    const registry = seedRegistry();
    assert.equal(registry.size, 6);
    assert.deepEqual(
      registry.list().map((v) => v.id),
      ['pt-cloud-female', 'pt-cloud-male', 'pt-local-default', 'en-cloud-female', 'en-local-default', 'es-local-default'],
    );
  });

  test('resolve is idempotent and returns frozen profiles', () => {
    const registry = seedRegistry();
    const first = registry.resolve('pt-cloud-female');
    const second = registry.resolve('pt-cloud-female');
    assert.deepEqual(first, second);
    assert.equal(first.backend, 'cloud');
    assert.equal(first.nativeVoiceKey, 'pt-BR-female-1');
    assert.equal(Object.isFrozen(first), true);
  });

  test('resolve fails with VoiceNotFoundError for unknown ids', () => {
    const registry = seedRegistry();
    assert.throws(
      () => registry.resolve('does-not-exist'),
      (err: unknown) => err instanceof VoiceNotFoundError && err.voiceId === 'does-not-exist',
    );
  });

  test('filters by language prefix and backend', () => {
    const registry = seedRegistry();
    assert.deepEqual(
      registry.list({ language: 'pt' }).map((v) => v.id),
      ['pt-cloud-female', 'pt-cloud-male', 'pt-local-default'],
    );
    assert.deepEqual(
      registry.list({ language: 'PT-BR', backend: 'local' }).map((v) => v.id),
      ['pt-local-default'],
    );
    assert.deepEqual(
      registry.list({ backend: 'cloud' }).map((v) => v.id),
      ['pt-cloud-female', 'pt-cloud-male', 'en-cloud-female'],
    );
    assert.deepEqual(registry.list({ language: 'fr' }), []);
  });

  test('picks the first registered voice as a language default', () => {
    const registry = seedRegistry();
    assert.equal(registry.defaultFor('pt')?.id, 'pt-cloud-female');
    assert.equal(registry.defaultFor('es')?.id, 'es-local-default');
    assert.equal(registry.defaultFor('fr'), undefined);
  });

  test('lists distinct languages in registration order', () => {
    assert.deepEqual(seedRegistry().languages(), ['pt-br', 'en-us', 'es']);
  });

  test('lowercases language tags', () => {
    const registry = VoiceRegistry.fromProfiles([profile('a', 'pt-BR', 'local')]);
    assert.equal(registry.resolve('a').language, 'pt-br');
  });

  test('rejects duplicate ids', () => {
    assert.throws(
      () => VoiceRegistry.fromProfiles([profile('dup', 'en', 'cloud'), profile('dup', 'es', 'local')]),
      /duplicate voice id: dup/,
    );
  });

  test('rejects invalid profiles', () => {
    assert.throws(() => VoiceRegistry.fromProfiles([profile('x', 'en', 'cloud'), { id: 'y' }]), /Invalid voice profiles: voices\.1\./);
    assert.throws(() => VoiceRegistry.fromProfiles([{ ...profile('z', 'en', 'cloud'), backend: 'gpu' }]), /backend/);
    assert.throws(() => VoiceRegistry.fromProfiles([]), /at least one voice is required/);
  });

  test('reports unreadable and malformed seed files', async () => {
    const dir = await makeTempDir();
    try {
      const broken = path.join(dir, 'voices.json');
      await fs.writeFile(broken, '{ not json');
      assert.throws(() => VoiceRegistry.fromFile(broken), /voice seed file is not valid JSON/);
      assert.throws(() => VoiceRegistry.fromFile(path.join(dir, 'missing.json')), /voice seed file unreadable/);
    } finally {
      await removeDir(dir);
    }
  });
});

describe('languageMatches', () => {
  test('matches exact tags and primary-language prefixes only', () => {
    assert.equal(languageMatches('pt-br', 'pt'), true);
    assert.equal(languageMatches('pt-br', 'pt-br'), true);
    assert.equal(languageMatches('pt', 'pt-br'), false);
    assert.equal(languageMatches('ptx', 'pt'), false);
  });
});
