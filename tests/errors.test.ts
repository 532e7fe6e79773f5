import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

import {
  EngineError,
  PipelineError,
  StorageError,
  errnoCode,
  errorKindOf,
  httpStatusFor,
} from '../src/errors';

describe('httpStatusFor', () => {
  test('maps caller mistakes to 400', () => {
    assert.equal(httpStatusFor(new PipelineError('ValidationError', 'validation', 'bad')), 400);
    assert.equal(httpStatusFor(new PipelineError('VoiceNotFound', 'voice_resolution', 'missing')), 400);
  });

  test('maps each engine failure code', () => {
    const wrap = (code: EngineError['code']) =>
      new PipelineError('SynthesisFailed', 'synthesis', 'failed', { cause: new EngineError(code, 'cloud_tts', 'x') });

    assert.equal(httpStatusFor(wrap('EngineRejected')), 422);
    assert.equal(httpStatusFor(wrap('EngineUnavailable')), 502);
    assert.equal(httpStatusFor(wrap('EngineTimeout')), 504);
  });

  test('maps storage failures to 500 and cancellation to 499', () => {
    const storage = new PipelineError('PersistenceFailed', 'persistence', 'disk', {
      cause: new StorageError('DiskFull', 'full'),
    });
    assert.equal(httpStatusFor(storage), 500);
    assert.equal(httpStatusFor(new PipelineError('RequestCancelled', 'synthesis', 'gone')), 499);
  });

  test('falls back to 502 for a synthesis failure without an engine cause', () => {
    assert.equal(httpStatusFor(new PipelineError('SynthesisFailed', 'synthesis', 'odd')), 502);
  });
});

describe('errorKindOf', () => {
  test('reports the engine code for synthesis failures', () => {
    const err = new PipelineError('SynthesisFailed', 'synthesis', 'timeout', {
      cause: new EngineError('EngineTimeout', 'local_tts', 'slow'),
    });
    assert.equal(errorKindOf(err), 'EngineTimeout');
    assert.equal(err.engineError?.engine, 'local_tts');
  });

  test('reports the pipeline kind otherwise', () => {
    const err = new PipelineError('PersistenceFailed', 'persistence', 'disk', {
      cause: new StorageError('WriteError', 'nope'),
    });
    assert.equal(errorKindOf(err), 'PersistenceFailed');
    assert.equal(err.storageError?.code, 'WriteError');
    assert.equal(err.engineError, undefined);
  });
});

describe('errnoCode', () => {
  test('reads the code of a system error', () => {
    assert.equal(errnoCode(Object.assign(new Error('no space'), { code: 'ENOSPC' })), 'ENOSPC');
  });

  test('ignores values without a string code', () => {
    assert.equal(errnoCode(new Error('plain')), undefined);
    assert.equal(errnoCode({ code: 'ENOENT' }), undefined);
    assert.equal(errnoCode(Object.assign(new Error('numeric'), { code: 7 })), undefined);
  });
});
