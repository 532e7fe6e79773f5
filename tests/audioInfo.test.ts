import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

import { readAudioInfo } from '../src/audio/audioInfo';
import { parseMp3Info } from '../src/audio/mp3Info';
import { parseWavInfo } from '../src/audio/wavInfo';
import { buildMp3, buildWav } from './helpers';

describe('parseWavInfo', () => {
  test('reads the fmt and data chunks', () => {
    const info = parseWavInfo(buildWav({ sampleRate: 16000, samples: 8000 }));
    assert.equal(info.audioFormat, 1);
    assert.equal(info.channels, 1);
    assert.equal(info.sampleRateHz, 16000);
    assert.equal(info.bitsPerSample, 16);
    assert.equal(info.dataOffset, 44);
    assert.equal(info.dataBytes, 16000);
    assert.equal(info.durationSec, 0.5);
  });

  test('clamps a streaming placeholder size to the bytes present', () => {
    const wav = buildWav({ sampleRate: 22050, samples: 2205 });
    wav.writeUInt32LE(0xffffffff, 40);
    const info = parseWavInfo(wav);
    assert.equal(info.dataBytes, 4410);
    assert.equal(info.durationSec, 0.1);
  });

  test('skips chunks it does not know', () => {
    const base = buildWav({ sampleRate: 8000, samples: 800 });
    const list = Buffer.alloc(8 + 6);
    list.write('LIST', 0, 'ascii');
    list.writeUInt32LE(6, 4);
    const wav = Buffer.concat([base.subarray(0, 36), list, base.subarray(36)]);
    const info = parseWavInfo(wav);
    assert.equal(info.dataOffset, 58);
    assert.equal(info.durationSec, 0.1);
  });

  test('rejects buffers that are not WAVE', () => {
    assert.throws(() => parseWavInfo(Buffer.alloc(10)), /wav too short: 10 bytes/);
    assert.throws(() => parseWavInfo(Buffer.alloc(64)), /not a RIFF\/WAVE buffer/);
  });
});

describe('parseMp3Info', () => {
  test('reads the first frame header', () => {
    const info = parseMp3Info(buildMp3(16000));
    assert.equal(info.version, '1');
    assert.equal(info.sampleRateHz, 44100);
    assert.equal(info.bitrateKbps, 128);
    assert.equal(info.channels, 1);
    assert.equal(info.firstFrameOffset, 0);
    assert.equal(info.durationSec, 1);
  });

  test('skips an ID3v2 tag', () => {
    const tag = Buffer.alloc(10 + 20);
    tag.write('ID3', 0, 'latin1');
    tag[3] = 4;
    tag[9] = 20;
    const info = parseMp3Info(Buffer.concat([tag, buildMp3(16000)]));
    assert.equal(info.firstFrameOffset, 30);
    assert.equal(info.durationSec, 1);
  });

  test('fails when there is no frame', () => {
    assert.throws(() => parseMp3Info(Buffer.from('not audio at all')), /no mpeg layer III frame found/);
  });
});

describe('readAudioInfo', () => {
  test('reports sample rate and duration per format', () => {
    assert.deepEqual(readAudioInfo(buildWav({ sampleRate: 24000, samples: 12000 }), 'wav'), {
      format: 'wav',
      sampleRate: 24000,
      durationSec: 0.5,
    });
    assert.deepEqual(readAudioInfo(buildMp3(8000), 'mp3'), { format: 'mp3', sampleRate: 44100, durationSec: 0.5 });
  });

  test('rejects empty audio', () => {
    assert.throws(() => readAudioInfo(Buffer.alloc(0), 'wav'), /audio is empty/);
  });

  test('rejects audio that does not match the requested format', () => {
    assert.throws(() => readAudioInfo(buildMp3(), 'wav'), /not a RIFF\/WAVE buffer/);
  });
});
