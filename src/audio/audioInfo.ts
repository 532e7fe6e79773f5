import type { AudioFormat } from '../config';
import { parseMp3Info } from './mp3Info';
import { parseWavInfo } from './wavInfo';

export interface AudioInfo {
  format: AudioFormat;
  sampleRate: number;
  durationSec: number;
}

export const CONTENT_TYPES: Record<AudioFormat, string> = {
  wav: 'audio/wav',
  mp3: 'audio/mpeg',
};

/** Read sample rate and duration from the container header; throws on unreadable audio. */
export function readAudioInfo(bytes: Buffer, format: AudioFormat): AudioInfo {
  if (bytes.length === 0) {
    throw new Error('audio is empty');
  }
  if (format === 'wav') {
    const wav = parseWavInfo(bytes);
    return { format, sampleRate: wav.sampleRateHz, durationSec: wav.durationSec };
  }
  const mp3 = parseMp3Info(bytes);
  return { format, sampleRate: mp3.sampleRateHz, durationSec: mp3.durationSec };
}
