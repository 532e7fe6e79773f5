export interface WavInfo {
  audioFormat: number;
  channels: number;
  sampleRateHz: number;
  byteRate: number;
  bitsPerSample: number;
  dataOffset: number;
  dataBytes: number;
  durationSec: number;
}

/**
 * Parse a RIFF/WAVE header.
 *
 * Engines that stream WAV to a pipe (espeak-ng --stdout) cannot seek back to
 * patch the sizes and write 0xFFFFFFFF placeholders, so the data size is
 * clamped to what is actually in the buffer.
 */
export function parseWavInfo(buf: Buffer): WavInfo {
  if (buf.length < 44) {
    throw new Error(`wav too short: ${buf.length} bytes`);
  }
  if (buf.toString('ascii', 0, 4) !== 'RIFF' || buf.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('not a RIFF/WAVE buffer');
  }

  let offset = 12;
  let fmt: Omit<WavInfo, 'dataOffset' | 'dataBytes' | 'durationSec'> | undefined;

  while (offset + 8 <= buf.length) {
    const chunkId = buf.toString('ascii', offset, offset + 4);
    const chunkSize = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ') {
      if (body + 16 > buf.length) throw new Error('truncated fmt chunk');
      fmt = {
        audioFormat: buf.readUInt16LE(body),
        channels: buf.readUInt16LE(body + 2),
        sampleRateHz: buf.readUInt32LE(body + 4),
        byteRate: buf.readUInt32LE(body + 8),
        bitsPerSample: buf.readUInt16LE(body + 14),
      };
    } else if (chunkId === 'data') {
      if (!fmt) throw new Error('data chunk before fmt chunk');
      if (fmt.sampleRateHz === 0 || fmt.byteRate === 0) throw new Error('wav fmt chunk has zero rate');
      const dataBytes = Math.min(chunkSize, buf.length - body);
      return {
        ...fmt,
        dataOffset: body,
        dataBytes,
        durationSec: dataBytes / fmt.byteRate,
      };
    }

    // chunks are word-aligned
    offset = body + chunkSize + (chunkSize % 2);
  }

  throw new Error('wav has no data chunk');
}
