export interface Mp3Info {
  version: '1' | '2' | '2.5';
  sampleRateHz: number;
  bitrateKbps: number;
  channels: number;
  /** Offset of the first frame, after any ID3v2 tag. */
  firstFrameOffset: number;
  /** CBR estimate; VBR files will be off, which is fine for a hint. */
  durationSec: number;
}

const BITRATES_V1_L3 = [0, 32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320];
const BITRATES_V2_L3 = [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160];

const SAMPLE_RATES: Record<Mp3Info['version'], number[]> = {
  '1': [44100, 48000, 32000],
  '2': [22050, 24000, 16000],
  '2.5': [11025, 12000, 8000],
};

function id3v2Length(buf: Buffer): number {
  if (buf.length < 10 || buf.toString('latin1', 0, 3) !== 'ID3') return 0;
  // syncsafe integer: 7 bits per byte
  const size = ((buf[6] & 0x7f) << 21) | ((buf[7] & 0x7f) << 14) | ((buf[8] & 0x7f) << 7) | (buf[9] & 0x7f);
  const hasFooter = (buf[5] & 0x10) !== 0;
  return 10 + size + (hasFooter ? 10 : 0);
}

/** Read the first MPEG layer III frame header. */
export function parseMp3Info(buf: Buffer): Mp3Info {
  let offset = id3v2Length(buf);

  while (offset + 4 <= buf.length) {
    if (buf[offset] === 0xff && (buf[offset + 1] & 0xe0) === 0xe0) {
      const header = buf.readUInt32BE(offset);
      const versionBits = (header >>> 19) & 0x3;
      const layerBits = (header >>> 17) & 0x3;
      const bitrateIndex = (header >>> 12) & 0xf;
      const sampleRateIndex = (header >>> 10) & 0x3;
      const channelMode = (header >>> 6) & 0x3;

      const version = versionBits === 0x3 ? '1' : versionBits === 0x2 ? '2' : versionBits === 0x0 ? '2.5' : undefined;
      const isLayer3 = layerBits === 0x1;

      if (version && isLayer3 && bitrateIndex !== 0 && bitrateIndex !== 0xf && sampleRateIndex !== 0x3) {
        const bitrateKbps = (version === '1' ? BITRATES_V1_L3 : BITRATES_V2_L3)[bitrateIndex];
        const audioBytes = buf.length - offset;
        return {
          version,
          sampleRateHz: SAMPLE_RATES[version][sampleRateIndex],
          bitrateKbps,
          channels: channelMode === 0x3 ? 1 : 2,
          firstFrameOffset: offset,
          durationSec: (audioBytes * 8) / (bitrateKbps * 1000),
        };
      }
    }
    offset++;
  }

  throw new Error('no mpeg layer III frame found');
}
