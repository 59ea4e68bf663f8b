/**
 * PCM WAV encoder (16-bit, mono, little-endian).
 * Layout: [RIFF header 12B][fmt chunk 24B][data chunk 8B + samples]
 */

const HEADER_SIZE = 44;
const BITS_PER_SAMPLE = 16;
const CHANNELS = 1;

export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const bytesPerSample = BITS_PER_SAMPLE / 8;
  const dataLength = samples.length * bytesPerSample * CHANNELS;
  const buf = Buffer.alloc(HEADER_SIZE + dataLength);

  buf.write('RIFF', 0, 'ascii');
  buf.writeUInt32LE(36 + dataLength, 4);     // everything after this field
  buf.write('WAVE', 8, 'ascii');

  buf.write('fmt ', 12, 'ascii');
  buf.writeUInt32LE(16, 16);                 // fmt chunk size
  buf.writeUInt16LE(1, 20);                  // PCM
  buf.writeUInt16LE(CHANNELS, 22);
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * CHANNELS * bytesPerSample, 28);
  buf.writeUInt16LE(CHANNELS * bytesPerSample, 32);
  buf.writeUInt16LE(BITS_PER_SAMPLE, 34);

  buf.write('data', 36, 'ascii');
  buf.writeUInt32LE(dataLength, 40);

  let offset = HEADER_SIZE;
  for (const sample of samples) {
    const clamped = Math.max(-1, Math.min(1, sample));
    buf.writeInt16LE(Math.round(clamped * 32767), offset);
    offset += bytesPerSample;
  }
  return buf;
}
